// Pose landmark identifiers, in model index order (33 total)
export const POSE_LANDMARK_TYPES = [
  "nose",
  "leftEyeInner",
  "leftEye",
  "leftEyeOuter",
  "rightEyeInner",
  "rightEye",
  "rightEyeOuter",
  "leftEar",
  "rightEar",
  "leftMouth",
  "rightMouth",

  "leftShoulder",
  "rightShoulder",
  "leftElbow",
  "rightElbow",
  "leftWrist",
  "rightWrist",
  "leftPinky",
  "rightPinky",
  "leftIndex",
  "rightIndex",
  "leftThumb",
  "rightThumb",

  "leftHip",
  "rightHip",
  "leftKnee",
  "rightKnee",
  "leftAnkle",
  "rightAnkle",
  "leftHeel",
  "rightHeel",
  "leftFootIndex",
  "rightFootIndex",
] as const;

export type PoseLandmarkType = (typeof POSE_LANDMARK_TYPES)[number];

export type PoseLandmark = Readonly<{
  type: PoseLandmarkType;
  x: number;
  y: number;
  z: number;
  likelihood: number; // presence confidence (0..1), not used for drawing
}>;

export type PoseLandmarkMap = Readonly<Partial<Record<PoseLandmarkType, PoseLandmark>>>;

const LANDMARK_TYPE_SET: ReadonlySet<string> = new Set(POSE_LANDMARK_TYPES);

export function isPoseLandmarkType(v: unknown): v is PoseLandmarkType {
  return typeof v === "string" && LANDMARK_TYPE_SET.has(v);
}

/**
 * Fixed connectivity graph drawn by the overlay.
 * A segment is only drawn when both ends are present in the pose.
 */
export const POSE_CONNECTIONS: ReadonlyArray<readonly [PoseLandmarkType, PoseLandmarkType]> = [
  // face
  ["nose", "leftEyeInner"],
  ["leftEyeInner", "leftEye"],
  ["leftEye", "leftEyeOuter"],
  ["nose", "rightEyeInner"],
  ["rightEyeInner", "rightEye"],
  ["rightEye", "rightEyeOuter"],
  ["nose", "leftMouth"],
  ["leftMouth", "rightMouth"],
  ["nose", "rightMouth"],

  // shoulders
  ["leftShoulder", "rightShoulder"],

  // torso
  ["leftShoulder", "leftHip"],
  ["rightShoulder", "rightHip"],
  ["leftHip", "rightHip"],

  // left arm
  ["leftShoulder", "leftElbow"],
  ["leftElbow", "leftWrist"],
  ["leftWrist", "leftThumb"],
  ["leftWrist", "leftIndex"],
  ["leftWrist", "leftPinky"],

  // right arm
  ["rightShoulder", "rightElbow"],
  ["rightElbow", "rightWrist"],
  ["rightWrist", "rightThumb"],
  ["rightWrist", "rightIndex"],
  ["rightWrist", "rightPinky"],

  // left leg
  ["leftHip", "leftKnee"],
  ["leftKnee", "leftAnkle"],
  ["leftAnkle", "leftHeel"],
  ["leftAnkle", "leftFootIndex"],

  // right leg
  ["rightHip", "rightKnee"],
  ["rightKnee", "rightAnkle"],
  ["rightAnkle", "rightHeel"],
  ["rightAnkle", "rightFootIndex"],
];
