import type { Size } from "../models/CameraFrame";
import type { InputImageRotation } from "../models/InputImage";
import type { Pose } from "../models/Pose";
import { POSE_CONNECTIONS, POSE_LANDMARK_TYPES, type PoseLandmark, type PoseLandmarkType } from "../models/PoseLandmark";

/**
 * "detector": draw points as the detector reports them.
 * "canvas": scale from the camera preview size to the canvas size.
 */
export type CoordinateSpace = "detector" | "canvas";

export type OverlayProjection = Readonly<{
  cameraSize: Size;
  canvasSize: Size;
  coordinateSpace?: CoordinateSpace;
  rotation?: InputImageRotation;
  mirror?: boolean; // front camera preview is mirrored
}>;

export type OverlayMarker = Readonly<{ key: string; type: PoseLandmarkType; x: number; y: number }>;

export type OverlaySegment = Readonly<{
  key: string;
  from: PoseLandmarkType;
  to: PoseLandmarkType;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}>;

export type OverlayPlan = Readonly<{
  markers: OverlayMarker[];
  segments: OverlaySegment[];
}>;

type Point = { x: number; y: number };

type PlanBuffer = { markers: OverlayMarker[]; segments: OverlaySegment[] };

/** Image size as the detector sees it; 90/270 rotations swap the preview axes. */
export function sourceSize(cameraSize: Size, rotation: InputImageRotation = 0): Size {
  if (rotation === 90 || rotation === 270) return { width: cameraSize.height, height: cameraSize.width };
  return cameraSize;
}

export function projectPoint(lm: Point, projection: OverlayProjection): Point {
  if ((projection.coordinateSpace ?? "canvas") === "detector") return { x: lm.x, y: lm.y };

  const src = sourceSize(projection.cameraSize, projection.rotation);
  const { width, height } = projection.canvasSize;
  const sx = src.width > 0 ? width / src.width : 1;
  const sy = src.height > 0 ? height / src.height : 1;

  const x = lm.x * sx;
  return { x: projection.mirror ? width - x : x, y: lm.y * sy };
}

function planPose(pose: Pose, index: number, projection: OverlayProjection, out: PlanBuffer) {
  const projected = new Map<PoseLandmarkType, Point>();
  const at = (lm: PoseLandmark) => {
    let p = projected.get(lm.type);
    if (!p) {
      p = projectPoint(lm, projection);
      projected.set(lm.type, p);
    }
    return p;
  };

  for (const [from, to] of POSE_CONNECTIONS) {
    const a = pose.landmarks[from];
    const b = pose.landmarks[to];
    if (!a || !b) continue;

    const pa = at(a);
    const pb = at(b);
    out.segments.push({ key: `${index}-${from}-${to}`, from, to, x1: pa.x, y1: pa.y, x2: pb.x, y2: pb.y });
  }

  for (const type of POSE_LANDMARK_TYPES) {
    const lm = pose.landmarks[type];
    if (!lm) continue;
    const p = at(lm);
    out.markers.push({ key: `${index}-${type}`, type, x: p.x, y: p.y });
  }
}

/** Markers for every present landmark and segments whose two ends are present. */
export function planOverlay(poses: ReadonlyArray<Pose>, projection: OverlayProjection): OverlayPlan {
  const out: PlanBuffer = { markers: [], segments: [] };
  poses.forEach((pose, i) => planPose(pose, i, projection, out));
  return out;
}
