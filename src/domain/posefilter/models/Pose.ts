import type { PoseLandmarkMap } from "./PoseLandmark";

/** Landmarks found for one person in one frame; absent keys were not detected. */
export type Pose = Readonly<{
  landmarks: PoseLandmarkMap;
}>;
