import type { Pose } from "../../models/Pose";
import type { DetectorInputBuffer } from "../../models/InputImage";

export type PoseDetectorOptions = Readonly<{
  mode: "stream" | "single";
  model: "base" | "accurate";
}>;

export interface IPoseDetector {
  detect(input: DetectorInputBuffer): Promise<Pose[]>;
  close(): Promise<void>;
}
