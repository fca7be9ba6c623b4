import React from "react";
import type { Size } from "../../../domain/posefilter/models/CameraFrame";
import type { CoordinateSpace } from "../../../domain/posefilter/render/overlayGeometry";
import { rotationFromSensorOrientation } from "../../../domain/posefilter/pipeline/convert/FrameConverter";
import type { CaptureState } from "../state/captureStore";
import { OverlaySkeleton } from "../components/OverlaySkeleton";
import { DetectedPosesLabel } from "../components/DetectedPosesLabel";
import { FPSBadge } from "../components/FPSBadge";

export type CaptureSnapshot = Pick<CaptureState, "status" | "camera" | "previewSize" | "poses" | "poseFps">;

type Props = {
  snapshot: CaptureSnapshot;
  canvasSize: Size;
  coordinateSpace?: CoordinateSpace;
};

export const LOADING_TEXT = "Loading camera…";

export default function CaptureScreen({ snapshot, canvasSize, coordinateSpace }: Props) {
  const { status, camera, previewSize, poses, poseFps } = snapshot;
  const { width, height } = canvasSize;

  // stays here forever when permission or camera init failed
  if (status === "loading" || !camera || !previewSize) {
    return (
      <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height}>
        <text x={width / 2} y={height / 2} textAnchor="middle">
          {LOADING_TEXT}
        </text>
      </svg>
    );
  }

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height}>
      <rect x={0} y={0} width={width} height={height} fill="#111" />
      <OverlaySkeleton
        poses={poses}
        cameraSize={previewSize}
        canvasSize={canvasSize}
        coordinateSpace={coordinateSpace}
        rotation={rotationFromSensorOrientation(camera.sensorOrientation)}
        mirror={camera.lensDirection === "front"}
      />
      <FPSBadge poseFps={poseFps} canvasWidth={width} />
      <DetectedPosesLabel count={poses.length} canvasSize={canvasSize} />
    </svg>
  );
}
