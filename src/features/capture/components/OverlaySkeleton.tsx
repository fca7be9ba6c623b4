import React, { memo, useMemo } from "react";
import type { Size } from "../../../domain/posefilter/models/CameraFrame";
import type { InputImageRotation } from "../../../domain/posefilter/models/InputImage";
import type { Pose } from "../../../domain/posefilter/models/Pose";
import { planOverlay, type CoordinateSpace } from "../../../domain/posefilter/render/overlayGeometry";

export const MARKER_RADIUS = 8;
export const SEGMENT_WIDTH = 4;

type Props = {
  poses: ReadonlyArray<Pose>;
  cameraSize: Size;
  canvasSize: Size;
  coordinateSpace?: CoordinateSpace;
  rotation?: InputImageRotation;
  mirror?: boolean;
};

function OverlaySkeletonView({ poses, cameraSize, canvasSize, coordinateSpace, rotation, mirror }: Props) {
  const { markers, segments } = useMemo(
    () => planOverlay(poses, { cameraSize, canvasSize, coordinateSpace, rotation, mirror }),
    [poses, cameraSize, canvasSize, coordinateSpace, rotation, mirror]
  );

  const { width, height } = canvasSize;
  if (!width || !height) return null;

  return (
    <svg x={0} y={0} width={width} height={height} pointerEvents="none">
      {segments.map((s) => (
        <line
          key={`segment-${s.key}`}
          x1={s.x1}
          y1={s.y1}
          x2={s.x2}
          y2={s.y2}
          stroke="green"
          strokeWidth={SEGMENT_WIDTH}
        />
      ))}

      {markers.map((m) => (
        <circle key={`marker-${m.key}`} cx={m.x} cy={m.y} r={MARKER_RADIUS} fill="red" />
      ))}
    </svg>
  );
}

/** Repaints only when the poses reference changes. */
export function overlayPropsEqual(prev: Readonly<Props>, next: Readonly<Props>) {
  return prev.poses === next.poses;
}

export const OverlaySkeleton = memo(OverlaySkeletonView, overlayPropsEqual);
