import React from "react";

function detectedPosesText(count: number) {
  return `Detected Poses: ${count}`;
}

export function DetectedPosesLabel({ count, canvasSize }: { count: number; canvasSize: { width: number; height: number } }) {
  const { width, height } = canvasSize;
  return (
    <g>
      <rect x={0} y={height - 56} width={width} height={36} fill="rgba(0,0,0,0.54)" />
      <text x={width / 2} y={height - 32} textAnchor="middle" fill="white" fontSize={16}>
        {detectedPosesText(count)}
      </text>
    </g>
  );
}
