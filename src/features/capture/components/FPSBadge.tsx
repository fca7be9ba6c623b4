import React from "react";

export function FPSBadge({ poseFps, canvasWidth }: { poseFps: number; canvasWidth: number }) {
  return (
    <g>
      <rect x={canvasWidth - 84} y={12} width={72} height={28} rx={12} fill="rgba(0,0,0,0.35)" />
      <text x={canvasWidth - 48} y={31} textAnchor="middle" fill="white" fontWeight={600}>
        {`${Math.round(poseFps)} fps`}
      </text>
    </g>
  );
}
