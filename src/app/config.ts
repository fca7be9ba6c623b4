import path from "node:path";
import type { Size } from "../domain/posefilter/models/CameraFrame";
import type { PoseDetectorOptions } from "../domain/posefilter/pipeline/detect/IPoseDetector";
import type { CoordinateSpace } from "../domain/posefilter/render/overlayGeometry";
import { parseBooleanFlag, parseChoice, parseNumericEnv } from "./env";

export type AppConfig = Readonly<{
  debug: boolean;
  detector: PoseDetectorOptions;
  fps: number;
  frames: number;
  canvasSize: Size;
  coordinateSpace: CoordinateSpace;
  scriptPath: string;
}>;

type Env = Readonly<Record<string, string | undefined>>;

const DEFAULT_CANVAS: Size = { width: 360, height: 640 };

export const DEFAULT_SCRIPT_PATH = path.resolve(process.cwd(), "fixtures/poses.json");

/** "WxH" -> Size, each side clamped to 1..4096 */
export function parseCanvasSize(value: string | undefined): Size {
  const m = value?.trim().match(/^(\d+)\s*x\s*(\d+)$/i);
  if (!m) return DEFAULT_CANVAS;
  const width = parseNumericEnv(m[1], { min: 1, max: 4096, integer: true });
  const height = parseNumericEnv(m[2], { min: 1, max: 4096, integer: true });
  if (width == null || height == null) return DEFAULT_CANVAS;
  return { width, height };
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    debug: parseBooleanFlag(env.POSE_FILTER_DEBUG, false),
    detector: {
      mode: "stream",
      model: parseChoice(env.POSE_FILTER_MODEL, ["base", "accurate"], "accurate"),
    },
    fps: parseNumericEnv(env.POSE_FILTER_FPS, { min: 1, max: 60, integer: true }) ?? 15,
    frames: parseNumericEnv(env.POSE_FILTER_FRAMES, { min: 1, max: 10000, integer: true }) ?? 30,
    canvasSize: parseCanvasSize(env.POSE_FILTER_CANVAS),
    coordinateSpace: parseChoice(env.POSE_FILTER_COORDINATES, ["canvas", "detector"], "canvas"),
    scriptPath: env.POSE_FILTER_SCRIPT?.trim() || DEFAULT_SCRIPT_PATH,
  };
}
