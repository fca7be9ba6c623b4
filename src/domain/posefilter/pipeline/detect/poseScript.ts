import { readFile } from "node:fs/promises";
import type { Pose } from "../../models/Pose";
import { isPoseLandmarkType, type PoseLandmark, type PoseLandmarkType } from "../../models/PoseLandmark";
import type { PoseScriptStep } from "./PoseDetector.mock";

/** JSON payload landmark item */
type RawLandmark = {
  x?: unknown;
  y?: unknown;
  z?: unknown;
  likelihood?: unknown;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function num(v: unknown, fallback: number) {
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

function toLandmark(type: PoseLandmarkType, raw: RawLandmark): PoseLandmark | undefined {
  if (typeof raw.x !== "number" || typeof raw.y !== "number") return undefined;
  return {
    type,
    x: raw.x,
    y: raw.y,
    z: num(raw.z, 0),
    likelihood: Math.max(0, Math.min(1, num(raw.likelihood, 1))),
  };
}

export function parsePose(raw: unknown): Pose {
  const out: Partial<Record<PoseLandmarkType, PoseLandmark>> = {};
  const landmarks = isRecord(raw) ? raw.landmarks : undefined;
  if (!isRecord(landmarks)) return { landmarks: out };

  for (const [key, value] of Object.entries(landmarks)) {
    if (!isPoseLandmarkType(key) || !isRecord(value)) continue;
    const lm = toLandmark(key, value);
    if (lm) out[key] = lm;
  }
  return { landmarks: out };
}

/**
 * Script layout:
 * `{ "frames": [ { "poses": [ { "landmarks": { "nose": { "x": 1, "y": 2 } } } ] }, { "error": "..." } ] }`
 */
export function parsePoseScript(json: unknown): PoseScriptStep[] {
  if (!isRecord(json) || !Array.isArray(json.frames)) {
    throw new Error("pose script must be an object with a 'frames' array");
  }

  return json.frames.map((frame, i): PoseScriptStep => {
    if (!isRecord(frame)) throw new Error(`pose script frame ${i} is not an object`);
    if (typeof frame.error === "string") return new Error(frame.error);
    if (!Array.isArray(frame.poses)) throw new Error(`pose script frame ${i} has no 'poses' array`);
    return frame.poses.map(parsePose);
  });
}

export async function loadPoseScript(path: string): Promise<PoseScriptStep[]> {
  const text = await readFile(path, "utf8");
  return parsePoseScript(JSON.parse(text));
}
