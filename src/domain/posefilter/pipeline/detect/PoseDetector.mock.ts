import type { IPoseDetector, PoseDetectorOptions } from "./IPoseDetector";
import type { Pose } from "../../models/Pose";

/** One scripted detector reply: poses, or an error the call rejects with. */
export type PoseScriptStep = ReadonlyArray<Pose> | Error;

export type PoseDetectorMock = IPoseDetector & {
  readonly options: PoseDetectorOptions;
  readonly calls: number;
  readonly closed: boolean;
};

const DEFAULT_OPTIONS: PoseDetectorOptions = { mode: "stream", model: "accurate" };

/**
 * Replays `script` one step per detect() call, looping when `loop` is set.
 * Once the script is exhausted every call yields no poses.
 */
export function createPoseDetectorMock(
  script: ReadonlyArray<PoseScriptStep>,
  { loop = false, options = DEFAULT_OPTIONS }: { loop?: boolean; options?: PoseDetectorOptions } = {}
): PoseDetectorMock {
  let calls = 0;
  let closed = false;

  return {
    options,
    get calls() { return calls; },
    get closed() { return closed; },

    async detect() {
      if (closed) throw new Error("detector closed");
      const i = loop && script.length ? calls % script.length : calls;
      calls++;

      const step = script[i];
      if (step instanceof Error) throw step;
      return step ? [...step] : [];
    },

    async close() {
      closed = true;
    },
  };
}
