import type { CameraDescriptor, CameraFrame } from "../../../domain/posefilter/models/CameraFrame";
import type { Pose } from "../../../domain/posefilter/models/Pose";
import { toDetectorInput } from "../../../domain/posefilter/pipeline/convert/FrameConverter";
import type { IPoseDetector } from "../../../domain/posefilter/pipeline/detect/IPoseDetector";
import { logger } from "../../../infra/logger/logger";
import { FPSMeter } from "../../../utils/perf/fpsMeter";
import type { CaptureStore } from "../state/captureStore";

const log = logger.scoped("FrameProcessor");

export type FrameOutcome = "processed" | "dropped" | "unusable" | "failed";

type Deps = {
  camera: CameraDescriptor;
  detector: IPoseDetector;
  store: CaptureStore;
  fpsMeter?: FPSMeter;
};

/**
 * Owns the in-flight flag. At most one frame is converted and detected at a
 * time; frames arriving meanwhile are dropped, not queued.
 */
export class FrameProcessor {
  private inFlight = false;
  private closed = false;
  private readonly fpsMeter: FPSMeter;

  constructor(private readonly deps: Deps) {
    this.fpsMeter = deps.fpsMeter ?? new FPSMeter();
  }

  get busy() {
    return this.inFlight;
  }

  /** Frame listener for the camera stream. */
  readonly onFrame = (frame: CameraFrame) => {
    void this.handleFrame(frame);
  };

  async handleFrame(frame: CameraFrame): Promise<FrameOutcome> {
    const { store } = this.deps;

    if (this.inFlight || this.closed) {
      store.getState().count("dropped");
      return "dropped";
    }

    this.inFlight = true;
    try {
      const input = toDetectorInput(frame, this.deps.camera);
      if (!input) {
        store.getState().count("unusable");
        return "unusable";
      }

      let poses: Pose[];
      let outcome: FrameOutcome = "processed";
      try {
        poses = await this.deps.detector.detect(input);
      } catch (e) {
        log.warn("detector failed, treating frame as empty", { error: e });
        poses = [];
        outcome = "failed";
      }

      // a teardown during detect() discards the late result
      if (this.closed) return "dropped";

      const fps = this.fpsMeter.tick();
      store.getState().setPoses(poses, fps);
      store.getState().count(outcome);
      log.debug("frame done", { outcome, poses: poses.length });
      return outcome;
    } finally {
      this.inFlight = false;
    }
  }

  close() {
    this.closed = true;
    this.fpsMeter.reset();
  }
}
