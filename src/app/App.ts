import { createElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { createSyntheticCamera } from "../domain/posefilter/pipeline/camera/Camera.synthetic";
import { createStaticPermissionGate, type IPermissionGate } from "../domain/posefilter/pipeline/camera/ICameraSource";
import { createPoseDetectorMock } from "../domain/posefilter/pipeline/detect/PoseDetector.mock";
import { loadPoseScript } from "../domain/posefilter/pipeline/detect/poseScript";
import CaptureScreen from "../features/capture/screens/CaptureScreen";
import { PoseFilterSession } from "../features/capture/session/PoseFilterSession";
import type { CaptureStore } from "../features/capture/state/captureStore";
import { logger, setDebugLogging } from "../infra/logger/logger";
import type { AppConfig } from "./config";

const log = logger.scoped("App");

export function renderScreen(store: CaptureStore, config: Pick<AppConfig, "canvasSize" | "coordinateSpace">) {
  return renderToStaticMarkup(
    createElement(CaptureScreen, {
      snapshot: store.getState(),
      canvasSize: config.canvasSize,
      coordinateSpace: config.coordinateSpace,
    })
  );
}

export type RunResult = Readonly<{
  started: boolean;
  svg: string;
  detectedPoses: number;
}>;

/**
 * Streams `config.frames` synthetic frames through the scripted detector and
 * returns the final screen.
 */
export async function runPoseFilter(
  config: AppConfig,
  permission: IPermissionGate = createStaticPermissionGate("granted")
): Promise<RunResult> {
  setDebugLogging(config.debug);

  const script = await loadPoseScript(config.scriptPath);
  const detector = createPoseDetectorMock(script, { loop: true, options: config.detector });
  const camera = createSyntheticCamera({ fps: config.fps, maxFrames: config.frames });
  log.info("detector configured", { ...config.detector, steps: script.length });

  const session = new PoseFilterSession({ camera, permission, detector });
  const unsubscribe = session.store.subscribe((state, prev) => {
    if (state.poses.length !== prev.poses.length) {
      log.info("detected poses changed", { from: prev.poses.length, to: state.poses.length });
    }
  });

  try {
    const started = await session.start();
    if (started) await camera.finished();

    const { poses, counters } = session.store.getState();
    log.info("run finished", { ...counters, detectedPoses: poses.length, detectorCalls: detector.calls });

    return {
      started,
      svg: renderScreen(session.store, config),
      detectedPoses: poses.length,
    };
  } finally {
    unsubscribe();
    await session.dispose();
  }
}
