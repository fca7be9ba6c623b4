import type { LensDirection } from "../../../domain/posefilter/models/CameraFrame";
import {
  selectCamera,
  type ICameraSource,
  type IPermissionGate,
} from "../../../domain/posefilter/pipeline/camera/ICameraSource";
import type { IPoseDetector } from "../../../domain/posefilter/pipeline/detect/IPoseDetector";
import { logger } from "../../../infra/logger/logger";
import { createCaptureStore, type CaptureStore } from "../state/captureStore";
import { FrameProcessor } from "./FrameProcessor";

const log = logger.scoped("PoseFilterSession");

type SessionDeps = {
  camera: ICameraSource;
  permission: IPermissionGate;
  detector: IPoseDetector;
  store?: CaptureStore;
  lensDirection?: LensDirection;
};

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Permission -> camera selection -> stream start. Any failure on the way is
 * logged and leaves the store in "loading"; nothing is rethrown.
 */
export class PoseFilterSession {
  readonly store: CaptureStore;
  private processor: FrameProcessor | null = null;
  private streaming = false;
  private disposed = false;

  constructor(private readonly deps: SessionDeps) {
    this.store = deps.store ?? createCaptureStore();
  }

  get frameProcessor() {
    return this.processor;
  }

  async start(): Promise<boolean> {
    if (this.disposed || this.streaming) return this.streaming;
    const { setError, setCamera, setStatus } = this.store.getState();

    try {
      const permission = await this.deps.permission.request();
      if (this.disposed) return false;
      if (permission !== "granted") {
        log.warn("camera permission denied");
        setError("Camera permission denied");
        return false;
      }

      const cameras = await this.deps.camera.listCameras();
      if (this.disposed) return false;
      const camera = selectCamera(cameras, this.deps.lensDirection ?? "front");

      const processor = new FrameProcessor({ camera, detector: this.deps.detector, store: this.store });
      this.processor = processor;

      const previewSize = await this.deps.camera.startStream(camera, processor.onFrame);
      if (this.disposed) {
        // dispose() ran while the stream was starting and had nothing to stop
        await this.abandonStream(processor);
        return false;
      }
      this.streaming = true;

      setCamera(camera, previewSize);
      setStatus("streaming");
      log.info("camera stream started", { camera: camera.name, ...previewSize });
      return true;
    } catch (e) {
      this.processor?.close();
      this.processor = null;
      log.error("camera initialization failed", { error: e });
      setError(errorMessage(e));
      return false;
    }
  }

  private async abandonStream(processor: FrameProcessor) {
    processor.close();
    this.processor = null;
    try {
      await this.deps.camera.stopStream();
    } catch (e) {
      log.warn("stopStream failed", { error: e });
    }
    log.info("camera stream stopped after dispose");
  }

  async dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.processor?.close();

    try {
      if (this.streaming) await this.deps.camera.stopStream();
    } catch (e) {
      log.warn("stopStream failed", { error: e });
    } finally {
      this.streaming = false;
      if (this.store.getState().status === "streaming") this.store.getState().setStatus("stopped");
    }

    try {
      await this.deps.detector.close();
    } catch (e) {
      log.warn("detector close failed", { error: e });
    }
  }
}
