import type { CameraDescriptor, CameraFrame, LensDirection, Size } from "../../models/CameraFrame";

export type CameraFrameListener = (frame: CameraFrame) => void;

export interface ICameraSource {
  listCameras(): Promise<CameraDescriptor[]>;
  /** Starts delivering frames to `onFrame` until stopStream(). Resolves with the preview size. */
  startStream(camera: CameraDescriptor, onFrame: CameraFrameListener): Promise<Size>;
  stopStream(): Promise<void>;
}

export type PermissionStatus = "granted" | "denied";

export interface IPermissionGate {
  request(): Promise<PermissionStatus>;
}

export function selectCamera(cameras: ReadonlyArray<CameraDescriptor>, preferred: LensDirection = "front") {
  const camera = cameras.find((c) => c.lensDirection === preferred) ?? cameras[0];
  if (!camera) throw new Error("No camera available");
  return camera;
}

export function createStaticPermissionGate(status: PermissionStatus): IPermissionGate {
  return {
    async request() {
      return status;
    },
  };
}
