import type { CameraDescriptor, CameraFrame, Size } from "../../models/CameraFrame";
import { INPUT_IMAGE_FORMAT_CODES } from "../../models/InputImage";
import type { CameraFrameListener, ICameraSource } from "./ICameraSource";

export type SyntheticCameraOptions = Readonly<{
  cameras?: ReadonlyArray<CameraDescriptor>;
  previewSize?: Size;
  fps?: number;
  /** stop emitting after this many frames */
  maxFrames?: number;
}>;

const DEFAULT_CAMERAS: ReadonlyArray<CameraDescriptor> = [
  { name: "synthetic-back", lensDirection: "back", sensorOrientation: 90 },
  { name: "synthetic-front", lensDirection: "front", sensorOrientation: 270 },
];

/** YUV 4:2:0, three planes: full-size Y then quarter-size U and V. */
export function makeYuv420Frame(size: Size, seed: number): CameraFrame {
  const { width, height } = size;
  const cw = Math.ceil(width / 2);
  const ch = Math.ceil(height / 2);

  const y = new Uint8Array(width * height);
  for (let i = 0; i < y.length; i++) y[i] = (i + seed) & 0xff;

  const u = new Uint8Array(cw * ch).fill(128);
  const v = new Uint8Array(cw * ch).fill(128);

  return {
    width,
    height,
    format: { raw: INPUT_IMAGE_FORMAT_CODES.yuv_420_888 },
    planes: [
      { bytes: y, bytesPerRow: width, bytesPerPixel: 1 },
      { bytes: u, bytesPerRow: cw, bytesPerPixel: 1 },
      { bytes: v, bytesPerRow: cw, bytesPerPixel: 1 },
    ],
  };
}

export type SyntheticCamera = ICameraSource & {
  /** resolves once the stream has stopped, by stopStream() or maxFrames */
  finished(): Promise<void>;
};

export function createSyntheticCamera(options: SyntheticCameraOptions = {}): SyntheticCamera {
  const cameras = options.cameras ?? DEFAULT_CAMERAS;
  const previewSize = options.previewSize ?? { width: 480, height: 360 };
  const intervalMs = 1000 / Math.max(1, options.fps ?? 15);

  let timer: NodeJS.Timeout | null = null;
  let emitted = 0;
  let resolveFinished: (() => void) | null = null;
  let finished = Promise.resolve();

  const halt = () => {
    if (timer) clearInterval(timer);
    timer = null;
    resolveFinished?.();
    resolveFinished = null;
  };

  return {
    async listCameras() {
      return [...cameras];
    },

    async startStream(_camera: CameraDescriptor, onFrame: CameraFrameListener) {
      if (timer) throw new Error("stream already started");
      emitted = 0;
      finished = new Promise<void>((r) => { resolveFinished = r; });

      timer = setInterval(() => {
        if (options.maxFrames != null && emitted >= options.maxFrames) {
          halt();
          return;
        }
        onFrame(makeYuv420Frame(previewSize, emitted++));
      }, intervalMs);

      return previewSize;
    },

    async stopStream() {
      halt();
    },

    finished() {
      return finished;
    },
  };
}
