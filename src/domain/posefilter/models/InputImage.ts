import type { Size } from "./CameraFrame";

export type InputImageRotation = 0 | 90 | 180 | 270;

export const INPUT_IMAGE_ROTATIONS: ReadonlyArray<InputImageRotation> = [0, 90, 180, 270];

export const INPUT_IMAGE_FORMATS = ["nv21", "yv12", "yuv_420_888", "yuv420", "bgra8888"] as const;

export type InputImageFormat = (typeof INPUT_IMAGE_FORMATS)[number];

// platform raw codes (Android ImageFormat / iOS kCVPixelFormatType)
export const INPUT_IMAGE_FORMAT_CODES = {
  nv21: 17,
  yv12: 842094169,
  yuv_420_888: 35,
  yuv420: 875704438,
  bgra8888: 1111970369,
} as const satisfies Record<InputImageFormat, number>;

export const FALLBACK_INPUT_IMAGE_FORMAT: InputImageFormat = "nv21";

export type PlaneLayout = Readonly<{
  bytesPerRow: number;
  byteLength: number;
}>;

export type InputImageMetadata = Readonly<{
  size: Size;
  rotation: InputImageRotation;
  format: InputImageFormat;
  /** stride of the first plane only */
  bytesPerRow: number;
  planes: ReadonlyArray<PlaneLayout>;
}>;

/** Concatenated frame bytes handed to the detector for a single call. */
export type DetectorInputBuffer = Readonly<{
  bytes: Uint8Array;
  metadata: InputImageMetadata;
}>;
