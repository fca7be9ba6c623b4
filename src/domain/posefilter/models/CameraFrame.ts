export type LensDirection = "front" | "back" | "external";

export type CameraDescriptor = Readonly<{
  name: string;
  lensDirection: LensDirection;
  sensorOrientation: number; // degrees, fixed per sensor
}>;

export type CameraPlane = Readonly<{
  bytes: Uint8Array;
  bytesPerRow: number;
  bytesPerPixel?: number;
}>;

/** One camera tick. Consumed immediately, never retained. */
export type CameraFrame = Readonly<{
  planes: ReadonlyArray<CameraPlane>;
  width: number;
  height: number;
  format: Readonly<{ raw: number }>; // platform pixel format code
}>;

export type Size = Readonly<{ width: number; height: number }>;
