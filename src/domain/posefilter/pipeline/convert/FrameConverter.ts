import type { CameraDescriptor, CameraFrame } from "../../models/CameraFrame";
import {
  FALLBACK_INPUT_IMAGE_FORMAT,
  INPUT_IMAGE_FORMAT_CODES,
  INPUT_IMAGE_FORMATS,
  INPUT_IMAGE_ROTATIONS,
  type DetectorInputBuffer,
  type InputImageFormat,
  type InputImageRotation,
} from "../../models/InputImage";
import { logger } from "../../../../infra/logger/logger";

const log = logger.scoped("FrameConverter");

const FORMAT_BY_CODE = new Map<number, InputImageFormat>(
  INPUT_IMAGE_FORMATS.map((f): [number, InputImageFormat] => [INPUT_IMAGE_FORMAT_CODES[f], f])
);

export function rotationFromSensorOrientation(raw: number): InputImageRotation {
  return INPUT_IMAGE_ROTATIONS.find((r) => r === raw) ?? 0;
}

export function formatFromRaw(raw: number): InputImageFormat {
  return FORMAT_BY_CODE.get(raw) ?? FALLBACK_INPUT_IMAGE_FORMAT;
}

function concatPlanes(frame: CameraFrame) {
  let total = 0;
  for (const p of frame.planes) total += p.bytes.byteLength;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of frame.planes) {
    out.set(p.bytes, offset);
    offset += p.bytes.byteLength;
  }
  return out;
}

/**
 * Flattens the frame planes (no colour conversion) and attaches the metadata
 * the detector needs. Returns null when the frame cannot be used; never throws.
 *
 * `bytesPerRow` is the first plane's stride. Planes with a different stride
 * are described in `metadata.planes`.
 */
export function toDetectorInput(frame: CameraFrame, camera: CameraDescriptor): DetectorInputBuffer | null {
  try {
    const first = frame.planes[0];
    if (!first) throw new Error("frame has no planes");

    const bytes = concatPlanes(frame);

    return {
      bytes,
      metadata: {
        size: { width: frame.width, height: frame.height },
        rotation: rotationFromSensorOrientation(camera.sensorOrientation),
        format: formatFromRaw(frame.format.raw),
        bytesPerRow: first.bytesPerRow,
        planes: frame.planes.map((p) => ({ bytesPerRow: p.bytesPerRow, byteLength: p.bytes.byteLength })),
      },
    };
  } catch (e) {
    log.warn("dropping unusable frame", { error: e, width: frame.width, height: frame.height });
    return null;
  }
}
