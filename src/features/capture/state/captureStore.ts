import { createStore } from "zustand/vanilla";
import type { Pose } from "../../../domain/posefilter/models/Pose";
import type { CameraDescriptor, Size } from "../../../domain/posefilter/models/CameraFrame";

export type CaptureStatus = "loading" | "streaming" | "stopped";

export type FrameCounters = Readonly<{
  processed: number;
  dropped: number;
  unusable: number;
  failed: number;
}>;

export type FrameCounter = keyof FrameCounters;

export type CaptureState = {
  status: CaptureStatus;
  error?: string;

  camera?: CameraDescriptor;
  previewSize?: Size;

  /** latest detector result, replaced wholesale every frame */
  poses: ReadonlyArray<Pose>;
  poseFps: number;
  counters: FrameCounters;

  setStatus: (s: CaptureStatus) => void;
  setError: (msg?: string) => void;
  setCamera: (camera: CameraDescriptor, previewSize: Size) => void;
  setPoses: (poses: ReadonlyArray<Pose>, poseFps: number) => void;
  count: (counter: FrameCounter) => void;
};

const ZERO_COUNTERS: FrameCounters = { processed: 0, dropped: 0, unusable: 0, failed: 0 };

export function createCaptureStore() {
  return createStore<CaptureState>((set) => ({
    status: "loading",
    error: undefined,

    camera: undefined,
    previewSize: undefined,

    poses: [],
    poseFps: 0,
    counters: ZERO_COUNTERS,

    setStatus: (status) => set({ status }),
    setError: (error) => set({ error }),
    setCamera: (camera, previewSize) => set({ camera, previewSize }),

    setPoses: (poses, poseFps) => set({ poses, poseFps }),

    count: (counter) =>
      set((s) => ({ counters: { ...s.counters, [counter]: s.counters[counter] + 1 } })),
  }));
}

export type CaptureStore = ReturnType<typeof createCaptureStore>;
