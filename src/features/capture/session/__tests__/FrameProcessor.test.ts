import { backCamera, deferred, fullPose, tinyFrame } from "../../../../../test/poseFactory";
import type { Pose } from "../../../../domain/posefilter/models/Pose";
import type { IPoseDetector } from "../../../../domain/posefilter/pipeline/detect/IPoseDetector";
import { createPoseDetectorMock } from "../../../../domain/posefilter/pipeline/detect/PoseDetector.mock";
import { createCaptureStore } from "../../state/captureStore";
import { FrameProcessor } from "../FrameProcessor";

function setup(detector: IPoseDetector) {
  const store = createCaptureStore();
  const processor = new FrameProcessor({ camera: backCamera, detector, store });
  return { store, processor };
}

describe("FrameProcessor", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("publishes the detector result", async () => {
    const pose = fullPose();
    const { store, processor } = setup(createPoseDetectorMock([[pose]]));

    await expect(processor.handleFrame(tinyFrame())).resolves.toBe("processed");
    expect(store.getState().poses).toEqual([pose]);
    expect(store.getState().counters.processed).toBe(1);
  });

  it("drops a frame that arrives while a detection is outstanding", async () => {
    const pending = deferred<Pose[]>();
    const detect = jest.fn(() => pending.promise);
    const { store, processor } = setup({ detect, close: async () => undefined });

    const first = processor.handleFrame(tinyFrame());
    expect(processor.busy).toBe(true);

    await expect(processor.handleFrame(tinyFrame())).resolves.toBe("dropped");
    expect(detect).toHaveBeenCalledTimes(1);
    expect(store.getState().counters.dropped).toBe(1);

    pending.resolve([fullPose()]);
    await expect(first).resolves.toBe("processed");
    expect(processor.busy).toBe(false);

    // guard is released once the call settles
    const next = deferred<Pose[]>();
    detect.mockImplementationOnce(() => next.promise);
    const third = processor.handleFrame(tinyFrame());
    next.resolve([]);
    await expect(third).resolves.toBe("processed");
    expect(detect).toHaveBeenCalledTimes(2);
  });

  it("treats a detector error as zero poses", async () => {
    const { store, processor } = setup(createPoseDetectorMock([[fullPose()], new Error("model crashed")]));

    await processor.handleFrame(tinyFrame());
    expect(store.getState().poses).toHaveLength(1);

    await expect(processor.handleFrame(tinyFrame())).resolves.toBe("failed");
    expect(store.getState().poses).toEqual([]);
    expect(store.getState().counters).toEqual({ processed: 1, dropped: 0, unusable: 0, failed: 1 });
    expect(processor.busy).toBe(false);
  });

  it("drops an unusable frame without calling the detector or touching the poses", async () => {
    const detector = createPoseDetectorMock([[fullPose()]]);
    const { store, processor } = setup(detector);
    const before = store.getState().poses;

    await expect(processor.handleFrame({ ...tinyFrame(), planes: [] })).resolves.toBe("unusable");
    expect(detector.calls).toBe(0);
    expect(store.getState().poses).toBe(before);

    // later frames still go through
    await expect(processor.handleFrame(tinyFrame())).resolves.toBe("processed");
  });

  it("replaces the previous result wholesale", async () => {
    const a = fullPose();
    const b = fullPose();
    const { store, processor } = setup(createPoseDetectorMock([[a, b], [a]]));

    await processor.handleFrame(tinyFrame());
    const firstResult = store.getState().poses;
    await processor.handleFrame(tinyFrame());

    expect(firstResult).toEqual([a, b]);
    expect(store.getState().poses).toEqual([a]);
    expect(store.getState().poses).not.toBe(firstResult);
  });

  it("discards a result that lands after close()", async () => {
    const pending = deferred<Pose[]>();
    const { store, processor } = setup({ detect: () => pending.promise, close: async () => undefined });

    const inFlight = processor.handleFrame(tinyFrame());
    processor.close();
    pending.resolve([fullPose()]);

    await expect(inFlight).resolves.toBe("dropped");
    expect(store.getState().poses).toEqual([]);
    await expect(processor.handleFrame(tinyFrame())).resolves.toBe("dropped");
  });
});
