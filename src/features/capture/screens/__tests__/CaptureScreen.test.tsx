import React from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { backCamera, frontCamera, fullPose, tinyFrame } from "../../../../../test/poseFactory";
import { createPoseDetectorMock } from "../../../../domain/posefilter/pipeline/detect/PoseDetector.mock";
import { FrameProcessor } from "../../session/FrameProcessor";
import { createCaptureStore } from "../../state/captureStore";
import CaptureScreen, { LOADING_TEXT } from "../CaptureScreen";

const canvasSize = { width: 360, height: 640 };

function count(markup: string, tag: string) {
  return markup.match(new RegExp(`<${tag} `, "g"))?.length ?? 0;
}

describe("CaptureScreen", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("shows the loading state until the camera is up", () => {
    const store = createCaptureStore();
    const markup = renderToStaticMarkup(<CaptureScreen snapshot={store.getState()} canvasSize={canvasSize} />);

    expect(markup).toContain(`>${LOADING_TEXT}</text>`);
    expect(markup).not.toContain("Detected Poses");
  });

  it("goes from one detected pose to none and clears the overlay", async () => {
    const store = createCaptureStore();
    store.getState().setCamera(backCamera, { width: 480, height: 360 });
    store.getState().setStatus("streaming");

    const processor = new FrameProcessor({
      camera: backCamera,
      detector: createPoseDetectorMock([[fullPose()], []]),
      store,
    });

    await processor.handleFrame(tinyFrame());
    const first = renderToStaticMarkup(<CaptureScreen snapshot={store.getState()} canvasSize={canvasSize} />);
    expect(first).toContain(">Detected Poses: 1</text>");
    expect(count(first, "circle")).toBe(33);
    expect(count(first, "line")).toBe(31);

    await processor.handleFrame(tinyFrame());
    const second = renderToStaticMarkup(<CaptureScreen snapshot={store.getState()} canvasSize={canvasSize} />);
    expect(second).toContain(">Detected Poses: 0</text>");
    expect(count(second, "circle")).toBe(0);
    expect(count(second, "line")).toBe(0);
  });

  it("scales landmarks onto the canvas and mirrors the front camera", () => {
    const store = createCaptureStore();
    // 270 degrees: detector image is 360 wide, 480 high
    store.getState().setCamera(frontCamera, { width: 480, height: 360 });
    store.getState().setStatus("streaming");
    store.getState().setPoses([fullPose()], 0);

    const markup = renderToStaticMarkup(<CaptureScreen snapshot={store.getState()} canvasSize={{ width: 720, height: 960 }} />);
    // nose (10, 20) -> scaled (20, 40) -> mirrored x 700
    expect(markup).toContain('<circle cx="700" cy="40" r="8" fill="red"></circle>');
  });

  it("shows the detection rate", () => {
    const store = createCaptureStore();
    store.getState().setCamera(backCamera, { width: 480, height: 360 });
    store.getState().setStatus("streaming");
    store.getState().setPoses([], 14.6);

    const markup = renderToStaticMarkup(<CaptureScreen snapshot={store.getState()} canvasSize={canvasSize} />);
    expect(markup).toContain(">15 fps</text>");
  });
});
