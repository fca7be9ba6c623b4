import { DEFAULT_SCRIPT_PATH, loadConfig, parseCanvasSize } from "../config";
import { parseBooleanFlag, parseChoice, parseNumericEnv } from "../env";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      debug: false,
      detector: { mode: "stream", model: "accurate" },
      fps: 15,
      frames: 30,
      canvasSize: { width: 360, height: 640 },
      coordinateSpace: "canvas",
      scriptPath: DEFAULT_SCRIPT_PATH,
    });
  });

  it("reads and clamps overrides", () => {
    const config = loadConfig({
      POSE_FILTER_DEBUG: "yes",
      POSE_FILTER_MODEL: " BASE ",
      POSE_FILTER_FPS: "240",
      POSE_FILTER_FRAMES: "0",
      POSE_FILTER_CANVAS: "1080x1920",
      POSE_FILTER_COORDINATES: "detector",
      POSE_FILTER_SCRIPT: "/tmp/poses.json",
    });

    expect(config).toEqual({
      debug: true,
      detector: { mode: "stream", model: "base" },
      fps: 60,
      frames: 1,
      canvasSize: { width: 1080, height: 1920 },
      coordinateSpace: "detector",
      scriptPath: "/tmp/poses.json",
    });
  });

  it("ignores unknown choices", () => {
    const config = loadConfig({ POSE_FILTER_MODEL: "huge", POSE_FILTER_COORDINATES: "screen" });
    expect(config.detector.model).toBe("accurate");
    expect(config.coordinateSpace).toBe("canvas");
  });
});

describe("env parsing", () => {
  it("parses canvas sizes", () => {
    expect(parseCanvasSize("640 x 480")).toEqual({ width: 640, height: 480 });
    expect(parseCanvasSize("99999x2")).toEqual({ width: 4096, height: 2 });
    expect(parseCanvasSize("wide")).toEqual({ width: 360, height: 640 });
    expect(parseCanvasSize(undefined)).toEqual({ width: 360, height: 640 });
  });

  it("parses boolean flags", () => {
    expect(parseBooleanFlag("1")).toBe(true);
    expect(parseBooleanFlag("no", true)).toBe(false);
    expect(parseBooleanFlag("maybe", true)).toBe(true);
  });

  it("parses numbers", () => {
    expect(parseNumericEnv("12.5", { min: 0, max: 100 })).toBe(12.5);
    expect(parseNumericEnv("12.5", { min: 0, max: 100, integer: true })).toBe(12);
    expect(parseNumericEnv("", { min: 0, max: 100 })).toBeNull();
    expect(parseNumericEnv("abc", { min: 0, max: 100 })).toBeNull();
  });

  it("parses choices", () => {
    expect(parseChoice("B", ["a", "b"], "a")).toBe("b");
    expect(parseChoice(undefined, ["a", "b"], "a")).toBe("a");
  });
});
