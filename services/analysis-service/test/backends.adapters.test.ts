import { afterEach, expect, test, vi } from "vitest";
import { LightweightDetectorBackend, normalizePixelBox, type ObjectDetectorRuntime } from "../src/backends/local-detector";
import {
  buildMultimodalPrompt,
  OnDeviceMultimodalBackend,
  type MultimodalRuntime
} from "../src/backends/on-device-multimodal";
import { RemoteVisionBackend } from "../src/backends/remote-vision";
import { BackendError } from "../src/backends/errors";
import { makeImage } from "./fixtures";

afterEach(() => {
  vi.unstubAllGlobals();
});

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return null;
}

function remoteBackend(connected = true) {
  return new RemoteVisionBackend({
    baseUrl: "https://vision.test",
    apiKey: "test-secret",
    capabilities: ["PPE"],
    isConnected: () => connected
  });
}

test("remote vision posts the image and parses hazards", async () => {
  const fetchMock = vi.fn(
    async () =>
      new Response(
        JSON.stringify({ hazards: [{ type: "missing_hard_hat", confidence: 0.82, box: { x: 0.1, y: 0.2, width: 0.3, height: 0.4 } }] }),
        { status: 200, headers: { "content-type": "application/json" } }
      )
  );
  vi.stubGlobal("fetch", fetchMock);

  const detections = await remoteBackend().analyze(
    makeImage(),
    { traceId: "trace-1", workType: "ROOFING" },
    new AbortController().signal
  );

  expect(detections).toHaveLength(1);
  expect(detections[0]).toMatchObject({
    hazardType: "MISSING_HARD_HAT",
    confidence: 0.82,
    region: { x: 0.1, y: 0.2, width: 0.3, height: 0.4 },
    backendId: "remote-vision"
  });
  expect(fetchMock).toHaveBeenCalledTimes(1);
  expect(fetchMock).toHaveBeenCalledWith(
    "https://vision.test/v1/vision/hazards",
    expect.objectContaining({
      method: "POST",
      headers: expect.objectContaining({ authorization: "Bearer test-secret", "x-trace-id": "trace-1" })
    })
  );
});

test("remote vision maps HTTP 429 to a rate-limit failure", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response("slow down", { status: 429 }))
  );
  const error = await captureRejection(remoteBackend().analyze(makeImage(), {}, new AbortController().signal));
  expect(error).toBeInstanceOf(BackendError);
  expect(error instanceof BackendError ? error.kind : null).toBe("REMOTE_RATE_LIMITED");
});

test("remote vision rejects bodies that do not match the hazard schema", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response(JSON.stringify({ findings: [] }), { status: 200 }))
  );
  const error = await captureRejection(remoteBackend().analyze(makeImage(), {}, new AbortController().signal));
  expect(error instanceof BackendError ? error.kind : null).toBe("INVALID_RESPONSE");
});

test("remote vision is unavailable without connectivity or credentials", () => {
  expect(remoteBackend(true).available()).toBe(true);
  expect(remoteBackend(false).available()).toBe(false);
  expect(
    new RemoteVisionBackend({ baseUrl: "https://vision.test", apiKey: "", capabilities: [] }).available()
  ).toBe(false);
});

function detectorRuntime(loaded = true): ObjectDetectorRuntime {
  return {
    isLoaded: () => loaded,
    load: async () => undefined,
    detect: async () => [
      { label: "no_hardhat", score: 0.77, box: { x1: 64, y1: 48, x2: 192, y2: 240 } },
      { label: "no_gloves", score: 0.1, box: { x1: 0, y1: 0, x2: 10, y2: 10 } },
      { label: "person", score: 0.99, box: { x1: 0, y1: 0, x2: 640, y2: 480 } },
      { label: "constructor", score: 0.99, box: { x1: 0, y1: 0, x2: 640, y2: 480 } }
    ]
  };
}

test("pixel boxes are normalized to the image size", () => {
  expect(normalizePixelBox({ x1: 192, y1: 240, x2: 64, y2: 48 }, 640, 480)).toEqual({
    x: 0.1,
    y: 0.1,
    width: 0.2,
    height: 0.4
  });
});

test("the lightweight detector keeps mapped labels above the score floor", async () => {
  const backend = new LightweightDetectorBackend(detectorRuntime());
  const detections = await backend.analyze(makeImage(), {}, new AbortController().signal);
  expect(detections.map((item) => [item.hazardType, item.confidence])).toEqual([["MISSING_HARD_HAT", 0.77]]);
  expect(detections[0].region).toEqual({ x: 0.1, y: 0.1, width: 0.2, height: 0.4 });
  expect(backend.tier).toBe("LIGHTWEIGHT_DETECTOR");
  expect(backend.costClass).toBe("LOCAL_FREE");
});

test("an unloaded detector reports MODEL_NOT_LOADED", async () => {
  const backend = new LightweightDetectorBackend(detectorRuntime(false));
  expect(backend.available()).toBe(false);
  const error = await captureRejection(backend.analyze(makeImage(), {}, new AbortController().signal));
  expect(error instanceof BackendError ? error.kind : null).toBe("MODEL_NOT_LOADED");
});

function multimodalRuntime(output: string): MultimodalRuntime & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    prompts,
    isLoaded: () => true,
    load: async () => undefined,
    generate: async ({ prompt }) => {
      prompts.push(prompt);
      return output;
    }
  };
}

test("the multimodal prompt names the work type and categories", () => {
  const prompt = buildMultimodalPrompt("STEEL_ERECTION", ["PPE", "FALL_PROTECTION"]);
  expect(prompt.split("\n").slice(0, 2)).toEqual([
    "You are inspecting a steel erection site photo for safety hazards.",
    "Report only hazards in these categories: PPE, FALL_PROTECTION."
  ]);
});

test("the multimodal backend extracts JSON from model output", async () => {
  const runtime = multimodalRuntime(
    'Sure. {"hazards":[{"type":"unprotected_edge","confidence":0.88},{"type":"MISSING_SAFETY_VEST","confidence":0.41,"box":{"x":0.5,"y":0.5,"width":0.2,"height":0.3}}]}'
  );
  const backend = new OnDeviceMultimodalBackend(runtime, ["FALL_PROTECTION", "PPE"]);
  const detections = await backend.analyze(makeImage(), { workType: "ROOFING" }, new AbortController().signal);

  expect(detections.map((item) => item.hazardType)).toEqual(["UNPROTECTED_EDGE", "MISSING_SAFETY_VEST"]);
  expect(detections[0].region).toEqual({ x: 0, y: 0, width: 1, height: 1 });
  expect(runtime.prompts[0]).toContain("roofing site photo");
});

test("multimodal output without JSON is an invalid response", async () => {
  const backend = new OnDeviceMultimodalBackend(multimodalRuntime("I cannot tell."), ["PPE"]);
  const error = await captureRejection(backend.analyze(makeImage(), {}, new AbortController().signal));
  expect(error instanceof BackendError ? error.kind : null).toBe("INVALID_RESPONSE");
});
