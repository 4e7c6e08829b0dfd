import { expect, test } from "vitest";
import { aggregateConfidence, buildFusedHazardId, fuseDetections } from "../src/fusion/engine";
import { intersectionOverUnion, weightedRegion } from "../src/fusion/geometry";
import type { BackendDetections } from "../src/fusion/types";
import { backendResult, detection, fusionSettings, taxonomy } from "./fixtures";

const options = { ...fusionSettings, severityOf: taxonomy.severityOf };

const leftBox = { x: 0, y: 0, width: 0.3, height: 0.2 };
const shiftedBox = { x: 0.1, y: 0, width: 0.3, height: 0.2 };
const farBox = { x: 0.7, y: 0.7, width: 0.2, height: 0.2 };

test("intersectionOverUnion of half-overlapping boxes is 0.5", () => {
  expect(intersectionOverUnion(leftBox, shiftedBox)).toBeCloseTo(0.5, 10);
  expect(intersectionOverUnion(leftBox, farBox)).toBe(0);
});

test("weightedRegion falls back to equal weights when all weights are zero", () => {
  const region = weightedRegion([
    { region: { x: 0, y: 0, width: 0.2, height: 0.2 }, weight: 0 },
    { region: { x: 0.4, y: 0.2, width: 0.4, height: 0.2 }, weight: 0 }
  ]);
  expect(region.x).toBeCloseTo(0.2, 10);
  expect(region.y).toBeCloseTo(0.1, 10);
  expect(region.width).toBeCloseTo(0.3, 10);
  expect(region.height).toBeCloseTo(0.2, 10);
});

test("a single on-device detection keeps its confidence", () => {
  const fused = fuseDetections(
    [backendResult("mm", "ON_DEVICE_MULTIMODAL", [detection("mm", "MISSING_HARD_HAT", 0.92)])],
    options
  );
  expect(fused).toHaveLength(1);
  expect(fused[0].hazardType).toBe("MISSING_HARD_HAT");
  expect(fused[0].confidence).toBeCloseTo(0.92, 10);
  expect(fused[0].severity).toBe("high");
  expect(fused[0].contributingBackends).toEqual(["mm"]);
  expect(fused[0].detectionCount).toBe(1);
});

test("overlapping detections from two backends merge with a weighted, boosted confidence", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [detection("mm", "MISSING_HARD_HAT", 0.6, leftBox)]),
      backendResult("remote", "REMOTE_VISION", [detection("remote", "MISSING_HARD_HAT", 0.5, shiftedBox)])
    ],
    options
  );
  expect(fused).toHaveLength(1);
  expect(fused[0].confidence).toBeCloseTo(0.6, 6);
  expect(fused[0].contributingBackends).toEqual(["mm", "remote"]);
  expect(fused[0].detectionCount).toBe(2);
});

test("singleton confidence is scaled by backend weight and clamped to 1", () => {
  const fused = fuseDetections(
    [
      backendResult("remote", "REMOTE_VISION", [detection("remote", "EXPOSED_WIRING", 0.9)]),
      backendResult("detector", "LIGHTWEIGHT_DETECTOR", [detection("detector", "DEBRIS_TRIP_HAZARD", 0.5, farBox)])
    ],
    options
  );
  expect(fused.map((hazard) => hazard.hazardType)).toEqual(["EXPOSED_WIRING", "DEBRIS_TRIP_HAZARD"]);
  expect(fused[0].confidence).toBe(1);
  expect(fused[1].confidence).toBeCloseTo(0.35, 10);
});

test("per-backend weight overrides take precedence over tier weights", () => {
  const fused = fuseDetections([backendResult("remote", "REMOTE_VISION", [detection("remote", "MISSING_GLOVES", 0.5)])], {
    ...options,
    backendWeights: { remote: 0.5 }
  });
  expect(fused[0].confidence).toBeCloseTo(0.25, 10);
});

test("overlapping boxes from the same backend collapse into the strongest one", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [
        detection("mm", "MISSING_HARD_HAT", 0.55, shiftedBox),
        detection("mm", "MISSING_HARD_HAT", 0.7, leftBox)
      ])
    ],
    options
  );
  expect(fused).toHaveLength(1);
  expect(fused[0].confidence).toBeCloseTo(0.7, 10);
  expect(fused[0].detectionCount).toBe(1);
});

test("distant detections of the same type stay separate", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [detection("mm", "MISSING_HARD_HAT", 0.6, leftBox)]),
      backendResult("remote", "REMOTE_VISION", [detection("remote", "MISSING_HARD_HAT", 0.5, farBox)])
    ],
    options
  );
  expect(fused).toHaveLength(2);
  expect(fused.map((hazard) => hazard.detectionCount)).toEqual([1, 1]);
});

test("different hazard types never merge even when their boxes overlap", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [detection("mm", "MISSING_HARD_HAT", 0.6, leftBox)]),
      backendResult("remote", "REMOTE_VISION", [detection("remote", "MISSING_SAFETY_VEST", 0.5, leftBox)])
    ],
    options
  );
  expect(fused.map((hazard) => hazard.hazardType).sort()).toEqual(["MISSING_HARD_HAT", "MISSING_SAFETY_VEST"]);
});

test("ties on confidence are ordered by severity", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [
        detection("mm", "MISSING_GLOVES", 0.6, leftBox),
        detection("mm", "UNPROTECTED_EDGE", 0.6, farBox)
      ])
    ],
    options
  );
  expect(fused.map((hazard) => hazard.severity)).toEqual(["critical", "low"]);
});

const mixedInputs: BackendDetections[] = [
  backendResult("mm", "ON_DEVICE_MULTIMODAL", [
    detection("mm", "MISSING_HARD_HAT", 0.6, leftBox),
    detection("mm", "EXPOSED_WIRING", 0.45, farBox)
  ]),
  backendResult("remote", "REMOTE_VISION", [
    detection("remote", "MISSING_HARD_HAT", 0.5, shiftedBox),
    detection("remote", "EXPOSED_WIRING", 0.3, farBox)
  ]),
  backendResult("detector", "LIGHTWEIGHT_DETECTOR", [
    detection("detector", "MISSING_HARD_HAT", 0.8, leftBox),
    detection("detector", "DEBRIS_TRIP_HAZARD", 0.4, shiftedBox)
  ])
];

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) {
    return [items];
  }
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  );
}

test("fusion output is the same for every ordering of backends and detections", () => {
  const expected = fuseDetections(mixedInputs, options);
  for (const ordering of permutations(mixedInputs)) {
    const forward = ordering;
    const backward = ordering.map((result) => ({ ...result, detections: [...result.detections].reverse() }));
    expect(fuseDetections(forward, options)).toEqual(expected);
    expect(fuseDetections(backward, options)).toEqual(expected);
  }
});

test("fusing the same results again gives an identical list and leaves the input untouched", () => {
  const before = structuredClone(mixedInputs);
  const first = fuseDetections(mixedInputs, options);
  const second = fuseDetections(mixedInputs, options);
  expect(second).toEqual(first);
  expect(second.map((hazard) => hazard.id)).toEqual(first.map((hazard) => hazard.id));
  expect(mixedInputs).toEqual(before);
});

test("a backend never joins the same cluster twice through a chain of overlaps", () => {
  const chainLeft = { x: 0, y: 0, width: 0.3, height: 0.2 };
  const chainMiddle = { x: 0.1, y: 0, width: 0.3, height: 0.2 };
  const chainRight = { x: 0.25, y: 0, width: 0.3, height: 0.2 };
  expect(intersectionOverUnion(chainLeft, chainMiddle)).toBeCloseTo(0.5, 10);
  expect(intersectionOverUnion(chainMiddle, chainRight)).toBeCloseTo(1 / 3, 10);
  expect(intersectionOverUnion(chainLeft, chainRight)).toBeLessThan(0.3);

  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [
        detection("mm", "MISSING_HARD_HAT", 0.6, chainLeft),
        detection("mm", "MISSING_HARD_HAT", 0.6, chainRight)
      ]),
      backendResult("remote", "REMOTE_VISION", [detection("remote", "MISSING_HARD_HAT", 0.5, chainMiddle)])
    ],
    options
  );

  expect(fused).toHaveLength(2);
  const agreed = fused.find((hazard) => hazard.detectionCount === 2);
  const alone = fused.find((hazard) => hazard.detectionCount === 1);
  expect(agreed?.contributingBackends).toEqual(["mm", "remote"]);
  expect(agreed?.confidence).toBeCloseTo(0.6, 6);
  expect(agreed?.region.x).toBeCloseTo(0.05, 6);
  expect(alone?.contributingBackends).toEqual(["mm"]);
  expect(alone?.region.x).toBeCloseTo(0.25, 10);
  expect(alone?.confidence).toBeCloseTo(0.6, 10);
});

test("fused confidences stay within the unit interval", () => {
  const fused = fuseDetections(
    [
      backendResult("mm", "ON_DEVICE_MULTIMODAL", [detection("mm", "UNSAFE_SCAFFOLD", 1)]),
      backendResult("remote", "REMOTE_VISION", [detection("remote", "UNSAFE_SCAFFOLD", 1)]),
      backendResult("detector", "LIGHTWEIGHT_DETECTOR", [detection("detector", "UNSAFE_SCAFFOLD", 1)])
    ],
    options
  );
  expect(fused).toHaveLength(1);
  expect(fused[0].confidence).toBe(1);
  expect(fused[0].detectionCount).toBe(3);
});

test("no detections produce no hazards", () => {
  expect(fuseDetections([backendResult("mm", "ON_DEVICE_MULTIMODAL", [])], options)).toEqual([]);
});

test("aggregateConfidence applies the agreement boost per extra member", () => {
  expect(aggregateConfidence([], 0.1)).toBe(0);
  expect(
    aggregateConfidence(
      [
        { confidence: 0.5, weight: 1 },
        { confidence: 0.5, weight: 1 },
        { confidence: 0.5, weight: 1 }
      ],
      0.1
    )
  ).toBeCloseTo(0.6, 10);
});

test("fused hazard ids are stable for the same members", () => {
  const members = [detection("mm", "MISSING_HARD_HAT", 0.6, leftBox)];
  expect(buildFusedHazardId("MISSING_HARD_HAT", members)).toBe(buildFusedHazardId("MISSING_HARD_HAT", members));
  expect(buildFusedHazardId("MISSING_HARD_HAT", members)).toHaveLength(16);
});
