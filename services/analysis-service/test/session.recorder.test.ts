import { expect, test } from "vitest";
import { canTransition, SessionRecorder, SessionTransitionError } from "../src/orchestrator/session";

function recorder() {
  let current = 1_000;
  return new SessionRecorder("session-1", "trace-1", "capture", () => {
    current += 10;
    return current;
  });
}

test("states only move forward", () => {
  expect(canTransition("IDLE", "SELECTING_BACKENDS")).toBe(true);
  expect(canTransition("IDLE", "ANALYZING")).toBe(false);
  expect(canTransition("FUSING", "ANALYZING")).toBe(false);
  expect(canTransition("ANALYZING", "FAILED")).toBe(true);
  expect(canTransition("FUSING", "COMPLETE")).toBe(false);
  expect(canTransition("COMPLETE", "FAILED")).toBe(false);
});

test("a completed session records its transitions and is frozen", () => {
  const session = recorder();
  session.transition("SELECTING_BACKENDS");
  session.setBackendChain(["mm"]);
  session.transition("ANALYZING");
  session.recordAttempt({
    backendId: "mm",
    tier: "ON_DEVICE_MULTIMODAL",
    outcome: "SUCCESS",
    latencyMs: 12,
    detectionCount: 0,
    retry: false
  });
  session.transition("FUSING");
  session.transition("RECOMMENDING");
  const result = session.complete({
    fusedHazards: [],
    recommendations: [],
    autoSelectTags: ["ppe-hard-hat-required", "ppe-hard-hat-required"],
    degradedCapability: false
  });

  expect(result.state).toBe("COMPLETE");
  expect(result.transitions.map((entry) => entry.to)).toEqual([
    "SELECTING_BACKENDS",
    "ANALYZING",
    "FUSING",
    "RECOMMENDING",
    "COMPLETE"
  ]);
  expect(result.autoSelectTags).toEqual(["ppe-hard-hat-required"]);
  expect(result.backendsUsed).toEqual(["mm"]);
  expect(result.startedAt).toBe(1_010);
  expect(result.completedAt).toBe(1_070);
  expect(result.totalLatencyMs).toBe(60);
  expect(Object.isFrozen(result)).toBe(true);
  expect(Object.isFrozen(result.attempts[0])).toBe(true);
});

test("a finalized session rejects further changes", () => {
  const session = recorder();
  session.transition("SELECTING_BACKENDS");
  session.fail("NoBackendAvailable", "nothing to run");
  expect(() => session.transition("ANALYZING")).toThrow(SessionTransitionError);
  expect(() => session.fail("Cancelled", "late")).toThrow(SessionTransitionError);
  expect(() => session.setBackendChain(["mm"])).toThrow(SessionTransitionError);
});

test("failures carry a message for the person taking the photo", () => {
  const session = recorder();
  session.transition("SELECTING_BACKENDS");
  const result = session.fail("MalformedInput", "Image payload is empty");
  expect(result.error).toEqual({
    kind: "MalformedInput",
    message: "Image payload is empty",
    userMessage: "Could not analyze this image. Please retake the photo."
  });
});

test("snapshots of a live session are detached copies", () => {
  const session = recorder();
  session.transition("SELECTING_BACKENDS");
  const snapshot = session.snapshot();
  session.transition("ANALYZING");
  expect(snapshot.state).toBe("SELECTING_BACKENDS");
  expect(session.snapshot().state).toBe("ANALYZING");
});
