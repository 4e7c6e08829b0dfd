import { config } from "../config";
import { isConnected, type ConnectivityMonitor } from "../connectivity";
import { FakeAnalyzerBackend } from "./fake-backend";
import { DETECTOR_CAPABILITIES, LightweightDetectorBackend, type ObjectDetectorRuntime } from "./local-detector";
import { OnDeviceMultimodalBackend, type MultimodalRuntime } from "./on-device-multimodal";
import { RemoteVisionBackend } from "./remote-vision";
import type { AnalyzerBackend } from "./types";

export const MULTIMODAL_CAPABILITIES = [
  "PPE",
  "FALL_PROTECTION",
  "ELECTRICAL_SAFETY",
  "HOUSEKEEPING",
  "EXCAVATION",
  "CRANE_RIGGING",
  "SCAFFOLDING",
  "FIRE_SAFETY"
];

export type BackendRuntimes = {
  multimodal?: MultimodalRuntime;
  detector?: ObjectDetectorRuntime;
};

/**
 * Builds the adapter set for this process. Local engines are attached only when
 * a runtime is supplied; with `simulateLocal` idle scripted adapters stand in.
 */
export function createBackends(
  connectivity: ConnectivityMonitor,
  runtimes: BackendRuntimes = {},
  simulateLocal = config.simulateLocalBackends
): AnalyzerBackend[] {
  const backends: AnalyzerBackend[] = [];

  if (runtimes.multimodal) {
    backends.push(new OnDeviceMultimodalBackend(runtimes.multimodal, MULTIMODAL_CAPABILITIES));
  } else if (simulateLocal) {
    backends.push(
      new FakeAnalyzerBackend("on-device-multimodal", "ON_DEVICE_MULTIMODAL", [{ detections: [] }], {
        capabilities: MULTIMODAL_CAPABILITIES
      })
    );
  }

  backends.push(
    new RemoteVisionBackend({
      baseUrl: config.remoteVision.baseUrl,
      apiKey: config.remoteVision.apiKey,
      capabilities: MULTIMODAL_CAPABILITIES,
      isConnected: () => isConnected(connectivity.getQuality())
    })
  );

  if (runtimes.detector) {
    backends.push(new LightweightDetectorBackend(runtimes.detector));
  } else if (simulateLocal) {
    backends.push(
      new FakeAnalyzerBackend("local-detector", "LIGHTWEIGHT_DETECTOR", [{ detections: [] }], {
        capabilities: DETECTOR_CAPABILITIES
      })
    );
  }

  return backends;
}
