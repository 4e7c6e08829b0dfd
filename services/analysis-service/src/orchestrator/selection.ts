import type { ConnectivityQuality } from "../config";
import { isConnected } from "../connectivity";
import type { AnalyzerBackend, BackendTier } from "../backends/types";
import { isLocalTier } from "../backends/types";

const TIER_ORDER: Record<BackendTier, number> = {
  ON_DEVICE_MULTIMODAL: 0,
  REMOTE_VISION: 1,
  LIGHTWEIGHT_DETECTOR: 2
};

export type SelectionInput = {
  connectivity: ConnectivityQuality;
  isDeprioritized: (backendId: string) => boolean;
};

export type BackendPlan = {
  chain: AnalyzerBackend[];
  // set when a local and a remote backend should run side by side
  hybridPair: [AnalyzerBackend, AnalyzerBackend] | null;
};

export function isEligible(backend: AnalyzerBackend, connectivity: ConnectivityQuality): boolean {
  if (backend.tier === "REMOTE_VISION" && !isConnected(connectivity)) {
    return false;
  }
  return backend.available();
}

/**
 * Orders eligible backends by tier preference; healthy ones first, deprioritized
 * ones kept at the end as a last resort.
 */
export function selectBackendChain(backends: readonly AnalyzerBackend[], input: SelectionInput): AnalyzerBackend[] {
  const eligible = backends
    .filter((backend) => isEligible(backend, input.connectivity))
    .map((backend, index) => ({ backend, index }))
    .sort((a, b) => TIER_ORDER[a.backend.tier] - TIER_ORDER[b.backend.tier] || a.index - b.index)
    .map((entry) => entry.backend);

  const healthy = eligible.filter((backend) => !input.isDeprioritized(backend.id));
  const deprioritized = eligible.filter((backend) => input.isDeprioritized(backend.id));
  return [...healthy, ...deprioritized];
}

export function planBackends(
  backends: readonly AnalyzerBackend[],
  input: SelectionInput & { hybrid: boolean }
): BackendPlan {
  const chain = selectBackendChain(backends, input);
  if (!input.hybrid || input.connectivity === "POOR") {
    return { chain, hybridPair: null };
  }
  const local = chain.find((backend) => isLocalTier(backend.tier));
  const remote = chain.find((backend) => backend.tier === "REMOTE_VISION");
  return { chain, hybridPair: local && remote ? [local, remote] : null };
}
