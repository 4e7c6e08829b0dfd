import type { Logger } from "pino";
import { config, type ConnectivityQuality, type FusionSettings, type RecommendationThresholds } from "../config";
import { StaticConnectivityMonitor, type ConnectivityMonitor } from "../connectivity";
import { BackendError, toAnalysisErrorKind, type AnalysisErrorKind } from "../backends/errors";
import { startBackendCall } from "../backends/invoke";
import type { AnalysisContext, AnalysisImage, AnalyzerBackend, AnalyzerResult, BackendTier, CostClass } from "../backends/types";
import { isLocalTier } from "../backends/types";
import type { SessionEventPublisher } from "../events/session-publisher";
import { fuseDetections } from "../fusion/engine";
import type { BackendDetections } from "../fusion/types";
import { getBackendHealth, type BackendHealthRegistry, type BackendHealthSnapshot } from "../health/backend-health";
import { logger as rootLogger } from "../logger";
import { recommendTags } from "../recommendation/engine";
import type { HazardTaxonomy } from "../taxonomy/types";
import { AnalysisThrottler, type FrameThrottler } from "../throttle/throttler";
import { ensureTraceId, newSessionId, withTraceId } from "../trace/trace";
import { PrioritySemaphore, type AcquirePriority } from "./concurrency";
import { isEligible, planBackends, type BackendPlan } from "./selection";
import { SessionRecorder } from "./session";
import { InMemorySessionStore } from "./session-store";
import type { AnalysisMode, AnalysisSession, SessionState } from "./session-types";

export type OrchestratorSettings = {
  timeouts: { localMs: number; remoteMs: number; remoteRetryMs: number };
  remoteConcurrency: number;
  hybridMode: boolean;
  batchConcurrency: number;
  fusion: FusionSettings;
  recommendation: RecommendationThresholds;
  backendWeights?: Record<string, number>;
};

export type OrchestratorDeps = {
  backends: AnalyzerBackend[];
  taxonomy: HazardTaxonomy;
  health?: BackendHealthRegistry;
  connectivity?: ConnectivityMonitor;
  throttler?: FrameThrottler;
  publisher?: SessionEventPublisher;
  logger?: Logger;
  now?: () => number;
  settings?: Partial<OrchestratorSettings>;
};

export type FrameSubmission = {
  sessionId: string;
  result: Promise<AnalysisSession>;
  cancel: () => boolean;
};

export type BatchItem = {
  image: AnalysisImage;
  context?: AnalysisContext;
};

export type BackendHealthReport = {
  id: string;
  tier: BackendTier;
  costClass: CostClass;
  capabilities: string[];
  available: boolean;
  eligible: boolean;
  health: BackendHealthSnapshot;
};

export type HealthCheckReport = {
  status: "healthy" | "degraded" | "unavailable";
  connectivity: ConnectivityQuality;
  activeSessions: number;
  backends: BackendHealthReport[];
};

type AnalysisOutcome =
  | { ok: true; results: BackendDetections[] }
  | { ok: false; kind: AnalysisErrorKind; message: string };

type SessionRun = {
  recorder: SessionRecorder;
  signal: AbortSignal;
  mode: AnalysisMode;
  log: Logger;
};

const DEFAULT_SETTINGS: OrchestratorSettings = {
  timeouts: config.timeouts,
  remoteConcurrency: config.remoteVision.maxConcurrency,
  hybridMode: config.hybridMode,
  batchConcurrency: config.batchConcurrency,
  fusion: config.fusion,
  recommendation: config.recommendation
};

export function validateImage(image: AnalysisImage): string | null {
  if (image.data.byteLength === 0) {
    return "Image payload is empty";
  }
  if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width <= 0 || image.height <= 0) {
    return `Image dimensions ${image.width}x${image.height} are invalid`;
  }
  return null;
}

function isRetryableRemoteFailure(backend: AnalyzerBackend, result: AnalyzerResult): boolean {
  return (
    backend.tier === "REMOTE_VISION" &&
    !result.ok &&
    (result.error.kind === "TIMEOUT" || result.error.kind === "NETWORK")
  );
}

function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : "Analysis cancelled";
}

/**
 * Runs one analysis per submitted image: picks backends, calls them under
 * timeouts and concurrency limits, then fuses detections and maps them to tags.
 * Failures inside a session end up on the session record; the returned promise
 * always resolves with a finalized session.
 */
export class SmartAnalysisOrchestrator {
  private readonly backends: AnalyzerBackend[];
  private readonly taxonomy: HazardTaxonomy;
  private readonly health: BackendHealthRegistry;
  private readonly connectivity: ConnectivityMonitor;
  private readonly throttler: FrameThrottler;
  private readonly publisher: SessionEventPublisher | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly settings: OrchestratorSettings;
  private readonly localSlot = new PrioritySemaphore(1);
  private readonly remoteSlot: PrioritySemaphore;
  private readonly sessions = new InMemorySessionStore();
  private readonly running = new Map<string, Promise<AnalysisSession>>();
  private readonly reloads = new Map<string, Promise<void>>();

  constructor(deps: OrchestratorDeps) {
    this.backends = [...deps.backends];
    this.taxonomy = deps.taxonomy;
    this.health = deps.health ?? getBackendHealth();
    this.connectivity = deps.connectivity ?? new StaticConnectivityMonitor(config.connectivity);
    this.throttler = deps.throttler ?? new AnalysisThrottler(config.throttle.minIntervalMs);
    this.publisher = deps.publisher;
    this.logger = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => Date.now());
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.remoteSlot = new PrioritySemaphore(this.settings.remoteConcurrency);
  }

  submitPhoto(image: AnalysisImage, context: AnalysisContext = {}): Promise<AnalysisSession> {
    this.preemptStreams();
    return this.start(image, context, "capture").result;
  }

  submitFrame(image: AnalysisImage, context: AnalysisContext = {}): FrameSubmission | null {
    if (!this.throttler.tryAcquire()) {
      return null;
    }
    const { sessionId, result } = this.start(image, context, "stream");
    return { sessionId, result, cancel: () => this.cancelSession(sessionId) };
  }

  msUntilNextFrame(): number {
    return this.throttler.msUntilNextAccept();
  }

  async analyzeBatch(items: BatchItem[], maxConcurrency = this.settings.batchConcurrency): Promise<AnalysisSession[]> {
    const results: AnalysisSession[] = [];
    let cursor = 0;
    const worker = async () => {
      while (cursor < items.length) {
        const index = cursor;
        cursor += 1;
        results[index] = await this.submitPhoto(items[index].image, items[index].context);
      }
    };
    const workers = Math.max(1, Math.min(maxConcurrency, items.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results;
  }

  cancelSession(sessionId: string, reason = "Session cancelled"): boolean {
    const tracked = this.sessions.get(sessionId);
    if (!tracked || tracked.recorder.finalized || tracked.controller.signal.aborted) {
      return false;
    }
    tracked.controller.abort(new BackendError("CANCELLED", reason));
    return true;
  }

  cancelAll(): number {
    return this.sessions
      .active()
      .filter((tracked) => this.cancelSession(tracked.recorder.sessionId, "All sessions cancelled")).length;
  }

  getSession(sessionId: string): AnalysisSession | null {
    return this.sessions.get(sessionId)?.recorder.snapshot() ?? null;
  }

  getSessionState(sessionId: string): SessionState | null {
    return this.sessions.get(sessionId)?.recorder.state ?? null;
  }

  performHealthCheck(): HealthCheckReport {
    const connectivity = this.connectivity.getQuality();
    const backends = this.backends.map((backend) => ({
      id: backend.id,
      tier: backend.tier,
      costClass: backend.costClass,
      capabilities: [...backend.capabilities],
      available: backend.available(),
      eligible: isEligible(backend, connectivity),
      health: this.health.snapshot(backend.id)
    }));
    const usable = backends.filter((backend) => backend.eligible && !backend.health.deprioritized);
    const status =
      usable.length === 0 && !backends.some((backend) => backend.eligible)
        ? "unavailable"
        : usable.some((backend) => backend.tier !== "LIGHTWEIGHT_DETECTOR")
          ? "healthy"
          : "degraded";
    return { status, connectivity, activeSessions: this.sessions.active().length, backends };
  }

  // Resolves once every running session and background reload has settled.
  async drain(): Promise<void> {
    await Promise.allSettled([...this.running.values(), ...this.reloads.values()]);
  }

  private start(image: AnalysisImage, context: AnalysisContext, mode: AnalysisMode): { sessionId: string; result: Promise<AnalysisSession> } {
    const sessionId = newSessionId();
    const traceId = context.traceId ?? ensureTraceId();
    const recorder = new SessionRecorder(sessionId, traceId, mode, this.now);
    const controller = new AbortController();
    const tracked = { recorder, controller, mode, usesLocalBackend: false };
    this.sessions.add(tracked);

    const external = context.signal;
    const onExternalAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      controller.abort(external.reason);
    } else {
      external?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const log = withTraceId(this.logger, traceId).child({ sessionId, mode });
    const run: SessionRun = { recorder, signal: controller.signal, mode, log };
    const result = this.runSession(run, image, context, (plan) => {
      tracked.usesLocalBackend = plan.chain.some((backend) => isLocalTier(backend.tier));
    }).finally(() => {
      external?.removeEventListener("abort", onExternalAbort);
      this.running.delete(sessionId);
      this.sessions.evict();
    });
    this.running.set(sessionId, result);
    return { sessionId, result };
  }

  private preemptStreams(): void {
    for (const tracked of this.sessions.active()) {
      if (tracked.mode === "stream" && tracked.usesLocalBackend) {
        this.cancelSession(tracked.recorder.sessionId, "Preempted by photo capture");
      }
    }
  }

  private async runSession(
    run: SessionRun,
    image: AnalysisImage,
    context: AnalysisContext,
    onPlanned: (plan: BackendPlan) => void
  ): Promise<AnalysisSession> {
    const { recorder, log } = run;
    let session: AnalysisSession;
    try {
      session = await this.analyzeSession(run, image, context, onPlanned);
    } catch (error) {
      log.error({ err: error }, "analysis session crashed");
      session = recorder.finalized
        ? recorder.snapshot()
        : recorder.fail("BackendUnavailable", error instanceof Error ? error.message : String(error));
    }

    log.info(
      {
        state: session.state,
        hazards: session.fusedHazards.length,
        autoSelectTags: session.autoSelectTags,
        backendsUsed: session.backendsUsed,
        degraded: session.degradedCapability,
        errorKind: session.error?.kind,
        totalLatencyMs: session.totalLatencyMs
      },
      "analysis session finished"
    );
    await this.publish(session, log);
    return session;
  }

  private async analyzeSession(
    run: SessionRun,
    image: AnalysisImage,
    context: AnalysisContext,
    onPlanned: (plan: BackendPlan) => void
  ): Promise<AnalysisSession> {
    const { recorder, signal } = run;
    recorder.transition("SELECTING_BACKENDS");

    const invalid = validateImage(image);
    if (invalid) {
      return recorder.fail("MalformedInput", invalid);
    }

    const plan = planBackends(this.backends, {
      connectivity: this.connectivity.getQuality(),
      isDeprioritized: (backendId) => this.health.isDeprioritized(backendId),
      hybrid: context.hybrid ?? this.settings.hybridMode
    });
    recorder.setBackendChain(plan.chain.map((backend) => backend.id));
    onPlanned(plan);
    this.reloadUnavailable(plan, run.log);
    if (plan.chain.length === 0) {
      return recorder.fail("NoBackendAvailable", "No analyzer backend is available");
    }
    if (signal.aborted) {
      return recorder.fail("Cancelled", abortMessage(signal));
    }

    recorder.transition("ANALYZING");
    const outcome = plan.hybridPair
      ? await this.runHybrid(run, plan, image, context)
      : await this.runChain(run, plan.chain, image, context);

    if (signal.aborted) {
      return recorder.fail("Cancelled", abortMessage(signal));
    }
    if (!outcome.ok) {
      return recorder.fail(outcome.kind, outcome.message);
    }

    recorder.transition("FUSING");
    const fusedHazards = fuseDetections(outcome.results, {
      ...this.settings.fusion,
      backendWeights: this.settings.backendWeights,
      severityOf: (hazardType) => this.taxonomy.severityOf(hazardType)
    });

    recorder.transition("RECOMMENDING");
    const { recommendations, autoSelectTags } = recommendTags(fusedHazards, this.taxonomy, this.settings.recommendation);

    return recorder.complete({
      fusedHazards,
      recommendations,
      autoSelectTags,
      degradedCapability: outcome.results.every((result) => result.tier === "LIGHTWEIGHT_DETECTOR")
    });
  }

  private async runChain(
    run: SessionRun,
    chain: AnalyzerBackend[],
    image: AnalysisImage,
    context: AnalysisContext
  ): Promise<AnalysisOutcome> {
    const failures: string[] = [];
    for (const backend of chain) {
      const result = await this.attempt(run, backend, image, context);
      if (result.ok) {
        return { ok: true, results: [{ backendId: backend.id, tier: backend.tier, detections: result.detections }] };
      }
      if (result.error.kind === "MALFORMED_INPUT" || result.error.kind === "CANCELLED") {
        return { ok: false, kind: toAnalysisErrorKind(result.error.kind), message: result.error.message };
      }
      failures.push(`${backend.id}: ${result.error.kind}`);
    }
    return { ok: false, kind: "NoBackendAvailable", message: `All backends failed (${failures.join(", ")})` };
  }

  private async runHybrid(run: SessionRun, plan: BackendPlan, image: AnalysisImage, context: AnalysisContext): Promise<AnalysisOutcome> {
    const pair = plan.hybridPair;
    if (!pair) {
      return this.runChain(run, plan.chain, image, context);
    }
    const settled = await Promise.all(
      pair.map(async (backend) => ({ backend, result: await this.attempt(run, backend, image, context) }))
    );

    const fatal = settled.find(
      ({ result }) => !result.ok && (result.error.kind === "MALFORMED_INPUT" || result.error.kind === "CANCELLED")
    );
    if (fatal && !fatal.result.ok) {
      return { ok: false, kind: toAnalysisErrorKind(fatal.result.error.kind), message: fatal.result.error.message };
    }

    const results: BackendDetections[] = [];
    for (const { backend, result } of settled) {
      if (result.ok) {
        results.push({ backendId: backend.id, tier: backend.tier, detections: result.detections });
      }
    }

    if (results.length === 1) {
      const failed = settled.find(({ result }) => !result.ok);
      run.log.warn(
        { kind: "PartialFusionFailure", backendId: failed?.backend.id },
        "hybrid analysis continued with one backend"
      );
    }
    if (results.length > 0) {
      return { ok: true, results };
    }

    const remaining = plan.chain.filter((backend) => !pair.includes(backend));
    if (remaining.length === 0) {
      return { ok: false, kind: "NoBackendAvailable", message: "Both hybrid backends failed" };
    }
    return this.runChain(run, remaining, image, context);
  }

  private async attempt(
    run: SessionRun,
    backend: AnalyzerBackend,
    image: AnalysisImage,
    context: AnalysisContext
  ): Promise<AnalyzerResult> {
    const timeoutMs = isLocalTier(backend.tier) ? this.settings.timeouts.localMs : this.settings.timeouts.remoteMs;
    const first = await this.invokeWithSlot(run, backend, image, context, timeoutMs, false);
    if (!isRetryableRemoteFailure(backend, first) || run.signal.aborted) {
      return first;
    }
    run.log.info({ backendId: backend.id }, "retrying remote backend once");
    return this.invokeWithSlot(run, backend, image, context, this.settings.timeouts.remoteRetryMs, true);
  }

  private async invokeWithSlot(
    run: SessionRun,
    backend: AnalyzerBackend,
    image: AnalysisImage,
    context: AnalysisContext,
    timeoutMs: number,
    retry: boolean
  ): Promise<AnalyzerResult> {
    const slot = isLocalTier(backend.tier) ? this.localSlot : this.remoteSlot;
    const priority: AcquirePriority = run.mode === "capture" ? "capture" : "stream";

    let result: AnalyzerResult;
    try {
      const release = await slot.acquire(priority, run.signal);
      const call = startBackendCall(
        backend,
        image,
        { ...context, signal: run.signal },
        { timeoutMs, signal: run.signal, now: this.now }
      );
      // the slot stays taken until the adapter itself returns, even after a timeout or cancel
      void call.settled.then(release);
      result = await call.result;
    } catch (error) {
      if (!(error instanceof BackendError)) {
        throw error;
      }
      result = { ok: false, error: new BackendError(error.kind, error.message, backend.id), latencyMs: 0 };
    }

    this.recordOutcome(run, backend, result, retry);
    return result;
  }

  private recordOutcome(run: SessionRun, backend: AnalyzerBackend, result: AnalyzerResult, retry: boolean): void {
    run.recorder.recordAttempt({
      backendId: backend.id,
      tier: backend.tier,
      outcome: result.ok ? "SUCCESS" : result.error.kind,
      latencyMs: result.latencyMs,
      detectionCount: result.ok ? result.detections.length : 0,
      retry
    });

    if (result.ok) {
      this.health.recordSuccess(backend.id, result.latencyMs);
      return;
    }

    const { kind, message } = result.error;
    run.log.warn({ backendId: backend.id, kind, latencyMs: result.latencyMs, retry }, message);
    if (kind === "CANCELLED" || kind === "MALFORMED_INPUT") {
      return;
    }
    this.health.recordFailure(backend.id, result.latencyMs);
    if (kind === "REMOTE_RATE_LIMITED") {
      this.health.deprioritize(backend.id);
    }
    if (kind === "MODEL_NOT_LOADED") {
      this.scheduleReload(backend, run.log);
    }
  }

  // a local model that is not loaded keeps its backend out of selection, so load it for later sessions
  private reloadUnavailable(plan: BackendPlan, log: Logger): void {
    for (const backend of this.backends) {
      if (backend.reload && !plan.chain.includes(backend) && !backend.available()) {
        this.scheduleReload(backend, log);
      }
    }
  }

  private scheduleReload(backend: AnalyzerBackend, log: Logger): void {
    if (!backend.reload || this.reloads.has(backend.id)) {
      return;
    }
    const pending = backend
      .reload()
      .then(() => log.info({ backendId: backend.id }, "backend model reloaded"))
      .catch((error: unknown) => log.error({ backendId: backend.id, err: error }, "backend model reload failed"))
      .finally(() => this.reloads.delete(backend.id));
    this.reloads.set(backend.id, pending);
  }

  private async publish(session: AnalysisSession, log: Logger): Promise<void> {
    if (!this.publisher) {
      return;
    }
    try {
      await this.publisher.publish(session);
    } catch (error) {
      log.warn({ err: error }, "failed to publish analysis session event");
    }
  }
}
