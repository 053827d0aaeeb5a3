import { StorageError, errorMessage } from "./errors.js";
import type { ExtractionFailure, Extractor, ModelTier } from "./extraction.js";
import type { UnitCache } from "./cache.js";
import { log } from "./logger.js";
import type { ProviderMode, TextUnit, UnitPayload, UnitResult } from "./types.js";

export interface UnitFailure {
  documentId: string;
  unitId: string;
  model: string;
  error: ExtractionFailure;
}

export type UnitEvent = { ok: true; result: UnitResult } | { ok: false; failure: UnitFailure };

export interface BatchStats {
  total: number;
  succeeded: number;
  failed: number;
  /** Units never started because the batch was aborted. */
  skipped: number;
  cacheHits: number;
  liveCalls: number;
  escalations: number;
}

export interface BatchResult {
  /** Completion order, not input order. */
  results: UnitResult[];
  failures: UnitFailure[];
  stats: BatchStats;
  aborted: boolean;
}

export interface ProcessOptions {
  mode?: ProviderMode;
  concurrency?: number;
  signal?: AbortSignal;
  /** Skip cache reads; results are still written. */
  force?: boolean;
  onUnitDone?: (event: UnitEvent) => void;
}

export interface OrchestratorDeps {
  extractor: Extractor;
  cache: UnitCache;
  instructions: string;
  escalationConfidence: number;
  defaultMode?: ProviderMode;
  defaultConcurrency?: number;
}

type TierOutcome = { ok: true; payload: UnitPayload; model: string } | { ok: false; failure: UnitFailure };

/** Any UNSURE or low-confidence candidate sends the unit to the thorough model. */
export function needsEscalation(payload: UnitPayload, minConfidence: number): boolean {
  return Object.values(payload.candidates).some((list) =>
    list.some((c) => c.decision === "UNSURE" || c.confidence < minConfidence),
  );
}

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async processUnits(units: TextUnit[], options: ProcessOptions = {}): Promise<BatchResult> {
    const mode = options.mode ?? this.deps.defaultMode ?? "adaptive";
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? this.deps.defaultConcurrency ?? 4));
    const stats: BatchStats = {
      total: units.length,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      cacheHits: 0,
      liveCalls: 0,
      escalations: 0,
    };
    const results: UnitResult[] = [];
    const failures: UnitFailure[] = [];
    const halt: { storageError?: StorageError } = {};
    let cursor = 0;

    const emit = (event: UnitEvent): void => {
      if (!options.onUnitDone) return;
      try {
        options.onUnitDone(event);
      } catch (err) {
        log.warn(`progress hook threw: ${errorMessage(err)}`);
      }
    };

    const worker = async (): Promise<void> => {
      for (;;) {
        if (options.signal?.aborted || halt.storageError) return;
        const index = cursor++;
        if (index >= units.length) return;
        const unit = units[index];

        try {
          const outcome = await this.processUnit(unit, mode, options, stats);
          if (outcome.ok) {
            const result: UnitResult = {
              documentId: unit.documentId,
              unitId: unit.unitId,
              model: outcome.model,
              facts: outcome.payload.facts,
              candidates: outcome.payload.candidates,
            };
            results.push(result);
            stats.succeeded++;
            emit({ ok: true, result });
          } else {
            failures.push(outcome.failure);
            stats.failed++;
            log.warn(
              `unit ${unit.documentId}/${unit.unitId} failed (${outcome.failure.error.kind}): ${outcome.failure.error.message}`,
            );
            emit({ ok: false, failure: outcome.failure });
          }
        } catch (err) {
          if (err instanceof StorageError) {
            halt.storageError ??= err;
            return;
          }
          throw err;
        }
      }
    };

    const workerCount = Math.min(concurrency, units.length);
    log.debug(`processing ${units.length} units with ${workerCount} workers (mode=${mode})`);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (halt.storageError) throw halt.storageError;

    stats.skipped = stats.total - stats.succeeded - stats.failed;
    const aborted = options.signal?.aborted === true;
    log.info(
      `batch done: ${stats.succeeded}/${stats.total} ok, ${stats.failed} failed, ${stats.skipped} skipped, ` +
        `${stats.cacheHits} cache hits, ${stats.liveCalls} live calls, ${stats.escalations} escalations`,
    );
    return { results, failures, stats, aborted };
  }

  private async processUnit(
    unit: TextUnit,
    mode: ProviderMode,
    options: ProcessOptions,
    stats: BatchStats,
  ): Promise<TierOutcome> {
    if (mode !== "adaptive") return this.runTier(unit, mode, options, stats);

    const fast = await this.runTier(unit, "fast", options, stats);
    if (!fast.ok || !needsEscalation(fast.payload, this.deps.escalationConfidence)) return fast;

    stats.escalations++;
    log.debug(`escalating ${unit.documentId}/${unit.unitId} to the thorough model`);
    return this.runTier(unit, "thorough", options, stats);
  }

  private async runTier(
    unit: TextUnit,
    tier: ModelTier,
    options: ProcessOptions,
    stats: BatchStats,
  ): Promise<TierOutcome> {
    const model = this.deps.extractor.modelFor(tier);

    if (!options.force) {
      const cached = this.deps.cache.get(unit.documentId, unit.text, model);
      if (cached) {
        stats.cacheHits++;
        return { ok: true, payload: cached, model };
      }
    }

    stats.liveCalls++;
    const outcome = await this.deps.extractor.extract({
      unitText: unit.text,
      instructions: this.deps.instructions,
      tier,
      ...(options.signal ? { signal: options.signal } : {}),
    });
    if (!outcome.ok) {
      return {
        ok: false,
        failure: { documentId: unit.documentId, unitId: unit.unitId, model, error: outcome.error },
      };
    }

    this.deps.cache.put(unit.documentId, unit.text, model, outcome.value.payload);
    return { ok: true, payload: outcome.value.payload, model };
  }
}
