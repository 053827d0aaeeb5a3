import type { KnownCatalog } from "./catalog.js";
import { aggregateCandidates, collectObservations, type AggregationResult } from "./candidates.js";
import type { UnitCache } from "./cache.js";
import { buildUnits } from "./chunking.js";
import { buildExtractionInstructions, type Extractor } from "./extraction.js";
import { log } from "./logger.js";
import { mergeRunResults } from "./merge.js";
import { Orchestrator, type BatchResult, type BatchStats } from "./orchestrator.js";
import {
  renderChangelog,
  renderEnumPatch,
  renderModelUpdateProposal,
  renderReviewCsv,
  summarizeDecisions,
} from "./report.js";
import type { OutputStore } from "./storage.js";
import type {
  DocumentResult,
  DomainHeuristics,
  PipelineConfig,
  TextUnit,
  UnitResult,
} from "./types.js";

export interface SourceDocument {
  documentId: string;
  text: string;
}

export interface PipelineSummary {
  documents: number;
  units: BatchStats;
  documentsMerged: number;
  /** Documents with units but no successful one. */
  documentsFailed: number;
  aggregates: number;
  mappedToExisting: number;
  ignored: number;
  aborted: boolean;
}

export interface PipelineDeps {
  config: PipelineConfig;
  extractor: Extractor;
  cache: UnitCache;
  store: OutputStore;
  catalog: KnownCatalog;
  heuristics: DomainHeuristics;
  signal?: AbortSignal;
  now?: () => Date;
}

export function segmentDocuments(
  documents: SourceDocument[],
  config: Pick<PipelineConfig, "maxUnitChars" | "segmentation">,
  heuristics: DomainHeuristics,
): TextUnit[] {
  const units = documents.flatMap((doc) =>
    buildUnits(doc.documentId, doc.text, {
      maxUnitChars: config.maxUnitChars,
      segmentation: config.segmentation,
      paragraphFilter: heuristics.paragraphFilter,
    }),
  );
  log.info(`segmented ${documents.length} documents into ${units.length} units (${config.segmentation})`);
  return units;
}

/** Runs the batch and persists every result and failure it produced. */
export async function extractUnits(
  units: TextUnit[],
  deps: Pick<PipelineDeps, "config" | "extractor" | "cache" | "store" | "catalog" | "signal">,
  options: { force?: boolean } = {},
): Promise<BatchResult> {
  const orchestrator = new Orchestrator({
    extractor: deps.extractor,
    cache: deps.cache,
    instructions: buildExtractionInstructions(deps.catalog),
    escalationConfidence: deps.config.escalationConfidence,
    defaultMode: deps.config.providerMode,
    defaultConcurrency: deps.config.concurrency,
  });

  const batch = await orchestrator.processUnits(units, {
    ...(deps.signal ? { signal: deps.signal } : {}),
    force: options.force === true,
  });

  for (const result of batch.results) await deps.store.writeUnitResult(result);
  for (const failure of batch.failures) {
    await deps.store.appendJsonl("failures", {
      documentId: failure.documentId,
      unitId: failure.unitId,
      model: failure.model,
      kind: failure.error.kind,
      message: failure.error.message,
      ...(failure.error.status !== undefined ? { status: failure.error.status } : {}),
    });
  }
  return batch;
}

export async function mergeUnitResults(
  unitResults: UnitResult[],
  deps: Pick<PipelineDeps, "config" | "store" | "heuristics">,
  options: { overwrite?: boolean } = {},
): Promise<DocumentResult[]> {
  const documents = mergeRunResults(unitResults, {
    quoteMaxChars: deps.config.quoteMaxChars,
    psToKw: deps.heuristics.psToKw,
  });
  let written = 0;
  for (const doc of documents) {
    if (await deps.store.writeDocumentResult(doc, options)) written++;
  }
  await deps.store.writeSummary("merge_summary", {
    unitResults: unitResults.length,
    documents: documents.length,
    written,
    keptExisting: documents.length - written,
  });
  log.info(`merged ${unitResults.length} unit results into ${documents.length} documents (${written} written)`);
  return documents;
}

export async function proposeCandidates(
  documents: DocumentResult[],
  deps: Pick<PipelineDeps, "config" | "store" | "catalog" | "heuristics" | "now">,
): Promise<AggregationResult> {
  const observations = collectObservations(documents);
  const result = aggregateCandidates(observations, {
    catalog: deps.catalog,
    heuristics: deps.heuristics,
    minDocCount: deps.config.minDocCount,
    similarityThreshold: deps.config.similarityThreshold,
    exampleQuoteMaxChars: deps.config.exampleQuoteMaxChars,
  });
  const generatedAt = deps.now ? deps.now() : new Date();

  await deps.store.writeAggregates(result.aggregates, result.decisions);
  await deps.store.writeReport("candidates_review.csv", renderReviewCsv(result.aggregates));
  await deps.store.writeReport("CHANGELOG.md", renderChangelog(result.aggregates, result.decisions, generatedAt));
  await deps.store.writeReport(
    "dbml_patches/enum_additions.dbml",
    renderEnumPatch(result.aggregates, deps.catalog, generatedAt),
  );
  await deps.store.writeReport(
    "model_update_proposal.md",
    renderModelUpdateProposal(result.aggregates, deps.config.minDocCount, generatedAt),
  );
  await deps.store.writeSummary(
    "propose_summary",
    summarizeDecisions(result.decisions, {
      totalDocuments: documents.length,
      totalCandidates: observations.length,
      minDocCount: deps.config.minDocCount,
    }),
  );
  return result;
}

/** segment → extract → merge → propose, persisting each stage. */
export async function runPipeline(
  documents: SourceDocument[],
  deps: PipelineDeps,
  options: { force?: boolean; overwrite?: boolean } = {},
): Promise<PipelineSummary> {
  const units = segmentDocuments(documents, deps.config, deps.heuristics);
  const batch = await extractUnits(units, deps, options);

  // An interrupted batch covers part of the corpus. Merged documents and
  // proposals from an earlier complete run stay as they are.
  if (batch.aborted) {
    log.warn(
      `run interrupted with ${batch.stats.skipped} units not started: ` +
        `unit results saved, merge and proposals skipped`,
    );
    const summary: PipelineSummary = {
      documents: documents.length,
      units: batch.stats,
      documentsMerged: 0,
      documentsFailed: 0,
      aggregates: 0,
      mappedToExisting: 0,
      ignored: 0,
      aborted: true,
    };
    await deps.store.writeSummary("summary", summary);
    return summary;
  }

  const merged = await mergeUnitResults(batch.results, deps, { overwrite: options.overwrite !== false });
  const proposals = await proposeCandidates(merged, deps);

  const documentsWithUnits = new Set(units.map((u) => u.documentId));
  const mergedIds = new Set(merged.map((d) => d.documentId));
  const summary: PipelineSummary = {
    documents: documents.length,
    units: batch.stats,
    documentsMerged: merged.length,
    documentsFailed: [...documentsWithUnits].filter((id) => !mergedIds.has(id)).length,
    aggregates: proposals.aggregates.length,
    mappedToExisting: proposals.decisions.filter((d) => d.decision === "MAP_TO_EXISTING").length,
    ignored: proposals.decisions.filter((d) => d.decision === "IGNORE").length,
    aborted: batch.aborted,
  };
  await deps.store.writeSummary("summary", summary);
  return summary;
}
