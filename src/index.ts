export * from "./types.js";
export { ConfigError, StorageError, errorMessage } from "./errors.js";
export { parseConfig, assertExtractionReady } from "./config.js";
export { initLogger, createConsoleBackend, log, type LoggerBackend } from "./logger.js";
export { normalizeTerm, toSnakeCase, similarityRatio, partialSimilarityRatio } from "./similarity.js";
export { createCatalog, loadCatalog, loadHeuristics, type KnownCatalog } from "./catalog.js";
export { segmentText, selectRuleBearingParagraphs, buildUnits, documentIdFromFilename } from "./chunking.js";
export { parseExtractionEnvelope, type DroppedEntry } from "./schemas.js";
export {
  ExtractionClient,
  buildExtractionInstructions,
  type Extractor,
  type ExtractionOutcome,
  type ExtractionFailure,
  type ModelTier,
} from "./extraction.js";
export { ResultCache, fingerprint, type UnitCache } from "./cache.js";
export { Orchestrator, needsEscalation, type BatchResult, type BatchStats, type UnitFailure } from "./orchestrator.js";
export { mergeConditions, mergeFacts, mergeCandidates, mergeDocument, mergeRunResults } from "./merge.js";
export { classifyCandidate, aggregateCandidates, collectObservations, type AggregationResult } from "./candidates.js";
export { OutputStore } from "./storage.js";
export {
  renderReviewCsv,
  renderChangelog,
  renderEnumPatch,
  renderModelUpdateProposal,
  summarizeDecisions,
  type ProposeSummary,
} from "./report.js";
export {
  segmentDocuments,
  extractUnits,
  mergeUnitResults,
  proposeCandidates,
  runPipeline,
  type SourceDocument,
  type PipelineSummary,
  type PipelineDeps,
} from "./pipeline.js";
