export type ProviderMode = "fast" | "thorough" | "adaptive";
export type SegmentationMode = "sections" | "paragraphs";
export type CandidateDecision = "ADD_NEW" | "MAP_TO_EXISTING" | "IGNORE" | "UNSURE";

/** Condition types whose values form intervals and are merged by range. */
export const RANGE_CONDITION_TYPES: ReadonlySet<string> = new Set(["datumspanne", "tageszeit"]);

export interface PipelineConfig {
  apiKey: string | undefined;
  baseUrl: string | undefined;
  fastModel: string;
  thoroughModel: string;
  providerMode: ProviderMode;
  concurrency: number;
  maxUnitChars: number;
  segmentation: SegmentationMode;
  minDocCount: number;
  similarityThreshold: number;
  /** Candidates below this confidence trigger escalation in adaptive mode. */
  escalationConfidence: number;
  fastTimeoutMs: number;
  thoroughTimeoutMs: number;
  emptyContentRetries: number;
  emptyRetryDelayMs: number;
  retry5xxCount: number;
  retryBackoffMs: number;
  defaultRetryAfterSec: number;
  /** 0 means no limit: the server decides how long we wait. */
  maxRateLimitWaits: number;
  quoteMaxChars: number;
  exampleQuoteMaxChars: number;
  outputDir: string;
  cachePath: string;
  catalogPath: string | undefined;
  heuristicsPath: string | undefined;
  debug: boolean;
}

export interface TextUnit {
  documentId: string;
  unitId: string;
  text: string;
}

export interface Condition {
  type: string;
  value?: string | number;
  from?: string | number;
  to?: string | number;
  unit?: string;
  confidence?: number;
  note?: string;
}

export interface Zone {
  type: string;
  name?: string;
}

export interface Fact {
  activity: string;
  place: string;
  permission: string;
  zone?: Zone;
  conditions: Condition[];
  /** Set semantics; kept sorted once merged. */
  citations: string[];
  confidence: number;
  normalizationReason: string;
}

export interface Candidate {
  normalizedKey: string;
  originalText: string;
  quote: string;
  confidence: number;
  supportingReason?: string;
  /** Decision suggested by the model; UNSURE drives escalation. */
  decision?: CandidateDecision;
}

/** category → candidates */
export type CandidateMap = Record<string, Candidate[]>;

/** What the completion service yields for one unit; this is what the cache stores. */
export interface UnitPayload {
  facts: Fact[];
  candidates: CandidateMap;
}

export interface UnitResult extends UnitPayload {
  documentId: string;
  unitId: string;
  model: string;
}

export interface DocumentResult {
  documentId: string;
  facts: Fact[];
  candidates: CandidateMap;
}

export interface CandidateObservation {
  category: string;
  documentId: string;
  candidate: Candidate;
}

export interface CandidateAggregate {
  category: string;
  representativeText: string;
  decision: CandidateDecision;
  targetOrKey: string;
  reason: string;
  supportingDocCount: number;
  exampleQuote: string;
  meanConfidence: number;
  memberKeys: string[];
}

export interface CandidateDecisionRecord {
  category: string;
  normalizedKey: string;
  originalText: string;
  decision: CandidateDecision;
  target: string;
  reason: string;
  docCount: number;
  confidence: number;
}

export interface ParagraphFilterRules {
  minLength: number;
  /** A paragraph must match at least one of these (case-insensitive). */
  rulePatterns: string[];
  /** ...and none of these. */
  skipPatterns: string[];
}

export interface DomainHeuristics {
  /** Words that mark a phrase as "existing activity + qualifier". */
  qualifierPatterns: string[];
  /** Keyword fallbacks for the base activity, checked in order. */
  baseActivityHints: Array<{ keywords: string[]; target: string }>;
  /** Minimum partial similarity for picking a base activity directly. */
  baseActivityMinScore: number;
  /** PS → kW factor applied to engine-power conditions. */
  psToKw: number;
  /** Catalog category the qualifier heuristic applies to. */
  qualifierCategory: string;
  paragraphFilter: ParagraphFilterRules;
}
