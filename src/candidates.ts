import type { KnownCatalog } from "./catalog.js";
import { log } from "./logger.js";
import { normalizeTerm, partialSimilarityRatio, similarityRatio } from "./similarity.js";
import type {
  Candidate,
  CandidateAggregate,
  CandidateDecision,
  CandidateDecisionRecord,
  CandidateObservation,
  DocumentResult,
  DomainHeuristics,
} from "./types.js";

export interface DecisionContext {
  catalog: KnownCatalog;
  heuristics: DomainHeuristics;
  similarityThreshold: number;
}

export interface AggregateOptions extends DecisionContext {
  minDocCount: number;
  exampleQuoteMaxChars?: number;
}

export interface CandidateVerdict {
  decision: CandidateDecision;
  target: string;
  reason: string;
}

export interface AggregationResult {
  aggregates: CandidateAggregate[];
  decisions: CandidateDecisionRecord[];
}

/** Catalog entry sharing a word stem of at least this length counts as a base. */
const MIN_STEM = 5;

function sharesStem(token: string, entryWords: string[]): boolean {
  return entryWords.some((word) => {
    if (word.includes(token) || token.includes(word)) return Math.min(word.length, token.length) >= 4;
    let common = 0;
    while (common < word.length && common < token.length && word[common] === token[common]) common++;
    return common >= MIN_STEM;
  });
}

function suggestBaseActivity(text: string, entries: readonly string[], heuristics: DomainHeuristics): string | undefined {
  let best: { entry: string; score: number } | undefined;
  for (const entry of entries) {
    const score = partialSimilarityRatio(text, normalizeTerm(entry));
    if (!best || score > best.score) best = { entry, score };
  }
  if (best && best.score >= heuristics.baseActivityMinScore) return best.entry;

  for (const hint of heuristics.baseActivityHints) {
    if (hint.keywords.some((k) => text.includes(k))) return hint.target;
  }
  return undefined;
}

/**
 * "Existing activity + qualifier" phrases such as "Reiten im Winter": a
 * qualifier word plus a word that stems from a known entry.
 */
function matchQualifiedActivity(
  candidate: Candidate,
  entries: readonly string[],
  heuristics: DomainHeuristics,
): string | undefined {
  const text = normalizeTerm(candidate.originalText);
  const tokens = text.split(" ").filter((t) => t.length > 0);
  const qualifiers = new Set(heuristics.qualifierPatterns.map((q) => normalizeTerm(q)));
  if (!tokens.some((t) => qualifiers.has(t))) return undefined;

  const baseTokens = tokens.filter((t) => !qualifiers.has(t) && t.length >= 4);
  const hasBase = entries.some((entry) => {
    const words = normalizeTerm(entry).split(" ");
    return baseTokens.some((t) => sharesStem(t, words));
  });
  if (!hasBase) return undefined;

  return suggestBaseActivity(text, entries, heuristics);
}

/**
 * Per-candidate taxonomy. Returns a verdict when the catalog already covers
 * the term; `undefined` means the candidate is still pending and goes on to
 * clustering.
 */
export function classifyCandidate(
  category: string,
  candidate: Candidate,
  ctx: DecisionContext,
): CandidateVerdict | undefined {
  const entries = ctx.catalog.entries(category);
  if (entries.length === 0) {
    return { decision: "IGNORE", target: candidate.normalizedKey, reason: `unknown category: ${category}` };
  }

  const exact = ctx.catalog.lookup(category, candidate.normalizedKey) ?? ctx.catalog.lookup(category, candidate.originalText);
  if (exact) {
    return { decision: "MAP_TO_EXISTING", target: exact, reason: "exact match with existing catalog entry" };
  }

  const normalized = normalizeTerm(candidate.originalText);
  let best: { entry: string; score: number } | undefined;
  for (const entry of entries) {
    const score = similarityRatio(normalized, normalizeTerm(entry));
    if (!best || score > best.score) best = { entry, score };
  }
  if (best && best.score >= ctx.similarityThreshold) {
    return {
      decision: "MAP_TO_EXISTING",
      target: best.entry,
      reason: `high similarity match (score: ${Math.round(best.score)})`,
    };
  }

  if (category === ctx.heuristics.qualifierCategory) {
    const base = matchQualifiedActivity(candidate, entries, ctx.heuristics);
    if (base) {
      return {
        decision: "MAP_TO_EXISTING",
        target: base,
        reason: "representable as existing activity plus conditions",
      };
    }
  }

  return undefined;
}

interface KeyGroup {
  category: string;
  key: string;
  observations: CandidateObservation[];
}

function bestObservation(observations: CandidateObservation[]): CandidateObservation {
  let best = observations[0];
  for (const obs of observations) {
    if (obs.candidate.confidence > best.candidate.confidence) best = obs;
  }
  return best;
}

function distinctDocuments(observations: CandidateObservation[]): number {
  return new Set(observations.map((o) => o.documentId)).size;
}

function shortestQuote(observations: CandidateObservation[]): string {
  let shortest = "";
  for (const obs of observations) {
    const quote = obs.candidate.quote.trim();
    if (quote.length === 0) continue;
    if (shortest.length === 0 || quote.length < shortest.length) shortest = quote;
  }
  return shortest;
}

/** The model's own IGNORE or MAP_TO_EXISTING keeps a sighting out of the new-term counts. */
function isNewTermProposal(candidate: Candidate): boolean {
  return candidate.decision !== "IGNORE" && candidate.decision !== "MAP_TO_EXISTING";
}

function decisionRow(
  group: KeyGroup,
  verdict: CandidateVerdict,
  observations: CandidateObservation[],
): CandidateDecisionRecord {
  const best = bestObservation(observations);
  return {
    category: group.category,
    normalizedKey: group.key,
    originalText: best.candidate.originalText,
    decision: verdict.decision,
    target: verdict.target,
    reason: verdict.reason,
    docCount: distinctDocuments(observations),
    confidence: best.candidate.confidence,
  };
}

/**
 * Greedy single-pass clustering: each unassigned key seeds a cluster and
 * absorbs every later unassigned key of the same category whose similarity
 * to the seed reaches the threshold. Results depend on first-seen order.
 */
function clusterGroups(groups: KeyGroup[], threshold: number): KeyGroup[][] {
  const assigned = new Set<number>();
  const clusters: KeyGroup[][] = [];
  for (let i = 0; i < groups.length; i++) {
    if (assigned.has(i)) continue;
    assigned.add(i);
    const seed = groups[i];
    const cluster = [seed];
    for (let j = i + 1; j < groups.length; j++) {
      if (assigned.has(j) || groups[j].category !== seed.category) continue;
      if (similarityRatio(seed.key, groups[j].key) >= threshold) {
        assigned.add(j);
        cluster.push(groups[j]);
      }
    }
    clusters.push(cluster);
  }
  return clusters;
}

export function aggregateCandidates(observations: CandidateObservation[], options: AggregateOptions): AggregationResult {
  const groups = new Map<string, KeyGroup>();
  for (const obs of observations) {
    const id = JSON.stringify([obs.category, obs.candidate.normalizedKey]);
    const group = groups.get(id);
    if (group) group.observations.push(obs);
    else groups.set(id, { category: obs.category, key: obs.candidate.normalizedKey, observations: [obs] });
  }

  const verdicts = new Map<KeyGroup, CandidateVerdict>();
  const proposals = new Map<KeyGroup, CandidateObservation[]>();
  const pending: KeyGroup[] = [];
  for (const group of groups.values()) {
    const verdict = classifyCandidate(group.category, bestObservation(group.observations).candidate, options);
    if (verdict) {
      verdicts.set(group, verdict);
      continue;
    }
    const proposed = group.observations.filter((o) => isNewTermProposal(o.candidate));
    if (proposed.length === 0) {
      verdicts.set(group, { decision: "IGNORE", target: group.key, reason: "not proposed as a new term by the model" });
      continue;
    }
    proposals.set(group, proposed);
    pending.push(group);
  }

  const aggregates: CandidateAggregate[] = [];
  for (const cluster of clusterGroups(pending, options.similarityThreshold)) {
    const members = cluster.flatMap((g) => proposals.get(g) ?? []);
    const docCount = distinctDocuments(members);

    if (docCount < options.minDocCount) {
      const reason = `insufficient document frequency (${docCount} < ${options.minDocCount})`;
      for (const group of cluster) verdicts.set(group, { decision: "IGNORE", target: group.key, reason });
      continue;
    }

    const best = bestObservation(members);
    const reason = `new term, appears in ${docCount} documents`;
    for (const group of cluster) verdicts.set(group, { decision: "ADD_NEW", target: best.candidate.normalizedKey, reason });

    const quote = shortestQuote(members);
    aggregates.push({
      category: best.category,
      representativeText: best.candidate.originalText,
      decision: "ADD_NEW",
      targetOrKey: best.candidate.normalizedKey,
      reason,
      supportingDocCount: docCount,
      exampleQuote: options.exampleQuoteMaxChars ? quote.slice(0, options.exampleQuoteMaxChars) : quote,
      meanConfidence: members.reduce((sum, o) => sum + o.candidate.confidence, 0) / members.length,
      memberKeys: cluster.map((g) => g.key),
    });
  }

  aggregates.sort((a, b) => b.supportingDocCount - a.supportingDocCount || b.meanConfidence - a.meanConfidence);

  const decisions: CandidateDecisionRecord[] = [];
  for (const group of groups.values()) {
    const verdict = verdicts.get(group);
    if (verdict) decisions.push(decisionRow(group, verdict, proposals.get(group) ?? group.observations));
  }

  log.info(
    `candidates: ${groups.size} keys, ${aggregates.length} ADD_NEW clusters, ` +
      `${decisions.filter((d) => d.decision === "MAP_TO_EXISTING").length} mapped, ` +
      `${decisions.filter((d) => d.decision === "IGNORE").length} ignored`,
  );
  return { aggregates, decisions };
}

export function collectObservations(documents: DocumentResult[]): CandidateObservation[] {
  const out: CandidateObservation[] = [];
  for (const doc of documents) {
    for (const [category, candidates] of Object.entries(doc.candidates)) {
      for (const candidate of candidates) out.push({ category, documentId: doc.documentId, candidate });
    }
  }
  return out;
}
