/**
 * Per-document consolidation of unit results.
 *
 * Every step sorts its inputs into a canonical order first, so merging the
 * same unit results in any order yields the same document.
 */

import type {
  Candidate,
  CandidateMap,
  Condition,
  DocumentResult,
  Fact,
  UnitResult,
} from "./types.js";
import { RANGE_CONDITION_TYPES } from "./types.js";

export interface MergeOptions {
  quoteMaxChars: number;
  /** PS → kW factor for engine-power conditions; omitted means no conversion. */
  psToKw?: number;
}

const SEPARATOR = "; ";
const POWER_CONDITION = "motor_leistung";

/** JSON with object keys sorted at every level. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byStableJson<T>(a: T, b: T): number {
  return compareStrings(stableStringify(a), stableStringify(b));
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].filter((v) => v.length > 0).sort(compareStrings);
}

function asNumber(v: string | number): number | undefined {
  if (typeof v === "number") return v;
  if (v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

/** Numeric when both bounds are numeric, otherwise plain string order. */
export function compareBounds(a: string | number, b: string | number): number {
  const na = asNumber(a);
  const nb = asNumber(b);
  if (na !== undefined && nb !== undefined) return na - nb;
  return compareStrings(String(a), String(b));
}

export function factKey(fact: Fact): string {
  return JSON.stringify([fact.activity, fact.place, fact.permission, fact.zone?.type ?? "", fact.zone?.name ?? ""]);
}

export function canonicalizeCondition(cond: Condition, psToKw: number | undefined): Condition {
  if (psToKw === undefined || cond.type !== POWER_CONDITION) return cond;
  if (cond.unit?.toLowerCase() !== "ps" || cond.value === undefined) return cond;
  const ps = asNumber(cond.value);
  if (ps === undefined) return cond;
  return { ...cond, value: Math.round(ps * psToKw * 100) / 100, unit: "kw" };
}

type RangedCondition = Condition & { from: string | number; to: string | number };

function hasRange(cond: Condition): cond is RangedCondition {
  return cond.from !== undefined && cond.to !== undefined;
}

function mergeRanges(conditions: RangedCondition[]): Condition[] {
  const sorted = [...conditions].sort(
    (a, b) => compareBounds(a.from, b.from) || compareBounds(a.to, b.to) || byStableJson(a, b),
  );
  const out: Condition[] = [];
  let current: RangedCondition | undefined;

  for (const next of sorted) {
    if (!current) {
      current = { ...next };
      continue;
    }
    if (compareBounds(next.from, current.to) <= 0) {
      const end = compareBounds(next.to, current.to) > 0 ? next.to : current.to;
      const keepNext = (next.confidence ?? 0) > (current.confidence ?? 0);
      current = keepNext ? { ...next, from: current.from, to: end } : { ...current, to: end };
    } else {
      out.push(current);
      current = { ...next };
    }
  }
  if (current) out.push(current);
  return out;
}

function mergeScalars(conditions: Condition[]): Condition[] {
  const distinct = new Map<string, Condition>();
  for (const cond of conditions) distinct.set(stableStringify(cond), cond);
  const unique = [...distinct.values()].sort(byStableJson);

  const firstValue = unique[0]?.value;
  const sameValue =
    firstValue !== undefined && unique.every((c) => c.value !== undefined && String(c.value) === String(firstValue));
  if (!sameValue) return unique;

  let best = unique[0];
  for (const cond of unique) {
    if ((cond.confidence ?? 0) > (best.confidence ?? 0)) best = cond;
  }
  return [best];
}

export function mergeConditions(conditions: Condition[]): Condition[] {
  const byType = new Map<string, Condition[]>();
  for (const cond of conditions) {
    const list = byType.get(cond.type) ?? [];
    list.push(cond);
    byType.set(cond.type, list);
  }

  const out: Condition[] = [];
  for (const type of [...byType.keys()].sort(compareStrings)) {
    const group = byType.get(type) ?? [];
    if (RANGE_CONDITION_TYPES.has(type)) {
      const ranged = group.filter(hasRange);
      const open = group.filter((c) => !hasRange(c));
      out.push(...mergeRanges(ranged), ...mergeScalars(open));
    } else {
      out.push(...mergeScalars(group));
    }
  }
  return out;
}

function mergeFactGroup(members: Fact[]): Fact {
  const [first] = members;
  if (members.length === 1) return first;

  const merged: Fact = {
    activity: first.activity,
    place: first.place,
    permission: first.permission,
    conditions: mergeConditions(members.flatMap((f) => f.conditions)),
    citations: distinctSorted(members.flatMap((f) => f.citations)),
    confidence: Math.max(...members.map((f) => f.confidence)),
    normalizationReason: distinctSorted(members.map((f) => f.normalizationReason)).join(SEPARATOR),
  };
  if (first.zone) merged.zone = first.zone;
  return merged;
}

export function mergeFacts(facts: Fact[], options: Pick<MergeOptions, "psToKw"> = {}): Fact[] {
  const groups = new Map<string, Fact[]>();
  for (const raw of facts) {
    const fact: Fact = {
      ...raw,
      conditions: raw.conditions.map((c) => canonicalizeCondition(c, options.psToKw)),
    };
    const key = factKey(fact);
    const list = groups.get(key) ?? [];
    list.push(fact);
    groups.set(key, list);
  }

  return [...groups.keys()]
    .sort(compareStrings)
    .map((key) => mergeFactGroup([...(groups.get(key) ?? [])].sort(byStableJson)));
}

function capText(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}

function mergeCandidateGroup(members: Candidate[], quoteMaxChars: number): Candidate {
  const ordered = [...members].sort((a, b) => b.confidence - a.confidence || byStableJson(a, b));
  const best = ordered[0];
  const merged: Candidate = {
    normalizedKey: best.normalizedKey,
    originalText: best.originalText,
    quote: capText(distinctSorted(members.map((c) => c.quote)).join(SEPARATOR), quoteMaxChars),
    confidence: best.confidence,
  };
  const reasons = distinctSorted(members.map((c) => c.supportingReason ?? ""));
  if (reasons.length > 0) merged.supportingReason = reasons.join(SEPARATOR);
  if (best.decision) merged.decision = best.decision;
  return merged;
}

export function mergeCandidates(maps: CandidateMap[], quoteMaxChars: number): CandidateMap {
  const byCategory = new Map<string, Map<string, Candidate[]>>();
  for (const map of maps) {
    for (const [category, candidates] of Object.entries(map)) {
      const byKey = byCategory.get(category) ?? new Map<string, Candidate[]>();
      for (const candidate of candidates) {
        const list = byKey.get(candidate.normalizedKey) ?? [];
        list.push(candidate);
        byKey.set(candidate.normalizedKey, list);
      }
      byCategory.set(category, byKey);
    }
  }

  const out: CandidateMap = {};
  for (const category of [...byCategory.keys()].sort(compareStrings)) {
    const byKey = byCategory.get(category) ?? new Map<string, Candidate[]>();
    const merged = [...byKey.keys()]
      .sort(compareStrings)
      .map((key) => mergeCandidateGroup(byKey.get(key) ?? [], quoteMaxChars));
    if (merged.length > 0) out[category] = merged;
  }
  return out;
}

export function mergeDocument(documentId: string, unitResults: UnitResult[], options: MergeOptions): DocumentResult {
  const ordered = [...unitResults].sort((a, b) => compareStrings(a.unitId, b.unitId) || byStableJson(a, b));
  return {
    documentId,
    facts: mergeFacts(
      ordered.flatMap((r) => r.facts),
      options,
    ),
    candidates: mergeCandidates(
      ordered.map((r) => r.candidates),
      options.quoteMaxChars,
    ),
  };
}

/** Groups a whole run by document and merges each group. */
export function mergeRunResults(unitResults: UnitResult[], options: MergeOptions): DocumentResult[] {
  const byDocument = new Map<string, UnitResult[]>();
  for (const result of unitResults) {
    const list = byDocument.get(result.documentId) ?? [];
    list.push(result);
    byDocument.set(result.documentId, list);
  }
  return [...byDocument.keys()]
    .sort(compareStrings)
    .map((documentId) => mergeDocument(documentId, byDocument.get(documentId) ?? [], options));
}
