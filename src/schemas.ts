import { z } from "zod";
import { toSnakeCase } from "./similarity.js";
import type { Candidate, CandidateMap, Condition, Fact, UnitPayload } from "./types.js";

// Wire shapes: what the completion service is asked to return (snake_case).
// Each entry is validated on its own so one bad rule does not sink the unit.

const RangeBound = z.union([z.string().min(1), z.number()]);

export const ConditionWireSchema = z.object({
  type: z.string().min(1),
  value: z.union([z.string(), z.number()]).nullish(),
  from: RangeBound.nullish(),
  to: RangeBound.nullish(),
  unit: z.string().nullish(),
  confidence: z.number().min(0).max(1).nullish(),
  note: z.string().nullish(),
});

export const ZoneWireSchema = z.object({
  zone_typ: z.string().min(1),
  zone_name: z.string().nullish(),
});

export const RuleWireSchema = z.object({
  activity: z.string().min(1),
  place: z.string().min(1),
  permission: z.string().min(1),
  zone: ZoneWireSchema.nullish(),
  conditions: z.array(z.unknown()).default([]),
  citations: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1),
  normalization_reason: z.string().nullish(),
});

export const CandidateDecisionSchema = z.enum(["ADD_NEW", "MAP_TO_EXISTING", "IGNORE", "UNSURE"]);

export const CandidateWireSchema = z
  .object({
    key_snake: z.string().nullish(),
    original: z.string().min(1),
    quote: z.string().nullish(),
    confidence: z.number().min(0).max(1),
    why_new: z.string().nullish(),
    decision: CandidateDecisionSchema.nullish(),
  })
  .refine((c) => toSnakeCase(c.key_snake || c.original).length > 0, {
    message: "candidate has no usable key",
  });

export const ExtractionEnvelopeSchema = z.object({
  rules: z.array(z.unknown()),
  new_candidates: z.record(z.string(), z.array(z.unknown())).default({}),
});

export interface DroppedEntry {
  path: string;
  reason: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function toCondition(wire: z.infer<typeof ConditionWireSchema>): Condition {
  const out: Condition = { type: wire.type };
  if (wire.value !== null && wire.value !== undefined) out.value = wire.value;
  if (wire.from !== null && wire.from !== undefined) out.from = wire.from;
  if (wire.to !== null && wire.to !== undefined) out.to = wire.to;
  if (wire.unit) out.unit = wire.unit;
  if (wire.confidence !== null && wire.confidence !== undefined) out.confidence = wire.confidence;
  if (wire.note) out.note = wire.note;
  return out;
}

function toFact(wire: z.infer<typeof RuleWireSchema>, conditions: Condition[]): Fact {
  const fact: Fact = {
    activity: wire.activity,
    place: wire.place,
    permission: wire.permission,
    conditions,
    citations: [...new Set(wire.citations)].sort(),
    confidence: wire.confidence,
    normalizationReason: wire.normalization_reason ?? "",
  };
  if (wire.zone) {
    fact.zone = wire.zone.zone_name
      ? { type: wire.zone.zone_typ, name: wire.zone.zone_name }
      : { type: wire.zone.zone_typ };
  }
  return fact;
}

function toCandidate(wire: z.infer<typeof CandidateWireSchema>): Candidate {
  const candidate: Candidate = {
    normalizedKey: toSnakeCase(wire.key_snake || wire.original),
    originalText: wire.original,
    quote: wire.quote ?? "",
    confidence: wire.confidence,
  };
  if (wire.why_new) candidate.supportingReason = wire.why_new;
  if (wire.decision) candidate.decision = wire.decision;
  return candidate;
}

export type EnvelopeParse =
  | { ok: true; payload: UnitPayload; dropped: DroppedEntry[] }
  | { ok: false; reason: string };

/**
 * Validate a parsed reply. A wrong top-level shape fails the whole reply;
 * invalid rules, conditions or candidates are dropped and reported.
 */
export function parseExtractionEnvelope(raw: unknown): EnvelopeParse {
  const envelope = ExtractionEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, reason: describeIssues(envelope.error) };
  }

  const dropped: DroppedEntry[] = [];
  const facts: Fact[] = [];

  envelope.data.rules.forEach((entry, i) => {
    const rule = RuleWireSchema.safeParse(entry);
    if (!rule.success) {
      dropped.push({ path: `rules[${i}]`, reason: describeIssues(rule.error) });
      return;
    }
    const conditions: Condition[] = [];
    rule.data.conditions.forEach((condEntry, j) => {
      const cond = ConditionWireSchema.safeParse(condEntry);
      if (!cond.success) {
        dropped.push({ path: `rules[${i}].conditions[${j}]`, reason: describeIssues(cond.error) });
        return;
      }
      conditions.push(toCondition(cond.data));
    });
    facts.push(toFact(rule.data, conditions));
  });

  const candidates: CandidateMap = {};
  for (const [category, entries] of Object.entries(envelope.data.new_candidates)) {
    const kept: Candidate[] = [];
    entries.forEach((entry, i) => {
      const cand = CandidateWireSchema.safeParse(entry);
      if (!cand.success) {
        dropped.push({ path: `new_candidates.${category}[${i}]`, reason: describeIssues(cand.error) });
        return;
      }
      kept.push(toCandidate(cand.data));
    });
    if (kept.length > 0) candidates[category] = kept;
  }

  return { ok: true, payload: { facts, candidates }, dropped };
}

// Persisted shapes (camelCase domain objects) read back from the cache and
// from output files.

export const ConditionSchema = z.object({
  type: z.string(),
  value: z.union([z.string(), z.number()]).optional(),
  from: z.union([z.string(), z.number()]).optional(),
  to: z.union([z.string(), z.number()]).optional(),
  unit: z.string().optional(),
  confidence: z.number().optional(),
  note: z.string().optional(),
});

export const FactSchema = z.object({
  activity: z.string(),
  place: z.string(),
  permission: z.string(),
  zone: z.object({ type: z.string(), name: z.string().optional() }).optional(),
  conditions: z.array(ConditionSchema),
  citations: z.array(z.string()),
  confidence: z.number(),
  normalizationReason: z.string(),
});

export const CandidateSchema = z.object({
  normalizedKey: z.string(),
  originalText: z.string(),
  quote: z.string(),
  confidence: z.number(),
  supportingReason: z.string().optional(),
  decision: CandidateDecisionSchema.optional(),
});

export const UnitPayloadSchema = z.object({
  facts: z.array(FactSchema),
  candidates: z.record(z.string(), z.array(CandidateSchema)),
});

export const UnitResultSchema = UnitPayloadSchema.extend({
  documentId: z.string(),
  unitId: z.string(),
  model: z.string(),
});

export const DocumentResultSchema = UnitPayloadSchema.extend({
  documentId: z.string(),
});

export const TextUnitSchema = z.object({
  documentId: z.string().min(1),
  unitId: z.string().min(1),
  text: z.string().min(1),
});
