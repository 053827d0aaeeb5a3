import type { KnownCatalog } from "./catalog.js";
import type { CandidateAggregate, CandidateDecisionRecord } from "./types.js";

export const REVIEW_CSV_COLUMNS = [
  "category",
  "candidate",
  "decision",
  "target_or_key",
  "reason",
  "doc_count",
  "example_quote",
  "confidence_avg",
] as const;

export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** One row per aggregate, in aggregate order. */
export function renderReviewCsv(aggregates: CandidateAggregate[]): string {
  const lines = [REVIEW_CSV_COLUMNS.join(",")];
  for (const agg of aggregates) {
    lines.push(
      [
        agg.category,
        agg.representativeText,
        agg.decision,
        agg.targetOrKey,
        agg.reason,
        agg.supportingDocCount,
        agg.exampleQuote,
        agg.meanConfidence.toFixed(2),
      ]
        .map(escapeCsvField)
        .join(","),
    );
  }
  return lines.join("\n") + "\n";
}

function categoryTitle(category: string): string {
  return category
    .split("_")
    .filter((w) => w.length > 0)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(" ");
}

function groupByCategory(aggregates: CandidateAggregate[]): Map<string, CandidateAggregate[]> {
  const out = new Map<string, CandidateAggregate[]>();
  for (const agg of aggregates) {
    const list = out.get(agg.category) ?? [];
    list.push(agg);
    out.set(agg.category, list);
  }
  return out;
}

export function renderChangelog(
  aggregates: CandidateAggregate[],
  decisions: CandidateDecisionRecord[],
  generatedAt: Date,
): string {
  const lines: string[] = ["# Catalog Changes", "", `Generated on: ${generatedAt.toISOString()}`, ""];

  if (aggregates.length === 0) {
    lines.push("## No new entries", "", "All candidates were mapped to existing entries or ignored.", "");
  } else {
    lines.push(`## New Entries (${aggregates.length} additions)`, "");
    const byCategory = groupByCategory(aggregates);
    for (const category of [...byCategory.keys()].sort()) {
      lines.push(`### ${categoryTitle(category)}`, "");
      const entries = [...(byCategory.get(category) ?? [])].sort((a, b) =>
        a.targetOrKey < b.targetOrKey ? -1 : a.targetOrKey > b.targetOrKey ? 1 : 0,
      );
      for (const agg of entries) {
        lines.push(`**${agg.targetOrKey}**`);
        lines.push(`- Original term: ${agg.representativeText}`);
        lines.push(`- Found in ${agg.supportingDocCount} documents`);
        if (agg.exampleQuote) lines.push(`- Example: "${agg.exampleQuote}"`);
        lines.push(`- Mean confidence: ${agg.meanConfidence.toFixed(2)}`);
        if (agg.memberKeys.length > 1) lines.push(`- Variants: ${agg.memberKeys.join(", ")}`);
        lines.push("");
      }
    }
  }

  const count = (d: CandidateDecisionRecord["decision"]): number => decisions.filter((r) => r.decision === d).length;
  lines.push(
    "## Summary Statistics",
    "",
    `- Candidate keys analyzed: ${decisions.length}`,
    `- New entries proposed: ${aggregates.length}`,
    `- Mapped to existing entries: ${count("MAP_TO_EXISTING")}`,
    `- Ignored (low frequency or unknown category): ${count("IGNORE")}`,
    "",
  );
  return lines.join("\n");
}

/** DBML enum blocks listing the proposed keys per catalog enum. */
export function renderEnumPatch(aggregates: CandidateAggregate[], catalog: KnownCatalog, generatedAt: Date): string {
  const lines = ["// Generated enum additions", `// Generated on: ${generatedAt.toISOString()}`, ""];
  const byEnum = new Map<string, Set<string>>();
  for (const agg of aggregates) {
    const enumName = catalog.enumName(agg.category);
    if (!enumName) continue;
    const keys = byEnum.get(enumName) ?? new Set<string>();
    keys.add(agg.targetOrKey);
    byEnum.set(enumName, keys);
  }

  if (byEnum.size === 0) {
    lines.push("// No new enum values to add", "");
    return lines.join("\n");
  }

  for (const enumName of [...byEnum.keys()].sort()) {
    const keys = [...(byEnum.get(enumName) ?? [])].sort();
    lines.push(`Enum ${enumName} {`, ...keys.map((k) => `  ${k}`), "}", "");
  }
  return lines.join("\n");
}

/** Mean confidence above which a proposed entry is reviewed first. */
export const HIGH_CONFIDENCE = 0.7;

export function renderModelUpdateProposal(
  aggregates: CandidateAggregate[],
  minDocCount: number,
  generatedAt: Date,
): string {
  const lines: string[] = ["# Catalog Update Proposal", "", `Generated on: ${generatedAt.toISOString()}`, ""];

  lines.push("## Executive Summary", "");
  if (aggregates.length === 0) {
    lines.push(`No candidate term reached ${minDocCount} documents; the catalog needs no new entries.`, "");
  } else {
    lines.push(
      `This proposal adds ${aggregates.length} new catalog entries, each found in at least ${minDocCount} documents.`,
      "",
    );
    const priority = aggregates.filter((a) => a.meanConfidence > HIGH_CONFIDENCE);
    if (priority.length > 0) {
      lines.push(
        `**High priority**: ${priority.length} entries have a mean confidence above ${HIGH_CONFIDENCE} and should be reviewed first:`,
        "",
        ...priority.map((a) => `- \`${a.targetOrKey}\` (${a.category}, ${a.supportingDocCount} documents)`),
        "",
      );
    }
  }

  lines.push(
    "## Method",
    "",
    "1. Regulation texts are split into units and each unit is extracted into rules and candidate terms.",
    "2. Phrases made of an existing activity and a qualifier map to that activity plus conditions.",
    "3. Spelling variants are clustered by similarity before documents are counted.",
    `4. Only clusters found in at least ${minDocCount} documents are proposed.`,
    "",
    "## Next Steps",
    "",
    "1. Review `candidates_review.csv`, high-priority entries first.",
    "2. Check each example quote against its source document.",
    "3. Apply `dbml_patches/enum_additions.dbml` to the data model.",
    "4. Add the new keys to the catalog so later runs map them as existing entries.",
    "",
  );
  return lines.join("\n");
}

export interface CategoryDecisionCounts {
  total: number;
  addNew: number;
  mapExisting: number;
  ignore: number;
}

export interface ProposeSummary {
  totalDocuments: number;
  totalCandidates: number;
  minDocCount: number;
  /** Per-key decision counts, categories in name order. */
  categories: Record<string, CategoryDecisionCounts>;
}

export function summarizeDecisions(
  decisions: CandidateDecisionRecord[],
  totals: { totalDocuments: number; totalCandidates: number; minDocCount: number },
): ProposeSummary {
  const categories: Record<string, CategoryDecisionCounts> = {};
  for (const category of [...new Set(decisions.map((d) => d.category))].sort()) {
    const rows = decisions.filter((d) => d.category === category);
    categories[category] = {
      total: rows.length,
      addNew: rows.filter((d) => d.decision === "ADD_NEW").length,
      mapExisting: rows.filter((d) => d.decision === "MAP_TO_EXISTING").length,
      ignore: rows.filter((d) => d.decision === "IGNORE").length,
    };
  }
  return { ...totals, categories };
}
