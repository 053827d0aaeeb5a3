/**
 * Segmentation of regulation text into bounded work units.
 *
 * Splits prefer legal section markers, then blank-line paragraphs, then
 * sentence boundaries. A single sentence longer than the limit is emitted
 * as-is rather than truncated.
 */

import path from "node:path";
import type { ParagraphFilterRules, SegmentationMode, TextUnit } from "./types.js";

/** `§ 3`, `Art. 2`, `Artikel 12` at the start of a line. */
const LEGAL_MARKER = /^[ \t]*(?:§\s*\d+|Art(?:ikel|\.)[ \t]*\d+)/gm;
/** `1.` or `(1)` headings; only used when no legal marker is present. */
const NUMBERED_HEADING = /^[ \t]*(?:\d+\.|\(\d+\))[ \t]+\S/gm;

const PARAGRAPH_BREAK = /\n[ \t]*\n/;
const SENTENCE_BREAK = /(?<=[.!?])\s+/;

export interface SegmentOptions {
  maxUnitChars: number;
  segmentation?: SegmentationMode;
  paragraphFilter?: ParagraphFilterRules;
}

function splitBeforeMatches(text: string, pattern: RegExp): string[] {
  const starts: number[] = [];
  for (const match of text.matchAll(pattern)) {
    if (match.index !== undefined && match.index > 0) starts.push(match.index);
  }
  if (starts.length === 0) return [text];
  const pieces: string[] = [];
  let prev = 0;
  for (const start of starts) {
    pieces.push(text.slice(prev, start));
    prev = start;
  }
  pieces.push(text.slice(prev));
  return pieces;
}

function splitSections(text: string): string[] {
  const legal = splitBeforeMatches(text, LEGAL_MARKER);
  if (legal.length > 1) return legal;
  return splitBeforeMatches(text, NUMBERED_HEADING);
}

/**
 * Greedy accumulation: parts are joined with `sep` until the next one would
 * push the unit over `max`.
 */
function accumulate(parts: string[], max: number, sep: string): string[] {
  const out: string[] = [];
  let current = "";
  for (const raw of parts) {
    const part = raw.trim();
    if (part.length === 0) continue;
    if (current.length === 0) {
      current = part;
    } else if (current.length + sep.length + part.length <= max) {
      current += sep + part;
    } else {
      out.push(current);
      current = part;
    }
  }
  if (current.length > 0) out.push(current);
  return out;
}

function resplitOversized(units: string[], max: number, pattern: RegExp, sep: string): string[] {
  return units.flatMap((unit) => (unit.length <= max ? [unit] : accumulate(unit.split(pattern), max, sep)));
}

export function segmentText(text: string, maxUnitChars: number): string[] {
  if (text.trim().length === 0) return [];
  if (text.length <= maxUnitChars) return [text];

  const sections = accumulate(splitSections(text), maxUnitChars, "\n");
  const paragraphs = resplitOversized(sections, maxUnitChars, PARAGRAPH_BREAK, "\n\n");
  return resplitOversized(paragraphs, maxUnitChars, SENTENCE_BREAK, " ");
}

export interface SelectedParagraph {
  /** Position among the document's non-empty paragraphs. */
  index: number;
  text: string;
}

export function selectRuleBearingParagraphs(text: string, rules: ParagraphFilterRules): SelectedParagraph[] {
  const ruleRe = rules.rulePatterns.length > 0 ? new RegExp(rules.rulePatterns.join("|"), "i") : undefined;
  const skipRe = rules.skipPatterns.length > 0 ? new RegExp(rules.skipPatterns.join("|"), "i") : undefined;

  return text
    .split(PARAGRAPH_BREAK)
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p, index) => ({ index, text: p }))
    .filter(({ text: p }) => {
      if (p.length < rules.minLength) return false;
      if (ruleRe && !ruleRe.test(p)) return false;
      if (skipRe && skipRe.test(p)) return false;
      return true;
    });
}

function formatOrdinal(prefix: string, i: number, count: number): string {
  const width = Math.max(3, String(Math.max(count - 1, 0)).length);
  return `${prefix}_${String(i).padStart(width, "0")}`;
}

/** Unit ids are stable for a given document text and options. */
export function buildUnits(documentId: string, text: string, options: SegmentOptions): TextUnit[] {
  if (options.segmentation === "paragraphs") {
    if (!options.paragraphFilter) {
      throw new Error("paragraph segmentation requires paragraph filter rules");
    }
    const selected = selectRuleBearingParagraphs(text, options.paragraphFilter);
    const total = text.split(PARAGRAPH_BREAK).filter((p) => p.trim().length > 0).length;
    return selected.map((p) => ({
      documentId,
      unitId: formatOrdinal("para", p.index, total),
      text: p.text,
    }));
  }

  const pieces = segmentText(text, options.maxUnitChars);
  return pieces.map((piece, i) => ({
    documentId,
    unitId: formatOrdinal("unit", i, pieces.length),
    text: piece,
  }));
}

/** `NSG-2019-042` style identifiers win over the bare file name. */
export function documentIdFromFilename(fileName: string): string {
  const base = path.basename(fileName);
  const match = base.match(/NSG-\d{4}-\d{3}/);
  if (match) return match[0];
  return base.replace(/\.[^.]+$/, "");
}
