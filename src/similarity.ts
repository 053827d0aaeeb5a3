/**
 * String normalization and fuzzy similarity for German vocabulary terms.
 *
 * `similarityRatio` is the normalized indel similarity on a 0-100 scale:
 * 2 * LCS(a, b) / (|a| + |b|) * 100.
 */

const TRANSLITERATION: ReadonlyArray<[RegExp, string]> = [
  [/ä/g, "ae"],
  [/ö/g, "oe"],
  [/ü/g, "ue"],
  [/ß/g, "ss"],
];

const STOP_WORDS: ReadonlySet<string> = new Set([
  "und",
  "oder",
  "sowie",
  "bzw",
  "mit",
  "ohne",
  "von",
  "zu",
  "bei",
  "in",
  "an",
  "auf",
  "unter",
  "ueber",
]);

function transliterate(text: string): string {
  let out = text.normalize("NFC").toLowerCase();
  for (const [re, repl] of TRANSLITERATION) out = out.replace(re, repl);
  return out.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

/** Comparison form: no punctuation, no stop words, single spaces. */
export function normalizeTerm(text: string): string {
  return transliterate(text)
    .replace(/[_-]+/g, " ")
    .replace(/[^a-z0-9\s]/g, "")
    .split(/\s+/)
    .filter((w) => w.length > 0 && !STOP_WORDS.has(w))
    .join(" ");
}

export function toSnakeCase(text: string): string {
  return transliterate(text)
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }
  return prev[b.length];
}

export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (2 * lcsLength(a, b) * 100) / total;
}

/**
 * Best ratio of the shorter string against every equally long window of the
 * longer one.
 */
export function partialSimilarityRatio(a: string, b: string): number {
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  if (short.length === 0) return long.length === 0 ? 100 : 0;
  let best = 0;
  for (let start = 0; start + short.length <= long.length; start++) {
    const score = similarityRatio(short, long.slice(start, start + short.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}
