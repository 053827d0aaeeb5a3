import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { normalizeTerm } from "./similarity.js";
import type { DomainHeuristics } from "./types.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../config/catalog.json", import.meta.url));
export const DEFAULT_HEURISTICS_PATH = fileURLToPath(new URL("../config/heuristics.json", import.meta.url));

const CatalogFileSchema = z.object({
  categories: z.record(z.string(), z.array(z.string().min(1))),
  enumNames: z.record(z.string(), z.string()).default({}),
  permissions: z.array(z.string()).default([]),
});

const HeuristicsFileSchema = z.object({
  qualifierCategory: z.string().min(1),
  qualifierPatterns: z.array(z.string().min(1)),
  baseActivityMinScore: z.number().min(0).max(100),
  baseActivityHints: z.array(
    z.object({ keywords: z.array(z.string().min(1)), target: z.string().min(1) }),
  ),
  psToKw: z.number().positive(),
  paragraphFilter: z.object({
    minLength: z.number().int().min(0),
    rulePatterns: z.array(z.string().min(1)),
    skipPatterns: z.array(z.string()),
  }),
});

/**
 * Read-only view of the known vocabulary. Injected into the decision engine;
 * nothing in the pipeline mutates it.
 */
export interface KnownCatalog {
  categories(): string[];
  entries(category: string): readonly string[];
  /** Exact match on the normalized comparison form. Returns the catalog key. */
  lookup(category: string, term: string): string | undefined;
  enumName(category: string): string | undefined;
  permissions(): readonly string[];
}

export function createCatalog(
  categories: Record<string, readonly string[]>,
  enumNames: Record<string, string> = {},
  permissions: readonly string[] = [],
): KnownCatalog {
  const byCategory = new Map<string, readonly string[]>();
  const normalized = new Map<string, Map<string, string>>();
  for (const [category, values] of Object.entries(categories)) {
    const unique = [...new Set(values)];
    byCategory.set(category, Object.freeze(unique));
    const index = new Map<string, string>();
    for (const value of unique) {
      const norm = normalizeTerm(value);
      if (!index.has(norm)) index.set(norm, value);
    }
    normalized.set(category, index);
  }

  return {
    categories: () => [...byCategory.keys()],
    entries: (category) => byCategory.get(category) ?? [],
    lookup: (category, term) => normalized.get(category)?.get(normalizeTerm(term)),
    enumName: (category) => enumNames[category],
    permissions: () => permissions,
  };
}

async function readJson(filePath: string, what: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`cannot read ${what} file ${filePath}: ${errorMessage(err)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${what} file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
}

export async function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): Promise<KnownCatalog> {
  const parsed = CatalogFileSchema.safeParse(await readJson(filePath, "catalog"));
  if (!parsed.success) {
    throw new ConfigError(`invalid catalog file ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  const counts = Object.entries(parsed.data.categories).map(([k, v]) => `${k}=${v.length}`);
  log.debug(`catalog loaded from ${filePath}: ${counts.join(", ")}`);
  return createCatalog(parsed.data.categories, parsed.data.enumNames, parsed.data.permissions);
}

export async function loadHeuristics(filePath: string = DEFAULT_HEURISTICS_PATH): Promise<DomainHeuristics> {
  const parsed = HeuristicsFileSchema.safeParse(await readJson(filePath, "heuristics"));
  if (!parsed.success) {
    throw new ConfigError(`invalid heuristics file ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  for (const pattern of [...parsed.data.paragraphFilter.rulePatterns, ...parsed.data.paragraphFilter.skipPatterns]) {
    try {
      new RegExp(pattern, "i");
    } catch {
      throw new ConfigError(`invalid paragraph filter pattern in ${filePath}: ${pattern}`);
    }
  }
  return parsed.data;
}
