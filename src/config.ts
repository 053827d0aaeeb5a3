import path from "node:path";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import type { PipelineConfig, ProviderMode, SegmentationMode } from "./types.js";

const DEFAULT_FAST_MODEL = "deepseek-chat";
const DEFAULT_THOROUGH_MODEL = "deepseek-reasoner";
const DEFAULT_OUTPUT_DIR = "out";

const VALID_MODES: readonly ProviderMode[] = ["fast", "thorough", "adaptive"];
const VALID_SEGMENTATION: readonly SegmentationMode[] = ["sections", "paragraphs"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Expands `${VAR}` and `${VAR:-fallback}` in a config file value. All unset
 * variables are named in a single error.
 */
export function expandEnvRefs(value: string, field: string): string {
  const missing: string[] = [];
  const expanded = value.replace(ENV_REF, (_ref: string, name: string, fallback: string | undefined) => {
    const fromEnv = process.env[name];
    if (fromEnv) return fromEnv;
    if (fallback !== undefined) return fallback;
    missing.push(name);
    return "";
  });
  if (missing.length > 0) {
    throw new ConfigError(`${field} references unset environment variables: ${missing.join(", ")}`);
  }
  return expanded;
}

function tryParseUrl(text: string): URL | undefined {
  try {
    return new URL(text);
  } catch {
    return undefined;
  }
}

/** Trailing slashes are dropped; the SDK appends its own paths. */
export function endpointFrom(raw: string | undefined, source: "config" | "env"): string | undefined {
  const text = raw?.trim();
  if (!text) return undefined;

  const url = tryParseUrl(text);
  if (!url) {
    log.warn(`ignoring baseUrl from ${source}: not a valid URL`);
    return undefined;
  }
  const scheme = url.protocol.slice(0, -1);
  if (scheme !== "https" && scheme !== "http") {
    log.warn(`ignoring baseUrl from ${source}: unsupported URL scheme (${scheme})`);
    return undefined;
  }
  if (scheme === "http") log.warn(`baseUrl from ${source} is using insecure http; prefer https`);
  return url.href.replace(/\/+$/, "");
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function pickEnum<T extends string>(raw: unknown, valid: readonly T[], fallback: T, field: string): T {
  if (raw === undefined) return fallback;
  const hit = valid.find((v) => v === raw);
  if (hit === undefined) {
    log.warn(`ignoring ${field}=${String(raw)}: expected one of ${valid.join("|")}`);
    return fallback;
  }
  return hit;
}

/** Numbers may arrive as strings from CLI flags. */
function numberField(
  cfg: Record<string, unknown>,
  key: string,
  fallback: number,
  opts: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = cfg[key];
  if (raw === undefined || raw === null || raw === "") return fallback;
  const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : Number.NaN;
  const inRange =
    Number.isFinite(n) &&
    (opts.min === undefined || n >= opts.min) &&
    (opts.max === undefined || n <= opts.max) &&
    (!opts.integer || Number.isInteger(n));
  if (!inRange) {
    log.warn(`ignoring ${key}=${String(raw)}: out of range, using ${fallback}`);
    return fallback;
  }
  return n;
}

export function parseConfig(raw: unknown): PipelineConfig {
  const cfg = isRecord(raw) ? raw : {};

  const configKey = nonEmptyString(cfg.apiKey);
  const apiKey = configKey
    ? expandEnvRefs(configKey, "apiKey")
    : process.env.RULEMINE_API_KEY || process.env.OPENAI_API_KEY || undefined;

  const configUrl = nonEmptyString(cfg.baseUrl);
  const baseUrl = configUrl
    ? endpointFrom(expandEnvRefs(configUrl, "baseUrl"), "config")
    : endpointFrom(process.env.RULEMINE_BASE_URL || process.env.OPENAI_BASE_URL, "env");

  const fastModel =
    nonEmptyString(cfg.fastModel) ?? nonEmptyString(process.env.RULEMINE_MODEL_FAST) ?? DEFAULT_FAST_MODEL;
  const thoroughModel =
    nonEmptyString(cfg.thoroughModel) ??
    nonEmptyString(process.env.RULEMINE_MODEL_THOROUGH) ??
    DEFAULT_THOROUGH_MODEL;

  const outputDir = nonEmptyString(cfg.outputDir) ?? DEFAULT_OUTPUT_DIR;

  return {
    apiKey,
    baseUrl,
    fastModel,
    thoroughModel,
    providerMode: pickEnum(cfg.providerMode, VALID_MODES, "adaptive", "providerMode"),
    concurrency: numberField(cfg, "concurrency", 4, { min: 1, integer: true }),
    maxUnitChars: numberField(cfg, "maxUnitChars", 4000, { min: 1, integer: true }),
    segmentation: pickEnum(cfg.segmentation, VALID_SEGMENTATION, "sections", "segmentation"),
    minDocCount: numberField(cfg, "minDocCount", 5, { min: 1, integer: true }),
    similarityThreshold: numberField(cfg, "similarityThreshold", 80, { min: 0, max: 100 }),
    escalationConfidence: numberField(cfg, "escalationConfidence", 0.65, { min: 0, max: 1 }),
    fastTimeoutMs: numberField(cfg, "fastTimeoutMs", 60_000, { min: 1 }),
    thoroughTimeoutMs: numberField(cfg, "thoroughTimeoutMs", 90_000, { min: 1 }),
    emptyContentRetries: numberField(cfg, "emptyContentRetries", 2, { min: 0, integer: true }),
    emptyRetryDelayMs: numberField(cfg, "emptyRetryDelayMs", 1000, { min: 0 }),
    retry5xxCount: numberField(cfg, "retry5xxCount", 3, { min: 0, integer: true }),
    retryBackoffMs: numberField(cfg, "retryBackoffMs", 1000, { min: 0 }),
    defaultRetryAfterSec: numberField(cfg, "defaultRetryAfterSec", 60, { min: 0 }),
    maxRateLimitWaits: numberField(cfg, "maxRateLimitWaits", 0, { min: 0, integer: true }),
    quoteMaxChars: numberField(cfg, "quoteMaxChars", 500, { min: 1, integer: true }),
    exampleQuoteMaxChars: numberField(cfg, "exampleQuoteMaxChars", 200, { min: 1, integer: true }),
    outputDir,
    cachePath: nonEmptyString(cfg.cachePath) ?? path.join(outputDir, "cache.sqlite"),
    catalogPath: nonEmptyString(cfg.catalogPath),
    heuristicsPath: nonEmptyString(cfg.heuristicsPath),
    debug: cfg.debug === true,
  };
}

/**
 * Extraction needs both a key and an endpoint. Segmenting, merging and
 * proposing work without either.
 */
export function assertExtractionReady(config: PipelineConfig): { apiKey: string; baseUrl: string } {
  if (!config.apiKey) {
    throw new ConfigError("no API key: set apiKey in the config file, RULEMINE_API_KEY or OPENAI_API_KEY");
  }
  if (!config.baseUrl) {
    throw new ConfigError("no endpoint: set baseUrl in the config file, RULEMINE_BASE_URL or OPENAI_BASE_URL");
  }
  return { apiKey: config.apiKey, baseUrl: config.baseUrl };
}
