import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { setTimeout as sleep } from "node:timers/promises";
import type { KnownCatalog } from "./catalog.js";
import { errorMessage } from "./errors.js";
import { parseJsonObject } from "./json-extract.js";
import { log } from "./logger.js";
import { parseExtractionEnvelope, type DroppedEntry } from "./schemas.js";
import type { PipelineConfig, UnitPayload } from "./types.js";

export type ModelTier = "fast" | "thorough";

export type ExtractionFailureKind =
  | "rate_limit_exhausted"
  | "http_status"
  | "timeout"
  | "connection"
  | "empty_content"
  | "malformed_response"
  | "aborted";

export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
  status?: number;
  /** Raw model output, kept for malformed responses only. */
  raw?: string;
}

export interface ExtractionSuccess {
  payload: UnitPayload;
  dropped: DroppedEntry[];
  model: string;
  attempts: number;
}

export type ExtractionOutcome =
  | { ok: true; value: ExtractionSuccess }
  | { ok: false; error: ExtractionFailure };

export interface ExtractionRequest {
  unitText: string;
  instructions: string;
  tier: ModelTier;
  signal?: AbortSignal;
}

export type ExtractionClientConfig = Pick<
  PipelineConfig,
  | "fastModel"
  | "thoroughModel"
  | "fastTimeoutMs"
  | "thoroughTimeoutMs"
  | "emptyContentRetries"
  | "emptyRetryDelayMs"
  | "retry5xxCount"
  | "retryBackoffMs"
  | "defaultRetryAfterSec"
  | "maxRateLimitWaits"
>;

export interface ExtractionClientOptions {
  apiKey: string;
  baseUrl: string;
  /** Replaces the transport; tests use this to stand in for the service. */
  fetch?: typeof fetch;
}

/** Anything that can turn one unit into a payload. The orchestrator only needs this. */
export interface Extractor {
  modelFor(tier: ModelTier): string;
  extract(request: ExtractionRequest): Promise<ExtractionOutcome>;
}

const MARKER_TOKEN = "json";
const WRAP_PREFIX = "Extract information from the following text and return valid JSON:";
const MAX_TOKENS = 2000;

const TIER_TEMPERATURE: Record<ModelTier, number> = {
  fast: 0.2,
  thorough: 0.1,
};

/**
 * JSON mode refuses requests whose messages never mention JSON, so the unit
 * text is wrapped when neither input carries the marker.
 */
export function wrapUnitText(unitText: string, instructions: string): string {
  const marker = MARKER_TOKEN.toLowerCase();
  if (instructions.toLowerCase().includes(marker) || unitText.toLowerCase().includes(marker)) {
    return unitText;
  }
  return `${WRAP_PREFIX} ${unitText}`;
}

/** Seconds from a Retry-After header; absent or unparseable falls back. */
export function parseRetryAfter(header: string | null | undefined, fallbackSec: number): number {
  if (header === null || header === undefined || header.trim() === "") return fallbackSec;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : fallbackSec;
}

type CallError =
  | { kind: "rate_limited"; retryAfterSec: number }
  | { kind: "server_error"; status: number; message: string }
  | ExtractionFailure;

function fail(error: ExtractionFailure): ExtractionOutcome {
  return { ok: false, error };
}

export class ExtractionClient implements Extractor {
  private readonly client: OpenAI;

  constructor(
    private readonly config: ExtractionClientConfig,
    options: ExtractionClientOptions,
  ) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  modelFor(tier: ModelTier): string {
    return tier === "thorough" ? this.config.thoroughModel : this.config.fastModel;
  }

  private timeoutFor(tier: ModelTier): number {
    return tier === "thorough" ? this.config.thoroughTimeoutMs : this.config.fastTimeoutMs;
  }

  private buildRequest(req: ExtractionRequest): ChatCompletionCreateParamsNonStreaming {
    return {
      model: this.modelFor(req.tier),
      messages: [
        { role: "system", content: req.instructions },
        { role: "user", content: wrapUnitText(req.unitText, req.instructions) },
      ],
      temperature: TIER_TEMPERATURE[req.tier],
      max_tokens: MAX_TOKENS,
      response_format: { type: "json_object" },
    };
  }

  private classify(err: unknown, timeoutMs: number): CallError {
    if (err instanceof APIUserAbortError) {
      return { kind: "aborted", message: "request aborted" };
    }
    if (err instanceof APIConnectionTimeoutError) {
      return { kind: "timeout", message: `no response within ${timeoutMs}ms` };
    }
    if (err instanceof APIConnectionError) {
      return { kind: "connection", message: err.message };
    }
    if (err instanceof APIError && err.status !== undefined) {
      if (err.status === 429) {
        const header = err.headers?.get("retry-after");
        return { kind: "rate_limited", retryAfterSec: parseRetryAfter(header, this.config.defaultRetryAfterSec) };
      }
      if (err.status >= 500) {
        return { kind: "server_error", status: err.status, message: err.message };
      }
      return { kind: "http_status", status: err.status, message: err.message };
    }
    if (err instanceof SyntaxError) {
      return { kind: "malformed_response", message: `response body is not JSON: ${err.message}` };
    }
    return { kind: "connection", message: errorMessage(err) };
  }

  /**
   * One unit, one model. 429 waits for the server's Retry-After and reissues;
   * 5xx backs off linearly; empty content gets a few quick retries. Anything
   * else ends the call.
   */
  async extract(req: ExtractionRequest): Promise<ExtractionOutcome> {
    const body = this.buildRequest(req);
    const model = body.model;
    const timeoutMs = this.timeoutFor(req.tier);
    let rateLimitWaits = 0;
    let serverRetries = 0;
    let emptyRetries = 0;

    for (let attempt = 1; ; attempt++) {
      if (req.signal?.aborted) {
        return fail({ kind: "aborted", message: "batch aborted before request" });
      }

      let content: string;
      try {
        log.debug(`extract: model=${model} attempt=${attempt} chars=${req.unitText.length}`);
        const response = await this.client.chat.completions.create(body, {
          timeout: timeoutMs,
          maxRetries: 0,
          ...(req.signal ? { signal: req.signal } : {}),
        });
        content = response.choices?.[0]?.message?.content ?? "";
      } catch (err) {
        const error = this.classify(err, timeoutMs);

        if (error.kind === "rate_limited") {
          if (this.config.maxRateLimitWaits > 0 && rateLimitWaits >= this.config.maxRateLimitWaits) {
            return fail({
              kind: "rate_limit_exhausted",
              status: 429,
              message: `still rate limited after ${rateLimitWaits} waits`,
            });
          }
          rateLimitWaits++;
          log.warn(`rate limited by ${model}; waiting ${error.retryAfterSec}s (wait ${rateLimitWaits})`);
          if (!(await this.pause(error.retryAfterSec * 1000, req.signal))) {
            return fail({ kind: "aborted", message: "aborted while waiting for rate limit" });
          }
          continue;
        }

        if (error.kind === "server_error") {
          if (serverRetries < this.config.retry5xxCount) {
            serverRetries++;
            const delayMs = this.config.retryBackoffMs * serverRetries;
            log.warn(`${model} returned ${error.status}; retry ${serverRetries}/${this.config.retry5xxCount} in ${delayMs}ms`);
            if (!(await this.pause(delayMs, req.signal))) {
              return fail({ kind: "aborted", message: "aborted during backoff" });
            }
            continue;
          }
          return fail({ kind: "http_status", status: error.status, message: error.message });
        }

        log.warn(`extract failed: model=${model} kind=${error.kind} ${error.message}`);
        return fail(error);
      }

      if (content.trim().length === 0) {
        if (emptyRetries < this.config.emptyContentRetries) {
          emptyRetries++;
          log.warn(`${model} returned empty content; retry ${emptyRetries}/${this.config.emptyContentRetries}`);
          if (!(await this.pause(this.config.emptyRetryDelayMs, req.signal))) {
            return fail({ kind: "aborted", message: "aborted during empty-content retry" });
          }
          continue;
        }
        return fail({ kind: "empty_content", message: `empty content after ${emptyRetries + 1} attempts` });
      }

      const parsed = parseJsonObject(content);
      if (!parsed.ok) {
        log.warn(`${model} returned unparseable content (length=${content.length}): ${parsed.reason}`);
        return fail({ kind: "malformed_response", message: parsed.reason, raw: content });
      }

      const envelope = parseExtractionEnvelope(parsed.value);
      if (!envelope.ok) {
        log.warn(`${model} returned wrongly shaped JSON: ${envelope.reason}`);
        return fail({ kind: "malformed_response", message: envelope.reason, raw: content });
      }

      for (const entry of envelope.dropped) {
        log.warn(`dropped invalid entry ${entry.path}: ${entry.reason}`);
      }

      return {
        ok: true,
        value: { payload: envelope.payload, dropped: envelope.dropped, model, attempts: attempt },
      };
    }
  }

  /** false when the signal fired during the wait */
  private async pause(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (ms <= 0) return !signal?.aborted;
    try {
      await sleep(ms, undefined, signal ? { signal } : undefined);
      return true;
    } catch (err) {
      log.debug(`wait interrupted: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Minimal JSON-mode request against the fast model. */
  async checkConnectivity(): Promise<boolean> {
    const model = this.config.fastModel;
    try {
      await this.client.chat.completions.create(
        {
          model,
          messages: [{ role: "user", content: 'Reply with the JSON object {"ok": true}.' }],
          max_tokens: 10,
          response_format: { type: "json_object" },
        },
        { timeout: this.config.fastTimeoutMs, maxRetries: 0 },
      );
      log.info(`connectivity ok: ${model}`);
      return true;
    } catch (err) {
      if (err instanceof APIError && err.status === 401) {
        log.error("connectivity check failed: authentication rejected (401), check the API key");
      } else if (err instanceof APIError && err.status === 403) {
        log.error("connectivity check failed: access denied (403), check key permissions");
      } else if (err instanceof APIError && err.status === 404) {
        log.error(`connectivity check failed: endpoint or model ${model} not found (404), check baseUrl`);
      } else {
        log.error(`connectivity check failed: ${errorMessage(err)}`);
      }
      return false;
    }
  }
}

const RESPONSE_SHAPE = `{
  "rules": [
    {
      "activity": "<catalog activity key>",
      "place": "<catalog place key>",
      "permission": "<permission value>",
      "zone": { "zone_typ": "<catalog zone key>", "zone_name": "<name or null>" },
      "conditions": [
        { "type": "datumspanne", "from": "MM-DD", "to": "MM-DD" },
        { "type": "tageszeit", "from": "HH:MM", "to": "HH:MM" },
        { "type": "motor_leistung", "value": 5, "unit": "ps" }
      ],
      "citations": ["§ 4 Abs. 2 Nr. 3"],
      "confidence": 0.0,
      "normalization_reason": "<how the wording was mapped to the keys>"
    }
  ],
  "new_candidates": {
    "activities": [
      {
        "key_snake": "<snake_case key>",
        "original": "<term as written>",
        "quote": "<short verbatim quote>",
        "confidence": 0.0,
        "why_new": "<why no catalog entry fits>",
        "decision": "ADD_NEW | MAP_TO_EXISTING | IGNORE | UNSURE"
      }
    ],
    "zone_terms": [],
    "place_terms": []
  }
}`;

/** System prompt with the known vocabulary injected. */
export function buildExtractionInstructions(catalog: KnownCatalog): string {
  const vocabulary: Record<string, readonly string[]> = {};
  for (const category of catalog.categories()) vocabulary[category] = catalog.entries(category);

  return [
    "You extract rules from German nature-reserve regulations.",
    "Map every rule onto the known vocabulary below. Only report a term under new_candidates when no",
    "known key fits, and prefer an existing activity plus conditions over a new activity",
    "(\"Motorboote über 5 PS\" is wasserfahrzeuge_motorisiert with a motor_leistung condition).",
    "Confidence is a number between 0 and 1. Use decision UNSURE when you cannot tell.",
    "",
    `Known vocabulary: ${JSON.stringify(vocabulary)}`,
    `Permission values: ${JSON.stringify(catalog.permissions())}`,
    "",
    "Answer with a single JSON object of exactly this shape:",
    RESPONSE_SHAPE,
  ].join("\n");
}
