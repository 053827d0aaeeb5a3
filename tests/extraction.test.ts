import test from "node:test";
import assert from "node:assert/strict";
import {
  ExtractionClient,
  buildExtractionInstructions,
  parseRetryAfter,
  wrapUnitText,
  type ExtractionClientConfig,
} from "../src/extraction.js";
import { createCatalog } from "../src/catalog.js";

const CONFIG: ExtractionClientConfig = {
  fastModel: "fast-model",
  thoroughModel: "thorough-model",
  fastTimeoutMs: 5000,
  thoroughTimeoutMs: 5000,
  emptyContentRetries: 2,
  emptyRetryDelayMs: 0,
  retry5xxCount: 2,
  retryBackoffMs: 0,
  defaultRetryAfterSec: 0,
  maxRateLimitWaits: 0,
};

const INSTRUCTIONS = "Return a JSON object with rules.";

type Reply = { status: number; body: unknown; headers?: Record<string, string> };

function completion(content: string | null): Reply {
  return {
    status: 200,
    body: {
      id: "cmpl-test",
      object: "chat.completion",
      created: 0,
      model: "stub",
      choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
    },
  };
}

function errorReply(status: number, headers: Record<string, string> = {}): Reply {
  return { status, body: { error: { message: `status ${status}` } }, headers };
}

/** In-process stand-in for the completion endpoint; replays `replies` in order. */
function stubService(replies: Reply[]): { fetch: typeof fetch; requests: Record<string, unknown>[] } {
  const requests: Record<string, unknown>[] = [];
  let i = 0;
  const stub = async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    requests.push(JSON.parse(String(init?.body)));
    const reply = replies[Math.min(i, replies.length - 1)];
    i++;
    return new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json", ...reply.headers },
    });
  };
  return { fetch: stub, requests };
}

function client(fetchImpl: typeof fetch, config: Partial<ExtractionClientConfig> = {}): ExtractionClient {
  return new ExtractionClient(
    { ...CONFIG, ...config },
    { apiKey: "test-key", baseUrl: "https://llm.example.test/v1", fetch: fetchImpl },
  );
}

const GOOD_REPLY = JSON.stringify({
  rules: [{ activity: "reiten", place: "wege", permission: "verboten", citations: ["§ 3"], confidence: 0.9 }],
  new_candidates: {},
});

test("extract returns the parsed payload and sends a JSON-mode request", async () => {
  const service = stubService([completion(GOOD_REPLY)]);
  const outcome = await client(service.fetch).extract({
    unitText: "Das Reiten ist verboten.",
    instructions: INSTRUCTIONS,
    tier: "fast",
  });

  assert.ok(outcome.ok);
  if (!outcome.ok) return;
  assert.equal(outcome.value.model, "fast-model");
  assert.equal(outcome.value.attempts, 1);
  assert.deepEqual(outcome.value.payload.facts, [
    {
      activity: "reiten",
      place: "wege",
      permission: "verboten",
      conditions: [],
      citations: ["§ 3"],
      confidence: 0.9,
      normalizationReason: "",
    },
  ]);

  assert.equal(service.requests.length, 1);
  const body = service.requests[0];
  assert.equal(body.model, "fast-model");
  assert.equal(body.temperature, 0.2);
  assert.equal(body.max_tokens, 2000);
  assert.deepEqual(body.response_format, { type: "json_object" });
  assert.deepEqual(body.messages, [
    { role: "system", content: INSTRUCTIONS },
    { role: "user", content: "Das Reiten ist verboten." },
  ]);
});

test("extract uses the thorough model and temperature for the thorough tier", async () => {
  const service = stubService([completion(GOOD_REPLY)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "thorough" });
  assert.ok(outcome.ok);
  assert.equal(service.requests[0].model, "thorough-model");
  assert.equal(service.requests[0].temperature, 0.1);
});

test("extract accepts a fenced JSON reply", async () => {
  const service = stubService([completion("```json\n" + GOOD_REPLY + "\n```")]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.ok(outcome.ok);
});

test("extract waits out 429 responses and retries", async () => {
  const service = stubService([errorReply(429, { "retry-after": "0" }), completion(GOOD_REPLY)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.ok(outcome.ok);
  if (!outcome.ok) return;
  assert.equal(outcome.value.attempts, 2);
  assert.equal(service.requests.length, 2);
});

test("extract gives up on 429 once the wait budget is spent", async () => {
  const service = stubService([errorReply(429, { "retry-after": "0" })]);
  const outcome = await client(service.fetch, { maxRateLimitWaits: 2 }).extract({
    unitText: "x",
    instructions: INSTRUCTIONS,
    tier: "fast",
  });
  assert.deepEqual(outcome, {
    ok: false,
    error: { kind: "rate_limit_exhausted", status: 429, message: "still rate limited after 2 waits" },
  });
  assert.equal(service.requests.length, 3);
});

test("extract retries 5xx a bounded number of times", async () => {
  const service = stubService([errorReply(503)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, "http_status");
  assert.equal(outcome.error.status, 503);
  assert.equal(service.requests.length, 3);
});

test("extract fails on the first 5xx when retries are switched off", async () => {
  const service = stubService([errorReply(503)]);
  const outcome = await client(service.fetch, { retry5xxCount: 0 }).extract({
    unitText: "x",
    instructions: INSTRUCTIONS,
    tier: "fast",
  });
  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.status, 503);
  assert.equal(service.requests.length, 1);
});

test("extract recovers when a 5xx is followed by success", async () => {
  const service = stubService([errorReply(502), completion(GOOD_REPLY)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.ok(outcome.ok);
  assert.equal(service.requests.length, 2);
});

test("extract does not retry other error statuses", async () => {
  const service = stubService([errorReply(400)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, "http_status");
  assert.equal(outcome.error.status, 400);
  assert.equal(service.requests.length, 1);
});

test("extract retries empty content then fails", async () => {
  const service = stubService([completion("")]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.deepEqual(outcome, { ok: false, error: { kind: "empty_content", message: "empty content after 3 attempts" } });
  assert.equal(service.requests.length, 3);
});

test("extract treats a null message content as empty", async () => {
  const service = stubService([completion(null), completion(GOOD_REPLY)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.ok(outcome.ok);
  assert.equal(service.requests.length, 2);
});

test("extract reports unparseable content with the raw text", async () => {
  const service = stubService([completion("Sorry, no rules found.")]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.deepEqual(outcome, {
    ok: false,
    error: { kind: "malformed_response", message: "content is not a JSON object", raw: "Sorry, no rules found." },
  });
});

test("extract reports a reply cut off mid-object", async () => {
  const cut = '{"rules": [{"activity": "reiten", "place": "we';
  const service = stubService([completion(cut)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.deepEqual(outcome, {
    ok: false,
    error: { kind: "malformed_response", message: "content ends inside an unterminated JSON object", raw: cut },
  });
  assert.equal(service.requests.length, 1);
});

test("extract reports a wrongly shaped object", async () => {
  const service = stubService([completion('{"facts": []}')]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.deepEqual(outcome, {
    ok: false,
    error: { kind: "malformed_response", message: "rules: Required", raw: '{"facts": []}' },
  });
});

test("extract keeps valid rules and reports dropped ones", async () => {
  const reply = JSON.stringify({
    rules: [
      { activity: "reiten", place: "wege", permission: "verboten", confidence: 0.9 },
      { activity: "reiten" },
    ],
  });
  const service = stubService([completion(reply)]);
  const outcome = await client(service.fetch).extract({ unitText: "x", instructions: INSTRUCTIONS, tier: "fast" });
  assert.ok(outcome.ok);
  if (!outcome.ok) return;
  assert.equal(outcome.value.payload.facts.length, 1);
  assert.deepEqual(
    outcome.value.dropped.map((d) => d.path),
    ["rules[1]"],
  );
});

test("extract makes no request once the signal has fired", async () => {
  const service = stubService([completion(GOOD_REPLY)]);
  const controller = new AbortController();
  controller.abort();
  const outcome = await client(service.fetch).extract({
    unitText: "x",
    instructions: INSTRUCTIONS,
    tier: "fast",
    signal: controller.signal,
  });
  assert.deepEqual(outcome, { ok: false, error: { kind: "aborted", message: "batch aborted before request" } });
  assert.equal(service.requests.length, 0);
});

test("checkConnectivity reports success and auth failures", async () => {
  assert.equal(await client(stubService([completion('{"ok": true}')]).fetch).checkConnectivity(), true);
  assert.equal(await client(stubService([errorReply(401)]).fetch).checkConnectivity(), false);
});

test("wrapUnitText adds the JSON marker only when missing", () => {
  assert.equal(
    wrapUnitText("Reiten verboten.", "Extract rules."),
    "Extract information from the following text and return valid JSON: Reiten verboten.",
  );
  assert.equal(wrapUnitText("Reiten verboten.", "Answer in JSON."), "Reiten verboten.");
  assert.equal(wrapUnitText("json ist hier", "Extract rules."), "json ist hier");
});

test("parseRetryAfter falls back on missing or bad headers", () => {
  assert.equal(parseRetryAfter("12", 60), 12);
  assert.equal(parseRetryAfter(null, 60), 60);
  assert.equal(parseRetryAfter("soon", 60), 60);
  assert.equal(parseRetryAfter("-3", 60), 60);
});

test("buildExtractionInstructions lists the known vocabulary", () => {
  const catalog = createCatalog({ activities: ["reiten"], place_terms: ["wege"] }, {}, ["verboten", "erlaubt"]);
  const text = buildExtractionInstructions(catalog);
  assert.ok(text.includes('Known vocabulary: {"activities":["reiten"],"place_terms":["wege"]}'));
  assert.ok(text.includes('Permission values: ["verboten","erlaubt"]'));
});
