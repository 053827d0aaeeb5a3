import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import type { UnitCache } from "../src/cache.js";
import { createCatalog } from "../src/catalog.js";
import { parseConfig } from "../src/config.js";
import type { ExtractionOutcome, ExtractionRequest, Extractor, ModelTier } from "../src/extraction.js";
import { runPipeline, segmentDocuments, type SourceDocument } from "../src/pipeline.js";
import { OutputStore } from "../src/storage.js";
import type { Candidate, DomainHeuristics, UnitPayload } from "../src/types.js";

class MemoryCache implements UnitCache {
  private readonly entries = new Map<string, UnitPayload>();

  get(documentId: string, unitText: string, model: string): UnitPayload | undefined {
    return this.entries.get(JSON.stringify([documentId, unitText, model]));
  }

  put(documentId: string, unitText: string, model: string, payload: UnitPayload): void {
    this.entries.set(JSON.stringify([documentId, unitText, model]), payload);
  }
}

/** Stands in for the completion service: answers from the unit text. */
class ScriptedExtractor implements Extractor {
  calls = 0;

  modelFor(tier: ModelTier): string {
    return `${tier}-model`;
  }

  async extract(req: ExtractionRequest): Promise<ExtractionOutcome> {
    this.calls++;
    if (req.unitText.includes("FAIL")) {
      return { ok: false, error: { kind: "http_status", status: 400, message: "bad request" } };
    }
    const activities: Candidate[] = [];
    if (req.unitText.includes("aufsteigen")) {
      activities.push({ normalizedKey: "drohnen_aufsteigen_lassen", originalText: "Drohnen aufsteigen lassen", quote: "Drohnen aufsteigen lassen", confidence: 0.8 });
    } else if (req.unitText.includes("steigen")) {
      activities.push({ normalizedKey: "drohnen_steigen_lassen", originalText: "Drohnen steigen lassen", quote: "Drohnen steigen lassen", confidence: 0.7 });
    }
    if (req.unitText.includes("Winter")) {
      activities.push({ normalizedKey: "reiten_im_winter", originalText: "Reiten im Winter", quote: "", confidence: 0.9 });
    }
    return {
      ok: true,
      value: {
        payload: {
          facts: [
            {
              activity: "reiten",
              place: "wege",
              permission: "verboten",
              conditions: [],
              citations: ["§ 3"],
              confidence: 0.9,
              normalizationReason: "",
            },
          ],
          candidates: activities.length > 0 ? { activities } : {},
        },
        dropped: [],
        model: this.modelFor(req.tier),
        attempts: 1,
      },
    };
  }
}

/** Answers like ScriptedExtractor, then interrupts the batch after its first call. */
class InterruptingExtractor extends ScriptedExtractor {
  constructor(private readonly controller: AbortController) {
    super();
  }

  async extract(req: ExtractionRequest): Promise<ExtractionOutcome> {
    const outcome = await super.extract(req);
    this.controller.abort();
    return outcome;
  }
}

const CATALOG = createCatalog(
  { activities: ["reiten", "zelten", "drohnen_flugmodelle"] },
  { activities: "aktivitaet_enum" },
  ["verboten", "erlaubt"],
);

const HEURISTICS: DomainHeuristics = {
  qualifierCategory: "activities",
  qualifierPatterns: ["winter", "sommer", "m"],
  baseActivityMinScore: 60,
  baseActivityHints: [],
  psToKw: 0.7355,
  paragraphFilter: { minLength: 0, rulePatterns: [], skipPatterns: [] },
};

const DOCUMENTS: SourceDocument[] = [
  { documentId: "NSG-2020-001", text: "§ 3 Drohnen steigen lassen ist verboten. Reiten im Winter ebenso." },
  { documentId: "NSG-2020-002", text: "§ 3 Drohnen steigen lassen ist verboten." },
  { documentId: "NSG-2020-003", text: "§ 3 Drohnen aufsteigen lassen ist verboten." },
  { documentId: "NSG-2020-004", text: "§ 3 Das Drohnen aufsteigen lassen ist verboten." },
  { documentId: "NSG-2020-005", text: "§ 3 Es ist verboten, Drohnen aufsteigen lassen." },
  { documentId: "NSG-2020-006", text: "FAIL" },
];

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "rulemine-pipeline-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("segmentDocuments produces one unit per short document", () => {
  const config = parseConfig({});
  const units = segmentDocuments(DOCUMENTS, config, HEURISTICS);
  assert.equal(units.length, 6);
  assert.deepEqual(units[0], { documentId: "NSG-2020-001", unitId: "unit_000", text: DOCUMENTS[0].text });
});

test("runPipeline consolidates a corpus into reviewable proposals", async () => {
  await withTempDir(async (dir) => {
    const config = parseConfig({ outputDir: dir, minDocCount: 5, concurrency: 2 });
    const extractor = new ScriptedExtractor();
    const cache = new MemoryCache();
    const store = new OutputStore(dir);
    const deps = {
      config,
      extractor,
      cache,
      store,
      catalog: CATALOG,
      heuristics: HEURISTICS,
      now: () => new Date("2026-01-15T10:00:00.000Z"),
    };

    const summary = await runPipeline(DOCUMENTS, deps);

    assert.deepEqual(summary, {
      documents: 6,
      units: { total: 6, succeeded: 5, failed: 1, skipped: 0, cacheHits: 0, liveCalls: 6, escalations: 0 },
      documentsMerged: 5,
      documentsFailed: 1,
      aggregates: 1,
      mappedToExisting: 1,
      ignored: 0,
      aborted: false,
    });
    assert.equal(extractor.calls, 6);

    assert.equal((await readdir(store.unitResultsDir)).length, 5);
    assert.equal((await readdir(store.docsDir)).length, 5);

    const csv = (await readFile(path.join(dir, "candidates_review.csv"), "utf-8")).split("\n");
    assert.equal(
      csv[1],
      'activities,Drohnen aufsteigen lassen,ADD_NEW,drohnen_aufsteigen_lassen,"new term, appears in 5 documents",5,Drohnen steigen lassen,0.76',
    );
    assert.equal(csv.length, 3);

    const enumPatch = await readFile(path.join(dir, "dbml_patches", "enum_additions.dbml"), "utf-8");
    assert.ok(enumPatch.includes("Enum aktivitaet_enum {\n  drohnen_aufsteigen_lassen\n}\n"));

    const changelog = await readFile(path.join(dir, "CHANGELOG.md"), "utf-8");
    assert.ok(changelog.includes("## New Entries (1 additions)\n"));

    const failures = (await readFile(path.join(dir, "failures.jsonl"), "utf-8")).trim().split("\n");
    assert.deepEqual(failures.map((line) => JSON.parse(line)), [
      { documentId: "NSG-2020-006", unitId: "unit_000", model: "fast-model", kind: "http_status", message: "bad request", status: 400 },
    ]);

    const saved = JSON.parse(await readFile(path.join(dir, "summary.json"), "utf-8"));
    assert.deepEqual(saved, summary);

    assert.deepEqual(JSON.parse(await readFile(path.join(dir, "merge_summary.json"), "utf-8")), {
      unitResults: 5,
      documents: 5,
      written: 5,
      keptExisting: 0,
    });
    assert.deepEqual(JSON.parse(await readFile(path.join(dir, "propose_summary.json"), "utf-8")), {
      totalDocuments: 5,
      totalCandidates: 6,
      minDocCount: 5,
      categories: { activities: { total: 3, addNew: 2, mapExisting: 1, ignore: 0 } },
    });
    const proposal = (await readFile(path.join(dir, "model_update_proposal.md"), "utf-8")).split("\n");
    assert.equal(proposal[6], "This proposal adds 1 new catalog entries, each found in at least 5 documents.");
    assert.equal(proposal[10], "- `drohnen_aufsteigen_lassen` (activities, 5 documents)");

    const rerun = await runPipeline(DOCUMENTS, deps);
    assert.equal(extractor.calls, 7);
    assert.equal(rerun.units.cacheHits, 5);
    assert.equal(rerun.aggregates, 1);
  });
});

test("an interrupted run keeps merged documents and proposals from the last full run", async () => {
  await withTempDir(async (dir) => {
    const config = parseConfig({ outputDir: dir, minDocCount: 5, concurrency: 1 });
    const base = {
      config,
      cache: new MemoryCache(),
      store: new OutputStore(dir),
      catalog: CATALOG,
      heuristics: HEURISTICS,
      now: () => new Date("2026-01-15T10:00:00.000Z"),
    };
    const read = (rel: string): Promise<string> => readFile(path.join(dir, rel), "utf-8");

    const complete = await runPipeline(DOCUMENTS, { ...base, extractor: new ScriptedExtractor() });
    assert.equal(complete.aggregates, 1);
    const before = {
      aggregates: await read("aggregates.json"),
      csv: await read("candidates_review.csv"),
      doc: await read(path.join("docs", "NSG-2020-003.json")),
      proposeSummary: await read("propose_summary.json"),
      mergeSummary: await read("merge_summary.json"),
    };

    const controller = new AbortController();
    const extractor = new InterruptingExtractor(controller);
    const summary = await runPipeline(DOCUMENTS, { ...base, extractor, signal: controller.signal }, { force: true });

    assert.equal(extractor.calls, 1);
    assert.deepEqual(summary, {
      documents: 6,
      units: { total: 6, succeeded: 1, failed: 0, skipped: 5, cacheHits: 0, liveCalls: 1, escalations: 0 },
      documentsMerged: 0,
      documentsFailed: 0,
      aggregates: 0,
      mappedToExisting: 0,
      ignored: 0,
      aborted: true,
    });
    assert.deepEqual(JSON.parse(await read("summary.json")), summary);

    assert.equal(await read("aggregates.json"), before.aggregates);
    assert.equal(await read("candidates_review.csv"), before.csv);
    assert.equal(await read(path.join("docs", "NSG-2020-003.json")), before.doc);
    assert.equal(await read("propose_summary.json"), before.proposeSummary);
    assert.equal(await read("merge_summary.json"), before.mergeSummary);
  });
});
