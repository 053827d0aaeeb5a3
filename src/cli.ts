import path from "node:path";
import { readFile } from "node:fs/promises";
import { Command } from "commander";
import dotenv from "dotenv";
import { ResultCache } from "./cache.js";
import { loadCatalog, loadHeuristics } from "./catalog.js";
import { documentIdFromFilename } from "./chunking.js";
import { assertExtractionReady, isRecord, parseConfig } from "./config.js";
import { ConfigError, StorageError, errorMessage } from "./errors.js";
import { ExtractionClient } from "./extraction.js";
import { listFilesRecursive, readJsonFile } from "./fs-utils.js";
import { createConsoleBackend, initLogger, log } from "./logger.js";
import {
  extractUnits,
  mergeUnitResults,
  proposeCandidates,
  runPipeline,
  segmentDocuments,
  type SourceDocument,
} from "./pipeline.js";
import { TextUnitSchema } from "./schemas.js";
import { OutputStore } from "./storage.js";
import type { PipelineConfig, TextUnit } from "./types.js";

interface CliFlags {
  input?: string;
  out?: string;
  config?: string;
  catalog?: string;
  heuristics?: string;
  concurrency?: string;
  mode?: string;
  maxChars?: string;
  minDocCount?: string;
  segmentation?: string;
  force?: boolean;
  overwrite?: boolean;
  verbose?: boolean;
}

const UNITS_FILE = "units.jsonl";

async function loadConfigFile(file: string | undefined): Promise<Record<string, unknown>> {
  if (!file) return {};
  let raw: unknown;
  try {
    raw = await readJsonFile(file);
  } catch (err) {
    throw new ConfigError(`cannot read config file ${file}: ${errorMessage(err)}`);
  }
  if (!isRecord(raw)) throw new ConfigError(`config file ${file} must contain a JSON object`);
  return raw;
}

/** CLI flags win over the config file. */
export async function resolveConfig(flags: CliFlags): Promise<PipelineConfig> {
  const fromFile = await loadConfigFile(flags.config);
  const overrides: Record<string, unknown> = {};
  if (flags.out) overrides.outputDir = flags.out;
  if (flags.catalog) overrides.catalogPath = flags.catalog;
  if (flags.heuristics) overrides.heuristicsPath = flags.heuristics;
  if (flags.concurrency) overrides.concurrency = flags.concurrency;
  if (flags.mode) overrides.providerMode = flags.mode;
  if (flags.maxChars) overrides.maxUnitChars = flags.maxChars;
  if (flags.minDocCount) overrides.minDocCount = flags.minDocCount;
  if (flags.segmentation) overrides.segmentation = flags.segmentation;
  if (flags.verbose) overrides.debug = true;
  return parseConfig({ ...fromFile, ...overrides });
}

async function readDocuments(inputDir: string): Promise<SourceDocument[]> {
  const files = await listFilesRecursive(inputDir, ".txt");
  const documents: SourceDocument[] = [];
  const seen = new Set<string>();
  for (const file of files) {
    const documentId = documentIdFromFilename(file);
    if (seen.has(documentId)) {
      log.warn(`skipping ${file}: document id ${documentId} already used`);
      continue;
    }
    seen.add(documentId);
    documents.push({ documentId, text: await readFile(file, "utf-8") });
  }
  log.info(`read ${documents.length} documents from ${inputDir}`);
  return documents;
}

async function readUnits(file: string): Promise<TextUnit[]> {
  const raw = await readFile(file, "utf-8");
  const units: TextUnit[] = [];
  raw.split("\n").forEach((line, i) => {
    if (line.trim().length === 0) return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      log.warn(`${file}:${i + 1}: not JSON (${errorMessage(err)})`);
      return;
    }
    const parsed = TextUnitSchema.safeParse(json);
    if (parsed.success) units.push(parsed.data);
    else log.warn(`${file}:${i + 1}: not a text unit`);
  });
  return units;
}

function requireInput(flags: CliFlags): string {
  if (!flags.input) throw new ConfigError("missing --input <dir>");
  return flags.input;
}

function createClient(config: PipelineConfig): ExtractionClient {
  const { apiKey, baseUrl } = assertExtractionReady(config);
  return new ExtractionClient(config, { apiKey, baseUrl });
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--out <dir>", "output directory")
    .option("--config <file>", "JSON config file")
    .option("--catalog <file>", "known vocabulary catalog (JSON)")
    .option("--heuristics <file>", "domain heuristics (JSON)")
    .option("--verbose", "debug logging");
}

async function withSignal<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn("interrupt received: finishing in-flight units, starting no new ones");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("rulemine")
    .description("Mine regulation texts for rules and propose new catalog vocabulary");

  withCommonOptions(program.command("segment"))
    .description(`Split .txt documents into units and write ${UNITS_FILE}`)
    .option("--input <dir>", "directory of extracted .txt documents")
    .option("--max-chars <n>", "maximum characters per unit")
    .option("--segmentation <mode>", "sections|paragraphs")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const heuristics = await loadHeuristics(config.heuristicsPath);
      const units = segmentDocuments(await readDocuments(requireInput(flags)), config, heuristics);
      const store = new OutputStore(config.outputDir);
      const file = await store.writeReport(UNITS_FILE, units.map((u) => JSON.stringify(u)).join("\n") + "\n");
      console.log(`${units.length} units written to ${file}`);
    });

  withCommonOptions(program.command("extract"))
    .description(`Run the units in ${UNITS_FILE} through the completion service`)
    .option("--concurrency <n>", "parallel workers")
    .option("--mode <mode>", "fast|thorough|adaptive")
    .option("--force", "ignore cached results")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const extractor = createClient(config);
      const catalog = await loadCatalog(config.catalogPath);
      const store = new OutputStore(config.outputDir);
      const units = await readUnits(path.join(config.outputDir, UNITS_FILE));
      const cache = new ResultCache(config.cachePath);
      try {
        const batch = await withSignal((signal) =>
          extractUnits(units, { config, extractor, cache, store, catalog, signal }, { force: flags.force === true }),
        );
        console.log(
          `units: ${batch.stats.succeeded} ok, ${batch.stats.failed} failed, ${batch.stats.skipped} skipped ` +
            `(${batch.stats.cacheHits} cache hits, ${batch.stats.escalations} escalations)`,
        );
      } finally {
        cache.close();
      }
    });

  withCommonOptions(program.command("merge"))
    .description("Merge unit results into per-document results")
    .option("--overwrite", "replace existing document results")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const heuristics = await loadHeuristics(config.heuristicsPath);
      const store = new OutputStore(config.outputDir);
      const docs = await mergeUnitResults(await store.readUnitResults(), { config, store, heuristics }, {
        overwrite: flags.overwrite === true,
      });
      console.log(`${docs.length} documents merged into ${store.docsDir}`);
    });

  withCommonOptions(program.command("propose"))
    .description("Cluster candidates across documents and write review reports")
    .option("--min-doc-count <n>", "documents needed before a term is proposed")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const [catalog, heuristics] = await Promise.all([
        loadCatalog(config.catalogPath),
        loadHeuristics(config.heuristicsPath),
      ]);
      const store = new OutputStore(config.outputDir);
      const result = await proposeCandidates(await store.readDocumentResults(), {
        config,
        store,
        catalog,
        heuristics,
      });
      console.log(`${result.aggregates.length} new terms proposed, ${result.decisions.length} keys reviewed`);
    });

  withCommonOptions(program.command("run"))
    .description("segment, extract, merge and propose in one go")
    .option("--input <dir>", "directory of extracted .txt documents")
    .option("--concurrency <n>", "parallel workers")
    .option("--mode <mode>", "fast|thorough|adaptive")
    .option("--max-chars <n>", "maximum characters per unit")
    .option("--segmentation <mode>", "sections|paragraphs")
    .option("--min-doc-count <n>", "documents needed before a term is proposed")
    .option("--force", "ignore cached results")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const extractor = createClient(config);
      const [catalog, heuristics] = await Promise.all([
        loadCatalog(config.catalogPath),
        loadHeuristics(config.heuristicsPath),
      ]);
      const documents = await readDocuments(requireInput(flags));
      const store = new OutputStore(config.outputDir);
      const cache = new ResultCache(config.cachePath);
      try {
        const summary = await withSignal((signal) =>
          runPipeline(
            documents,
            { config, extractor, cache, store, catalog, heuristics, signal },
            { force: flags.force === true },
          ),
        );
        console.log(JSON.stringify(summary, null, 2));
      } finally {
        cache.close();
      }
    });

  withCommonOptions(program.command("check"))
    .description("Send one minimal request to verify credentials and endpoint")
    .action(async (flags: CliFlags) => {
      const config = await resolveConfig(flags);
      initLogger(createConsoleBackend(), config.debug);
      const ok = await createClient(config).checkConnectivity();
      if (!ok) process.exitCode = 1;
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();
  initLogger(createConsoleBackend(), false);
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(`configuration error: ${err.message}`);
    } else if (err instanceof StorageError) {
      log.error(`storage error: ${err.message}`);
    } else {
      log.error(`failed: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  }
}
