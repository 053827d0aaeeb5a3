import path from "node:path";
import { StorageError, errorMessage } from "./errors.js";
import {
  appendJsonLine,
  fileExists,
  listFilesRecursive,
  readJsonFile,
  writeJsonFile,
  writeTextFile,
} from "./fs-utils.js";
import { log } from "./logger.js";
import { DocumentResultSchema, UnitResultSchema } from "./schemas.js";
import type {
  CandidateAggregate,
  CandidateDecisionRecord,
  DocumentResult,
  UnitResult,
} from "./types.js";

function safeName(id: string): string {
  return id.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * On-disk layout of a run:
 *
 *   unit_results/<doc>__<unit>.json   one per processed unit
 *   docs/<doc>.json                   merged per document
 *   aggregates.json, decisions.json   corpus-level proposals
 *   *.jsonl                           append-only logs (units, failures)
 */
export class OutputStore {
  constructor(readonly outputDir: string) {}

  get unitResultsDir(): string {
    return path.join(this.outputDir, "unit_results");
  }

  get docsDir(): string {
    return path.join(this.outputDir, "docs");
  }

  unitResultPath(documentId: string, unitId: string): string {
    return path.join(this.unitResultsDir, `${safeName(documentId)}__${safeName(unitId)}.json`);
  }

  documentPath(documentId: string): string {
    return path.join(this.docsDir, `${safeName(documentId)}.json`);
  }

  private async guard<T>(what: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw new StorageError(`${what}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async writeUnitResult(result: UnitResult): Promise<void> {
    const file = this.unitResultPath(result.documentId, result.unitId);
    await this.guard(`cannot write ${file}`, () => writeJsonFile(file, result));
  }

  async readUnitResults(): Promise<UnitResult[]> {
    return this.readAll(this.unitResultsDir, (raw) => UnitResultSchema.safeParse(raw));
  }

  /** Returns false when the file exists and `overwrite` is off. */
  async writeDocumentResult(doc: DocumentResult, options: { overwrite?: boolean } = {}): Promise<boolean> {
    const file = this.documentPath(doc.documentId);
    if (!options.overwrite && (await fileExists(file))) {
      log.debug(`keeping existing ${file}`);
      return false;
    }
    await this.guard(`cannot write ${file}`, () => writeJsonFile(file, doc));
    return true;
  }

  async readDocumentResults(): Promise<DocumentResult[]> {
    return this.readAll(this.docsDir, (raw) => DocumentResultSchema.safeParse(raw));
  }

  async writeAggregates(aggregates: CandidateAggregate[], decisions: CandidateDecisionRecord[]): Promise<void> {
    const aggFile = path.join(this.outputDir, "aggregates.json");
    const decFile = path.join(this.outputDir, "decisions.json");
    await this.guard(`cannot write ${aggFile}`, () => writeJsonFile(aggFile, aggregates));
    await this.guard(`cannot write ${decFile}`, () => writeJsonFile(decFile, decisions));
  }

  async writeSummary(name: string, value: unknown): Promise<string> {
    const file = path.join(this.outputDir, `${safeName(name)}.json`);
    await this.guard(`cannot write ${file}`, () => writeJsonFile(file, value));
    return file;
  }

  /** `relPath` is relative to the output dir, e.g. `dbml_patches/enum_additions.dbml`. */
  async writeReport(relPath: string, content: string): Promise<string> {
    const file = path.join(this.outputDir, relPath);
    await this.guard(`cannot write ${file}`, () => writeTextFile(file, content));
    return file;
  }

  async appendJsonl(name: string, value: unknown): Promise<void> {
    const file = path.join(this.outputDir, `${safeName(name)}.jsonl`);
    await this.guard(`cannot append to ${file}`, () => appendJsonLine(file, value));
  }

  private async readAll<T>(
    dir: string,
    validate: (raw: unknown) => { success: true; data: T } | { success: false },
  ): Promise<T[]> {
    if (!(await fileExists(dir))) return [];
    const files = await listFilesRecursive(dir, ".json");
    const out: T[] = [];
    for (const file of files) {
      let raw: unknown;
      try {
        raw = await readJsonFile(file);
      } catch (err) {
        log.warn(`skipping unreadable ${file}: ${errorMessage(err)}`);
        continue;
      }
      const parsed = validate(raw);
      if (!parsed.success) {
        log.warn(`skipping ${file}: unexpected shape`);
        continue;
      }
      out.push(parsed.data);
    }
    return out;
  }
}
