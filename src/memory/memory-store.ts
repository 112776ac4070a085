/**
 * Memory Store - durable record files plus an index
 *
 * Layout under the data directory:
 * - memory_index.json        pointer list, rewritten on every save
 * - memories/<id>_<topic>.json  one file per record
 * - vectors/topic_vocab.json  encoder vocabulary
 *
 * A legacy single-file store (a bare list or { topics: [...] }) is read when
 * no index exists and is only migrated after explicit confirmation.
 */

import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../log.js";
import { type Clock, formatCompactStamp, systemClock } from "./clock.js";
import { errorMessage, MemoryStoreError, MigrationError } from "./errors.js";
import {
  decodeIndex,
  decodeLegacyRecord,
  decodeRecord,
  decodeVocabulary,
  encodeIndex,
  encodeRecord,
  encodeVocabulary,
  LegacyFileSchema,
  MemoryIndexFileSchema,
  recordFilename,
  recordId,
  toIndexEntry,
  VocabularyFileSchema,
} from "./record-codec.js";
import type { VocabularyState } from "./vector-encoder.js";
import type {
  MemoryIndex,
  MemoryLoadResult,
  MemoryRecord,
  MigrationResult,
  MigrationState,
  PendingMigration,
} from "./types.js";

const INDEX_FILE = "memory_index.json";
const MEMORIES_DIR = "memories";
const VECTORS_DIR = "vectors";
const VOCAB_FILE = "topic_vocab.json";

export class MemoryStore {
  readonly dataDir: string;
  readonly indexPath: string;
  readonly memoriesDir: string;
  readonly vocabPath: string;
  readonly legacyFilePath: string;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private migration: MigrationState = { status: "none" };

  constructor(params: { dataDir: string; legacyFilePath: string; logger: Logger; clock?: Clock }) {
    this.dataDir = params.dataDir;
    this.indexPath = path.join(params.dataDir, INDEX_FILE);
    this.memoriesDir = path.join(params.dataDir, MEMORIES_DIR);
    this.vocabPath = path.join(params.dataDir, VECTORS_DIR, VOCAB_FILE);
    this.legacyFilePath = params.legacyFilePath;
    this.logger = params.logger.child({ component: "memory-store" });
    this.clock = params.clock ?? systemClock;
  }

  /**
   * Create the directory layout
   */
  async init(): Promise<void> {
    await fs.mkdir(this.memoriesDir, { recursive: true });
    await fs.mkdir(path.dirname(this.vocabPath), { recursive: true });
  }

  /**
   * Load all records, preferring the index format over the legacy file
   */
  async load(): Promise<MemoryLoadResult> {
    const index = await this.readIndex();
    if (index) {
      const records: MemoryRecord[] = [];
      for (const entry of index.memories) {
        const record = await this.readRecordFile(entry.filename);
        if (record) records.push(record);
      }
      this.logger.info({ count: records.length }, "Memories loaded from index");
      return { records, source: "index" };
    }

    const legacy = await this.readLegacy();
    if (legacy) {
      const records = legacy
        .map((value) => decodeRecord(value))
        .filter((record): record is MemoryRecord => record !== null);
      this.logger.info({ count: records.length }, "Memories loaded from legacy file");
      return { records, source: "legacy" };
    }

    this.logger.debug("No memories found, starting fresh");
    return { records: [], source: "empty" };
  }

  /**
   * Rewrite every record file and regenerate the index from scratch
   */
  async save(records: readonly MemoryRecord[]): Promise<MemoryIndex> {
    const index: MemoryIndex = { memories: [] };
    const usedFilenames = new Set<string>();

    try {
      await fs.mkdir(this.memoriesDir, { recursive: true });

      for (const record of records) {
        const entry = toIndexEntry(record);
        entry.filename = uniqueFilename(entry.filename, usedFilenames);
        usedFilenames.add(entry.filename);

        await fs.writeFile(
          path.join(this.memoriesDir, entry.filename),
          JSON.stringify(encodeRecord(record), null, 2),
          "utf-8",
        );
        index.memories.push(entry);
      }

      await writeJsonAtomic(this.indexPath, encodeIndex(index));
    } catch (err) {
      throw new MemoryStoreError(`Failed to save memories: ${errorMessage(err)}`, {
        indexPath: this.indexPath,
      });
    }

    this.logger.debug({ count: index.memories.length }, "Memories saved");
    return index;
  }

  /**
   * Read the index file. Returns null when there is none; an unreadable index
   * is rebuilt from the record files on disk.
   */
  async readIndex(): Promise<MemoryIndex | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      this.logger.warn({ error: errorMessage(err) }, "Failed to read memory index");
      return this.rebuildIndexFromFiles();
    }

    try {
      const parsed = MemoryIndexFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return decodeIndex(parsed.data);
      this.logger.warn({ issues: parsed.error.issues.length }, "Memory index has an invalid shape");
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Memory index is not valid JSON");
    }
    return this.rebuildIndexFromFiles();
  }

  async loadVocabulary(): Promise<VocabularyState | null> {
    try {
      const raw = await fs.readFile(this.vocabPath, "utf-8");
      const parsed = VocabularyFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn("Vocabulary file has an invalid shape, starting empty");
        return null;
      }
      return decodeVocabulary(parsed.data);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ error: errorMessage(err) }, "Failed to load vocabulary, starting empty");
      }
      return null;
    }
  }

  async saveVocabulary(state: VocabularyState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.vocabPath), { recursive: true });
      await writeJsonAtomic(this.vocabPath, encodeVocabulary(state));
    } catch (err) {
      throw new MemoryStoreError(`Failed to save vocabulary: ${errorMessage(err)}`, {
        vocabPath: this.vocabPath,
      });
    }
  }

  // ============================================
  // Migration
  // ============================================

  /**
   * Look for a legacy file with records. Never migrates on its own: a hit
   * moves the store into the pending state until confirmed or declined.
   */
  async detectMigration(): Promise<PendingMigration | null> {
    const legacy = await this.readLegacy();
    if (!legacy || legacy.length === 0) {
      this.migration = { status: "none" };
      return null;
    }

    const index = await this.readIndex();
    const pending = {
      oldCount: legacy.length,
      currentCount: index?.memories.length ?? 0,
    };
    this.migration = { status: "pending", ...pending, legacyRecords: legacy };
    this.logger.info(pending, "Legacy memories awaiting migration");
    return pending;
  }

  getMigrationState(): MigrationState {
    return this.migration;
  }

  getPendingMigration(): PendingMigration | null {
    if (this.migration.status !== "pending") return null;
    return { oldCount: this.migration.oldCount, currentCount: this.migration.currentCount };
  }

  /**
   * Migrate the pending legacy records into the index format, skipping any
   * whose id already exists, then rename the legacy file to a backup.
   */
  async confirmMigration(): Promise<MigrationResult> {
    const state = this.migration;
    if (state.status !== "pending") {
      throw new MigrationError("No pending migration");
    }

    const index = (await this.readIndex()) ?? { memories: [] };
    const knownIds = new Set(index.memories.map((entry) => entry.id));
    const usedFilenames = new Set(index.memories.map((entry) => entry.filename));
    let migrated = 0;
    let duplicates = 0;

    await fs.mkdir(this.memoriesDir, { recursive: true });

    for (const value of state.legacyRecords) {
      const record = decodeLegacyRecord(value);
      if (!record) {
        this.logger.warn("Skipping legacy entry that is not a record");
        continue;
      }

      const id = recordId(record);
      if (knownIds.has(id)) {
        duplicates += 1;
        continue;
      }

      const filename = uniqueFilename(recordFilename(record), usedFilenames);
      await fs.writeFile(
        path.join(this.memoriesDir, filename),
        JSON.stringify(encodeRecord(record), null, 2),
        "utf-8",
      );
      index.memories.push({ ...toIndexEntry(record), filename });
      knownIds.add(id);
      usedFilenames.add(filename);
      migrated += 1;
    }

    await writeJsonAtomic(this.indexPath, encodeIndex(index));

    const backupPath = `${this.legacyFilePath}.migrated_${formatCompactStamp(this.clock())}`;
    try {
      await fs.rename(this.legacyFilePath, backupPath);
    } catch (err) {
      throw new MigrationError(`Migrated records but could not back up legacy file: ${errorMessage(err)}`, {
        migrated,
        duplicates,
      });
    }

    this.migration = { status: "none" };
    this.logger.info({ migrated, duplicates, backupPath }, "Legacy memories migrated");
    return { migrated, duplicates, backupPath };
  }

  /**
   * Leave the legacy file untouched and clear the pending state
   */
  declineMigration(): boolean {
    if (this.migration.status !== "pending") return false;
    this.migration = { status: "none" };
    this.logger.info("Legacy memory migration declined");
    return true;
  }

  // ============================================
  // Private methods
  // ============================================

  private async readRecordFile(filename: string): Promise<MemoryRecord | null> {
    try {
      const raw = await fs.readFile(path.join(this.memoriesDir, filename), "utf-8");
      const record = decodeRecord(JSON.parse(raw));
      if (!record) {
        this.logger.warn({ filename }, "Skipping memory file that is not a record");
      }
      return record;
    } catch (err) {
      this.logger.warn({ filename, error: errorMessage(err) }, "Failed to load memory file");
      return null;
    }
  }

  private async readLegacy(): Promise<unknown[] | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.legacyFilePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ error: errorMessage(err) }, "Failed to read legacy memory file");
      }
      return null;
    }

    try {
      const parsed = LegacyFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.warn("Legacy memory file has an unrecognised shape");
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Legacy memory file is not valid JSON");
    }
    return null;
  }

  /**
   * Recover pointers from the record files themselves, in file name order
   * (which is chronological for the `<date>_<time>` prefix).
   */
  private async rebuildIndexFromFiles(): Promise<MemoryIndex> {
    let names: string[];
    try {
      names = (await fs.readdir(this.memoriesDir)).filter((name) => name.endsWith(".json")).sort();
    } catch {
      return { memories: [] };
    }

    const index: MemoryIndex = { memories: [] };
    for (const filename of names) {
      const record = await this.readRecordFile(filename);
      if (record) index.memories.push({ ...toIndexEntry(record), filename });
    }
    this.logger.warn({ count: index.memories.length }, "Memory index rebuilt from record files");
    return index;
  }
}

/**
 * Suffix a file name until it is not in `used`
 */
function uniqueFilename(filename: string, used: ReadonlySet<string>): string {
  if (!used.has(filename)) return filename;
  const base = filename.replace(/\.json$/, "");
  let n = 2;
  while (used.has(`${base}_${n}.json`)) n += 1;
  return `${base}_${n}.json`;
}

/**
 * Write to a uniquely named temp file, then rename into place
 */
async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `${path.basename(filePath)}.${randomUUID()}.tmp`);
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
  await fs.rename(tempPath, filePath);
}
