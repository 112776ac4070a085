import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";

import { createSilentLogger } from "../../../src/log.js";
import { MemoryStoreError, MigrationError } from "../../../src/memory/errors.js";
import { MemoryStore } from "../../../src/memory/memory-store.js";
import type { MemoryRecord } from "../../../src/memory/types.js";
import { createTestClock, makeTempDir } from "./helpers.js";

function makeRecord(overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    topic: "Beijing weather",
    timestamp: "09:15:00",
    date: "2026-03-10",
    conversationCount: 3,
    keywords: ["天气", "北京"],
    conversationDetails: "User: weather?\nAssistant: sunny",
    topicVector: [1, 1, 0],
    detailsVector: [0, 1, 0],
    isImportant: false,
    isFirstConversation: false,
    ...overrides,
  };
}

const legacyRecords = [
  { topic: "Old music chat", date: "2026-01-05", timestamp: "10:00:00", keywords: ["music"], context: "songs" },
  { topic: "Old weather talk", date: "2026-01-06", timestamp: "11:30:00", keywords: ["天气"], is_important: true },
];

describe("MemoryStore", () => {
  let dataDir: string;
  let legacyFilePath: string;
  let testClock: ReturnType<typeof createTestClock>;

  function createStore(): MemoryStore {
    return new MemoryStore({ dataDir, legacyFilePath, logger: createSilentLogger(), clock: testClock.clock });
  }

  async function writeLegacy(content: unknown): Promise<void> {
    await fs.writeFile(legacyFilePath, JSON.stringify(content), "utf-8");
  }

  beforeEach(async () => {
    const root = await makeTempDir("memory-store-");
    dataDir = path.join(root, "chat_logs");
    legacyFilePath = path.join(root, "memory_lake.json");
    testClock = createTestClock();
  });

  afterEach(async () => {
    await fs.rm(path.dirname(dataDir), { recursive: true, force: true });
  });

  describe("load and save", () => {
    it("starts empty when nothing is on disk", async () => {
      const store = createStore();
      await store.init();

      await expect(store.load()).resolves.toEqual({ records: [], source: "empty" });
    });

    it("round-trips records through the index", async () => {
      const store = createStore();
      const records = [
        makeRecord(),
        makeRecord({ topic: "Python review", timestamp: "10:00:00", detailsVector: null, isImportant: true }),
      ];

      const index = await store.save(records);
      const loaded = await store.load();

      expect(loaded.source).toBe("index");
      expect(loaded.records).toEqual(records);
      expect(index.memories.map((entry) => entry.filename)).toEqual([
        "2026-03-10_09-15-00_Beijing weather.json",
        "2026-03-10_10-00-00_Python review.json",
      ]);
      await expect(store.readIndex()).resolves.toEqual(index);
    });

    it("writes the index with snake_case pointers", async () => {
      const store = createStore();
      await store.save([makeRecord({ isImportant: true })]);

      const raw = JSON.parse(await fs.readFile(path.join(dataDir, "memory_index.json"), "utf-8"));
      expect(raw).toEqual({
        memories: [
          {
            id: "2026-03-10_09-15-00",
            filename: "2026-03-10_09-15-00_Beijing weather.json",
            topic: "Beijing weather",
            date: "2026-03-10",
            timestamp: "09:15:00",
            is_important: true,
          },
        ],
      });
    });

    it("gives colliding file names a numeric suffix", async () => {
      const store = createStore();
      const index = await store.save([makeRecord(), makeRecord({ conversationDetails: "second" })]);

      expect(index.memories.map((entry) => entry.filename)).toEqual([
        "2026-03-10_09-15-00_Beijing weather.json",
        "2026-03-10_09-15-00_Beijing weather_2.json",
      ]);
      expect((await store.load()).records).toHaveLength(2);
    });

    it("skips index entries whose file is missing", async () => {
      const store = createStore();
      await store.save([makeRecord(), makeRecord({ topic: "Other", timestamp: "11:00:00" })]);
      await fs.rm(path.join(dataDir, "memories", "2026-03-10_09-15-00_Beijing weather.json"));

      const loaded = await store.load();
      expect(loaded.records.map((record) => record.topic)).toEqual(["Other"]);
    });

    it("rebuilds a corrupt index from the record files", async () => {
      const store = createStore();
      await store.save([
        makeRecord({ topic: "Later", timestamp: "12:00:00" }),
        makeRecord({ topic: "Earlier", timestamp: "08:00:00" }),
      ]);
      await fs.writeFile(path.join(dataDir, "memory_index.json"), "{not json", "utf-8");

      const loaded = await store.load();
      expect(loaded.source).toBe("index");
      expect(loaded.records.map((record) => record.topic)).toEqual(["Earlier", "Later"]);
    });

    it("reads a bare-list legacy file", async () => {
      await writeLegacy(legacyRecords);
      const store = createStore();

      const loaded = await store.load();
      expect(loaded.source).toBe("legacy");
      expect(loaded.records.map((record) => record.topic)).toEqual(["Old music chat", "Old weather talk"]);
      expect(loaded.records[0]?.conversationDetails).toBe("songs");
    });

    it("reads a legacy file with a topics key", async () => {
      await writeLegacy({ topics: legacyRecords });
      const store = createStore();

      const loaded = await store.load();
      expect(loaded.source).toBe("legacy");
      expect(loaded.records).toHaveLength(2);
    });

    it("treats a corrupt legacy file as empty", async () => {
      await fs.writeFile(legacyFilePath, "[{broken", "utf-8");
      const store = createStore();

      await expect(store.load()).resolves.toEqual({ records: [], source: "empty" });
    });

    it("completes overlapping saves without leaving temp files", async () => {
      const store = createStore();

      await Promise.all([
        store.save([makeRecord()]),
        store.save([makeRecord(), makeRecord({ topic: "Other", timestamp: "11:00:00" })]),
      ]);

      const index = await store.readIndex();
      expect([1, 2]).toContain(index?.memories.length);
      const leftovers = (await fs.readdir(dataDir)).filter((name) => name.endsWith(".tmp"));
      expect(leftovers).toEqual([]);
    });

    it("raises MemoryStoreError when records cannot be written", async () => {
      const blocker = path.join(path.dirname(dataDir), "blocker");
      await fs.writeFile(blocker, "", "utf-8");
      const store = new MemoryStore({
        dataDir: path.join(blocker, "data"),
        legacyFilePath,
        logger: createSilentLogger(),
      });

      await expect(store.save([makeRecord()])).rejects.toBeInstanceOf(MemoryStoreError);
    });
  });

  describe("vocabulary", () => {
    it("persists and restores the vocabulary", async () => {
      const store = createStore();
      await store.init();
      const state = { vocab: { beijing: 0, weather: 1 }, wordFreq: { beijing: 2, weather: 1 } };

      await store.saveVocabulary(state);

      await expect(store.loadVocabulary()).resolves.toEqual(state);
      const raw = JSON.parse(await fs.readFile(path.join(dataDir, "vectors", "topic_vocab.json"), "utf-8"));
      expect(raw).toEqual({ vocab: { beijing: 0, weather: 1 }, word_freq: { beijing: 2, weather: 1 } });
    });

    it("returns null for a missing or corrupt vocabulary", async () => {
      const store = createStore();
      await store.init();
      await expect(store.loadVocabulary()).resolves.toBeNull();

      await fs.writeFile(store.vocabPath, "nope", "utf-8");
      await expect(store.loadVocabulary()).resolves.toBeNull();
    });
  });

  describe("migration", () => {
    it("detects legacy records without migrating them", async () => {
      await writeLegacy({ topics: legacyRecords });
      const store = createStore();
      await store.save([makeRecord()]);

      await expect(store.detectMigration()).resolves.toEqual({ oldCount: 2, currentCount: 1 });
      expect(store.getMigrationState().status).toBe("pending");
      await expect(fs.access(legacyFilePath)).resolves.toBeUndefined();
      expect((await store.load()).records).toHaveLength(1);
    });

    it("ignores an empty legacy file", async () => {
      await writeLegacy([]);
      const store = createStore();

      await expect(store.detectMigration()).resolves.toBeNull();
      expect(store.getPendingMigration()).toBeNull();
      await expect(fs.access(legacyFilePath)).resolves.toBeUndefined();
    });

    it("migrates on confirmation and backs up the legacy file", async () => {
      await writeLegacy(legacyRecords);
      const store = createStore();
      await store.init();
      await store.detectMigration();

      const result = await store.confirmMigration();

      expect(result).toEqual({
        migrated: 2,
        duplicates: 0,
        backupPath: `${legacyFilePath}.migrated_20260310_091500`,
      });
      await expect(fs.access(legacyFilePath)).rejects.toThrow();
      await expect(fs.access(result.backupPath)).resolves.toBeUndefined();
      expect(store.getMigrationState()).toEqual({ status: "none" });

      const loaded = await store.load();
      expect(loaded.source).toBe("index");
      expect(loaded.records.map((record) => record.topic)).toEqual(["Old music chat", "Old weather talk"]);
      expect(loaded.records[0]?.conversationCount).toBe(1);
      expect(loaded.records[0]?.topicVector).toBeNull();
      expect(loaded.records[0]?.keywords).toEqual(["music"]);
      expect(loaded.records[1]?.isImportant).toBe(true);
    });

    it("counts already-present records as duplicates on a second run", async () => {
      await writeLegacy(legacyRecords);
      const store = createStore();
      await store.detectMigration();
      await store.confirmMigration();

      await writeLegacy(legacyRecords);
      testClock.advance(60_000);
      await store.detectMigration();
      const second = await store.confirmMigration();

      expect(second.migrated).toBe(0);
      expect(second.duplicates).toBe(2);
      expect(second.backupPath).toBe(`${legacyFilePath}.migrated_20260310_091600`);
      expect((await store.load()).records).toHaveLength(2);
    });

    it("skips legacy records whose id already exists", async () => {
      const store = createStore();
      await store.save([makeRecord({ date: "2026-01-05", timestamp: "10:00:00", topic: "Already here" })]);
      await writeLegacy(legacyRecords);
      await store.detectMigration();

      const result = await store.confirmMigration();

      expect(result.migrated).toBe(1);
      expect(result.duplicates).toBe(1);
      const topics = (await store.load()).records.map((record) => record.topic);
      expect(topics).toEqual(["Already here", "Old weather talk"]);
    });

    it("leaves the legacy file alone when declined", async () => {
      await writeLegacy(legacyRecords);
      const store = createStore();
      await store.detectMigration();

      expect(store.declineMigration()).toBe(true);
      expect(store.getPendingMigration()).toBeNull();
      await expect(fs.access(legacyFilePath)).resolves.toBeUndefined();
      await expect(store.confirmMigration()).rejects.toBeInstanceOf(MigrationError);
    });

    it("refuses to confirm without a pending migration", async () => {
      const store = createStore();

      expect(store.declineMigration()).toBe(false);
      await expect(store.confirmMigration()).rejects.toThrow("No pending migration");
    });
  });
});
