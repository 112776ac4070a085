/**
 * Memory Lake
 *
 * The surface the chat pipeline talks to. Buffers turns, flushes them every
 * `summarizeEvery` turns into a summarised, vectorised MemoryRecord, and
 * ranks stored records against new user input.
 *
 * Flushes are serialised on a promise chain; turns added while a flush is in
 * flight stay in the buffer for the next one. Every store write runs on a
 * separate write chain, so saves never overlap.
 */

import type { MemorySettings } from "../config.js";
import type { Logger } from "../log.js";
import { truncate } from "../utils/text.js";
import { type Clock, formatDate, formatTime, systemClock } from "./clock.js";
import { errorMessage } from "./errors.js";
import { extractKeywords } from "./keywords.js";
import type { MemoryStore } from "./memory-store.js";
import { rankByKeywords, rankByVectors } from "./ranking.js";
import { TOPIC_SUMMARY_FAILED } from "./summary-agent.js";
import type { VectorEncoder } from "./vector-encoder.js";
import type {
  AddConversationOptions,
  ConversationTurn,
  MarkSavedCallback,
  MemoryLoadSource,
  MemoryRecord,
  MemoryStats,
  MigrationReply,
  PendingMigration,
  RankedMemory,
  Summarizer,
  VectorStats,
} from "./types.js";

const FIRST_MEETING_PREFIX = "First meeting - ";
const FIRST_MEETING_TOPIC = "First meeting";
const FIRST_MEETING_QUOTE_CHARS = 10;

const CONFIRM_ANSWERS = new Set(["是", "yes", "y", "确认", "同意", "ok"]);
const DECLINE_ANSWERS = new Set(["否", "no", "n", "取消", "拒绝"]);

type NewRecord = {
  topic: string;
  details: string;
  keywords: string[];
  conversationCount: number;
  isFirstConversation: boolean;
};

type FlushRequest = {
  force: boolean;
  introduction?: string;
};

export class MemoryLake {
  private readonly store: MemoryStore;
  private readonly encoder: VectorEncoder;
  private readonly summarizer: Summarizer;
  private readonly settings: MemorySettings;
  private readonly keywordTerms: readonly string[];
  private readonly logger: Logger;
  private readonly clock: Clock;

  private records: MemoryRecord[] = [];
  private source: MemoryLoadSource = "empty";
  private readonly buffer: ConversationTurn[] = [];
  private onSaved?: MarkSavedCallback;
  private flushChain: Promise<unknown> = Promise.resolve();
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(params: {
    store: MemoryStore;
    encoder: VectorEncoder;
    summarizer: Summarizer;
    settings: MemorySettings;
    keywordTerms: readonly string[];
    logger: Logger;
    clock?: Clock;
  }) {
    this.store = params.store;
    this.encoder = params.encoder;
    this.summarizer = params.summarizer;
    this.settings = params.settings;
    this.keywordTerms = params.keywordTerms;
    this.logger = params.logger.child({ component: "memory-lake" });
    this.clock = params.clock ?? systemClock;
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Load records and vocabulary, enforce first-record importance, fill in
   * missing vectors and look for a legacy file awaiting migration.
   */
  async init(): Promise<void> {
    await this.store.init();
    await this.reload();

    const vocabulary = await this.store.loadVocabulary();
    if (vocabulary) this.encoder.importState(vocabulary);
    this.encoder.updateVocab(this.records.map((record) => record.topic));

    await this.enqueueWrite(async () => {
      await this.applyFirstMemoryImportant();
      await this.backfillVectors();
      await this.persistVocabulary();
    });

    const pending = await this.store.detectMigration();
    this.logger.info(
      { records: this.records.length, vocabSize: this.encoder.vocabSize, pendingMigration: pending !== null },
      "Memory lake ready",
    );
  }

  /**
   * Flush whatever is buffered, regardless of the threshold
   */
  async shutdown(): Promise<void> {
    const topic = await this.summarizeAndSaveTopic(true);
    if (topic) {
      this.logger.info({ topic }, "Buffered conversation saved on shutdown");
    }
  }

  // ============================================
  // Conversation buffer
  // ============================================

  /**
   * Buffer one exchange. A repeat of the previous user input inside the
   * duplicate window is dropped. Returns whether the turn was buffered.
   */
  addConversation(userInput: string, aiResponse: string, options: AddConversationOptions = {}): boolean {
    if (options.developerMode) {
      this.logger.debug("Developer mode, conversation not recorded");
      return false;
    }

    const now = this.clock();
    const last = this.buffer.at(-1);
    if (last && last.userInput === userInput && now.getTime() - last.createdAt < this.settings.duplicateWindowMs) {
      this.logger.debug({ userInput: userInput.slice(0, 30) }, "Duplicate conversation skipped");
      return false;
    }

    this.buffer.push({
      timestamp: formatTime(now),
      createdAt: now.getTime(),
      userInput,
      aiResponse,
      saved: false,
    });
    if (options.onSaved) this.onSaved = options.onSaved;

    this.logger.debug({ buffered: this.buffer.length }, "Conversation buffered");
    return true;
  }

  shouldSummarize(): boolean {
    return this.buffer.length >= this.settings.summarizeEvery;
  }

  /**
   * Turns waiting to be flushed, oldest first
   */
  getCurrentConversation(): readonly ConversationTurn[] {
    return this.buffer;
  }

  /**
   * Summarise the buffer into a new record once the threshold is met (or
   * always when forced). Resolves to the new topic, or null when nothing was
   * saved.
   */
  summarizeAndSaveTopic(forceSave = false): Promise<string | null> {
    return this.enqueueFlush({ force: forceSave });
  }

  /**
   * Save the buffer as the first-meeting record. The introduction is folded
   * in only when exactly one turn is buffered.
   */
  forceSaveCurrentConversation(introduction?: string): Promise<string | null> {
    return this.enqueueFlush({ force: true, introduction: introduction ?? "" });
  }

  // ============================================
  // Retrieval
  // ============================================

  /**
   * Records relevant to the user input, best first. Vector ranking with
   * keyword fallback.
   */
  searchRelevantMemories(userInput: string, currentContext = ""): RankedMemory[] {
    if (!userInput.trim() || this.records.length === 0) return [];

    const now = this.clock();
    const queryKeywords = this.queryKeywords(userInput, currentContext);
    const queryVector = this.encoder.encodeText(userInput);

    if (queryVector) {
      const hits = rankByVectors(this.records, queryVector, queryKeywords, this.settings, now);
      if (hits.length > 0) {
        this.logger.debug({ hits: hits.length }, "Memories found by vector search");
        return hits;
      }
    }

    const hits = rankByKeywords(this.records, queryKeywords, this.settings, now);
    this.logger.debug({ hits: hits.length, keywords: queryKeywords }, "Memories found by keyword search");
    return hits;
  }

  /**
   * One `【date time】topic` line per record, for prompt injection
   */
  generateMemoryContext(records: readonly Pick<MemoryRecord, "date" | "timestamp" | "topic">[]): string {
    return records.map((record) => `【${record.date} ${record.timestamp}】${record.topic}`).join("\n");
  }

  /**
   * Whether the input asks about earlier conversations. References to the
   * current session ("just now") never trigger recall.
   */
  shouldRecallMemory(userInput: string): boolean {
    const text = userInput.toLowerCase();
    if (this.settings.recallSuppressors.some((word) => text.includes(word.toLowerCase()))) {
      return false;
    }
    return this.settings.recallTriggers.some((word) => text.includes(word.toLowerCase()));
  }

  // ============================================
  // Listing and importance
  // ============================================

  getMemoryStats(): MemoryStats {
    return {
      totalTopics: this.records.length,
      importantTopics: this.records.filter((record) => record.isImportant).length,
      currentConversationCount: this.buffer.length,
      pendingMigration: this.store.getPendingMigration() !== null,
    };
  }

  getVectorStats(): VectorStats {
    const topicVectorized = this.records.filter((record) => record.topicVector !== null).length;
    const detailsVectorized = this.records.filter((record) => record.detailsVector !== null).length;
    const dualVectorized = this.records.filter(
      (record) => record.topicVector !== null && record.detailsVector !== null,
    ).length;
    const rate = this.records.length > 0 ? (dualVectorized / this.records.length) * 100 : 0;

    return {
      encoder: this.encoder.getStats(),
      totalMemories: this.records.length,
      topicVectorized,
      detailsVectorized,
      dualVectorized,
      dualVectorizationRate: `${rate.toFixed(1)}%`,
    };
  }

  /**
   * All records in insertion order
   */
  getAllMemories(): readonly MemoryRecord[] {
    return this.records;
  }

  /**
   * Newest first
   */
  getRecentMemories(limit = 100): MemoryRecord[] {
    return [...this.records].sort((a, b) => compareChronologically(b, a)).slice(0, limit);
  }

  /**
   * Chronologically earliest record; records without a date sort last
   */
  getFirstMemory(): MemoryRecord | null {
    return [...this.records].sort(compareChronologically)[0] ?? null;
  }

  markAsImportant(index: number): Promise<boolean> {
    return this.enqueueWrite(() => this.setImportant(index, true));
  }

  unmarkAsImportant(index: number): Promise<boolean> {
    return this.enqueueWrite(() => this.setImportant(index, false));
  }

  getImportantMemories(): MemoryRecord[] {
    return this.records.filter((record) => record.isImportant);
  }

  /**
   * Flag the chronologically earliest record important. Returns false when
   * it already was, or when the change could not be saved.
   */
  ensureFirstMemoryImportant(): Promise<boolean> {
    return this.enqueueWrite(() => this.applyFirstMemoryImportant());
  }

  // ============================================
  // Migration
  // ============================================

  getMigrationStatus(): PendingMigration | null {
    return this.store.getPendingMigration();
  }

  /**
   * Apply a free-text yes/no answer to the pending migration
   */
  async confirmMigration(answer: string): Promise<MigrationReply> {
    if (!this.store.getPendingMigration()) {
      return { status: "none", message: "There is no pending migration." };
    }

    const normalized = answer.trim().toLowerCase();
    if (DECLINE_ANSWERS.has(normalized)) {
      this.store.declineMigration();
      return {
        status: "declined",
        message: "Migration cancelled. The old memory file is kept as it is; restart to be asked again.",
      };
    }
    if (!CONFIRM_ANSWERS.has(normalized)) {
      return { status: "unrecognized", message: "Please answer yes or no to confirm the memory migration." };
    }

    return this.enqueueWrite(() => this.applyMigration());
  }

  // ============================================
  // Private methods
  // ============================================

  private async applyMigration(): Promise<MigrationReply> {
    if (!this.store.getPendingMigration()) {
      return { status: "none", message: "There is no pending migration." };
    }
    try {
      const result = await this.store.confirmMigration();
      await this.reload();
      this.encoder.updateVocab(this.records.map((record) => record.topic));
      await this.applyFirstMemoryImportant();
      await this.backfillVectors();
      await this.persistVocabulary();
      return {
        status: "migrated",
        message: `Memory migration complete: ${result.migrated} migrated, ${result.duplicates} already present.`,
        result,
      };
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, "Memory migration failed");
      return { status: "failed", message: `Memory migration failed: ${errorMessage(err)}` };
    }
  }

  private enqueueFlush(request: FlushRequest): Promise<string | null> {
    const run = this.flushChain.then(() => this.flush(request));
    this.flushChain = run.catch(() => undefined);
    return run;
  }

  /**
   * Run a task that touches the store after every write queued before it
   */
  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task);
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async flush(request: FlushRequest): Promise<string | null> {
    if (this.buffer.length === 0) return null;
    if (!request.force && !this.shouldSummarize()) return null;

    const turns = this.buffer.slice();
    const transcript = this.buildTranscript(turns);

    try {
      let topic: string;
      let details: string;
      let keywordSource = transcript;
      const isFirstConversation = request.introduction !== undefined;

      if (isFirstConversation) {
        const intro = request.introduction ?? "";
        const withIntro = intro ? `${this.settings.assistantLabel}: ${intro}\n\n${transcript}` : transcript;
        keywordSource = withIntro;
        topic = await this.firstMeetingTopic(withIntro, turns);
        details = await this.summarizer.summarizeConversationDetails(transcript);
        if (intro && turns.length === 1) {
          details = `${this.settings.assistantLabel}: ${intro}\n\n${details}`;
        }
      } else {
        topic = await this.summarizer.summarizeTopic(transcript);
        details = await this.summarizer.summarizeConversationDetails(transcript);
      }

      const saved = await this.persistRecord({
        topic,
        details,
        keywords: extractKeywords(keywordSource, this.keywordTerms),
        conversationCount: turns.length,
        isFirstConversation,
      });
      if (!saved) return null;

      this.buffer.splice(0, turns.length);
      for (const turn of turns) {
        turn.saved = true;
        this.onSaved?.(turn.userInput, turn.aiResponse);
      }

      this.logger.info({ topic, turns: turns.length }, "Conversation saved to memory");
      return topic;
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, "Failed to summarise conversation");
      return null;
    }
  }

  private persistRecord(params: NewRecord): Promise<boolean> {
    return this.enqueueWrite(() => this.appendRecord(params));
  }

  private async appendRecord(params: NewRecord): Promise<boolean> {
    const now = this.clock();
    const details = truncate(params.details, this.settings.maxDetailsChars);

    this.encoder.updateVocab([params.topic]);
    const record: MemoryRecord = {
      topic: params.topic,
      timestamp: formatTime(now),
      date: formatDate(now),
      conversationCount: params.conversationCount,
      keywords: params.keywords,
      conversationDetails: details,
      topicVector: this.encoder.encodeText(params.topic),
      detailsVector: this.encoder.encodeText(details),
      isImportant: params.isFirstConversation,
      isFirstConversation: params.isFirstConversation,
    };

    this.records.push(record);
    try {
      await this.store.save(this.records);
    } catch (err) {
      this.records.pop();
      this.logger.error({ topic: params.topic, error: errorMessage(err) }, "Failed to persist memory record");
      return false;
    }
    this.source = "index";

    this.encoder.updateVocab(this.records.map((entry) => entry.topic));
    await this.persistVocabulary();
    return true;
  }

  private async firstMeetingTopic(conversationText: string, turns: readonly ConversationTurn[]): Promise<string> {
    const topic = await this.summarizer.summarizeTopic(conversationText);
    if (topic && topic !== TOPIC_SUMMARY_FAILED) {
      return `${FIRST_MEETING_PREFIX}${topic}`;
    }

    const firstInput = turns.find((turn) => turn.userInput.trim())?.userInput.trim();
    if (!firstInput) return FIRST_MEETING_TOPIC;
    const quote =
      Array.from(firstInput).length > FIRST_MEETING_QUOTE_CHARS
        ? `${Array.from(firstInput).slice(0, FIRST_MEETING_QUOTE_CHARS).join("")}...`
        : firstInput;
    return `${FIRST_MEETING_PREFIX}${quote}`;
  }

  private buildTranscript(turns: readonly ConversationTurn[]): string {
    return turns
      .map((turn) => `${this.settings.userLabel}: ${turn.userInput}\n${this.settings.assistantLabel}: ${turn.aiResponse}`)
      .join("\n");
  }

  private queryKeywords(userInput: string, currentContext: string): string[] {
    const keywords = extractKeywords(userInput, this.keywordTerms);
    for (const keyword of extractKeywords(currentContext, this.keywordTerms)) {
      if (!keywords.includes(keyword)) keywords.push(keyword);
    }
    return keywords;
  }

  private async applyFirstMemoryImportant(): Promise<boolean> {
    const first = this.getFirstMemory();
    if (!first || first.isImportant) return false;

    first.isImportant = true;
    try {
      await this.saveUnlessLegacy();
    } catch (err) {
      first.isImportant = false;
      this.logger.error({ topic: first.topic, error: errorMessage(err) }, "Failed to persist first-memory importance");
      return false;
    }
    this.logger.info({ topic: first.topic }, "First memory marked important");
    return true;
  }

  private async setImportant(index: number, important: boolean): Promise<boolean> {
    const record = this.records[index];
    if (!record) return false;

    const previous = record.isImportant;
    record.isImportant = important;
    try {
      await this.store.save(this.records);
      return true;
    } catch (err) {
      record.isImportant = previous;
      this.logger.error({ index, error: errorMessage(err) }, "Failed to update memory importance");
      return false;
    }
  }

  private async reload(): Promise<void> {
    const { records, source } = await this.store.load();
    this.records = records;
    this.source = source;
    this.logger.debug({ count: records.length, source }, "Memory records loaded");
  }

  /**
   * Encode records that were stored without vectors, then save once if
   * anything changed
   */
  private async backfillVectors(): Promise<number> {
    let updated = 0;
    for (const record of this.records) {
      let changed = false;
      if (record.topicVector === null) {
        record.topicVector = this.encoder.encodeText(record.topic);
        changed = changed || record.topicVector !== null;
      }
      if (record.detailsVector === null && record.conversationDetails) {
        record.detailsVector = this.encoder.encodeText(record.conversationDetails);
        changed = changed || record.detailsVector !== null;
      }
      if (changed) updated += 1;
    }

    if (updated > 0) {
      try {
        await this.saveUnlessLegacy();
        this.logger.info({ updated }, "Missing memory vectors generated");
      } catch (err) {
        this.logger.error({ error: errorMessage(err) }, "Failed to persist generated vectors");
      }
    }
    return updated;
  }

  /**
   * Records read from a legacy file stay out of the index until the user
   * confirms migration or a new record is saved.
   */
  private async saveUnlessLegacy(): Promise<void> {
    if (this.source === "legacy") return;
    await this.store.save(this.records);
  }

  private async persistVocabulary(): Promise<void> {
    try {
      await this.store.saveVocabulary(this.encoder.exportState());
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Failed to persist vocabulary");
    }
  }
}

/**
 * Ascending by (date, timestamp); records without a date sort last
 */
function compareChronologically(a: MemoryRecord, b: MemoryRecord): number {
  const keyA = `${a.date && a.date !== "unknown" ? a.date : "9999-12-31"} ${a.timestamp}`;
  const keyB = `${b.date && b.date !== "unknown" ? b.date : "9999-12-31"} ${b.timestamp}`;
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
}
