/**
 * Memory Lake Types
 *
 * Domain types use camelCase. The on-disk shapes (record files, index file,
 * legacy file) keep their snake_case keys and live in record-codec.ts.
 */

/**
 * One user/assistant exchange waiting in the current conversation buffer.
 */
export type ConversationTurn = {
  /** Wall-clock time of the exchange, HH:MM:SS */
  timestamp: string;
  /** Epoch milliseconds, used for duplicate detection */
  createdAt: number;
  userInput: string;
  aiResponse: string;
  /** True once the turn has been folded into a persisted MemoryRecord */
  saved: boolean;
};

/**
 * A persisted, summarised unit of conversation history.
 */
export type MemoryRecord = {
  topic: string;
  /** HH:MM:SS */
  timestamp: string;
  /** YYYY-MM-DD */
  date: string;
  /** Number of turns folded into this record */
  conversationCount: number;
  /** Matched domain terms, used by the keyword fallback */
  keywords: string[];
  /** Condensed multi-turn transcript */
  conversationDetails: string;
  topicVector: number[] | null;
  detailsVector: number[] | null;
  isImportant: boolean;
  isFirstConversation: boolean;
};

/**
 * Lightweight pointer to a record file.
 */
export type MemoryIndexEntry = {
  /** `<date>_<time-with-dashes>` */
  id: string;
  filename: string;
  topic: string;
  date: string;
  timestamp: string;
  isImportant: boolean;
};

export type MemoryIndex = {
  memories: MemoryIndexEntry[];
};

/**
 * Where the records of a load() came from.
 */
export type MemoryLoadSource = "index" | "legacy" | "empty";

export type MemoryLoadResult = {
  records: MemoryRecord[];
  source: MemoryLoadSource;
};

/**
 * Migration state machine:
 * none -> pending{oldCount,currentCount} -> (confirmed -> none) | (declined -> none)
 */
export type MigrationState =
  | { status: "none" }
  | {
      status: "pending";
      oldCount: number;
      currentCount: number;
      legacyRecords: unknown[];
    };

export type PendingMigration = {
  oldCount: number;
  currentCount: number;
};

export type MigrationResult = {
  migrated: number;
  duplicates: number;
  backupPath: string;
};

export type MigrationReplyStatus = "migrated" | "declined" | "failed" | "none" | "unrecognized";

export type MigrationReply = {
  status: MigrationReplyStatus;
  message: string;
  result?: MigrationResult;
};

/**
 * A record returned by relevance search, with the scores that ranked it.
 */
export type RankedMemory = MemoryRecord & {
  relevanceScore: number;
  topicSimilarity?: number;
  detailsSimilarity?: number;
};

/**
 * Invoked once per flushed turn after the turn's record is durably saved.
 */
export type MarkSavedCallback = (userInput: string, aiResponse: string) => void;

export type AddConversationOptions = {
  /** When set, nothing is buffered or persisted */
  developerMode?: boolean;
  onSaved?: MarkSavedCallback;
};

/**
 * The text-summarisation capability the engine depends on. Implementations
 * never throw; on terminal failure they return a sentinel string.
 */
export interface Summarizer {
  summarizeTopic(conversationText: string): Promise<string>;
  summarizeContext(conversationText: string): Promise<string>;
  summarizeConversationDetails(conversationText: string): Promise<string>;
}

/**
 * Raw text-generation backend used by the summary agent.
 */
export interface TextGenerator {
  generate(prompt: string, opts?: { maxTokens?: number }): Promise<string>;
}

export type EncoderStats = {
  vocabSize: number;
  totalTokens: number;
  uniqueTokens: number;
  maxVocabularySize: number | null;
};

export type VectorStats = {
  encoder: EncoderStats;
  totalMemories: number;
  topicVectorized: number;
  detailsVectorized: number;
  dualVectorized: number;
  /** e.g. "66.7%" */
  dualVectorizationRate: string;
};

export type MemoryStats = {
  totalTopics: number;
  importantTopics: number;
  currentConversationCount: number;
  pendingMigration: boolean;
};
