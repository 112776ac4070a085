/**
 * Memory Lake
 *
 * Long-term conversational memory:
 * - Buffered turns are summarised into durable records every few exchanges
 * - Records carry term-frequency vectors over a self-maintained vocabulary
 * - Retrieval ranks records by vector similarity with a keyword fallback
 */

export { MemoryLake } from "./memory-lake.js";
export { createMemoryLake } from "./factory.js";

export { MemoryStore } from "./memory-store.js";

export { cosineSimilarity, tokenize, VectorEncoder, type VocabularyState } from "./vector-encoder.js";

export {
  CONTEXT_SUMMARY_FAILED,
  DETAILS_SUMMARY_FAILED,
  fallbackRoundSummary,
  MemorySummaryAgent,
  splitRounds,
  TOPIC_SUMMARY_FAILED,
  type SummaryAgentOptions,
} from "./summary-agent.js";

export {
  combinedScore,
  keywordRelevance,
  qualifiesByVector,
  rankByKeywords,
  rankByVectors,
  sortByRelevance,
  type RankingOptions,
} from "./ranking.js";

export { extractKeywords, loadKeywordTerms } from "./keywords.js";

export { MemoryError, MemoryStoreError, MigrationError, SummarizerError } from "./errors.js";

export { systemClock, type Clock } from "./clock.js";

export type {
  AddConversationOptions,
  ConversationTurn,
  EncoderStats,
  MarkSavedCallback,
  MemoryIndex,
  MemoryIndexEntry,
  MemoryLoadResult,
  MemoryRecord,
  MemoryStats,
  MigrationReply,
  MigrationResult,
  MigrationState,
  PendingMigration,
  RankedMemory,
  Summarizer,
  TextGenerator,
  VectorStats,
} from "./types.js";
