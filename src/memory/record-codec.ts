/**
 * On-disk shapes for memory records, the index and the vocabulary.
 *
 * Record and index files keep snake_case keys so that files written by older
 * releases (including the single-file legacy format) load unchanged.
 */

import { z } from "zod";

import type { VocabularyState } from "./vector-encoder.js";
import type { MemoryIndex, MemoryIndexEntry, MemoryRecord } from "./types.js";

export const UNKNOWN_TOPIC = "Unknown topic";
const UNKNOWN_DATE = "unknown";
const UNKNOWN_TIME = "00:00:00";
const MAX_FILENAME_TOPIC_CHARS = 50;

const VectorSchema = z.array(z.number()).nullable().catch(null);

export const MemoryRecordFileSchema = z.object({
  topic: z.string().trim().min(1).catch(UNKNOWN_TOPIC),
  timestamp: z.string().min(1).catch(UNKNOWN_TIME),
  date: z.string().min(1).catch(UNKNOWN_DATE),
  conversation_count: z.number().int().positive().catch(1),
  keywords: z.array(z.string()).catch([]),
  conversation_details: z.string().optional().catch(undefined),
  // Legacy records carried their summary under "context"
  context: z.string().optional().catch(undefined),
  topic_vector: VectorSchema.optional(),
  details_vector: VectorSchema.optional(),
  is_important: z.boolean().catch(false),
  is_first_conversation: z.boolean().catch(false),
});

export type MemoryRecordFile = {
  topic: string;
  timestamp: string;
  date: string;
  conversation_count: number;
  keywords: string[];
  conversation_details: string;
  topic_vector: number[] | null;
  details_vector: number[] | null;
  is_important: boolean;
  is_first_conversation: boolean;
};

const IndexEntrySchema = z.object({
  id: z.string(),
  filename: z.string().min(1),
  topic: z.string().catch(""),
  date: z.string().catch(UNKNOWN_DATE),
  timestamp: z.string().catch(UNKNOWN_TIME),
  is_important: z.boolean().catch(false),
});

export const MemoryIndexFileSchema = z.object({
  memories: z.array(IndexEntrySchema).default([]),
});

export type MemoryIndexFile = z.infer<typeof MemoryIndexFileSchema>;

/**
 * Legacy single-file store: either a bare list of records or { topics: [...] }
 */
export const LegacyFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ topics: z.array(z.unknown()) }).transform((value) => value.topics),
]);

export const VocabularyFileSchema = z.object({
  vocab: z.record(z.number()).default({}),
  word_freq: z.record(z.number()).default({}),
});

export type VocabularyFile = z.infer<typeof VocabularyFileSchema>;

/**
 * Parse one record object, filling defaults for missing or malformed fields.
 * Returns null when the value is not an object at all.
 */
export function decodeRecord(value: unknown): MemoryRecord | null {
  const parsed = MemoryRecordFileSchema.safeParse(value);
  if (!parsed.success) return null;
  const file = parsed.data;
  return {
    topic: file.topic,
    timestamp: file.timestamp,
    date: file.date,
    conversationCount: file.conversation_count,
    keywords: file.keywords,
    conversationDetails: file.conversation_details ?? file.context ?? "",
    topicVector: file.topic_vector ?? null,
    detailsVector: file.details_vector ?? null,
    isImportant: file.is_important,
    isFirstConversation: file.is_first_conversation,
  };
}

/**
 * Convert a legacy record to the current schema: one turn, no vectors,
 * keywords and importance preserved.
 */
export function decodeLegacyRecord(value: unknown): MemoryRecord | null {
  const record = decodeRecord(value);
  if (!record) return null;
  return {
    ...record,
    conversationCount: 1,
    topicVector: null,
    detailsVector: null,
  };
}

export function encodeRecord(record: MemoryRecord): MemoryRecordFile {
  return {
    topic: record.topic,
    timestamp: record.timestamp,
    date: record.date,
    conversation_count: record.conversationCount,
    keywords: record.keywords,
    conversation_details: record.conversationDetails,
    topic_vector: record.topicVector,
    details_vector: record.detailsVector,
    is_important: record.isImportant,
    is_first_conversation: record.isFirstConversation,
  };
}

export function decodeIndex(file: MemoryIndexFile): MemoryIndex {
  return {
    memories: file.memories.map((entry) => ({
      id: entry.id,
      filename: entry.filename,
      topic: entry.topic,
      date: entry.date,
      timestamp: entry.timestamp,
      isImportant: entry.is_important,
    })),
  };
}

export function encodeIndex(index: MemoryIndex): MemoryIndexFile {
  return {
    memories: index.memories.map((entry) => ({
      id: entry.id,
      filename: entry.filename,
      topic: entry.topic,
      date: entry.date,
      timestamp: entry.timestamp,
      is_important: entry.isImportant,
    })),
  };
}

export function decodeVocabulary(file: VocabularyFile): VocabularyState {
  return { vocab: file.vocab, wordFreq: file.word_freq };
}

export function encodeVocabulary(state: VocabularyState): VocabularyFile {
  return { vocab: state.vocab, word_freq: state.wordFreq };
}

/**
 * Stable identity of a record: `<date>_<time-with-dashes>`
 */
export function recordId(record: Pick<MemoryRecord, "date" | "timestamp">): string {
  return `${record.date}_${record.timestamp.replaceAll(":", "-")}`;
}

/**
 * Replace characters that are illegal in file names and cap the length.
 */
export function sanitizeFilename(name: string): string {
  const sanitized = name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_");
  const chars = Array.from(sanitized);
  return chars.length > MAX_FILENAME_TOPIC_CHARS
    ? chars.slice(0, MAX_FILENAME_TOPIC_CHARS).join("")
    : sanitized;
}

export function recordFilename(record: Pick<MemoryRecord, "date" | "timestamp" | "topic">): string {
  return `${recordId(record)}_${sanitizeFilename(record.topic)}.json`;
}

export function toIndexEntry(record: MemoryRecord): MemoryIndexEntry {
  return {
    id: recordId(record),
    filename: recordFilename(record),
    topic: record.topic,
    date: record.date,
    timestamp: record.timestamp,
    isImportant: record.isImportant,
  };
}
