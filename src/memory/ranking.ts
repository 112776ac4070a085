/**
 * Relevance ranking over stored memory records.
 *
 * Vector path: combined = topicWeight * topicSim + detailsWeight * detailsSim,
 * qualifying above combinedThreshold, or above detailsThreshold on the
 * details similarity alone. Records without a topic vector are scored in the
 * same pass by keyword overlap at reduced weight.
 */

import type { MemorySettings } from "../config.js";
import { daysSince, parseRecordDate } from "./clock.js";
import { cosineSimilarity } from "./vector-encoder.js";
import type { MemoryRecord, RankedMemory } from "./types.js";

export type RankingOptions = Pick<
  MemorySettings,
  | "topicWeight"
  | "detailsWeight"
  | "combinedThreshold"
  | "detailsThreshold"
  | "keywordThreshold"
  | "keywordFallbackWeight"
  | "maxResults"
>;

export function combinedScore(
  topicSimilarity: number,
  detailsSimilarity: number,
  options: Pick<RankingOptions, "topicWeight" | "detailsWeight">,
): number {
  return options.topicWeight * topicSimilarity + options.detailsWeight * detailsSimilarity;
}

export function qualifiesByVector(
  combined: number,
  detailsSimilarity: number,
  options: Pick<RankingOptions, "combinedThreshold" | "detailsThreshold">,
): boolean {
  return combined > options.combinedThreshold || detailsSimilarity > options.detailsThreshold;
}

/**
 * Keyword overlap score in [0, 1]:
 * +0.4 per query keyword in the record's keywords,
 * +0.3 per query keyword contained in the topic,
 * +0.2 when the record is at most 7 days old, else +0.1 up to 30 days.
 */
export function keywordRelevance(record: MemoryRecord, queryKeywords: readonly string[], now: Date): number {
  let score = 0;
  const recordKeywords = new Set(record.keywords.map((keyword) => keyword.toLowerCase()));
  const topic = record.topic.toLowerCase();

  for (const keyword of queryKeywords) {
    const needle = keyword.toLowerCase();
    if (recordKeywords.has(needle)) score += 0.4;
    if (needle && topic.includes(needle)) score += 0.3;
  }

  const age = daysSince(record.date, now);
  if (age !== null && age >= 0) {
    if (age <= 7) score += 0.2;
    else if (age <= 30) score += 0.1;
  }

  return Math.min(score, 1);
}

/**
 * Epoch milliseconds of a record's date and time, 0 when unparseable
 */
export function timestampScore(record: Pick<MemoryRecord, "date" | "timestamp">): number {
  return parseRecordDate(record.date, record.timestamp)?.getTime() ?? 0;
}

/**
 * Highest score first, newer record first on ties
 */
export function sortByRelevance<T extends RankedMemory>(ranked: T[]): T[] {
  return ranked.sort((a, b) => {
    if (b.relevanceScore !== a.relevanceScore) return b.relevanceScore - a.relevanceScore;
    return timestampScore(b) - timestampScore(a);
  });
}

/**
 * Rank records against an encoded query. Returns at most maxResults.
 */
export function rankByVectors(
  records: readonly MemoryRecord[],
  queryVector: readonly number[],
  queryKeywords: readonly string[],
  options: RankingOptions,
  now: Date,
): RankedMemory[] {
  const ranked: RankedMemory[] = [];

  for (const record of records) {
    if (record.topicVector && record.topicVector.length > 0) {
      const topicSimilarity = cosineSimilarity(queryVector, record.topicVector);
      const detailsSimilarity = record.detailsVector ? cosineSimilarity(queryVector, record.detailsVector) : 0;
      const combined = combinedScore(topicSimilarity, detailsSimilarity, options);
      if (qualifiesByVector(combined, detailsSimilarity, options)) {
        ranked.push({ ...record, relevanceScore: combined, topicSimilarity, detailsSimilarity });
      }
      continue;
    }

    const keywordScore = keywordRelevance(record, queryKeywords, now);
    if (keywordScore > options.keywordThreshold) {
      ranked.push({ ...record, relevanceScore: keywordScore * options.keywordFallbackWeight });
    }
  }

  return sortByRelevance(ranked).slice(0, options.maxResults);
}

/**
 * Rank every record by keyword overlap alone. Returns at most maxResults.
 */
export function rankByKeywords(
  records: readonly MemoryRecord[],
  queryKeywords: readonly string[],
  options: Pick<RankingOptions, "keywordThreshold" | "maxResults">,
  now: Date,
): RankedMemory[] {
  const ranked: RankedMemory[] = [];
  for (const record of records) {
    const relevanceScore = keywordRelevance(record, queryKeywords, now);
    if (relevanceScore > options.keywordThreshold) {
      ranked.push({ ...record, relevanceScore });
    }
  }
  return sortByRelevance(ranked).slice(0, options.maxResults);
}
