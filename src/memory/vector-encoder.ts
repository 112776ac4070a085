/**
 * Vector Encoder
 *
 * Offline text embedding over a self-maintained vocabulary:
 * - Each distinct token owns a stable slot; slots are never reassigned
 * - A vector has one weight per slot (raw term frequency)
 * - Similarity is cosine over the shorter vector's range, so vectors
 *   encoded under an older, smaller vocabulary stay comparable
 */

import type { Logger } from "../log.js";
import type { EncoderStats } from "./types.js";

/**
 * Serializable vocabulary snapshot
 */
export type VocabularyState = {
  /** token -> slot */
  vocab: Record<string, number>;
  /** token -> number of times seen across update_vocab calls */
  wordFreq: Record<string, number>;
};

// A single CJK ideograph, or a run of other letters/digits.
const TOKEN_RE = /\p{Script=Han}|(?:(?!\p{Script=Han})[\p{L}\p{N}])+/gu;

/**
 * Split text into lower-cased tokens
 */
export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/**
 * Cosine similarity in [0, 1]. Vectors of different length are compared over
 * the shorter one's index range.
 */
export function cosineSimilarity(a: readonly number[] | null | undefined, b: readonly number[] | null | undefined): number {
  if (!a || !b || a.length === 0 || b.length === 0) return 0;

  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < len; i += 1) {
    const va = a[i] ?? 0;
    const vb = b[i] ?? 0;
    dot += va * vb;
    normA += va * va;
    normB += vb * vb;
  }

  if (normA === 0 || normB === 0) return 0;
  const score = dot / Math.sqrt(normA * normB);
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export class VectorEncoder {
  private readonly logger: Logger;
  private readonly maxVocabularySize?: number;
  private readonly slots = new Map<string, number>();
  private readonly wordFreq = new Map<string, number>();

  constructor(params: { logger: Logger; maxVocabularySize?: number }) {
    this.logger = params.logger.child({ component: "vector-encoder" });
    this.maxVocabularySize = params.maxVocabularySize;
  }

  /**
   * Current vector dimensionality
   */
  get vocabSize(): number {
    return this.slots.size;
  }

  /**
   * Admit unseen tokens from the given texts. Returns how many slots were added.
   */
  updateVocab(texts: readonly string[]): number {
    let added = 0;
    let capped = false;

    for (const text of texts) {
      for (const token of tokenize(text)) {
        this.wordFreq.set(token, (this.wordFreq.get(token) ?? 0) + 1);
        if (this.slots.has(token)) continue;
        if (this.maxVocabularySize !== undefined && this.slots.size >= this.maxVocabularySize) {
          capped = true;
          continue;
        }
        this.slots.set(token, this.slots.size);
        added += 1;
      }
    }

    if (capped) {
      this.logger.warn({ maxVocabularySize: this.maxVocabularySize }, "Vocabulary cap reached, new tokens ignored");
    }
    if (added > 0) {
      this.logger.debug({ added, vocabSize: this.slots.size }, "Vocabulary updated");
    }
    return added;
  }

  /**
   * Encode text as a term-frequency vector of length vocabSize. Returns null
   * when there is nothing to encode (empty vocabulary or blank text).
   */
  encodeText(text: string): number[] | null {
    if (this.slots.size === 0 || !text || !text.trim()) return null;

    const tokens = tokenize(text);
    if (tokens.length === 0) return null;

    const vector = new Array<number>(this.slots.size).fill(0);
    for (const token of tokens) {
      const slot = this.slots.get(token);
      if (slot === undefined) continue;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }

  calculateSimilarity(a: readonly number[] | null | undefined, b: readonly number[] | null | undefined): number {
    return cosineSimilarity(a, b);
  }

  /**
   * Slot assigned to a token, if any
   */
  slotOf(token: string): number | undefined {
    return this.slots.get(token);
  }

  getStats(): EncoderStats {
    let totalTokens = 0;
    for (const count of this.wordFreq.values()) totalTokens += count;
    return {
      vocabSize: this.slots.size,
      totalTokens,
      uniqueTokens: this.wordFreq.size,
      maxVocabularySize: this.maxVocabularySize ?? null,
    };
  }

  exportState(): VocabularyState {
    return {
      vocab: Object.fromEntries(this.slots),
      wordFreq: Object.fromEntries(this.wordFreq),
    };
  }

  /**
   * Replace the vocabulary with a persisted snapshot. A snapshot whose slots
   * are not exactly 0..n-1 is rejected and the encoder keeps its state.
   */
  importState(state: VocabularyState): boolean {
    const entries = Object.entries(state.vocab);
    const seen = new Set<number>();
    for (const [, slot] of entries) {
      if (!Number.isInteger(slot) || slot < 0 || slot >= entries.length || seen.has(slot)) {
        this.logger.warn({ vocabSize: entries.length }, "Ignoring vocabulary snapshot with invalid slots");
        return false;
      }
      seen.add(slot);
    }

    this.slots.clear();
    this.wordFreq.clear();
    entries
      .sort((a, b) => a[1] - b[1])
      .forEach(([token, slot]) => this.slots.set(token, slot));
    for (const [token, count] of Object.entries(state.wordFreq)) {
      if (Number.isFinite(count) && count > 0) this.wordFreq.set(token, count);
    }
    this.logger.debug({ vocabSize: this.slots.size }, "Vocabulary loaded");
    return true;
  }
}
