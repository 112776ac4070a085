/**
 * Domain keyword extraction for the keyword fallback path.
 *
 * Terms ship in data/keyword-terms.json; a replacement list can be pointed to
 * from config (memory.keywordTermsPath).
 */

import fs from "node:fs/promises";

import { z } from "zod";

import type { Logger } from "../log.js";
import { errorMessage } from "./errors.js";

const DEFAULT_TERMS_URL = new URL("../../data/keyword-terms.json", import.meta.url);

const KeywordTermsSchema = z.array(z.string().trim().min(1));

/**
 * Terms from `terms` that occur in `text`, in term-list order, compared
 * case-insensitively and without duplicates.
 */
export function extractKeywords(text: string, terms: readonly string[]): string[] {
  if (!text) return [];
  const haystack = text.toLowerCase();
  const seen = new Set<string>();
  const found: string[] = [];

  for (const term of terms) {
    const needle = term.toLowerCase();
    if (seen.has(needle)) continue;
    seen.add(needle);
    if (haystack.includes(needle)) found.push(term);
  }
  return found;
}

/**
 * Load the term list from `filePath`, or the bundled list when omitted.
 * An unreadable or malformed file yields an empty list.
 */
export async function loadKeywordTerms(logger: Logger, filePath?: string): Promise<string[]> {
  const source = filePath ?? DEFAULT_TERMS_URL;
  try {
    const raw = await fs.readFile(source, "utf-8");
    const parsed = KeywordTermsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logger.warn({ path: String(source) }, "Keyword term list has an invalid shape");
      return [];
    }
    return parsed.data;
  } catch (err) {
    logger.warn({ path: String(source), error: errorMessage(err) }, "Failed to load keyword terms");
    return [];
  }
}
