/**
 * Memory Summary Agent
 *
 * Implements the Summarizer capability over a TextGenerator. Every operation
 * retries with exponential backoff and ends in a sentinel string instead of
 * throwing, so a failing backend never stalls a memory flush.
 */

import type { SummarizerSettings } from "../config.js";
import type { Logger } from "../log.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { retry, type RetryResult } from "../utils/retry.js";
import { truncate } from "../utils/text.js";
import { buildContextPrompt, buildRoundPrompt, buildTopicPrompt, type TranscriptLabels } from "./prompts.js";
import type { Summarizer, TextGenerator } from "./types.js";

export const TOPIC_SUMMARY_FAILED = "Topic summary failed";
export const CONTEXT_SUMMARY_FAILED = "Context summary failed";
export const DETAILS_SUMMARY_FAILED = "Details summary failed";

const TOPIC_MAX_TOKENS = 800;
const CONTEXT_MAX_TOKENS = 800;
const ROUND_MAX_TOKENS = 3000;
const CONTEXT_MIN_CHARS = 20;
const CONTEXT_MAX_CHARS = 200;
const ROUND_MIN_CHARS = 5;

export type SummaryAgentOptions = Pick<
  SummarizerSettings,
  "maxAttempts" | "baseDelayMs" | "concurrency" | "roundMaxChars" | "topicMaxChars"
> &
  TranscriptLabels;

/**
 * Split a transcript into rounds. A line starting with the user label opens a
 * round; unlabelled lines continue the most recent speaker. Rounds missing
 * either side are dropped.
 */
export function splitRounds(conversationText: string, labels: TranscriptLabels): string[] {
  const userPrefix = `${labels.userLabel}:`;
  const assistantPrefix = `${labels.assistantLabel}:`;
  const rounds: string[][] = [];
  let current: string[] | null = null;

  for (const rawLine of conversationText.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.startsWith(userPrefix)) {
      current = [line];
      rounds.push(current);
    } else if (current) {
      current.push(line);
    }
  }

  return rounds
    .filter((lines) => lines.some((line) => line.startsWith(assistantPrefix)))
    .map((lines) => lines.join("\n"));
}

/**
 * Local stand-in for a round the backend could not summarise: the first line
 * of each speaker.
 */
export function fallbackRoundSummary(roundText: string, labels: TranscriptLabels, maxChars: number): string {
  const lines = roundText.split("\n").map((line) => line.trim());
  const userLine = lines.find((line) => line.startsWith(`${labels.userLabel}:`));
  const assistantLine = lines.find((line) => line.startsWith(`${labels.assistantLabel}:`));
  const parts = [userLine, assistantLine].filter((line): line is string => Boolean(line));
  return truncate(parts.join("\n"), maxChars);
}

export class MemorySummaryAgent implements Summarizer {
  private readonly generator: TextGenerator;
  private readonly logger: Logger;
  private readonly options: SummaryAgentOptions;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(params: {
    generator: TextGenerator;
    logger: Logger;
    options: SummaryAgentOptions;
    sleep?: (ms: number) => Promise<void>;
  }) {
    this.generator = params.generator;
    this.logger = params.logger.child({ component: "summary-agent" });
    this.options = params.options;
    this.sleep = params.sleep;
  }

  /**
   * Short topic line drawn from what the user said
   */
  async summarizeTopic(conversationText: string): Promise<string> {
    const quotes = this.extractUserQuotes(conversationText);
    const prompt = buildTopicPrompt(quotes, this.options.topicMaxChars);
    const result = await this.attempt("topic", () => this.generator.generate(prompt, { maxTokens: TOPIC_MAX_TOKENS }), (value) => {
      const length = Array.from(value).length;
      return length >= 2 && length <= this.options.topicMaxChars;
    });
    return result.ok ? result.value : TOPIC_SUMMARY_FAILED;
  }

  /**
   * Chronological running summary of the whole conversation
   */
  async summarizeContext(conversationText: string): Promise<string> {
    const prompt = buildContextPrompt(conversationText);
    const result = await this.attempt("context", () => this.generator.generate(prompt, { maxTokens: CONTEXT_MAX_TOKENS }), (value) => {
      const length = Array.from(value).length;
      return length > CONTEXT_MIN_CHARS && length < CONTEXT_MAX_CHARS;
    });
    return result.ok ? result.value : CONTEXT_SUMMARY_FAILED;
  }

  /**
   * Condensed transcript: each round summarised on its own, in parallel,
   * reassembled in round order.
   */
  async summarizeConversationDetails(conversationText: string): Promise<string> {
    const rounds = splitRounds(conversationText, this.options);
    if (rounds.length === 0) {
      this.logger.warn("No complete rounds to summarise");
      return DETAILS_SUMMARY_FAILED;
    }

    const summaries = await mapWithConcurrency(rounds, this.options.concurrency, (round, index) =>
      this.summarizeRound(round, index + 1),
    );
    this.logger.debug({ rounds: rounds.length }, "Conversation details summarised");
    return summaries.join("\n\n");
  }

  private async summarizeRound(roundText: string, roundNumber: number): Promise<string> {
    const prompt = buildRoundPrompt(roundText, roundNumber, this.options, this.options.roundMaxChars);
    const result = await this.attempt(
      `round ${roundNumber}`,
      () => this.generator.generate(prompt, { maxTokens: ROUND_MAX_TOKENS }),
      (value) => Array.from(value).length > ROUND_MIN_CHARS,
    );
    if (result.ok) return truncate(result.value, this.options.roundMaxChars);

    this.logger.warn({ round: roundNumber }, "Round summary failed, using local fallback");
    return fallbackRoundSummary(roundText, this.options, this.options.roundMaxChars);
  }

  private extractUserQuotes(conversationText: string): string {
    const prefix = `${this.options.userLabel}:`;
    const quotes = conversationText
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.startsWith(prefix))
      .map((line) => line.slice(prefix.length).trim())
      .filter(Boolean);
    return quotes.length > 0 ? quotes.join("\n") : conversationText;
  }

  private async attempt(
    label: string,
    operation: () => Promise<string>,
    validate: (value: string) => boolean,
  ): Promise<RetryResult<string>> {
    const result = await retry(async () => (await operation()).trim(), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.baseDelayMs,
      validate,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn({ operation: label, attempt, delayMs, error }, "Summary attempt failed, retrying");
      },
    });
    if (!result.ok) {
      this.logger.error({ operation: label, attempts: result.attempts, error: result.error }, "Summary failed");
    }
    return result;
  }
}
