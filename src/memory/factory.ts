import type { MemoryLakeConfig } from "../config.js";
import type { Logger } from "../log.js";
import { OpenAIClient } from "../runtime/openai.js";
import type { Clock } from "./clock.js";
import { loadKeywordTerms } from "./keywords.js";
import { MemoryLake } from "./memory-lake.js";
import { MemoryStore } from "./memory-store.js";
import { MemorySummaryAgent } from "./summary-agent.js";
import type { TextGenerator } from "./types.js";
import { VectorEncoder } from "./vector-encoder.js";

/**
 * Wire a MemoryLake from config and run its startup sequence. Pass
 * `generator` to summarise through something other than the configured
 * OpenAI-compatible endpoint.
 */
export async function createMemoryLake(params: {
  config: MemoryLakeConfig;
  logger: Logger;
  generator?: TextGenerator;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}): Promise<MemoryLake> {
  const { config, logger } = params;

  const generator =
    params.generator ??
    new OpenAIClient({
      baseUrl: config.summarizer.baseUrl,
      apiKey: config.summarizer.apiKey,
      model: config.summarizer.model,
      temperature: config.summarizer.temperature,
      timeoutMs: config.summarizer.timeoutMs,
    });

  const summarizer = new MemorySummaryAgent({
    generator,
    logger,
    sleep: params.sleep,
    options: {
      maxAttempts: config.summarizer.maxAttempts,
      baseDelayMs: config.summarizer.baseDelayMs,
      concurrency: config.summarizer.concurrency,
      roundMaxChars: config.summarizer.roundMaxChars,
      topicMaxChars: config.summarizer.topicMaxChars,
      userLabel: config.memory.userLabel,
      assistantLabel: config.memory.assistantLabel,
    },
  });

  const store = new MemoryStore({
    dataDir: config.resolved.dataDir,
    legacyFilePath: config.resolved.legacyFilePath,
    logger,
    clock: params.clock,
  });
  const encoder = new VectorEncoder({ logger, maxVocabularySize: config.memory.maxVocabularySize });
  const keywordTerms = await loadKeywordTerms(logger, config.resolved.keywordTermsPath);

  const lake = new MemoryLake({
    store,
    encoder,
    summarizer,
    settings: config.memory,
    keywordTerms,
    logger,
    clock: params.clock,
  });
  await lake.init();
  return lake;
}
