import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

const DEFAULT_CONFIG_PATH = "memory-lake.config.json";

const DEFAULT_RECALL_TRIGGERS = [
  "remember",
  "recall",
  "we discussed",
  "you said",
  "last time",
  "previously",
  "earlier",
  "continue",
  "记得",
  "说过",
  "讨论过",
  "回忆",
  "继续",
  "接着",
  "历史",
  "以前",
  "曾经",
  "之前",
  "上个",
];

const DEFAULT_RECALL_SUPPRESSORS = ["just now", "the last one", "上一个", "刚才"];

const MemorySchema = z.object({
  summarizeEvery: z.number().int().positive().default(3),
  duplicateWindowMs: z.number().int().min(0).default(5_000),
  maxResults: z.number().int().positive().default(5),
  topicWeight: z.number().min(0).max(1).default(0.7),
  detailsWeight: z.number().min(0).max(1).default(0.3),
  combinedThreshold: z.number().min(0).max(1).default(0.2),
  detailsThreshold: z.number().min(0).max(1).default(0.3),
  keywordThreshold: z.number().min(0).max(1).default(0.3),
  keywordFallbackWeight: z.number().min(0).max(1).default(0.5),
  maxDetailsChars: z.number().int().positive().default(2_000),
  maxVocabularySize: z.number().int().positive().optional(),
  userLabel: z.string().min(1).default("User"),
  assistantLabel: z.string().min(1).default("Assistant"),
  recallTriggers: z.array(z.string().min(1)).default(DEFAULT_RECALL_TRIGGERS),
  recallSuppressors: z.array(z.string().min(1)).default(DEFAULT_RECALL_SUPPRESSORS),
  keywordTermsPath: z.string().optional(),
});

const SummarizerSchema = z.object({
  baseUrl: z.string().min(1).default("http://localhost:1234/v1"),
  apiKey: z.string().optional(),
  model: z.string().min(1).default("memory-summary"),
  temperature: z.number().min(0).max(2).default(0.3),
  maxAttempts: z.number().int().positive().default(5),
  baseDelayMs: z.number().int().min(0).default(2_000),
  timeoutMs: z.number().int().positive().default(240_000),
  concurrency: z.number().int().positive().default(3),
  roundMaxChars: z.number().int().positive().default(300),
  topicMaxChars: z.number().int().positive().default(40),
});

const LoggingSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  filePath: z.string().optional(),
  fileLevel: z.enum(["trace", "debug", "info", "warn", "error"]).optional(),
});

const ConfigSchema = z.object({
  workspaceDir: z.string().default("."),
  dataDir: z.string().default("chat_logs"),
  legacyFile: z.string().default("memory_lake.json"),
  memory: MemorySchema.default({}),
  summarizer: SummarizerSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type MemorySettings = z.infer<typeof MemorySchema>;
export type SummarizerSettings = z.infer<typeof SummarizerSchema>;

export type MemoryLakeConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    workspaceDir: string;
    dataDir: string;
    legacyFilePath: string;
    keywordTermsPath?: string;
    logFilePath?: string;
    logFileLevel: string;
  };
};

export async function loadConfig(explicitPath?: string): Promise<MemoryLakeConfig> {
  const configPath = resolveConfigPath(explicitPath);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  return parseConfig(parsed);
}

export function parseConfig(input: unknown): MemoryLakeConfig {
  const base = ConfigSchema.parse(input);
  return resolveConfig(base);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.MEMORY_LAKE_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>): MemoryLakeConfig {
  const workspaceDir = resolveUserPath(base.workspaceDir);
  const dataDir = resolveUserPath(base.dataDir, workspaceDir);
  const legacyFilePath = resolveUserPath(base.legacyFile, workspaceDir);
  const keywordTermsPath = base.memory.keywordTermsPath?.trim()
    ? resolveUserPath(base.memory.keywordTermsPath, workspaceDir)
    : undefined;
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, workspaceDir)
    : undefined;
  const logFileLevel = base.logging.fileLevel?.trim() || base.logging.level;

  return {
    ...base,
    resolved: {
      workspaceDir,
      dataDir,
      legacyFilePath,
      keywordTermsPath,
      logFilePath,
      logFileLevel,
    },
  };
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
