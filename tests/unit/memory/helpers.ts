import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Summarizer } from "../../../src/memory/types.js";

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Clock pinned to 2026-03-10 09:15:00 local time unless told otherwise
 */
export function createTestClock(start = new Date(2026, 2, 10, 9, 15, 0)) {
  let now = start.getTime();
  return {
    clock: () => new Date(now),
    advance(ms: number) {
      now += ms;
    },
  };
}

export const noSleep = async (): Promise<void> => {};

type SummarizerCall = { method: "topic" | "context" | "details"; text: string };

/**
 * Summarizer returning canned text; queued topics are used first
 */
export class FakeSummarizer implements Summarizer {
  readonly calls: SummarizerCall[] = [];
  topics: string[] = [];
  topic = "Test topic";
  details = "User: question\nAssistant: answer";
  context = "A short running summary of the conversation.";
  gate?: Promise<void>;
  onTopicCalled?: () => void;

  async summarizeTopic(conversationText: string): Promise<string> {
    this.calls.push({ method: "topic", text: conversationText });
    this.onTopicCalled?.();
    if (this.gate) await this.gate;
    return this.topics.shift() ?? this.topic;
  }

  async summarizeContext(conversationText: string): Promise<string> {
    this.calls.push({ method: "context", text: conversationText });
    return this.context;
  }

  async summarizeConversationDetails(conversationText: string): Promise<string> {
    this.calls.push({ method: "details", text: conversationText });
    return this.details;
  }
}
