import { describe, it, expect, vi } from "vitest";

import { createSilentLogger } from "../../../src/log.js";
import {
  CONTEXT_SUMMARY_FAILED,
  DETAILS_SUMMARY_FAILED,
  fallbackRoundSummary,
  MemorySummaryAgent,
  splitRounds,
  TOPIC_SUMMARY_FAILED,
  type SummaryAgentOptions,
} from "../../../src/memory/summary-agent.js";
import type { TextGenerator } from "../../../src/memory/types.js";

const labels = { userLabel: "User", assistantLabel: "Assistant" };

const options: SummaryAgentOptions = {
  maxAttempts: 5,
  baseDelayMs: 2000,
  concurrency: 3,
  roundMaxChars: 300,
  topicMaxChars: 40,
  ...labels,
};

function createAgent(generate: TextGenerator["generate"]) {
  const sleep = vi.fn(async (_ms: number) => {});
  const generator = { generate: vi.fn(generate) };
  const agent = new MemorySummaryAgent({ generator, logger: createSilentLogger(), options, sleep });
  return { agent, generator, sleep };
}

const transcript = [
  "User: What's the weather in Beijing?",
  "Assistant: Sunny, 25 degrees.",
  "User: Should I take a jacket?",
  "Assistant: A light one for the evening.",
  "User: Thanks",
  "Assistant: You're welcome.",
].join("\n");

describe("splitRounds", () => {
  it("pairs each user line with the reply and its continuation lines", () => {
    const text = "User: hi\nAssistant: hello\nmore text\n\nUser: q2\nAssistant: a2\nUser: dangling";

    expect(splitRounds(text, labels)).toEqual(["User: hi\nAssistant: hello\nmore text", "User: q2\nAssistant: a2"]);
  });

  it("ignores text before the first user line", () => {
    expect(splitRounds("Assistant: intro\nUser: q\nAssistant: a", labels)).toEqual(["User: q\nAssistant: a"]);
  });
});

describe("fallbackRoundSummary", () => {
  it("keeps the first line of each speaker", () => {
    expect(fallbackRoundSummary("User: hi\nAssistant: line one\nline two", labels, 300)).toBe(
      "User: hi\nAssistant: line one",
    );
  });

  it("caps the result", () => {
    const summary = fallbackRoundSummary(`User: ${"x".repeat(50)}\nAssistant: ok`, labels, 20);
    expect(summary).toBe(`User: ${"x".repeat(11)}...`);
  });
});

describe("MemorySummaryAgent", () => {
  describe("summarizeTopic", () => {
    it("returns the trimmed topic generated from the user's lines", async () => {
      const { agent, generator } = createAgent(async () => "  Beijing weather and clothing  ");

      await expect(agent.summarizeTopic(transcript)).resolves.toBe("Beijing weather and clothing");

      const prompt = generator.generate.mock.calls[0]?.[0] ?? "";
      expect(prompt).toContain("What's the weather in Beijing?");
      expect(prompt).not.toContain("Sunny, 25 degrees.");
    });

    it("backs off 2s, 4s, 8s, 16s and returns the sentinel after five failures", async () => {
      const { agent, generator, sleep } = createAgent(async () => {
        throw new Error("timeout");
      });

      await expect(agent.summarizeTopic(transcript)).resolves.toBe(TOPIC_SUMMARY_FAILED);
      expect(generator.generate).toHaveBeenCalledTimes(5);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000, 8000, 16000]);
    });

    it("retries a topic that is too short or too long", async () => {
      const replies = ["x", "y".repeat(41), "Weather"];
      const { agent, sleep } = createAgent(async () => replies.shift() ?? "");

      await expect(agent.summarizeTopic(transcript)).resolves.toBe("Weather");
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
    });
  });

  describe("summarizeContext", () => {
    it("accepts a summary between 20 and 200 characters", async () => {
      const summary = "Asked about Beijing weather, then about a jacket.";
      const { agent } = createAgent(async () => summary);

      await expect(agent.summarizeContext(transcript)).resolves.toBe(summary);
    });

    it("returns the sentinel when every reply is too short", async () => {
      const { agent, generator } = createAgent(async () => "too short");

      await expect(agent.summarizeContext(transcript)).resolves.toBe(CONTEXT_SUMMARY_FAILED);
      expect(generator.generate).toHaveBeenCalledTimes(5);
    });
  });

  describe("summarizeConversationDetails", () => {
    it("reassembles rounds in order whatever order they finish in", async () => {
      const { agent } = createAgent(async (prompt) => {
        const round = Number(/Condense round (\d+)/.exec(prompt)?.[1] ?? 0);
        await new Promise((resolve) => setTimeout(resolve, (4 - round) * 10));
        return `Summary of round ${round}`;
      });

      await expect(agent.summarizeConversationDetails(transcript)).resolves.toBe(
        "Summary of round 1\n\nSummary of round 2\n\nSummary of round 3",
      );
    });

    it("runs at most three rounds at once", async () => {
      let active = 0;
      let peak = 0;
      const { agent, generator } = createAgent(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return "Condensed round";
      });
      const fiveRounds = Array.from({ length: 5 }, (_, i) => `User: q${i}\nAssistant: a${i}`).join("\n");

      await agent.summarizeConversationDetails(fiveRounds);

      expect(generator.generate).toHaveBeenCalledTimes(5);
      expect(peak).toBe(3);
    });

    it("substitutes the local fallback for a round that keeps failing", async () => {
      const { agent } = createAgent(async (prompt) => {
        if (prompt.includes("Condense round 2")) throw new Error("HTTP 500");
        return "Condensed round";
      });

      await expect(agent.summarizeConversationDetails(transcript)).resolves.toBe(
        "Condensed round\n\nUser: Should I take a jacket?\nAssistant: A light one for the evening.\n\nCondensed round",
      );
    });

    it("caps each round summary", async () => {
      const { agent } = createAgent(async () => "z".repeat(400));

      const details = await agent.summarizeConversationDetails("User: q\nAssistant: a");

      expect(details).toBe(`${"z".repeat(297)}...`);
    });

    it("returns the sentinel when there is no complete round", async () => {
      const { agent, generator } = createAgent(async () => "unused");

      await expect(agent.summarizeConversationDetails("User: only a question")).resolves.toBe(DETAILS_SUMMARY_FAILED);
      expect(generator.generate).not.toHaveBeenCalled();
    });
  });
});
