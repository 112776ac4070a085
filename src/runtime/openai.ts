import { z } from "zod";

import { SummarizerError } from "../memory/errors.js";
import type { TextGenerator } from "../memory/types.js";

export type OpenAIMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
          })
          .optional(),
      }),
    )
    .default([]),
});

/**
 * Text generation over an OpenAI-compatible `/chat/completions` endpoint.
 * Every failure (HTTP status, timeout, empty completion) throws SummarizerError.
 */
export class OpenAIClient implements TextGenerator {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(params: { baseUrl: string; apiKey?: string; model: string; temperature?: number; timeoutMs?: number }) {
    this.baseUrl = params.baseUrl.replace(/\/$/, "");
    this.apiKey = params.apiKey;
    this.model = params.model;
    this.temperature = params.temperature ?? 0.3;
    this.timeoutMs = params.timeoutMs ?? 240_000;
  }

  async generate(prompt: string, opts?: { maxTokens?: number }): Promise<string> {
    const message = await this.chat({
      messages: [{ role: "user", content: prompt }],
      maxTokens: opts?.maxTokens,
    });
    return message.content;
  }

  async chat(params: { messages: OpenAIMessage[]; maxTokens?: number }): Promise<OpenAIMessage> {
    const payload: Record<string, unknown> = {
      model: this.model,
      messages: params.messages,
      temperature: this.temperature,
    };
    if (params.maxTokens) payload.max_tokens = params.maxTokens;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new SummarizerError(`chat completion request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!res.ok) {
      const text = await res.text();
      throw new SummarizerError(`chat completion failed: ${res.status} ${text}`, { status: res.status });
    }

    const parsed = ChatCompletionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new SummarizerError("chat completion has an unexpected shape");
    }
    const content = parsed.data.choices[0]?.message?.content?.trim();
    if (!content) throw new SummarizerError("chat completion missing content");
    return { role: "assistant", content };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.apiKey) headers.authorization = `Bearer ${this.apiKey}`;
    return headers;
  }
}
