/**
 * OpenAI-compatible chat-completions client.
 *
 * Retries 429 and 5xx responses, empty replies and timeouts with a linear
 * backoff; anything else fails immediately with a `CollaboratorError`.
 */

import { z } from "zod";
import { CollaboratorError } from "../errors";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatClientConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  retries: number;
  /** Base delay between attempts, multiplied by the attempt number. */
  retryDelayMs?: number;
  fetch?: typeof fetch;
}

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

type Env = Record<string, string | undefined>;

function envInt(env: Env, key: string, fallback: number): number {
  const v = env[key];
  return v ? parseInt(v, 10) : fallback;
}

export function loadChatClientConfig(env: Env = process.env): ChatClientConfig {
  const apiKey = env.LLM_API_KEY;
  if (!apiKey) {
    throw new CollaboratorError("Missing LLM config. Set LLM_API_KEY (and optionally LLM_API_URL, LLM_MODEL).");
  }
  return {
    apiUrl: env.LLM_API_URL || "https://api.openai.com/v1/chat/completions",
    apiKey,
    model: env.LLM_MODEL || "gpt-4o-mini",
    timeoutMs: envInt(env, "LLM_TIMEOUT_MS", 60_000),
    retries: envInt(env, "LLM_RETRIES", 2),
  };
}

export class ChatClient {
  private readonly fetchImpl: typeof fetch;
  private readonly retryDelayMs: number;

  constructor(private readonly config: ChatClientConfig) {
    this.fetchImpl = config.fetch ?? fetch;
    this.retryDelayMs = config.retryDelayMs ?? 2000;
  }

  async complete(messages: ChatMessage[], maxTokens = 4096): Promise<string> {
    const { retries } = this.config;
    let lastError = "no attempt made";

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0) await sleep(this.retryDelayMs * attempt);

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
      try {
        const res = await this.fetchImpl(this.config.apiUrl, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify({
            model: this.config.model,
            messages,
            max_tokens: maxTokens,
            temperature: 0.2,
          }),
          signal: controller.signal,
        });

        if (!res.ok) {
          const errBody = await res.text().catch(() => "");
          lastError = `HTTP ${res.status}: ${errBody.slice(0, 200)}`;
          console.error(`[llm] ${lastError}`);
          if (res.status === 429 || res.status >= 500) continue;
          throw new CollaboratorError(`chat completion failed with ${lastError}`);
        }

        const parsed = CompletionSchema.safeParse(await res.json());
        if (!parsed.success) {
          throw new CollaboratorError("chat completion response has an unexpected shape");
        }
        const content = parsed.data.choices[0].message.content ?? "";
        if (content.trim().length === 0) {
          lastError = "empty response";
          console.warn(`[llm] Empty response, retry (${attempt + 1})`);
          continue;
        }
        return content;
      } catch (err) {
        if (err instanceof CollaboratorError) throw err;
        lastError = err instanceof Error && err.name === "AbortError"
          ? "timeout"
          : err instanceof Error ? err.message : String(err);
        console.error(`[llm] Call error: ${lastError}`);
      } finally {
        clearTimeout(timeout);
      }
    }

    throw new CollaboratorError(`chat completion failed after ${retries + 1} attempt(s): ${lastError}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
