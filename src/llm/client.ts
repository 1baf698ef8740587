import { TransientServiceError } from "../errors.ts";
import { RetryPolicy } from "./retry.ts";

export type CompletionOptions = {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type Completion = {
  content: string;
  tokens?: number;
  costUsd?: number;
};

export interface LLMClient {
  complete(model: string, systemPrompt: string, prompt: string, options?: CompletionOptions): Promise<Completion>;
}

export type LiteLLMClientOptions = {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
};

export function resolveBaseUrl(explicit?: string): string {
  return (explicit ?? process.env.LITELLM_BASE_URL ?? process.env.OPENAI_BASE_URL ?? "https://api.openai.com/v1").replace(
    /\/$/,
    "",
  );
}

export function resolveApiKey(explicit?: string): string | null {
  return explicit ?? process.env.LITELLM_API_KEY ?? process.env.OPENAI_API_KEY ?? null;
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * POSTs JSON with a per-request timeout. 429/5xx responses, network failures and
 * timeouts surface as TransientServiceError; other HTTP failures as plain errors.
 */
export async function postJson(
  url: string,
  apiKey: string,
  body: unknown,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<unknown> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      const message = `Request to ${url} failed (${response.status}): ${detail}`;
      if (isTransientStatus(response.status)) {
        throw new TransientServiceError(message, { status: response.status });
      }
      throw new Error(message);
    }

    return (await response.json()) as unknown;
  } catch (err) {
    if (timedOut) {
      throw new TransientServiceError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: err });
    }
    if (err instanceof TypeError) {
      throw new TransientServiceError(`Request to ${url} failed: ${err.message}`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

type ChatCompletionPayload = {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { total_tokens?: number };
};

function isChatCompletionPayload(value: unknown): value is ChatCompletionPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class LiteLLMClient implements LLMClient {
  private baseUrl: string;
  private apiKey: string | null;
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;

  constructor(options: LiteLLMClientOptions = {}) {
    this.baseUrl = resolveBaseUrl(options.baseUrl);
    this.apiKey = resolveApiKey(options.apiKey);
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
  }

  async complete(model: string, systemPrompt: string, prompt: string, options: CompletionOptions = {}): Promise<Completion> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new Error("No API key configured. Set LITELLM_API_KEY or OPENAI_API_KEY, or inject a custom llmClient.");
    }

    const body: {
      model: string;
      messages: Array<{ role: "system" | "user"; content: string }>;
      temperature?: number;
      max_tokens?: number;
    } = {
      model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: prompt },
      ],
    };

    const temperature = options.temperature ?? 0;
    if (shouldSendTemperature(model, temperature)) {
      body.temperature = temperature;
    }
    if (options.maxTokens != null) {
      body.max_tokens = options.maxTokens;
    }

    return this.retryPolicy.execute(async () => {
      const payload = await postJson(`${this.baseUrl}/chat/completions`, apiKey, body, this.timeoutMs, options.signal);
      if (!isChatCompletionPayload(payload)) {
        throw new Error("LLM response was not a JSON object");
      }

      const content = payload.choices?.[0]?.message?.content;
      if (typeof content !== "string") {
        throw new Error("LLM response did not include choices[0].message.content");
      }

      return {
        content: content.trim(),
        tokens: Number(payload.usage?.total_tokens ?? 0),
        costUsd: undefined,
      };
    });
  }
}

function shouldSendTemperature(model: string, temperature: number | undefined): boolean {
  if (typeof temperature !== "number" || Number.isNaN(temperature)) {
    return false;
  }
  const lower = model.toLowerCase();
  const noTempPrefixes = ["o1", "o3", "gpt-5"];
  return !noTempPrefixes.some((prefix) => lower.startsWith(prefix));
}
