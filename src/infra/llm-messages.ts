import { ContentGenerationError } from "../workforce/errors.js";

type FetchLike = typeof fetch;

export const DEFAULT_LLM_MODEL = "claude-3-5-haiku-20241022";
export const DEFAULT_LLM_BASE_URL = "https://api.anthropic.com";
const ANTHROPIC_VERSION = "2023-06-01";

export type LlmMessagesEnv = {
  apiKey: string | null;
  model: string;
  baseUrl: string;
};

export type MessageCompletionRequest = {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
};

export interface MessageCompletionClient {
  complete(request: MessageCompletionRequest): Promise<string>;
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function resolveLlmMessagesEnv(env: NodeJS.ProcessEnv = process.env): LlmMessagesEnv {
  return {
    apiKey: normalizeString(env.ANTHROPIC_API_KEY),
    model: normalizeString(env.KWSIM_LLM_MODEL) ?? DEFAULT_LLM_MODEL,
    baseUrl: (normalizeString(env.KWSIM_LLM_BASE_URL) ?? DEFAULT_LLM_BASE_URL).replace(/\/+$/, ""),
  };
}

async function parseResponseBody(response: Response): Promise<Record<string, unknown>> {
  const raw = await response.text();
  if (!raw.trim()) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { value: parsed };
  } catch {
    return { raw };
  }
}

function extractErrorMessage(payload: Record<string, unknown>, status: number): string {
  const error = payload.error;
  if (isRecord(error)) {
    const message = normalizeString(error.message);
    if (message) {
      return message;
    }
  }
  return normalizeString(payload.raw) ?? `status_${status}`;
}

function extractText(payload: Record<string, unknown>): string {
  const content = Array.isArray(payload.content) ? payload.content : [];
  const parts: string[] = [];
  for (const block of content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    }
  }
  return parts.join("");
}

export class AnthropicMessagesClient implements MessageCompletionClient {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchLike;

  constructor(options: { apiKey: string; model?: string; baseUrl?: string; fetchFn?: FetchLike }) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_LLM_MODEL;
    this.baseUrl = options.baseUrl ?? DEFAULT_LLM_BASE_URL;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async complete(request: MessageCompletionRequest): Promise<string> {
    const endpoint = `${this.baseUrl}/v1/messages`;
    let response: Response;
    try {
      response = await this.fetchFn(endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-api-key": this.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        }),
      });
    } catch (err) {
      throw new ContentGenerationError(
        `llm_request_failed:${String(err)}`,
        { endpoint },
        { cause: err },
      );
    }

    const payload = await parseResponseBody(response);
    if (!response.ok) {
      throw new ContentGenerationError(
        `llm_http_${response.status}:${extractErrorMessage(payload, response.status)}`,
        { endpoint, status: response.status },
      );
    }
    const text = extractText(payload);
    if (!text.trim()) {
      throw new ContentGenerationError("llm_empty_response", { endpoint });
    }
    return text;
  }
}

/** Returns null when no API key is configured. */
export function createMessageCompletionClient(
  options: { env?: NodeJS.ProcessEnv; fetchFn?: FetchLike } = {},
): MessageCompletionClient | null {
  const env = resolveLlmMessagesEnv(options.env ?? process.env);
  if (!env.apiKey) {
    return null;
  }
  return new AnthropicMessagesClient({
    apiKey: env.apiKey,
    model: env.model,
    baseUrl: env.baseUrl,
    fetchFn: options.fetchFn,
  });
}
