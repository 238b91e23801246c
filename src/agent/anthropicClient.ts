/**
 * Minimal Anthropic Messages API client built on fetch. Responses are
 * validated with Zod; content blocks other than text and tool_use are dropped.
 */
import { z } from "zod";

import { ANTHROPIC_BASE_URL, ANTHROPIC_VERSION } from "../config/constants.js";
import type {
  AssistantContentBlock,
  CompletionRequest,
  CompletionResponse,
} from "./chatTypes.js";

export class AnthropicRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AnthropicRequestError";
    this.status = status;
  }
}

export class AnthropicAuthenticationError extends AnthropicRequestError {
  constructor(status: number, message: string) {
    super(status, message);
    this.name = "AnthropicAuthenticationError";
  }
}

export interface CreateMessageOptions {
  readonly signal?: AbortSignal;
}

export interface LlmClient {
  createMessage(
    request: CompletionRequest,
    options?: CreateMessageOptions,
  ): Promise<CompletionResponse>;
}

export interface AnthropicClientOptions {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly fetch?: typeof fetch;
}

const contentBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("tool_use"),
    id: z.string(),
    name: z.string(),
    input: z.record(z.unknown()),
  }),
]);

const responseSchema = z.object({
  id: z.string(),
  model: z.string(),
  stop_reason: z.string().nullable(),
  content: z.array(z.unknown()),
});

const defaultFetch: typeof fetch = (input, init) => fetch(input, init);

export function parseCompletionResponse(payload: unknown): CompletionResponse {
  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error("Unexpected response shape from Anthropic", {
      cause: parsed.error,
    });
  }

  const content = parsed.data.content.flatMap(
    (block): AssistantContentBlock[] => {
      const result = contentBlockSchema.safeParse(block);
      return result.success ? [result.data] : [];
    },
  );

  return {
    id: parsed.data.id,
    model: parsed.data.model,
    stop_reason: parsed.data.stop_reason,
    content,
  };
}

export class AnthropicClient implements LlmClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AnthropicClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? defaultFetch;
  }

  async createMessage(
    request: CompletionRequest,
    options: CreateMessageOptions = {},
  ): Promise<CompletionResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      body: JSON.stringify(request),
      signal: options.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      const status = `${response.status} ${response.statusText}`;
      const message = `Anthropic request failed (${status}): ${text}`;
      if (response.status === 401 || response.status === 403) {
        throw new AnthropicAuthenticationError(response.status, message);
      }
      throw new AnthropicRequestError(response.status, message);
    }

    return parseCompletionResponse(await response.json());
  }
}
