import type { ToolDescriptor } from "../mcp/session.js";
import {
  COMPLETION_TIMEOUT_MS,
  MAX_TOKENS,
  MAX_TOOL_ROUNDS,
  MODEL_NAME,
} from "../config/constants.js";
import {
  errorKind,
  formatSeconds,
  OperationTimeoutError,
  withTimeout,
} from "../utils/asyncUtils.js";
import type { LlmClient } from "./anthropicClient.js";
import type {
  ChatMessage,
  CompletionResponse,
  ToolDefinition,
} from "./chatTypes.js";
import { buildSystemPrompt } from "./systemPrompt.js";
import { toToolDefinitions } from "./tooling.js";

/** The part of the tool-server connection the agent relies on. */
export interface ToolGateway {
  readonly availableTools: ReadonlyArray<ToolDescriptor>;
  callTool(name: string, args: Record<string, unknown>): Promise<string>;
}

export interface FinanceAgentOptions {
  readonly llm: LlmClient;
  readonly tools: ToolGateway;
  readonly model?: string;
  readonly maxTokens?: number;
  /**
   * How many tool-call/tool-result exchanges one user turn may run. The
   * answer that follows the last allowed exchange is final even if the model
   * asks for more tools.
   */
  readonly maxToolRounds?: number;
  readonly completionTimeoutMs?: number;
}

export const AUTHENTICATION_ERROR_MESSAGE =
  "Authentication error with Claude API. Please check your ANTHROPIC_API_KEY.";

export function responseText(response: CompletionResponse): string {
  return response.content
    .flatMap((block) => (block.type === "text" ? [block.text] : []))
    .join("");
}

/**
 * Answers one operator question. Each call starts a fresh conversation; the
 * history only lives for the duration of a tool exchange. Every failure is
 * turned into text for the operator.
 */
export class FinanceAgent {
  private readonly llm: LlmClient;
  private readonly tools: ToolGateway;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly maxToolRounds: number;
  private readonly completionTimeoutMs: number;

  constructor(options: FinanceAgentOptions) {
    this.llm = options.llm;
    this.tools = options.tools;
    this.model = options.model ?? MODEL_NAME;
    this.maxTokens = options.maxTokens ?? MAX_TOKENS;
    this.maxToolRounds = Math.max(1, options.maxToolRounds ?? MAX_TOOL_ROUNDS);
    this.completionTimeoutMs =
      options.completionTimeoutMs ?? COMPLETION_TIMEOUT_MS;
  }

  async getResponse(userMessage: string): Promise<string> {
    console.log(`Sending to Claude: ${userMessage}`);
    const messages: ChatMessage[] = [{ role: "user", content: userMessage }];
    const offeredTools = toToolDefinitions(this.tools.availableTools);

    let response: CompletionResponse;
    try {
      response = await this.requestCompletion(messages, offeredTools);
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        const seconds = formatSeconds(error.timeoutMs);
        return `Claude request timed out after ${seconds} seconds`;
      }
      const kind = errorKind(error);
      if (kind.toLowerCase().includes("authentication")) {
        return AUTHENTICATION_ERROR_MESSAGE;
      }
      return `Error communicating with Claude: ${kind}`;
    }

    console.log(
      `Claude response received with stop reason: ${response.stop_reason ?? "none"}`,
    );
    if (response.stop_reason !== "tool_use" || offeredTools.length === 0) {
      return responseText(response);
    }

    try {
      return await this.runToolRounds(messages, offeredTools, response);
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        return "Tool execution timed out";
      }
      return `Error during tool execution: ${errorKind(error)}`;
    }
  }

  /**
   * Follow-up requests re-send the definitions offered at the start of the
   * turn, since the history now references them. Further rounds only run
   * while the live catalog is still non-empty. Once the catalog is lost, a
   * follow-up carries both those definitions and the unavailable-tools note.
   */
  private async runToolRounds(
    messages: ChatMessage[],
    offeredTools: ToolDefinition[],
    firstResponse: CompletionResponse,
  ): Promise<string> {
    let response = firstResponse;
    for (let round = 1; ; round++) {
      messages.push({ role: "assistant", content: response.content });

      for (const block of response.content) {
        if (block.type !== "tool_use") {
          continue;
        }
        const result = await this.tools.callTool(block.name, block.input);
        messages.push({
          role: "user",
          content: [
            { type: "tool_result", tool_use_id: block.id, content: result },
          ],
        });
      }

      response = await this.requestCompletion(messages, offeredTools);
      const canContinue =
        round < this.maxToolRounds &&
        response.stop_reason === "tool_use" &&
        this.tools.availableTools.length > 0;
      if (!canContinue) {
        return responseText(response);
      }
    }
  }

  private async requestCompletion(
    messages: ChatMessage[],
    tools: ToolDefinition[],
  ): Promise<CompletionResponse> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.llm.createMessage(
          {
            model: this.model,
            max_tokens: this.maxTokens,
            system: buildSystemPrompt(this.tools.availableTools.length > 0),
            ...(tools.length > 0 ? { tools } : {}),
            messages: [...messages],
          },
          { signal: controller.signal },
        ),
        this.completionTimeoutMs,
        "Claude request",
      );
    } finally {
      controller.abort();
    }
  }
}
