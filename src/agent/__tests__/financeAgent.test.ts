import { beforeEach, describe, expect, it, vi } from "vitest";

import type { ToolDescriptor } from "../../mcp/session.js";
import {
  AnthropicAuthenticationError,
  AnthropicRequestError,
  type LlmClient,
} from "../anthropicClient.js";
import type { CompletionResponse } from "../chatTypes.js";
import {
  AUTHENTICATION_ERROR_MESSAGE,
  FinanceAgent,
  type FinanceAgentOptions,
  type ToolGateway,
} from "../financeAgent.js";
import { systemPrompt, toolsUnavailableNote } from "../systemPrompt.js";

const stockQuoteTool: ToolDescriptor = {
  name: "get_stock_quote",
  description: "Get current stock price and basic info for a given symbol",
  inputSchema: {
    type: "object",
    properties: { symbol: { type: "string" } },
    required: ["symbol"],
  },
};

function textResponse(
  text: string,
  stopReason = "end_turn",
): CompletionResponse {
  return {
    id: "msg_text",
    model: "test-model",
    stop_reason: stopReason,
    content: [{ type: "text", text }],
  };
}

function toolUseResponse(
  calls: Array<{ id: string; name: string; input: Record<string, unknown> }>,
  preamble?: string,
): CompletionResponse {
  return {
    id: "msg_tool",
    model: "test-model",
    stop_reason: "tool_use",
    content: [
      ...(preamble ? [{ type: "text" as const, text: preamble }] : []),
      ...calls.map((call) => ({ type: "tool_use" as const, ...call })),
    ],
  };
}

function quoteCall(id: string, symbol: string) {
  return { id, name: "get_stock_quote", input: { symbol } };
}

function toolResultMessage(toolUseId: string, content: string) {
  return {
    role: "user",
    content: [{ type: "tool_result", tool_use_id: toolUseId, content }],
  };
}

function never(): Promise<CompletionResponse> {
  return new Promise<CompletionResponse>(() => undefined);
}

function setup(
  options: {
    tools?: ToolDescriptor[];
    toolResult?: (
      name: string,
      args: Record<string, unknown>,
    ) => Promise<string>;
  } & Partial<
    Pick<FinanceAgentOptions, "maxToolRounds" | "completionTimeoutMs">
  > = {},
) {
  const createMessage = vi.fn<LlmClient["createMessage"]>();
  const callTool = vi.fn<ToolGateway["callTool"]>(
    options.toolResult ?? (async () => "AAPL: $150.00"),
  );
  const gateway: {
    availableTools: ToolDescriptor[];
    callTool: ToolGateway["callTool"];
  } = {
    availableTools: options.tools ?? [stockQuoteTool],
    callTool,
  };
  const agent = new FinanceAgent({
    llm: { createMessage },
    tools: gateway,
    model: "test-model",
    maxTokens: 256,
    maxToolRounds: options.maxToolRounds,
    completionTimeoutMs: options.completionTimeoutMs,
  });
  return { agent, createMessage, callTool, gateway };
}

describe("FinanceAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  it("returns a direct answer without calling tools", async () => {
    const { agent, createMessage, callTool } = setup();
    createMessage.mockResolvedValueOnce(
      textResponse("A stock is a share in a company."),
    );

    await expect(agent.getResponse("What is a stock?")).resolves.toBe(
      "A stock is a share in a company.",
    );

    expect(callTool).not.toHaveBeenCalled();
    expect(createMessage).toHaveBeenCalledTimes(1);
    expect(createMessage.mock.calls[0]?.[0]).toEqual({
      model: "test-model",
      max_tokens: 256,
      system: systemPrompt,
      tools: [
        {
          name: "get_stock_quote",
          description:
            "Get current stock price and basic info for a given symbol",
          input_schema: stockQuoteTool.inputSchema,
        },
      ],
      messages: [{ role: "user", content: "What is a stock?" }],
    });
  });

  it("runs the requested tool and returns the follow-up answer", async () => {
    const { agent, createMessage, callTool } = setup();
    const toolRequest = toolUseResponse(
      [quoteCall("toolu_01", "AAPL")],
      "Let me look that up.",
    );
    createMessage
      .mockResolvedValueOnce(toolRequest)
      .mockResolvedValueOnce(textResponse("Apple is at $150.00"));

    await expect(agent.getResponse("What's Apple's price?")).resolves.toBe(
      "Apple is at $150.00",
    );

    expect(callTool).toHaveBeenCalledTimes(1);
    expect(callTool).toHaveBeenCalledWith("get_stock_quote", {
      symbol: "AAPL",
    });
    expect(createMessage.mock.calls[1]?.[0].messages).toEqual([
      { role: "user", content: "What's Apple's price?" },
      { role: "assistant", content: toolRequest.content },
      {
        role: "user",
        content: [
          {
            type: "tool_result",
            tool_use_id: "toolu_01",
            content: "AAPL: $150.00",
          },
        ],
      },
    ]);
  });

  it("tells the model when no tools are available", async () => {
    const { agent, createMessage, callTool } = setup({ tools: [] });
    createMessage.mockResolvedValueOnce(
      toolUseResponse([quoteCall("toolu_02", "MSFT")], "Hmm."),
    );

    await expect(agent.getResponse("Price of MSFT?")).resolves.toBe("Hmm.");

    const request = createMessage.mock.calls[0]?.[0];
    expect(request?.system).toBe(`${systemPrompt}\n\n${toolsUnavailableNote}`);
    expect(request).not.toHaveProperty("tools");
    expect(callTool).not.toHaveBeenCalled();
  });

  it("executes several tool requests one after another, in order", async () => {
    const events: string[] = [];
    const { agent, createMessage } = setup({
      toolResult: async (_name, args) => {
        events.push(`start ${String(args.symbol)}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`end ${String(args.symbol)}`);
        return `${String(args.symbol)} quote`;
      },
    });
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([
          quoteCall("toolu_a", "AAPL"),
          quoteCall("toolu_b", "MSFT"),
        ]),
      )
      .mockResolvedValueOnce(textResponse("Both fetched."));

    await expect(agent.getResponse("Compare AAPL and MSFT")).resolves.toBe(
      "Both fetched.",
    );

    expect(events).toEqual([
      "start AAPL",
      "end AAPL",
      "start MSFT",
      "end MSFT",
    ]);
    const followUp = createMessage.mock.calls[1]?.[0].messages ?? [];
    expect(followUp.slice(2)).toEqual([
      toolResultMessage("toolu_a", "AAPL quote"),
      toolResultMessage("toolu_b", "MSFT quote"),
    ]);
  });

  it("treats the follow-up as final after a single tool round by default", async () => {
    const { agent, createMessage, callTool } = setup();
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_1", "AAPL")]),
      )
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_2", "GOOG")], "I also want GOOG."),
      );

    await expect(agent.getResponse("AAPL?")).resolves.toBe("I also want GOOG.");

    expect(createMessage).toHaveBeenCalledTimes(2);
    expect(callTool).toHaveBeenCalledTimes(1);
  });

  it("runs further tool rounds up to the configured limit", async () => {
    const { agent, createMessage, callTool } = setup({ maxToolRounds: 2 });
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_1", "AAPL")]),
      )
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_2", "GOOG")]),
      )
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_3", "AMZN")], "Done."),
      );

    await expect(agent.getResponse("AAPL and GOOG?")).resolves.toBe("Done.");

    expect(createMessage).toHaveBeenCalledTimes(3);
    expect(callTool.mock.calls).toEqual([
      ["get_stock_quote", { symbol: "AAPL" }],
      ["get_stock_quote", { symbol: "GOOG" }],
    ]);
  });

  it("keeps offering the turn's tools after the catalog is lost mid-turn", async () => {
    const { agent, createMessage, gateway } = setup({ maxToolRounds: 3 });
    gateway.callTool = async () => {
      gateway.availableTools = [];
      return "MCP server is no longer available.";
    };
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_1", "AAPL")]),
      )
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_2", "AAPL")], "Server is down."),
      );

    await expect(agent.getResponse("AAPL?")).resolves.toBe("Server is down.");

    const followUp = createMessage.mock.calls[1]?.[0];
    expect(followUp?.tools).toHaveLength(1);
    expect(followUp?.system).toBe(`${systemPrompt}\n\n${toolsUnavailableNote}`);
    expect(createMessage).toHaveBeenCalledTimes(2);
  });

  it("reports a completion timeout", async () => {
    const { agent, createMessage } = setup({ completionTimeoutMs: 100 });
    createMessage.mockImplementationOnce(() => never());

    await expect(agent.getResponse("Hello")).resolves.toBe(
      "Claude request timed out after 0.1 seconds",
    );
  });

  it("reports authentication failures distinctly", async () => {
    const { agent, createMessage } = setup();
    createMessage.mockRejectedValueOnce(
      new AnthropicAuthenticationError(401, "invalid x-api-key"),
    );

    await expect(agent.getResponse("Hello")).resolves.toBe(
      AUTHENTICATION_ERROR_MESSAGE,
    );
  });

  it("reports other completion failures by kind", async () => {
    const { agent, createMessage } = setup();
    createMessage.mockRejectedValueOnce(
      new AnthropicRequestError(529, "overloaded"),
    );

    await expect(agent.getResponse("Hello")).resolves.toBe(
      "Error communicating with Claude: AnthropicRequestError",
    );
  });

  it("reports a failed follow-up request as a tool execution error", async () => {
    const { agent, createMessage } = setup();
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_1", "AAPL")]),
      )
      .mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(agent.getResponse("AAPL?")).resolves.toBe(
      "Error during tool execution: TypeError",
    );
  });

  it("reports a follow-up timeout as a tool execution timeout", async () => {
    const { agent, createMessage } = setup({ completionTimeoutMs: 50 });
    createMessage
      .mockResolvedValueOnce(
        toolUseResponse([quoteCall("toolu_1", "AAPL")]),
      )
      .mockImplementationOnce(() => never());

    await expect(agent.getResponse("AAPL?")).resolves.toBe(
      "Tool execution timed out",
    );
  });
});
