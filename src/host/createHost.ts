import { AnthropicClient } from "../agent/anthropicClient.js";
import { FinanceAgent } from "../agent/financeAgent.js";
import type { HostConfig } from "../config/env.js";
import { ToolServerConnection } from "../mcp/toolServerConnection.js";

export interface Host {
  readonly connection: ToolServerConnection;
  readonly agent: FinanceAgent;
  cleanup(): Promise<void>;
}

/** Wires the tool-server connection and the agent from one configuration. */
export function createHost(config: HostConfig): Host {
  const connection = new ToolServerConnection({
    serverUrl: config.serverUrl,
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs,
  });
  const agent = new FinanceAgent({
    llm: new AnthropicClient({
      apiKey: config.anthropicApiKey,
      baseUrl: config.anthropicBaseUrl,
    }),
    tools: connection,
    model: config.model,
    maxTokens: config.maxTokens,
    maxToolRounds: config.maxToolRounds,
  });

  return {
    connection,
    agent,
    async cleanup() {
      console.log("Cleaning up resources...");
      await connection.disconnect();
      console.log("Cleanup completed");
    },
  };
}
