/**
 * The host's view of an MCP session, plus the SSE-backed connector that
 * produces one. The connection manager only talks to these interfaces, which
 * keeps the retry logic independent of the transport.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";

import { MCP_CLIENT_NAME, MCP_SERVER_VERSION } from "../config/constants.js";
import type { ResourceStack } from "./resourceStack.js";

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
}

export interface ToolContentBlock {
  readonly type: string;
  readonly text?: string;
}

export interface ToolCallOutput {
  readonly content: ReadonlyArray<ToolContentBlock>;
  readonly isError?: boolean;
}

export interface ToolRequestOptions {
  /** Aborting cancels the request on the server as well. */
  readonly signal?: AbortSignal;
}

export interface ToolSession {
  listTools(options?: ToolRequestOptions): Promise<ToolDescriptor[]>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolRequestOptions,
  ): Promise<ToolCallOutput>;
}

/**
 * Two-step session setup. Each step registers what it acquires on
 * `resources` before awaiting anything, so the caller can release a
 * half-open attempt after a timeout.
 */
export interface SessionConnector {
  openTransport(resources: ResourceStack): Promise<Transport>;
  initializeSession(
    transport: Transport,
    resources: ResourceStack,
  ): Promise<ToolSession>;
}

const toolCallOutputSchema = z.object({
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
        })
        .passthrough(),
    )
    .default([]),
  isError: z.boolean().optional(),
});

export class McpToolSession implements ToolSession {
  constructor(private readonly client: Client) {}

  async listTools(options: ToolRequestOptions = {}): Promise<ToolDescriptor[]> {
    const { tools } = await this.client.listTools(undefined, {
      signal: options.signal,
    });
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? "",
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: ToolRequestOptions = {},
  ): Promise<ToolCallOutput> {
    const result = await this.client.callTool(
      { name, arguments: args },
      undefined,
      { signal: options.signal },
    );
    const parsed = toolCallOutputSchema.safeParse(result);
    if (!parsed.success) {
      throw new Error(`Malformed result from tool ${name}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

/**
 * `Client.connect` starts its transport itself. Starting it once up front
 * lets the transport open and the MCP handshake run under separate timeouts.
 */
class EagerSseClientTransport extends SSEClientTransport {
  private opening: Promise<void> | undefined;

  override start(): Promise<void> {
    this.opening ??= super.start();
    return this.opening;
  }
}

export class McpSessionConnector implements SessionConnector {
  private readonly serverUrl: URL;

  constructor(serverUrl: string) {
    this.serverUrl = new URL(serverUrl);
  }

  async openTransport(resources: ResourceStack): Promise<Transport> {
    const transport = new EagerSseClientTransport(this.serverUrl);
    resources.defer("SSE transport", () => transport.close());
    await transport.start();
    return transport;
  }

  async initializeSession(
    transport: Transport,
    resources: ResourceStack,
  ): Promise<ToolSession> {
    const client = new Client(
      { name: MCP_CLIENT_NAME, version: MCP_SERVER_VERSION },
      { capabilities: {} },
    );
    resources.defer("MCP client session", () => client.close());
    await client.connect(transport);
    return new McpToolSession(client);
  }
}
