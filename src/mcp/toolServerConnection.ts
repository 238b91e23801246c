/**
 * Owns the single live session to the finance tool server: connects with
 * bounded retries, discovers the tool catalog, and invokes tools. Nothing in
 * here throws to its caller; failures come back as `false` or as text.
 */
import {
  CONNECT_TIMEOUT_MS,
  DISCOVERY_TIMEOUT_MS,
  INITIALIZE_TIMEOUT_MS,
  MAX_CONNECT_RETRIES,
  RETRY_BASE_DELAY_MS,
  TOOL_CALL_TIMEOUT_MS,
} from "../config/constants.js";
import {
  errorKind,
  errorMessage,
  formatSeconds,
  OperationTimeoutError,
  sleep,
  withTimeout,
} from "../utils/asyncUtils.js";
import { isConnectionError } from "./connectionErrors.js";
import { ResourceStack } from "./resourceStack.js";
import {
  McpSessionConnector,
  type SessionConnector,
  type ToolDescriptor,
  type ToolSession,
} from "./session.js";

export const SERVER_UNAVAILABLE_MESSAGE =
  "MCP server is no longer available. The server may have been shut down. " +
  "You can continue with general questions or restart the server and " +
  "try again.";

export interface ToolServerConnectionOptions {
  readonly serverUrl: string;
  readonly maxRetries?: number;
  readonly baseDelayMs?: number;
  readonly connectTimeoutMs?: number;
  readonly initializeTimeoutMs?: number;
  readonly discoveryTimeoutMs?: number;
  readonly toolCallTimeoutMs?: number;
  readonly connector?: SessionConnector;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** Delay before `attempt` (1-indexed); the first attempt starts immediately. */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return attempt <= 1 ? 0 : baseDelayMs * 2 ** (attempt - 2);
}

export class ToolServerConnection {
  readonly serverUrl: string;

  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly connectTimeoutMs: number;
  private readonly initializeTimeoutMs: number;
  private readonly discoveryTimeoutMs: number;
  private readonly toolCallTimeoutMs: number;
  private readonly connector: SessionConnector;
  private readonly sleep: (ms: number) => Promise<void>;

  private session: ToolSession | null = null;
  private resources: ResourceStack | null = null;
  private tools: ToolDescriptor[] = [];

  constructor(options: ToolServerConnectionOptions) {
    this.serverUrl = options.serverUrl;
    this.maxRetries = options.maxRetries ?? MAX_CONNECT_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.initializeTimeoutMs =
      options.initializeTimeoutMs ?? INITIALIZE_TIMEOUT_MS;
    this.discoveryTimeoutMs =
      options.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS;
    this.toolCallTimeoutMs = options.toolCallTimeoutMs ?? TOOL_CALL_TIMEOUT_MS;
    this.connector =
      options.connector ?? new McpSessionConnector(options.serverUrl);
    this.sleep = options.sleep ?? sleep;
  }

  get availableTools(): readonly ToolDescriptor[] {
    return this.tools;
  }

  get hasTools(): boolean {
    return this.tools.length > 0;
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  async connect(): Promise<boolean> {
    console.log("Connecting to Finance MCP Server...");
    console.log(`Server URL: ${this.serverUrl}`);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const delay = backoffDelayMs(attempt, this.baseDelayMs);
      if (delay > 0) {
        const seconds = (delay / 1000).toFixed(1);
        console.log(`Waiting ${seconds} seconds before retry...`);
        await this.sleep(delay);
      }

      console.log(`Connection attempt ${attempt}/${this.maxRetries}...`);
      if (await this.tryConnect(attempt)) {
        return true;
      }
      await this.disconnect();
    }

    console.log("Failed to connect to MCP server after all retry attempts");
    console.log("\nTroubleshooting:");
    console.log("1. Make sure the MCP server is running: npm run start:server");
    console.log(`2. Check that the server is accessible at ${this.serverUrl}`);
    console.log("3. Verify your network connection and firewall settings");
    return false;
  }

  private async tryConnect(attempt: number): Promise<boolean> {
    await this.disconnect();
    const resources = new ResourceStack();
    this.resources = resources;

    try {
      const transport = await withTimeout(
        this.connector.openTransport(resources),
        this.connectTimeoutMs,
        "Transport connect",
      );

      console.log("Initializing MCP session...");
      this.session = await withTimeout(
        this.connector.initializeSession(transport, resources),
        this.initializeTimeoutMs,
        "Session initialization",
      );
      console.log("Connected to MCP server successfully!");

      if (await this.discoverTools()) {
        return true;
      }
      console.log("Failed to discover tools, retrying...");
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        console.log(`Connection attempt ${attempt} timed out`);
      } else {
        console.log(
          `Connection attempt ${attempt} failed: ${errorKind(error)}`,
        );
        if (!isConnectionError(error)) {
          console.log(`Details: ${errorMessage(error)}`);
        }
      }
    }
    return false;
  }

  async discoverTools(): Promise<boolean> {
    const session = this.session;
    if (!session) {
      this.tools = [];
      return false;
    }

    console.log("Discovering available tools...");
    try {
      const tools = await this.cancellable(
        (signal) => session.listTools({ signal }),
        this.discoveryTimeoutMs,
        "Tool discovery",
      );
      if (tools.length === 0) {
        this.tools = [];
        console.log("No tools found on server");
        return false;
      }

      this.tools = tools;
      console.log(`Found ${tools.length} tools:`);
      for (const tool of tools) {
        console.log(`  > ${tool.name}: ${tool.description}`);
      }
      return true;
    } catch (error) {
      this.tools = [];
      console.log(
        error instanceof OperationTimeoutError
          ? "Tool discovery timed out"
          : `Error discovering tools: ${errorKind(error)}`,
      );
      return false;
    }
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    console.log(`Calling tool: ${name} with args: ${JSON.stringify(args)}`);
    try {
      const session = this.session;
      if (!session) {
        throw new Error("No open connection to the MCP server");
      }

      const result = await this.cancellable(
        (signal) => session.callTool(name, args, { signal }),
        this.toolCallTimeoutMs,
        `Tool ${name}`,
      );
      const text = result.content.find(
        (block) => block.type === "text" && typeof block.text === "string",
      )?.text;
      if (text === undefined) {
        return `Tool ${name} executed but returned no content`;
      }
      console.log(`Tool ${name} executed successfully`);
      return text;
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        const seconds = formatSeconds(error.timeoutMs);
        return (
          `Tool ${name} timed out after ${seconds} seconds - ` +
          "MCP server may be unavailable"
        );
      }
      if (isConnectionError(error)) {
        this.tools = [];
        return SERVER_UNAVAILABLE_MESSAGE;
      }
      return `Error calling tool ${name}: ${errorKind(error)}`;
    }
  }

  /**
   * Runs a session request under a deadline. A request that misses it is
   * aborted, which sends a cancellation to the server. Requests that settle
   * in time are left alone so no stray cancellation follows a response.
   */
  private async cancellable<T>(
    request: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    operation: string,
  ): Promise<T> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        request(controller.signal),
        timeoutMs,
        operation,
      );
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        controller.abort(error);
      }
      throw error;
    }
  }

  /** Idempotent; never throws. Leaves the catalog empty. */
  async disconnect(): Promise<void> {
    const resources = this.resources;
    this.resources = null;
    this.session = null;
    this.tools = [];
    if (resources) {
      await resources.close();
    }
  }
}
