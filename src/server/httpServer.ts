/**
 * HTTP listener for the SSE transport: `GET /sse` opens a session and
 * `POST /messages?sessionId=...` delivers client messages to it.
 */
import http from "node:http";

import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { MESSAGES_PATH, SSE_PATH } from "../config/constants.js";
import { errorMessage } from "../utils/asyncUtils.js";

export interface FinanceHttpServerOptions {
  readonly host: string;
  readonly port: number;
  readonly createServer: () => McpServer;
}

export interface RunningFinanceServer {
  readonly url: string;
  readonly activeSessions: () => number;
  close(): Promise<void>;
}

function sendText(
  res: http.ServerResponse,
  status: number,
  body: string,
): void {
  if (res.headersSent) {
    return;
  }
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(body);
}

export async function startFinanceHttpServer(
  options: FinanceHttpServerOptions,
): Promise<RunningFinanceServer> {
  const transports = new Map<string, SSEServerTransport>();

  const openSession = async (res: http.ServerResponse) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    const server = options.createServer();
    transports.set(transport.sessionId, transport);
    res.on("close", () => {
      transports.delete(transport.sessionId);
      server.close().catch((error: unknown) => {
        console.error(
          `Failed to close session ${transport.sessionId}: ${errorMessage(error)}`,
        );
      });
    });
    await server.connect(transport);
    console.log(`Client session opened: ${transport.sessionId}`);
  };

  const httpServer = http.createServer((req, res) => {
    const url = new URL(
      req.url ?? "/",
      `http://${req.headers.host ?? "localhost"}`,
    );

    const handle = async () => {
      if (req.method === "GET" && url.pathname === SSE_PATH) {
        await openSession(res);
        return;
      }
      if (req.method === "POST" && url.pathname === MESSAGES_PATH) {
        const sessionId = url.searchParams.get("sessionId") ?? "";
        const transport = transports.get(sessionId);
        if (!transport) {
          sendText(res, 404, `Unknown session: ${sessionId}`);
          return;
        }
        await transport.handlePostMessage(req, res);
        return;
      }
      sendText(res, 404, "Not found");
    };

    handle().catch((error: unknown) => {
      console.error(
        `Request ${req.method ?? "?"} ${url.pathname} failed: ${errorMessage(error)}`,
      );
      sendText(res, 500, "Internal server error");
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port =
    typeof address === "object" && address ? address.port : options.port;

  return {
    url: `http://${options.host}:${port}${SSE_PATH}`,
    activeSessions: () => transports.size,
    close: async () => {
      for (const transport of transports.values()) {
        await transport.close();
      }
      transports.clear();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
