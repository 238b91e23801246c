#!/usr/bin/env node
import "dotenv/config.js";

import { ALPHA_VANTAGE_API_KEY_ENV } from "../config/constants.js";
import { loadServerConfig } from "../config/env.js";
import { createFinanceServer } from "../server/financeServer.js";
import { startFinanceHttpServer } from "../server/httpServer.js";
import { AlphaVantageClient } from "../tools/alphaVantage.js";
import { financeToolNames } from "../tools/financeTools.js";
import { errorMessage } from "../utils/asyncUtils.js";

const BANNER_RULE = "=".repeat(50);

async function run() {
  const config = loadServerConfig();
  const client = new AlphaVantageClient({ apiKey: config.alphaVantageApiKey });
  if (!client.configured) {
    console.warn(
      `Warning: ${ALPHA_VANTAGE_API_KEY_ENV} not found in environment variables`,
    );
  }
  const server = await startFinanceHttpServer({
    host: config.host,
    port: config.port,
    createServer: () => createFinanceServer(client),
  });

  console.log(BANNER_RULE);
  console.log("Finance MCP Server (HTTP Transport)");
  console.log(BANNER_RULE);
  console.log(`Server listening on ${server.url}`);
  console.log(`Available tools: ${financeToolNames.join(", ")}`);
  console.log("Press Ctrl+C to stop");
  console.log(BANNER_RULE);

  process.once("SIGINT", () => {
    console.log("\nServer stopped by user");
    console.log(`Closing ${server.activeSessions()} open session(s)`);
    server.close().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        console.error(`Error while stopping server: ${errorMessage(error)}`);
        process.exitCode = 1;
      },
    );
  });
}

run().catch((error: unknown) => {
  console.error(`Server failed to start: ${errorMessage(error)}`);
  process.exitCode = 1;
});
