#!/usr/bin/env node
import "dotenv/config.js";

import { createReadlinePrompt } from "./cli/linePrompt.js";
import { InteractiveShell } from "./cli/interactiveShell.js";
import { ANTHROPIC_API_KEY_ENV } from "./config/constants.js";
import {
  ConfigurationError,
  loadHostConfig,
  type HostConfig,
} from "./config/env.js";
import { createHost } from "./host/createHost.js";
import { errorKind } from "./utils/asyncUtils.js";

function readConfig(): HostConfig | null {
  try {
    return loadHostConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`);
      if (error.missing.includes(ANTHROPIC_API_KEY_ENV)) {
        console.error("Please add your Anthropic API key to the .env file");
      }
      return null;
    }
    throw error;
  }
}

async function main() {
  const rule = "=".repeat(60);
  console.log(rule);
  console.log("Finance Analyzer with MCP Integration (HTTP Client)");
  console.log(rule);

  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const host = createHost(config);
  const prompt = createReadlinePrompt();
  try {
    if (await host.connection.connect()) {
      const shell = new InteractiveShell({
        prompt,
        connection: host.connection,
        agent: host.agent,
      });
      await shell.run();
    } else {
      console.log("Unable to connect to MCP server. Exiting gracefully.");
    }
  } catch (error) {
    console.log(`Unexpected error: ${errorKind(error)}`);
    console.log("Application will exit because of an error.");
  } finally {
    prompt.close();
    await host.cleanup();
  }
}

main().catch((error: unknown) => {
  console.error(`Application terminated: ${errorKind(error)}`);
});
