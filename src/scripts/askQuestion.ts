#!/usr/bin/env node
import "dotenv/config.js";

import { createReadlinePrompt } from "../cli/linePrompt.js";
import { loadHostConfig } from "../config/env.js";
import { createHost } from "../host/createHost.js";

async function readPrompt(): Promise<string> {
  const [, , ...rest] = process.argv;
  if (rest.length > 0) {
    return rest.join(" ");
  }

  const prompt = createReadlinePrompt();
  const question = (await prompt.ask("Enter your finance question: "))?.trim();
  prompt.close();

  if (!question) {
    throw new Error("A prompt is required to query the finance agent.");
  }
  return question;
}

async function run() {
  const config = loadHostConfig();
  const question = await readPrompt();

  const host = createHost(config);
  try {
    if (!(await host.connection.connect())) {
      console.log("Answering without financial tools.");
    }
    console.log(await host.agent.getResponse(question));
  } finally {
    await host.cleanup();
  }
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
