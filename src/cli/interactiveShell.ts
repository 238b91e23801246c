import { errorKind } from "../utils/asyncUtils.js";
import type { LinePrompt } from "./linePrompt.js";

const QUIT_COMMANDS = new Set(["quit", "exit", "q"]);
const YES_ANSWERS = new Set(["yes", "y"]);

export interface ShellConnection {
  readonly hasTools: boolean;
  connect(): Promise<boolean>;
}

export interface ShellAgent {
  getResponse(userMessage: string): Promise<string>;
}

export interface InteractiveShellOptions {
  readonly prompt: LinePrompt;
  readonly connection: ShellConnection;
  readonly agent: ShellAgent;
}

/**
 * Read-eval-print loop for the operator. Runs until quit, end of input or
 * interrupt; errors are reported and the loop carries on.
 */
export class InteractiveShell {
  private readonly prompt: LinePrompt;
  private readonly connection: ShellConnection;
  private readonly agent: ShellAgent;
  private proceedWithoutTools = false;

  constructor(options: InteractiveShellOptions) {
    this.prompt = options.prompt;
    this.connection = options.connection;
    this.agent = options.agent;
  }

  get proceedingWithoutTools(): boolean {
    return this.proceedWithoutTools;
  }

  async run(): Promise<void> {
    const rule = "=".repeat(50);
    console.log(`\n${rule}`);
    console.log("Finance Analyzer Ready!");
    console.log("Ask me about stocks, crypto, or financial analysis.");
    console.log("Type 'quit', 'exit', or 'q' to exit.");
    console.log(`${rule}\n`);

    for (;;) {
      try {
        const line = await this.prompt.ask("You: ");
        if (line === null) {
          console.log("\nGoodbye!");
          return;
        }

        const userInput = line.trim();
        if (QUIT_COMMANDS.has(userInput.toLowerCase())) {
          console.log("Goodbye!");
          return;
        }
        if (!userInput) {
          continue;
        }

        if (!this.connection.hasTools && !this.proceedWithoutTools) {
          const decision = await this.ensureTools();
          if (decision === "ended") {
            console.log("\nGoodbye!");
            return;
          }
          if (decision === "skip") {
            continue;
          }
        }

        const response = await this.agent.getResponse(userInput);
        console.log(`\nClaude: ${response}\n`);
      } catch (error) {
        console.log(`An unexpected error occurred: ${errorKind(error)}`);
        console.log("Please try again or type 'quit' to exit.");
      }
    }
  }

  private async ensureTools(): Promise<"continue" | "skip" | "ended"> {
    console.log("No MCP tools available. Attempting to connect to server...");
    if (await this.connection.connect()) {
      return "continue";
    }

    console.log("\nUnable to connect to MCP server.");
    const answer = await this.prompt.ask(
      "Proceed without financial tools? (yes/no): ",
    );
    if (answer === null) {
      return "ended";
    }
    if (YES_ANSWERS.has(answer.trim().toLowerCase())) {
      this.proceedWithoutTools = true;
      console.log("Continuing with general questions only...");
      return "continue";
    }
    console.log("Please start the MCP server and try again.");
    return "skip";
  }
}
