import readline from "node:readline";

/** Reads one answer per call; resolves `null` on end of input or Ctrl+C. */
export interface LinePrompt {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LinePrompt {
  const rl = readline.createInterface({ input, output });
  let ended = false;
  const waiting = new Set<(answer: string | null) => void>();

  const end = () => {
    ended = true;
    for (const resolve of waiting) {
      resolve(null);
    }
    waiting.clear();
  };
  rl.on("close", end);
  rl.on("SIGINT", () => {
    rl.close();
  });

  return {
    ask(question) {
      if (ended) {
        return Promise.resolve(null);
      }
      return new Promise<string | null>((resolve) => {
        waiting.add(resolve);
        rl.question(question, (answer) => {
          waiting.delete(resolve);
          resolve(answer);
        });
      });
    },
    close() {
      rl.close();
    },
  };
}
