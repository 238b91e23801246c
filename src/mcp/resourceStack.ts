import { errorMessage } from "../utils/asyncUtils.js";

export type Release = () => Promise<void> | void;

interface Entry {
  readonly label: string;
  readonly release: Release;
}

/**
 * Collects release callbacks as resources are acquired and runs them in
 * reverse order. `close()` never throws: failures are logged and the
 * remaining callbacks still run. A resource registered after the stack has
 * closed (an acquisition that finished after its caller gave up) is released
 * straight away.
 */
export class ResourceStack {
  private readonly entries: Entry[] = [];
  private closed = false;

  defer(label: string, release: Release): void {
    const entry = { label, release };
    if (this.closed) {
      void ResourceStack.run(entry);
      return;
    }
    this.entries.push(entry);
  }

  async close(): Promise<void> {
    this.closed = true;
    for (let entry = this.entries.pop(); entry; entry = this.entries.pop()) {
      await ResourceStack.run(entry);
    }
  }

  private static async run(entry: Entry): Promise<void> {
    try {
      await entry.release();
    } catch (error) {
      console.error(`Failed to release ${entry.label}: ${errorMessage(error)}`);
    }
  }
}
