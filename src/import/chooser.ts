import { createInterface, type Interface } from "node:readline/promises";

/**
 * The only way the importer asks a person anything. `select` answers with the index
 * of the picked option or null; `input` answers with the typed text or null.
 */
export interface Chooser {
  readonly interactive: boolean;
  select(prompt: string, options: readonly string[]): Promise<number | null>;
  input(prompt: string): Promise<string | null>;
}

export const nonInteractiveChooser: Chooser = {
  interactive: false,
  select: async () => null,
  input: async () => null
};

export class ConsoleChooser implements Chooser {
  readonly interactive = true;
  private readline: Interface | null = null;

  constructor(
    private readonly stdin: NodeJS.ReadableStream = process.stdin,
    private readonly stdout: NodeJS.WritableStream = process.stdout
  ) {}

  async select(prompt: string, options: readonly string[]): Promise<number | null> {
    if (!options.length) {
      return null;
    }

    this.stdout.write(`${prompt}\n`);
    const width = String(options.length).length;
    options.forEach((option, index) => {
      this.stdout.write(`  ${String(index + 1).padStart(width)}) ${option}\n`);
    });

    for (;;) {
      const answer = (await this.question("> ")).trim();
      const picked = Number(answer);
      if (Number.isInteger(picked) && picked >= 1 && picked <= options.length) {
        return picked - 1;
      }
      this.stdout.write(`enter a number between 1 and ${options.length}\n`);
    }
  }

  async input(prompt: string): Promise<string | null> {
    const answer = (await this.question(`${prompt}: `)).trim();
    return answer ? answer : null;
  }

  close(): void {
    this.readline?.close();
    this.readline = null;
  }

  private question(query: string): Promise<string> {
    if (!this.readline) {
      this.readline = createInterface({ input: this.stdin, output: this.stdout });
    }
    return this.readline.question(query);
  }
}
