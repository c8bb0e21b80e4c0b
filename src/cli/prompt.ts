import { createInterface, type Interface } from "node:readline/promises";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** Line prompts on stdin/stdout. The readline interface opens on first use. */
export class ConsolePrompter implements Prompter {
  private rl: Interface | null = null;

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({ input: process.stdin, output: process.stdout });
    }
    return this.rl.question(question);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
