/**
 * Yes/no questions to the user.
 */

import { createInterface } from "node:readline/promises";

export interface Prompter {
  /**
   * Ask a yes/no question.
   *
   * @returns true only for an explicit yes
   */
  confirm(question: string): Promise<boolean>;
}

/**
 * Input stream with the TTY flag Node sets on terminals.
 */
export type PromptInput = NodeJS.ReadableStream & { readonly isTTY?: boolean };

/**
 * Prompter on node:readline. Answers "no" without asking when the input is
 * not a terminal, so piped and CI runs never block.
 */
export class ReadlinePrompter implements Prompter {
  constructor(
    private readonly input: PromptInput,
    private readonly output: NodeJS.WritableStream
  ) {}

  async confirm(question: string): Promise<boolean> {
    if (this.input.isTTY !== true) {
      return false;
    }

    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const answer = await rl.question(`${question} [y/N] `);
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}
