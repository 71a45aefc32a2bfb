/**
 * Line-oriented prompt over stdin. Waits indefinitely for the judge.
 */

import * as readline from 'readline';

export interface Prompt {
  /** Resolves with the entered line, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export class ReadlinePrompt implements Prompt {
  private rl: readline.Interface;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      this.rl.once('close', onClose);
      this.rl.question(question, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}
