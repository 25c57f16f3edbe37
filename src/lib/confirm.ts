/**
 * Yes/no confirmations, either asked on a terminal or answered by flags.
 */

import { createInterface } from 'node:readline';

/** Which decision is being confirmed */
export type PromptKind = 'network' | 'container';

/** How a prompt kind is answered */
export type ConfirmationPolicy = 'prompt' | 'yes' | 'no';

export interface Confirmer {
  /** Resolves true only on an explicit yes */
  confirm: (question: string, kind: PromptKind) => Promise<boolean>;
  /** Release stdin; safe to call more than once */
  close: () => void;
}

const YES_PATTERN = /^(yes|y)$/i;

/**
 * `y` or `yes` in any case means yes; empty input, EOF and anything else mean no.
 */
export function parseAnswer(answer: string | null): boolean {
  return answer !== null && YES_PATTERN.test(answer.trim());
}

/**
 * Asks on a stream pair. One readline interface serves every question so
 * lines typed ahead are not lost.
 */
export function createPromptConfirmer(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Confirmer {
  const rl = createInterface({ input, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line: string) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const next of waiting.splice(0)) {
      next(null);
    }
  });

  const readLine = (): Promise<string | null> => {
    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (closed) return Promise.resolve(null);
    return new Promise((resolve) => waiting.push(resolve));
  };

  return {
    async confirm(question: string): Promise<boolean> {
      output.write(`${question} [y/N]: `);
      const answer = await readLine();
      if (answer === null) {
        // EOF leaves the cursor on the prompt line
        output.write('\n');
      }
      return parseAnswer(answer);
    },

    close() {
      if (!closed) {
        rl.close();
      }
    },
  };
}

/**
 * Answers each prompt kind from its policy; only `prompt` kinds reach the
 * interactive confirmer, and it is created on first use.
 */
export function createPolicyConfirmer(
  policies: Record<PromptKind, ConfirmationPolicy>,
  createInteractive: () => Confirmer = () => createPromptConfirmer(),
): Confirmer {
  let interactive: Confirmer | null = null;

  return {
    async confirm(question: string, kind: PromptKind): Promise<boolean> {
      const policy = policies[kind];
      if (policy !== 'prompt') {
        return policy === 'yes';
      }
      if (!interactive) {
        interactive = createInteractive();
      }
      return interactive.confirm(question, kind);
    },

    close() {
      interactive?.close();
    },
  };
}
