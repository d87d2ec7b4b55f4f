/**
 * cli/prompt.ts — Terminal prompter: numbered topic picker with fuzzy tab
 * completion, and plain line input for keywords.
 */

import { createInterface, type Interface } from "node:readline";
import { stdin as input, stdout as output } from "node:process";

import type { Prompter, PromptRequest } from "../extensions/lib/mod.ts";

// ---- Fuzzy matching ----

/**
 * Score `candidate` against `query`, lower is better; null when the query
 * characters do not appear in order. Substring matches always beat
 * scattered subsequence matches.
 */
export function fuzzyScore(query: string, candidate: string): number | null {
  const q = query.toLowerCase();
  const c = candidate.toLowerCase();
  if (!q) return 0;

  const idx = c.indexOf(q);
  if (idx !== -1) return idx;

  let pos = -1;
  let first = -1;
  for (const ch of q) {
    pos = c.indexOf(ch, pos + 1);
    if (pos === -1) return null;
    if (first === -1) first = pos;
  }
  return 1000 + (pos - first);
}

export function fuzzyFilter(query: string, choices: string[]): string[] {
  const scored: Array<{ choice: string; score: number }> = [];
  for (const choice of choices) {
    const score = fuzzyScore(query, choice);
    if (score !== null) scored.push({ choice, score });
  }
  return scored
    .sort((a, b) => a.score - b.score || a.choice.localeCompare(b.choice))
    .map((s) => s.choice);
}

/**
 * Map a picker answer to a topic: `#<n>` selects the n-th of `choices`,
 * anything else is taken as typed (so new topics, numeric ones included,
 * can be entered).
 */
export function pickChoice(answer: string, choices: string[]): string {
  const trimmed = answer.trim();
  const m = /^#(\d+)$/.exec(trimmed);
  if (m) {
    const n = parseInt(m[1], 10);
    if (n >= 1 && n <= choices.length) return choices[n - 1];
  }
  return trimmed;
}

export function formatChoices(choices: string[]): string {
  const width = String(choices.length).length + 1;
  return choices.map((c, i) => `  ${`#${i + 1}`.padStart(width)}  ${c}`).join("\n");
}

// ---- Readline prompter ----

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export interface ReadlinePrompter extends Prompter {
  /** Release the terminal. Later prompts resolve undefined. */
  close(): void;
}

/**
 * One readline interface serves every prompt of a command, created on the
 * first prompt. Lines are read through its async iterator, which queues
 * lines that arrive before they are asked for (piped input). End of input
 * or Ctrl-C cancels.
 */
export function createReadlinePrompter(opts: ReadlinePrompterOptions = {}): ReadlinePrompter {
  const out = opts.output ?? output;
  let session: { rl: Interface; lines: AsyncIterator<string> } | undefined;
  let ended = false;
  let released = false;
  let choices: string[] = [];

  function open(): { rl: Interface; lines: AsyncIterator<string> } {
    if (session) return session;
    const rl = createInterface({
      input: opts.input ?? input,
      output: out,
      completer: (line: string): [string[], string] => [fuzzyFilter(line, choices), line],
    });
    rl.on("close", () => {
      ended = true;
    });
    session = { rl, lines: rl[Symbol.asyncIterator]() };
    return session;
  }

  return {
    async prompt(request: PromptRequest): Promise<string | undefined> {
      if (released) return undefined;
      choices = request.kind === "topic" ? request.choices : [];
      const { rl, lines } = open();

      if (!ended) {
        if (request.kind === "topic" && choices.length > 0) {
          out.write(formatChoices(choices) + "\n");
        }
        rl.setPrompt(`${request.title} `);
        rl.prompt();
      }

      const next = await lines.next();
      if (next.done) return undefined;
      return request.kind === "topic" ? pickChoice(next.value, choices) : next.value;
    },

    close(): void {
      released = true;
      session?.rl.close();
    },
  };
}
