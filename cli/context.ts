/**
 * cli/context.ts — Wires a WikiStore for the terminal from the loaded settings.
 */

import {
  WikiStore,
  SessionHost,
  RipgrepSearcher,
  editorLauncher,
  formatHits,
  type Launcher,
  type Prompter,
  type SearchHit,
} from "../extensions/lib/mod.ts";
import { loadSettings, type WikiSettings } from "./config.ts";
import { createReadlinePrompter, type ReadlinePrompter } from "./prompt.ts";

export interface CliStoreOptions {
  mode?: string;
  prompter?: Prompter;
  launch?: Launcher;
}

export interface CliContext {
  settings: WikiSettings;
  store: WikiStore;
  /** Release the terminal prompt; call once the command is done. */
  close(): void;
}

export function createCliContext(opts: CliStoreOptions = {}, settings: WikiSettings = loadSettings()): CliContext {
  const host = new SessionHost({
    statePath: settings.sessionPath,
    launch: opts.launch ?? editorLauncher(settings.editorCommand),
    mode: opts.mode,
  });

  let prompter: Prompter;
  let terminal: ReadlinePrompter | undefined;
  if (opts.prompter) {
    prompter = opts.prompter;
  } else {
    terminal = createReadlinePrompter();
    prompter = terminal;
  }

  const store = new WikiStore({
    dir: settings.dir,
    host,
    prompter,
    searcher: new RipgrepSearcher(settings.searchCommand),
  });

  return { settings, store, close: () => terminal?.close() };
}

/** Print grep-style hits, or a note when there are none. */
export function printHits(hits: SearchHit[], emptyMessage: string): void {
  if (hits.length === 0) {
    console.log(emptyMessage);
    return;
  }
  console.log(formatHits(hits));
}

/** Positional arguments joined back into one topic (topics may contain spaces). */
export function positionalText(args: string[]): string {
  return args.filter((a) => !a.startsWith("--")).join(" ");
}
