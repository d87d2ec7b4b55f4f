/**
 * extensions/lib/wiki-store.ts — The note store: topic → file resolution,
 * note creation from the header template, and the lookup, bulk-close and
 * search operations built on it.
 *
 * Everything the host owns (opening files, the set of open buffers, user
 * prompts, the external search tool) comes in through interfaces, so the
 * CLI, the pi extension and the tests each supply their own.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import { WikiError } from "./errors.ts";
import { LinkRegistry } from "./link-registry.ts";
import {
  NOTE_EXTENSION,
  TEMPLATE_CURSOR_LINE,
  WIKI_SCHEME,
  parseEntry,
  renderTemplate,
  topicFromFileName,
  type OrgEntry,
  type OrgLink,
} from "./org-entry.ts";
import {
  KEYWORD_PATTERN,
  backlinkPattern,
  filterByKeywords,
  type SearchHit,
  type Searcher,
} from "./search.ts";

// ---- Host interfaces ----

export interface OpenBuffer {
  id: string;
  file?: string; // absent for scratch buffers
  modified: boolean;
}

export interface OpenOptions {
  line?: number; // 1-based
}

export interface EditorHost {
  open(file: string, options?: OpenOptions): Promise<void>;
  buffers(): OpenBuffer[];
  /**
   * Close one buffer. The host applies its own unsaved-changes confirmation
   * and resolves false when the buffer stays open.
   */
  close(buffer: OpenBuffer): Promise<boolean>;
  activeFile(): string | undefined;
  /** Editing mode of the buffer the user was in before the current command. */
  previousMode(): string | undefined;
}

export type PromptRequest =
  | { kind: "topic"; title: string; choices: string[] }
  | { kind: "keywords"; title: string; topic: string };

export interface Prompter {
  /** Resolves undefined when the user cancels. */
  prompt(request: PromptRequest): Promise<string | undefined>;
}

// ---- Results ----

export interface VisitResult {
  topic: string;
  path: string;
  created: boolean;
}

export interface KillResult {
  closed: string[];
  kept: string[];
}

export interface WikiEntry extends OrgEntry {
  topic: string;
  path: string;
}

export interface WikiStoreOptions {
  dir: string;
  host: EditorHost;
  prompter: Prompter;
  searcher: Searcher;
  links?: LinkRegistry;
}

export const MODE_SUFFIX = " (major mode)";

// ---- Store ----

export class WikiStore {
  readonly dir: string;
  readonly links: LinkRegistry;
  private readonly host: EditorHost;
  private readonly prompter: Prompter;
  private readonly searcher: Searcher;

  constructor(opts: WikiStoreOptions) {
    this.dir = path.resolve(opts.dir);
    this.host = opts.host;
    this.prompter = opts.prompter;
    this.searcher = opts.searcher;
    this.links = opts.links ?? new LinkRegistry();

    this.links.register(WIKI_SCHEME, async (target) => {
      await this.visit(target);
    });
  }

  /**
   * Absolute path of the note for `topic`, or undefined for a blank topic.
   * Topics that would land outside the notes directory are rejected.
   */
  resolvePath(topic: string): string | undefined {
    const trimmed = topic.trim();
    if (!trimmed) return undefined;

    const fileName = trimmed.endsWith(NOTE_EXTENSION) ? trimmed : trimmed + NOTE_EXTENSION;
    if (/[/\\\0]/.test(fileName) || topicFromFileName(fileName).trim() === "") {
      throw new WikiError("INVALID_TOPIC", `Invalid topic: ${trimmed}`);
    }

    const file = path.join(this.dir, fileName);
    if (path.dirname(file) !== this.dir) {
      throw new WikiError("INVALID_TOPIC", `Invalid topic: ${trimmed}`);
    }
    return file;
  }

  /**
   * Open the note for `topic`, creating it from the template first when it
   * does not exist. Blank topics and a cancelled keyword prompt do nothing.
   */
  async visit(topic: string): Promise<VisitResult | undefined> {
    const file = this.resolvePath(topic);
    if (!file) return undefined;

    const name = topicFromFileName(path.basename(file));

    if (fs.existsSync(file)) {
      await this.host.open(file);
      return { topic: name, path: file, created: false };
    }

    const keywords = await this.prompter.prompt({
      kind: "keywords",
      title: `Keywords for ${name}:`,
      topic: name,
    });
    if (keywords === undefined) return undefined;

    fs.writeFileSync(file, renderTemplate(name, keywords), { encoding: "utf-8", flag: "wx" });
    await this.host.open(file, { line: TEMPLATE_CURSOR_LINE });
    return { topic: name, path: file, created: true };
  }

  /** Topics of every note directly inside the notes directory, sorted. */
  listTopics(): string[] {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.dir, { withFileTypes: true });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    return entries
      .filter((e) => (e.isFile() || e.isSymbolicLink()) && e.name.endsWith(NOTE_EXTENSION))
      .map((e) => topicFromFileName(e.name))
      .filter((t) => t.trim() !== "")
      .sort((a, b) => a.localeCompare(b));
  }

  async findEntryInteractive(): Promise<VisitResult | undefined> {
    const answer = await this.prompter.prompt({
      kind: "topic",
      title: "Wiki entry:",
      choices: this.listTopics(),
    });
    if (answer === undefined) return undefined;
    return this.visit(answer);
  }

  /** One note per editing mode, e.g. `python-mode (major mode).org`. */
  async findEntryForCurrentMode(mode?: string): Promise<VisitResult | undefined> {
    const name = (mode ?? this.host.previousMode() ?? "").trim();
    if (!name) {
      throw new WikiError("NO_MODE", "No editing mode to look up");
    }
    return this.visit(`${name}${MODE_SUFFIX}`);
  }

  isWikiEntry(file: string): boolean {
    if (path.extname(file) !== NOTE_EXTENSION) return false;
    return canonical(path.dirname(path.resolve(file))) === canonical(this.dir);
  }

  /**
   * Ask the host to close every open buffer visiting a wiki entry.
   */
  async killAllEntries(): Promise<KillResult> {
    const result: KillResult = { closed: [], kept: [] };

    for (const buffer of this.host.buffers()) {
      if (!buffer.file || !this.isWikiEntry(buffer.file)) continue;
      if (await this.host.close(buffer)) {
        result.closed.push(buffer.file);
      } else {
        result.kept.push(buffer.file);
      }
    }

    return result;
  }

  /** Notes linking to `file` (default: the active file). Empty for non-entries. */
  async linksHere(file?: string): Promise<SearchHit[]> {
    const target = file ?? this.host.activeFile();
    if (!target || !this.isWikiEntry(target)) return [];

    const topic = topicFromFileName(path.basename(target));
    return this.searcher.search(backlinkPattern(topic), this.dir);
  }

  /** Keyword lines of every note, optionally narrowed by an `a|b` query. */
  async findKeyword(query?: string): Promise<SearchHit[]> {
    const hits = await this.searcher.search(KEYWORD_PATTERN, this.dir);
    return filterByKeywords(hits, query);
  }

  followLink(text: string): Promise<OrgLink> {
    return this.links.follow(text);
  }

  readEntry(topic: string): WikiEntry | undefined {
    const file = this.resolvePath(topic);
    if (!file || !fs.existsSync(file)) return undefined;

    const entry = parseEntry(fs.readFileSync(file, "utf-8"));
    return { ...entry, topic: topicFromFileName(path.basename(file)), path: file };
  }
}

function canonical(p: string): string {
  try {
    return fs.realpathSync(p);
  } catch {
    return path.resolve(p);
  }
}
