/**
 * extensions/lib/search.ts — Note search through an external regex tool.
 *
 * The core only builds patterns and consumes hits. RipgrepSearcher shells
 * out to ripgrep's JSON output; tests substitute an in-memory Searcher.
 */

import { spawnSync } from "node:child_process";

import { WikiError } from "./errors.ts";
import { KEYWORDS_MARKER, NOTE_EXTENSION, WIKI_SCHEME } from "./org-entry.ts";

// ---- Types ----

export interface SearchHit {
  file: string;
  line: number;
  text: string;
}

export interface Searcher {
  search(pattern: string, root: string): Promise<SearchHit[]>;
}

// ---- Patterns ----

export const KEYWORD_PATTERN = "^#\\+KEYWORDS: ";

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Pattern for `[[wiki:<topic>]]` and `[[wiki:<topic>][...]]`, with or without the extension. */
export function backlinkPattern(topic: string): string {
  return `\\[\\[${WIKI_SCHEME}:${escapeRegex(topic)}(${escapeRegex(NOTE_EXTENSION)})?\\]`;
}

// ---- Keyword refinement ----

/**
 * Narrow keyword-line hits by a `a|b|c` query (any token matches,
 * case-insensitive substring of the keyword field). Blank query keeps all.
 */
export function filterByKeywords(hits: SearchHit[], query?: string): SearchHit[] {
  const tokens = (query ?? "")
    .split("|")
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean);
  if (tokens.length === 0) return hits;

  return hits.filter((hit) => {
    const idx = hit.text.indexOf(KEYWORDS_MARKER);
    const field = (idx === -1 ? hit.text : hit.text.slice(idx + KEYWORDS_MARKER.length)).toLowerCase();
    return tokens.some((t) => field.includes(t));
  });
}

export function formatHits(hits: SearchHit[]): string {
  return hits.map((h) => `${h.file}:${h.line}:${h.text}`).join("\n");
}

// ---- ripgrep ----

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

/**
 * Parse ripgrep `--json` output into hits. Non-match events are skipped.
 */
export function parseRipgrepJson(output: string): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    let event: unknown;
    try {
      event = JSON.parse(line);
    } catch {
      continue;
    }

    const ev = asRecord(event);
    if (!ev || ev.type !== "match") continue;
    const data = asRecord(ev.data);
    const file = asRecord(data?.path)?.text;
    const text = asRecord(data?.lines)?.text;
    const lineNumber = data?.line_number;
    if (typeof file !== "string") continue;

    hits.push({
      file,
      line: typeof lineNumber === "number" ? lineNumber : 0,
      text: typeof text === "string" ? text.replace(/\r?\n$/, "") : "",
    });
  }
  return hits;
}

export class RipgrepSearcher implements Searcher {
  private readonly command: string;

  constructor(command = "rg") {
    this.command = command;
  }

  async search(pattern: string, root: string): Promise<SearchHit[]> {
    const r = spawnSync(
      this.command,
      ["--json", "--no-config", "--glob", `*${NOTE_EXTENSION}`, "-e", pattern, root],
      { encoding: "utf-8", maxBuffer: 64 * 1024 * 1024 },
    );

    if (r.error) {
      if ("code" in r.error && r.error.code === "ENOENT") {
        throw new WikiError("SEARCH_UNAVAILABLE", `Search tool not found: ${this.command}`);
      }
      throw new WikiError("SEARCH_FAILED", `${this.command}: ${r.error.message}`);
    }

    // rg exits 1 when nothing matched
    if (r.status !== 0 && r.status !== 1) {
      const stderr = (r.stderr ?? "").trim();
      throw new WikiError("SEARCH_FAILED", `${this.command} exited with ${r.status}${stderr ? `: ${stderr}` : ""}`);
    }

    return parseRipgrepJson(r.stdout ?? "");
  }
}
