/**
 * extensions/lib/session.ts — Open-note session kept in ~/.orgwiki/session.json.
 *
 * SessionHost is the EditorHost for the terminal: opening a note launches
 * the user's editor (or whatever launcher is supplied) and records the
 * buffer; closing forgets it. A terminal editor has saved or discarded its
 * changes by the time it exits, so recorded buffers are never modified.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";
import { spawnSync } from "node:child_process";

import type { EditorHost, OpenBuffer, OpenOptions } from "./wiki-store.ts";

// ---- Types ----

export interface SessionBuffer {
  id: string;
  file: string;
  openedAt: string; // ISO 8601
}

export interface SessionState {
  buffers: SessionBuffer[];
}

export type Launcher = (file: string, options: OpenOptions) => Promise<void>;

export interface SessionHostOptions {
  statePath: string;
  launch: Launcher;
  /** Mode reported by previousMode(), e.g. from `orgwiki mode <name>`. */
  mode?: string;
}

// ---- Persistence ----

export function loadSession(path: string): SessionState {
  if (!existsSync(path)) return { buffers: [] };
  try {
    const raw = asRecord(JSON.parse(readFileSync(path, "utf-8")))?.buffers;
    const list: unknown[] = Array.isArray(raw) ? raw : [];
    const buffers: SessionBuffer[] = [];
    for (const item of list) {
      const b = asRecord(item);
      if (!b || typeof b.id !== "string" || typeof b.file !== "string") continue;
      buffers.push({
        id: b.id,
        file: b.file,
        openedAt: typeof b.openedAt === "string" ? b.openedAt : new Date(0).toISOString(),
      });
    }
    return { buffers };
  } catch {
    return { buffers: [] };
  }
}

export function saveSession(state: SessionState, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(state, null, 2) + "\n", "utf-8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

// ---- Host ----

export class SessionHost implements EditorHost {
  private readonly statePath: string;
  private readonly launch: Launcher;
  private readonly mode: string | undefined;

  constructor(opts: SessionHostOptions) {
    this.statePath = opts.statePath;
    this.launch = opts.launch;
    this.mode = opts.mode;
  }

  async open(file: string, options: OpenOptions = {}): Promise<void> {
    await this.launch(file, options);

    const state = loadSession(this.statePath);
    const existing = state.buffers.find((b) => b.file === file);
    // Re-opening moves the buffer to the end so it becomes the active one
    state.buffers = state.buffers.filter((b) => b.file !== file);
    state.buffers.push({
      id: existing?.id ?? randomBytes(4).toString("hex"),
      file,
      openedAt: new Date().toISOString(),
    });
    saveSession(state, this.statePath);
  }

  buffers(): OpenBuffer[] {
    return loadSession(this.statePath).buffers.map((b) => ({
      id: b.id,
      file: b.file,
      modified: false,
    }));
  }

  async close(buffer: OpenBuffer): Promise<boolean> {
    const state = loadSession(this.statePath);
    const remaining = state.buffers.filter((b) => b.id !== buffer.id);
    if (remaining.length !== state.buffers.length) {
      saveSession({ buffers: remaining }, this.statePath);
    }
    return true;
  }

  activeFile(): string | undefined {
    const buffers = loadSession(this.statePath).buffers;
    return buffers.length > 0 ? buffers[buffers.length - 1].file : undefined;
  }

  previousMode(): string | undefined {
    return this.mode;
  }
}

// ---- Terminal editor ----

/**
 * Resolve the editor command: explicit setting, then $VISUAL, $EDITOR, vi.
 */
export function resolveEditor(command?: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = command?.trim() || env.VISUAL?.trim() || env.EDITOR?.trim() || "vi";
  return raw.split(/\s+/);
}

/**
 * Launcher that runs the editor in the foreground with inherited stdio,
 * passing `+<line>` when a cursor line is requested.
 */
export function editorLauncher(command?: string): Launcher {
  return async (file, options) => {
    const [bin, ...args] = resolveEditor(command);
    if (options.line !== undefined) args.push(`+${options.line}`);
    args.push(file);

    const r = spawnSync(bin, args, { stdio: "inherit" });
    if (r.error) {
      throw new Error(`Failed to launch editor "${bin}": ${r.error.message}`);
    }
    if (r.status !== 0) {
      throw new Error(`Editor "${bin}" exited with status ${r.status}`);
    }
  };
}
