/**
 * cli/config.ts — TOML config parser and validator for orgwiki.
 *
 * Parses ~/.orgwiki/config.toml into a typed structure and resolves it,
 * together with the environment, into the settings the commands run with.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseToml } from "smol-toml";

// ---- Types ----

export interface OrgwikiConfig {
  wiki: {
    dir: string;
  };
  search: {
    command: string;
  };
  editor: {
    command?: string;
  };
}

/** Config with paths expanded and environment overrides applied. */
export interface WikiSettings {
  home: string;
  configPath: string;
  sessionPath: string;
  dir: string;
  searchCommand: string;
  editorCommand?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ---- Defaults ----

export const DEFAULT_NOTES_DIR = "~/org/wiki";
export const DEFAULT_SEARCH_COMMAND = "rg";
export const CONFIG_FILE = "config.toml";
export const SESSION_FILE = "session.json";

const KNOWN_SECTIONS = ["wiki", "search", "editor"] as const;

export function defaultConfig(): OrgwikiConfig {
  return {
    wiki: { dir: DEFAULT_NOTES_DIR },
    search: { command: DEFAULT_SEARCH_COMMAND },
    editor: {},
  };
}

// ---- Paths ----

export function homeDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.HOME || os.homedir();
}

/** Config and state directory: $ORGWIKI_HOME or ~/.orgwiki. */
export function orgwikiHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.ORGWIKI_HOME?.trim() || path.join(homeDir(env), ".orgwiki");
}

export function expandHome(p: string, home: string): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}

// ---- Parsing ----

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value == null) return {};
  if (!isTable(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function optionalString(table: Record<string, unknown>, sectionName: string, key: string): string | undefined {
  const value = table[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${sectionName}.${key} must be a string, got ${typeof value}`);
  }
  return value;
}

/**
 * Parse a config.toml string into a typed OrgwikiConfig.
 * Missing keys take their defaults. Throws on invalid TOML or type mismatches.
 */
export function parseConfigToml(content: string): OrgwikiConfig {
  const raw: Record<string, unknown> = parseToml(content);
  const config = defaultConfig();

  const wiki = section(raw, "wiki");
  const dir = optionalString(wiki, "wiki", "dir");
  if (dir !== undefined) config.wiki.dir = dir;

  const search = section(raw, "search");
  const searchCommand = optionalString(search, "search", "command");
  if (searchCommand !== undefined) config.search.command = searchCommand;

  const editor = section(raw, "editor");
  const editorCommand = optionalString(editor, "editor", "command");
  if (editorCommand !== undefined && editorCommand.trim() !== "") {
    config.editor.command = editorCommand;
  }

  return config;
}

/**
 * Validate a parsed config. When the TOML source is given, top-level
 * sections orgwiki does not know are reported as warnings.
 */
export function validateConfig(config: OrgwikiConfig, source?: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.wiki.dir.trim()) {
    errors.push("wiki.dir must not be empty");
  } else if (!path.isAbsolute(config.wiki.dir) && !config.wiki.dir.startsWith("~")) {
    warnings.push(`wiki.dir "${config.wiki.dir}" is relative; it will be resolved against the working directory`);
  }

  if (!config.search.command.trim()) {
    errors.push("search.command must not be empty");
  }

  if (source !== undefined) {
    const raw: Record<string, unknown> = parseToml(source);
    for (const key of Object.keys(raw)) {
      if (!(KNOWN_SECTIONS as readonly string[]).includes(key)) {
        warnings.push(`Unknown section [${key}]. It will be ignored.`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// ---- Resolution ----

/**
 * Combine a parsed config with the environment. $ORGWIKI_DIR overrides wiki.dir.
 */
export function resolveSettings(config: OrgwikiConfig, env: NodeJS.ProcessEnv = process.env): WikiSettings {
  const home = orgwikiHome(env);
  const userHome = homeDir(env);
  const dir = env.ORGWIKI_DIR?.trim() || config.wiki.dir;

  const settings: WikiSettings = {
    home,
    configPath: path.join(home, CONFIG_FILE),
    sessionPath: path.join(home, SESSION_FILE),
    dir: path.resolve(expandHome(dir, userHome)),
    searchCommand: config.search.command.trim(),
  };
  if (config.editor.command) settings.editorCommand = config.editor.command.trim();
  return settings;
}

/**
 * Read config.toml from the orgwiki home (defaults when absent) and resolve it.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): WikiSettings {
  const file = path.join(orgwikiHome(env), CONFIG_FILE);
  const config = fs.existsSync(file)
    ? parseConfigToml(fs.readFileSync(file, "utf-8"))
    : defaultConfig();
  return resolveSettings(config, env);
}

/**
 * Commented config.toml written by `orgwiki init`.
 */
export function renderConfigToml(dir: string = DEFAULT_NOTES_DIR): string {
  return `# orgwiki configuration

[wiki]
# Directory holding the notes. Only *.org files directly inside it are wiki entries.
dir = ${JSON.stringify(dir)}

[search]
# Regex search tool used for backlinks and keyword lookups (ripgrep).
command = "${DEFAULT_SEARCH_COMMAND}"

[editor]
# Editor for opening notes. Falls back to $VISUAL, then $EDITOR, then vi.
# command = "vim"
`;
}
