/**
 * cli/init-core.ts — Pure init logic, no filesystem IO.
 *
 * Plans which directories and files `orgwiki init` creates. Existing files
 * are never overwritten.
 */

import * as path from "node:path";

import { NOTE_EXTENSION, formatLink, renderTemplate } from "../extensions/lib/mod.ts";
import { CONFIG_FILE, DEFAULT_NOTES_DIR, defaultConfig, renderConfigToml, resolveSettings } from "./config.ts";

// ---- Types ----

export interface PlanInitInput {
  /** orgwiki home (config + session) */
  home: string;
  /** Notes directory as written to config.toml (may start with ~) */
  configuredDir: string;
  /** Notes directory, expanded */
  notesDir: string;
  existingHomeFiles: Set<string>;
  notesDirExists: boolean;
  /** Topics already in the notes directory */
  existingTopics: string[];
}

export interface InitPlan {
  dirsToCreate: string[];
  /** absolute path -> content */
  filesToCreate: Map<string, string>;
  existing: string[];
}

export interface InitDirInput {
  /** --dir flag */
  flagDir?: string;
  /** wiki.dir of the config.toml init preserves */
  existingDir?: string;
  /** Answer to the interactive prompt */
  answeredDir?: string;
  env: NodeJS.ProcessEnv;
}

export interface InitDirChoice {
  /** Written to a new config.toml */
  configuredDir: string;
  /** Directory the other commands will use */
  notesDir: string;
  warnings: string[];
}

export const INDEX_TOPIC = "index";

// ---- Content ----

/**
 * Starter index note: the usual template plus a line showing link syntax.
 */
export function renderIndexNote(): string {
  return (
    renderTemplate(INDEX_TOPIC, "index") +
    `Start here. Link other notes with ${formatLink("topic")} or ${formatLink("topic", "a description")}.\n`
  );
}

// ---- Planning ----

/**
 * Decide the notes directory: --dir, then the preserved config, then the
 * prompt answer, then the default; resolved the way every other command
 * resolves it, so ORGWIKI_DIR still wins.
 */
export function resolveInitDir(input: InitDirInput): InitDirChoice {
  const configuredDir = input.flagDir ?? input.existingDir ?? input.answeredDir ?? DEFAULT_NOTES_DIR;
  const config = defaultConfig();
  config.wiki.dir = configuredDir;
  const notesDir = resolveSettings(config, input.env).dir;

  const warnings: string[] = [];
  if (input.flagDir !== undefined && input.existingDir !== undefined && input.flagDir !== input.existingDir) {
    warnings.push(
      `config.toml is preserved with wiki.dir = "${input.existingDir}"; --dir "${input.flagDir}" is not saved. Edit ${CONFIG_FILE} to switch.`,
    );
  }
  if (input.env.ORGWIKI_DIR?.trim()) {
    warnings.push(`ORGWIKI_DIR is set; notes directory is ${notesDir}`);
  }

  return { configuredDir, notesDir, warnings };
}

export function planInit(input: PlanInitInput): InitPlan {
  const dirsToCreate: string[] = [];
  const filesToCreate = new Map<string, string>();
  const existing: string[] = [];

  if (input.existingHomeFiles.size === 0) {
    dirsToCreate.push(input.home);
  }

  if (input.existingHomeFiles.has(CONFIG_FILE)) {
    existing.push(CONFIG_FILE);
  } else {
    filesToCreate.set(path.join(input.home, CONFIG_FILE), renderConfigToml(input.configuredDir));
  }

  if (!input.notesDirExists) {
    dirsToCreate.push(input.notesDir);
  }

  // Seed an index only into an empty wiki
  if (input.existingTopics.length === 0) {
    filesToCreate.set(path.join(input.notesDir, INDEX_TOPIC + NOTE_EXTENSION), renderIndexNote());
  } else if (input.existingTopics.includes(INDEX_TOPIC)) {
    existing.push(INDEX_TOPIC + NOTE_EXTENSION);
  }

  return { dirsToCreate, filesToCreate, existing };
}
