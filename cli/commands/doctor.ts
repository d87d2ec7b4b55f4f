/**
 * orgwiki doctor — Diagnose the wiki setup.
 *
 * Checks Node.js, the search tool, the editor, config.toml, the notes
 * directory, and the open-note session.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { execFileSync } from "node:child_process";

import { NOTE_EXTENSION, loadSession, resolveEditor } from "../../extensions/lib/mod.ts";
import {
  CONFIG_FILE,
  defaultConfig,
  orgwikiHome,
  parseConfigToml,
  resolveSettings,
  validateConfig,
  type OrgwikiConfig,
  type ValidationResult,
} from "../config.ts";
import {
  runAllChecks,
  formatResults,
  summaryCounts,
  type BinaryInfo,
  type DoctorInput,
} from "../doctor-core.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki doctor

Check the wiki setup: Node.js, the search tool (ripgrep), the editor,
config.toml, the notes directory, and the open-note session.

Options:
  --json       Output results as JSON`);
    return;
  }

  const jsonOutput = args.includes("--json");

  const input = gatherDoctorInput();
  const results = runAllChecks(input);
  const counts = summaryCounts(results);

  if (jsonOutput) {
    console.log(JSON.stringify({ checks: results, summary: counts }, null, 2));
    return;
  }

  console.log(formatResults(results));
  console.log("");

  const parts: string[] = [];
  if (counts.ok > 0) parts.push(`${counts.ok} ok`);
  if (counts.warn > 0) parts.push(`${counts.warn} warning${counts.warn > 1 ? "s" : ""}`);
  if (counts.fail > 0) parts.push(`${counts.fail} error${counts.fail > 1 ? "s" : ""}`);
  console.log(parts.join(", "));

  if (counts.fail > 0) process.exit(1);
}

function gatherDoctorInput(): DoctorInput {
  const configPath = path.join(orgwikiHome(), CONFIG_FILE);
  const exists = fs.existsSync(configPath);

  let config: OrgwikiConfig = defaultConfig();
  let parseError: string | null = null;
  let validation: ValidationResult | null = null;
  if (exists) {
    try {
      const source = fs.readFileSync(configPath, "utf-8");
      config = parseConfigToml(source);
      validation = validateConfig(config, source);
    } catch (err) {
      parseError = err instanceof Error ? err.message : String(err);
    }
  }

  const settings = resolveSettings(config);
  const notesExists = fs.existsSync(settings.dir);
  const noteCount = notesExists
    ? fs.readdirSync(settings.dir).filter((f) => f.endsWith(NOTE_EXTENSION)).length
    : 0;

  const session = loadSession(settings.sessionPath);
  const [editorBin] = resolveEditor(settings.editorCommand);

  return {
    nodeVersion: process.version,
    searchTool: { command: settings.searchCommand, ...getBinaryInfo(settings.searchCommand) },
    editor: { command: editorBin, ...getBinaryOnPath(editorBin) },
    config: { path: configPath, exists, parseError, validation },
    notesDir: { path: settings.dir, exists: notesExists, noteCount },
    session: {
      open: session.buffers.length,
      missing: session.buffers.filter((b) => !fs.existsSync(b.file)).map((b) => path.basename(b.file)),
    },
  };
}

function getBinaryInfo(name: string): BinaryInfo {
  try {
    const out = execFileSync(name, ["--version"], {
      encoding: "utf-8",
      timeout: 5000,
      stdio: ["pipe", "pipe", "pipe"],
    }).trim();
    const match = out.match(/(\d+[\d.]*\d+)/);
    return { version: match ? match[1] : null, exists: true };
  } catch {
    return { version: null, exists: false };
  }
}

/**
 * Editors may not answer --version (or may open a window), so only PATH is searched.
 */
function getBinaryOnPath(name: string): BinaryInfo {
  if (path.isAbsolute(name)) return { version: null, exists: fs.existsSync(name) };
  const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const exists = dirs.some((d) => fs.existsSync(path.join(d, name)));
  return { version: null, exists };
}
