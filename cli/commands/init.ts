/**
 * orgwiki init — Create the config file and the notes directory.
 *
 * Preserves existing files — only creates what's missing.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { NOTE_EXTENSION, topicFromFileName } from "../../extensions/lib/mod.ts";
import { CONFIG_FILE, DEFAULT_NOTES_DIR, orgwikiHome, parseConfigToml } from "../config.ts";
import { planInit, resolveInitDir } from "../init-core.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki init [--dir <path>]

Create ~/.orgwiki/config.toml and the notes directory, and seed an
index note into an empty wiki. Existing files are never overwritten.

Options:
  --dir <path>   Notes directory (default: ${DEFAULT_NOTES_DIR})
  --verbose      Show detailed output`);
    return;
  }

  const verbose = args.includes("--verbose");
  const home = orgwikiHome();
  const configFile = path.join(home, CONFIG_FILE);

  let flagDir: string | undefined;
  const dirIdx = args.indexOf("--dir");
  if (dirIdx !== -1) {
    const val = args[dirIdx + 1];
    if (!val || val.startsWith("--")) {
      console.error("Error: --dir requires a value.");
      process.exit(1);
    }
    flagDir = val;
  }

  const existingDir = fs.existsSync(configFile)
    ? parseConfigToml(fs.readFileSync(configFile, "utf-8")).wiki.dir
    : undefined;

  let answeredDir: string | undefined;
  const decided = flagDir !== undefined || existingDir !== undefined || !!process.env.ORGWIKI_DIR?.trim();
  if (!decided && process.stdin.isTTY) {
    const rl = createInterface({ input, output });
    try {
      const ans = (await rl.question(`Notes directory [${DEFAULT_NOTES_DIR}]: `)).trim();
      if (ans) answeredDir = ans;
    } finally {
      rl.close();
    }
  }

  const { configuredDir, notesDir, warnings } = resolveInitDir({ flagDir, existingDir, answeredDir, env: process.env });
  for (const w of warnings) console.warn(`Warning: ${w}`);

  const notesDirExists = fs.existsSync(notesDir);

  const plan = planInit({
    home,
    configuredDir,
    notesDir,
    existingHomeFiles: new Set(fs.existsSync(home) ? fs.readdirSync(home) : []),
    notesDirExists,
    existingTopics: notesDirExists
      ? fs.readdirSync(notesDir).filter((f) => f.endsWith(NOTE_EXTENSION)).map(topicFromFileName)
      : [],
  });

  for (const d of plan.dirsToCreate) {
    fs.mkdirSync(d, { recursive: true });
    if (verbose) console.log(`Created ${d}`);
  }

  let created = 0;
  for (const [file, content] of plan.filesToCreate) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, { encoding: "utf-8", flag: "wx" });
    if (verbose) console.log(`✓ Created ${file}`);
    created++;
  }

  if (plan.existing.length > 0) {
    console.log(`Preserved existing: ${plan.existing.join(", ")}`);
  }

  if (created > 0) {
    console.log(`Initialized ${home} (${created} file${created > 1 ? "s" : ""} created, notes: ${notesDir})`);
  } else {
    console.log(`${home} already initialized. No files changed.`);
  }

  console.log(`\nNext steps:`);
  console.log(`  1. Run \`orgwiki find\` to open or create a note`);
  console.log(`  2. Run \`orgwiki doctor\` to check that ripgrep is available`);
}
