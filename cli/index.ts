/**
 * orgwiki CLI - a flat wiki of Org notes.
 *
 * Minimal command router. No heavy CLI framework.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { errorMessage } from "../extensions/lib/mod.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Read version from package.json
const pkgPath = path.resolve(__dirname, "..", "package.json");
const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
const VERSION: string =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

// Command definitions: name -> { description, loader }
interface CommandDef {
  description: string;
  load: () => Promise<{ run: (args: string[]) => Promise<void> }>;
}

const COMMANDS: Record<string, CommandDef> = {
  open:        { description: "Open (or create) the note for a topic",        load: () => import("./commands/open.ts") },
  find:        { description: "Pick a note interactively and open it",       load: () => import("./commands/find.ts") },
  mode:        { description: "Open the note for an editing mode",           load: () => import("./commands/mode.ts") },
  "close-all": { description: "Close every open note",                       load: () => import("./commands/close-all.ts") },
  links:       { description: "Show notes linking to a note",                load: () => import("./commands/links.ts") },
  keywords:    { description: "Search notes by keyword",                     load: () => import("./commands/keywords.ts") },
  follow:      { description: "Follow a [[wiki:topic]] link",                load: () => import("./commands/follow.ts") },
  list:        { description: "List all topics",                             load: () => import("./commands/list.ts") },
  show:        { description: "Show a note's title, keywords and links",     load: () => import("./commands/show.ts") },
  init:        { description: "Create ~/.orgwiki/config.toml and the notes directory", load: () => import("./commands/init.ts") },
  doctor:      { description: "Check the search tool, config and notes directory",     load: () => import("./commands/doctor.ts") },
};

function printHelp(): void {
  const maxLen = Math.max(...Object.keys(COMMANDS).map((k) => k.length));
  const lines = Object.entries(COMMANDS).map(
    ([name, def]) => `  ${name.padEnd(maxLen + 2)}${def.description}`
  );

  console.log(`orgwiki v${VERSION} - a flat wiki of Org notes

Usage: orgwiki <command> [options]

Commands:
${lines.join("\n")}

Flags:
  --help       Show this help
  --version    Show version

Run \`orgwiki <command> --help\` for command-specific help.`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global flags
  if (args.includes("--version") || args.includes("-v")) {
    console.log(VERSION);
    return;
  }

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    // If --help is combined with a command, let the command handle it
    const cmdName = args.find((a) => !a.startsWith("-"));
    if (cmdName && COMMANDS[cmdName]) {
      const cmd = await COMMANDS[cmdName].load();
      await cmd.run(args.filter((a) => a !== cmdName));
      return;
    }
    printHelp();
    return;
  }

  const cmdName = args[0];
  const cmdArgs = args.slice(1);

  if (!COMMANDS[cmdName]) {
    console.error(`Unknown command: ${cmdName}\nRun \`orgwiki --help\` for available commands.`);
    process.exit(1);
  }

  const cmd = await COMMANDS[cmdName].load();
  await cmd.run(cmdArgs);
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
