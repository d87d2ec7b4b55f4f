/**
 * Tests for cli/init-core.ts — what `orgwiki init` plans to create.
 * Run: npx tsx tests/test-init.ts
 */

// ---- Test harness ----
let PASS = 0;
let FAIL = 0;

function assert(condition: boolean, label: string): void {
  if (condition) {
    console.log(`  PASS: ${label}`);
    PASS++;
  } else {
    console.error(`  FAIL: ${label}`);
    FAIL++;
  }
}

function assertEq(actual: unknown, expected: unknown, label: string): void {
  const ok = JSON.stringify(actual) === JSON.stringify(expected);
  if (ok) {
    console.log(`  PASS: ${label}`);
    PASS++;
  } else {
    console.error(`  FAIL: ${label} — got ${JSON.stringify(actual)}, expected ${JSON.stringify(expected)}`);
    FAIL++;
  }
}

// ---- Imports ----
import {
  INDEX_TOPIC,
  planInit,
  renderIndexNote,
  resolveInitDir,
  type PlanInitInput,
} from "../cli/init-core.ts";
import { parseConfigToml } from "../cli/config.ts";
import { extractLinks, parseEntry } from "../extensions/lib/mod.ts";

function input(overrides: Partial<PlanInitInput> = {}): PlanInitInput {
  return {
    home: "/home/u/.orgwiki",
    configuredDir: "~/org/wiki",
    notesDir: "/home/u/org/wiki",
    existingHomeFiles: new Set<string>(),
    notesDirExists: false,
    existingTopics: [],
    ...overrides,
  };
}

// ================================================================
// renderIndexNote
// ================================================================
console.log("\n-- renderIndexNote --");
{
  const entry = parseEntry(renderIndexNote());
  assertEq(entry.title, INDEX_TOPIC, "index note titled");
  assertEq(entry.keywords, "index", "index note keywords");
  assertEq(
    extractLinks(entry.body).map((l) => l.target),
    ["topic", "topic"],
    "index note shows both link forms",
  );
}

// ================================================================
// planInit
// ================================================================
console.log("\n-- fresh install --");
{
  const plan = planInit(input());
  assertEq(plan.dirsToCreate, ["/home/u/.orgwiki", "/home/u/org/wiki"], "home and notes dirs created");
  assertEq([...plan.filesToCreate.keys()], ["/home/u/.orgwiki/config.toml", "/home/u/org/wiki/index.org"], "config and index created");
  assertEq(plan.existing, [], "nothing existing");

  const config = plan.filesToCreate.get("/home/u/.orgwiki/config.toml") ?? "";
  assertEq(parseConfigToml(config).wiki.dir, "~/org/wiki", "config keeps the unexpanded dir");
  assertEq(plan.filesToCreate.get("/home/u/org/wiki/index.org"), renderIndexNote(), "index content");
}

console.log("\n-- re-run --");
{
  const plan = planInit(
    input({
      existingHomeFiles: new Set(["config.toml", "session.json"]),
      notesDirExists: true,
      existingTopics: ["index", "rust"],
    }),
  );
  assertEq(plan.dirsToCreate, [], "no dirs to create");
  assertEq(plan.filesToCreate.size, 0, "no files to create");
  assertEq(plan.existing, ["config.toml", "index.org"], "existing files reported");
}

console.log("\n-- existing notes without an index --");
{
  const plan = planInit(input({ existingHomeFiles: new Set(["session.json"]), notesDirExists: true, existingTopics: ["rust"] }));
  assertEq(plan.dirsToCreate, [], "home exists, notes dir exists");
  assertEq([...plan.filesToCreate.keys()], ["/home/u/.orgwiki/config.toml"], "only config written");
  assertEq(plan.existing, [], "no index reported");
}

console.log("\n-- empty notes dir --");
{
  const plan = planInit(input({ notesDirExists: true }));
  assertEq(plan.dirsToCreate, ["/home/u/.orgwiki"], "only home created");
  assert(plan.filesToCreate.has("/home/u/org/wiki/index.org"), "index seeded into an empty wiki");
}

// ================================================================
// resolveInitDir
// ================================================================
console.log("\n-- resolveInitDir --");
{
  assertEq(
    resolveInitDir({ env: { HOME: "/home/u" } }),
    { configuredDir: "~/org/wiki", notesDir: "/home/u/org/wiki", warnings: [] },
    "default directory",
  );
  assertEq(
    resolveInitDir({ answeredDir: "~/notes", env: { HOME: "/home/u" } }).notesDir,
    "/home/u/notes",
    "prompt answer expanded",
  );
}
{
  const choice = resolveInitDir({ env: { HOME: "/home/u", ORGWIKI_DIR: "/tmp/ow/notes" } });
  assertEq(choice.notesDir, "/tmp/ow/notes", "ORGWIKI_DIR decides the notes directory");
  assertEq(choice.configuredDir, "~/org/wiki", "config keeps the configured directory");
  assertEq(choice.warnings, ["ORGWIKI_DIR is set; notes directory is /tmp/ow/notes"], "override reported");
}
{
  const choice = resolveInitDir({ flagDir: "/srv/new", existingDir: "~/org/wiki", env: { HOME: "/home/u" } });
  assertEq(choice.notesDir, "/srv/new", "--dir wins over the preserved config");
  assertEq(
    choice.warnings,
    ['config.toml is preserved with wiki.dir = "~/org/wiki"; --dir "/srv/new" is not saved. Edit config.toml to switch.'],
    "disagreement with the preserved config reported",
  );
  assertEq(
    resolveInitDir({ flagDir: "~/org/wiki", existingDir: "~/org/wiki", env: { HOME: "/home/u" } }).warnings,
    [],
    "matching --dir is silent",
  );
  assertEq(
    resolveInitDir({ existingDir: "/srv/kept", answeredDir: "/srv/typed", env: { HOME: "/home/u" } }).notesDir,
    "/srv/kept",
    "preserved config beats a prompt answer",
  );
}

// ---- Summary ----
console.log(`\n=== Results: ${PASS} passed, ${FAIL} failed ===\n`);
process.exit(FAIL > 0 ? 1 : 0);
