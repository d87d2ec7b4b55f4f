/**
 * Tests for extensions/lib/session.ts — session.json persistence, the
 * terminal EditorHost, and editor resolution.
 * Run: npx tsx tests/test-session.ts
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
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
  SessionHost,
  loadSession,
  resolveEditor,
  saveSession,
  type OpenOptions,
} from "../extensions/lib/mod.ts";

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "orgwiki-session-"));

// ================================================================
// loadSession / saveSession
// ================================================================
console.log("\n-- loadSession --");
{
  assertEq(loadSession(path.join(tmp, "missing.json")), { buffers: [] }, "missing file is an empty session");

  const corrupt = path.join(tmp, "corrupt.json");
  fs.writeFileSync(corrupt, "{ not json");
  assertEq(loadSession(corrupt), { buffers: [] }, "corrupt file is an empty session");

  const odd = path.join(tmp, "odd.json");
  fs.writeFileSync(
    odd,
    JSON.stringify({
      buffers: [
        { id: "a1", file: "/w/a.org", openedAt: "2026-01-02T03:04:05.000Z" },
        { id: 7, file: "/w/b.org" },
        "junk",
        { id: "c3", file: "/w/c.org" },
      ],
    }),
  );
  assertEq(
    loadSession(odd),
    {
      buffers: [
        { id: "a1", file: "/w/a.org", openedAt: "2026-01-02T03:04:05.000Z" },
        { id: "c3", file: "/w/c.org", openedAt: "1970-01-01T00:00:00.000Z" },
      ],
    },
    "malformed entries skipped, missing timestamps defaulted",
  );

  const nested = path.join(tmp, "nested", "dir", "session.json");
  saveSession({ buffers: [{ id: "x", file: "/w/x.org", openedAt: "2026-01-01T00:00:00.000Z" }] }, nested);
  assertEq(loadSession(nested).buffers.map((b) => b.id), ["x"], "save creates parent directories");
}

// ================================================================
// SessionHost
// ================================================================
console.log("\n-- SessionHost --");
{
  const statePath = path.join(tmp, "host", "session.json");
  const launched: Array<{ file: string; options: OpenOptions }> = [];
  const host = new SessionHost({
    statePath,
    launch: async (file, options) => {
      launched.push({ file, options });
    },
    mode: "python-mode",
  });

  assertEq(host.buffers(), [], "no buffers before opening");
  assertEq(host.activeFile(), undefined, "no active file before opening");
  assertEq(host.previousMode(), "python-mode", "mode comes from the options");

  await host.open("/w/a.org", { line: 4 });
  await host.open("/w/b.org");
  assertEq(launched, [{ file: "/w/a.org", options: { line: 4 } }, { file: "/w/b.org", options: {} }], "launcher called with options");
  assertEq(host.buffers().map((b) => b.file), ["/w/a.org", "/w/b.org"], "buffers recorded in order");
  assert(host.buffers().every((b) => !b.modified), "recorded buffers are never modified");
  assertEq(host.activeFile(), "/w/b.org", "last opened is active");

  const idA = host.buffers()[0].id;
  await host.open("/w/a.org");
  assertEq(host.buffers().map((b) => b.file), ["/w/b.org", "/w/a.org"], "re-open moves buffer to the end");
  assertEq(host.buffers()[1].id, idA, "re-open keeps the buffer id");
  assertEq(host.activeFile(), "/w/a.org", "re-opened note is active");

  const closed = await host.close(host.buffers()[0]);
  assert(closed, "close reports success");
  assertEq(host.buffers().map((b) => b.file), ["/w/a.org"], "closed buffer forgotten");
  assert(await host.close({ id: "gone", file: "/w/zzz.org", modified: false }), "closing an unknown buffer is harmless");

  const other = new SessionHost({ statePath, launch: async () => {} });
  assertEq(other.buffers().map((b) => b.file), ["/w/a.org"], "session shared through the state file");
  assertEq(other.previousMode(), undefined, "no mode unless given");
}

{
  const statePath = path.join(tmp, "failing", "session.json");
  const host = new SessionHost({
    statePath,
    launch: async () => {
      throw new Error("editor crashed");
    },
  });
  let message = "";
  try {
    await host.open("/w/a.org");
  } catch (e: unknown) {
    message = e instanceof Error ? e.message : "";
  }
  assertEq(message, "editor crashed", "launcher failure propagates");
  assertEq(host.buffers(), [], "failed launch records nothing");
}

// ================================================================
// resolveEditor
// ================================================================
console.log("\n-- resolveEditor --");
{
  assertEq(resolveEditor("code --wait", { EDITOR: "nano" }), ["code", "--wait"], "explicit command wins");
  assertEq(resolveEditor(undefined, { VISUAL: "emacs -nw", EDITOR: "nano" }), ["emacs", "-nw"], "VISUAL before EDITOR");
  assertEq(resolveEditor("  ", { EDITOR: "nano" }), ["nano"], "blank command falls through");
  assertEq(resolveEditor(undefined, { VISUAL: " ", EDITOR: "" }), ["vi"], "vi when nothing is set");
}

fs.rmSync(tmp, { recursive: true, force: true });

// ---- Summary ----
console.log(`\n=== Results: ${PASS} passed, ${FAIL} failed ===\n`);
process.exit(FAIL > 0 ? 1 : 0);
