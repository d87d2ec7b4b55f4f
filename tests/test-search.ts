/**
 * Tests for extensions/lib/search.ts — search patterns, keyword refinement,
 * ripgrep JSON parsing, and RipgrepSearcher against stand-in executables.
 * Run: npx tsx tests/test-search.ts
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
  KEYWORD_PATTERN,
  RipgrepSearcher,
  backlinkPattern,
  escapeRegex,
  filterByKeywords,
  formatHits,
  isWikiError,
  parseRipgrepJson,
  type SearchHit,
} from "../extensions/lib/mod.ts";

// ================================================================
// Patterns
// ================================================================
console.log("\n-- patterns --");
{
  assertEq(KEYWORD_PATTERN, "^#\\+KEYWORDS: ", "keyword pattern anchors the marker");
  assertEq(escapeRegex("a.b*c(d)[e]|f"), "a\\.b\\*c\\(d\\)\\[e\\]\\|f", "regex metacharacters escaped");

  const re = new RegExp(backlinkPattern("rust-notes"));
  assert(re.test("see [[wiki:rust-notes]] here"), "matches plain link");
  assert(re.test("[[wiki:rust-notes][Rust]]"), "matches described link");
  assert(re.test("[[wiki:rust-notes.org]]"), "matches link carrying the extension");
  assert(!re.test("[[wiki:rust-notes-old]]"), "does not match a longer topic");
  assert(!re.test("[[file:rust-notes]]"), "does not match other schemes");
}

// ================================================================
// filterByKeywords
// ================================================================
console.log("\n-- filterByKeywords --");
{
  const hits: SearchHit[] = [
    { file: "/w/a.org", line: 2, text: "#+KEYWORDS: rust async" },
    { file: "/w/b.org", line: 2, text: "#+KEYWORDS: Go channels" },
    { file: "/w/c.org", line: 2, text: "#+KEYWORDS: python" },
  ];
  assertEq(filterByKeywords(hits).length, 3, "no query keeps all");
  assertEq(filterByKeywords(hits, "  |  ").length, 3, "empty tokens keep all");
  assertEq(filterByKeywords(hits, "go").map((h) => h.file), ["/w/b.org"], "case-insensitive token");
  assertEq(filterByKeywords(hits, "async|python").map((h) => h.file), ["/w/a.org", "/w/c.org"], "OR across tokens");
  assertEq(filterByKeywords(hits, "KEYWORDS").length, 0, "the marker itself is not matched");
}

// ================================================================
// formatHits
// ================================================================
console.log("\n-- formatHits --");
{
  assertEq(
    formatHits([
      { file: "/w/a.org", line: 3, text: "[[wiki:b]]" },
      { file: "/w/c.org", line: 10, text: "x" },
    ]),
    "/w/a.org:3:[[wiki:b]]\n/w/c.org:10:x",
    "grep-style lines",
  );
  assertEq(formatHits([]), "", "no hits formats empty");
}

// ================================================================
// parseRipgrepJson
// ================================================================
console.log("\n-- parseRipgrepJson --");
{
  const output = [
    JSON.stringify({ type: "begin", data: { path: { text: "/w/a.org" } } }),
    JSON.stringify({
      type: "match",
      data: { path: { text: "/w/a.org" }, lines: { text: "#+KEYWORDS: rust\n" }, line_number: 2, submatches: [] },
    }),
    "not json",
    JSON.stringify({ type: "match", data: { path: { bytes: "L3cvYi5vcmc=" }, lines: { text: "x\n" }, line_number: 1 } }),
    JSON.stringify({
      type: "match",
      data: { path: { text: "/w/b.org" }, lines: { text: "see [[wiki:a]]\r\n" }, line_number: 7 },
    }),
    JSON.stringify({ type: "end", data: { path: { text: "/w/a.org" } } }),
    "",
  ].join("\n");

  assertEq(
    parseRipgrepJson(output),
    [
      { file: "/w/a.org", line: 2, text: "#+KEYWORDS: rust" },
      { file: "/w/b.org", line: 7, text: "see [[wiki:a]]" },
    ],
    "match events become hits; other events and non-UTF-8 paths skipped",
  );
  assertEq(parseRipgrepJson(""), [], "empty output");
}

// ================================================================
// RipgrepSearcher
// ================================================================
console.log("\n-- RipgrepSearcher --");

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "orgwiki-search-"));

function stubTool(name: string, script: string): string {
  const file = path.join(tmp, name);
  fs.writeFileSync(file, `#!/bin/sh\n${script}\n`, { mode: 0o755 });
  return file;
}

{
  const searcher = new RipgrepSearcher(path.join(tmp, "no-such-tool"));
  let code: string | undefined;
  try {
    await searcher.search(KEYWORD_PATTERN, tmp);
  } catch (e: unknown) {
    code = isWikiError(e) ? e.code : undefined;
  }
  assertEq(code, "SEARCH_UNAVAILABLE", "missing executable reported");
}

{
  const line = JSON.stringify({
    type: "match",
    data: { path: { text: "/w/a.org" }, lines: { text: "#+KEYWORDS: rust\n" }, line_number: 2 },
  });
  const argsFile = path.join(tmp, "args.txt");
  const tool = stubTool("rg-ok", `printf '%s\\n' "$@" > '${argsFile}'\nprintf '%s\\n' '${line}'\nexit 0`);
  const hits = await new RipgrepSearcher(tool).search(KEYWORD_PATTERN, "/w");

  assertEq(hits, [{ file: "/w/a.org", line: 2, text: "#+KEYWORDS: rust" }], "stdout parsed into hits");
  assertEq(
    fs.readFileSync(argsFile, "utf-8").split("\n").filter(Boolean),
    ["--json", "--no-config", "--glob", "*.org", "-e", "^#\\+KEYWORDS: ", "/w"],
    "pattern and root passed to the tool",
  );
}

{
  const tool = stubTool("rg-none", "exit 1");
  assertEq(await new RipgrepSearcher(tool).search("x", "/w"), [], "exit 1 means no matches");
}

{
  const tool = stubTool("rg-bad", "echo 'regex parse error' >&2\nexit 2");
  let message = "";
  let code: string | undefined;
  try {
    await new RipgrepSearcher(tool).search("(", "/w");
  } catch (e: unknown) {
    if (isWikiError(e)) {
      code = e.code;
      message = e.message;
    }
  }
  assertEq(code, "SEARCH_FAILED", "exit 2 is a failure");
  assert(message.endsWith("exited with 2: regex parse error"), "failure carries stderr");
}

fs.rmSync(tmp, { recursive: true, force: true });

// ---- Summary ----
console.log(`\n=== Results: ${PASS} passed, ${FAIL} failed ===\n`);
process.exit(FAIL > 0 ? 1 : 0);
