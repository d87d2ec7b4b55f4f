/**
 * orgwiki close-all — Close every open note in the session.
 */

import { createCliContext } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki close-all

Close every wiki note recorded as open in the session. Files outside the
notes directory are left alone.

Options:
  --verbose    List each closed note`);
    return;
  }

  const verbose = args.includes("--verbose");
  const { store } = createCliContext();
  const result = await store.killAllEntries();

  if (verbose) {
    for (const file of result.closed) console.log(`  closed ${file}`);
    for (const file of result.kept) console.log(`  kept   ${file}`);
  }

  const n = result.closed.length;
  console.log(`Closed ${n} note${n === 1 ? "" : "s"}.`);
  if (result.kept.length > 0) {
    console.log(`${result.kept.length} left open.`);
  }
}
