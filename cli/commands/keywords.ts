/**
 * orgwiki keywords — List keyword lines across the wiki, optionally filtered.
 */

import { createCliContext, positionalText, printHits } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki keywords [query]

Search every note's #+KEYWORDS: line. The optional query narrows the result;
separate alternatives with "|" (e.g. "rust|go").`);
    return;
  }

  const query = positionalText(args);
  const { store } = createCliContext();
  const hits = await store.findKeyword(query);
  printHits(hits, "No matching keywords.");
}
