/**
 * orgwiki links — Show the notes linking to a note (backlinks).
 */

import * as path from "node:path";

import { createCliContext, positionalText, printHits } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki links [file]

Search the wiki for [[wiki:...]] links pointing at <file>. Without a file,
the most recently opened note is used. Files that are not wiki entries
produce no search.`);
    return;
  }

  const arg = positionalText(args).trim();
  const { store } = createCliContext();
  const file = arg ? path.resolve(arg) : undefined;

  const hits = await store.linksHere(file);
  printHits(hits, "No backlinks.");
}
