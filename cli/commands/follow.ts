/**
 * orgwiki follow — Follow a [[wiki:topic]] link.
 */

import { createCliContext, positionalText } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki follow <link>

Follow a link such as "[[wiki:rust-notes]]", "[[wiki:rust-notes][Rust]]"
or "wiki:rust-notes", opening (or creating) the linked note.`);
    return;
  }

  const text = positionalText(args);
  if (!text.trim()) {
    console.error("Usage: orgwiki follow <link>");
    process.exit(1);
  }

  const { store, close } = createCliContext();
  try {
    const link = await store.followLink(text);
    console.log(`Followed ${link.scheme}:${link.target}`);
  } finally {
    close();
  }
}
