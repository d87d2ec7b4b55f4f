/**
 * orgwiki show — Print a note's header fields and links.
 */

import { WIKI_SCHEME, extractLinks } from "../../extensions/lib/mod.ts";
import { createCliContext, positionalText } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki show <topic>

Print the title, keywords and outgoing wiki links of a note.

Options:
  --json    Output as JSON`);
    return;
  }

  const topic = positionalText(args);
  const { store } = createCliContext();
  const entry = store.readEntry(topic);
  if (!entry) {
    console.error(`No such note: ${topic.trim()}`);
    process.exit(1);
  }

  const links = extractLinks(entry.body).filter((l) => l.scheme === WIKI_SCHEME).map((l) => l.target);

  if (args.includes("--json")) {
    console.log(JSON.stringify({ topic: entry.topic, path: entry.path, title: entry.title, keywords: entry.keywords, links }, null, 2));
    return;
  }

  console.log(`${entry.title || entry.topic}
  path:     ${entry.path}
  keywords: ${entry.keywords || "(none)"}
  links:    ${links.length > 0 ? links.join(", ") : "(none)"}`);
}
