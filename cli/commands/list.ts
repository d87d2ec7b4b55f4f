/**
 * orgwiki list — List the topics in the wiki.
 */

import { createCliContext } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki list

Print every topic (one per line) in the notes directory.

Options:
  --json    Output as a JSON array`);
    return;
  }

  const { store } = createCliContext();
  const topics = store.listTopics();

  if (args.includes("--json")) {
    console.log(JSON.stringify(topics));
    return;
  }
  for (const topic of topics) console.log(topic);
}
