/**
 * orgwiki find — Pick an existing note (or type a new topic) and open it.
 */

import { createCliContext } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki find

List the notes in the wiki and open the one you pick, by #number or by name
(Tab completes names fuzzily). Typing a topic that does not exist yet
creates it.`);
    return;
  }

  const { store, close } = createCliContext();
  try {
    const result = await store.findEntryInteractive();
    if (!result) {
      console.log("Cancelled.");
      return;
    }
    console.log(`${result.created ? "Created" : "Opened"} ${result.path}`);
  } finally {
    close();
  }
}
