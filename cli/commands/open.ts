/**
 * orgwiki open — Open a note by topic, creating it from the template if needed.
 */

import { createCliContext, positionalText } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki open <topic>

Open the note for <topic> in your editor. A topic maps to <topic>.org in the
notes directory; the extension may be given or left off. A note that does
not exist yet is created with a title, a keywords line (you are asked for
the keywords) and an empty section header.

Topics may contain spaces but not path separators.`);
    return;
  }

  const topic = positionalText(args);
  if (!topic.trim()) {
    console.error("Usage: orgwiki open <topic>");
    process.exit(1);
  }

  const { store, close } = createCliContext();
  try {
    const result = await store.visit(topic);
    if (!result) {
      console.log("Cancelled.");
      return;
    }
    console.log(`${result.created ? "Created" : "Opened"} ${result.path}`);
  } finally {
    close();
  }
}
