/**
 * orgwiki mode — Open the note kept for an editing mode, e.g. "python-mode (major mode)".
 */

import { createCliContext, positionalText } from "../context.ts";

export async function run(args: string[]): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`orgwiki mode <mode-name>

Open the note for an editing mode. "orgwiki mode python-mode" opens
"python-mode (major mode).org", creating it if needed.`);
    return;
  }

  const mode = positionalText(args).trim();
  const { store, close } = createCliContext({ mode: mode || undefined });
  try {
    const result = await store.findEntryForCurrentMode();
    if (!result) {
      console.log("Cancelled.");
      return;
    }
    console.log(`${result.created ? "Created" : "Opened"} ${result.path}`);
  } finally {
    close();
  }
}
