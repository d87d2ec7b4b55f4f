/**
 * extensions/lib/ui-editor.ts — Launcher that edits a note in an agent UI's
 * multi-line editor instead of a terminal editor.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { basename } from "node:path";

import type { Launcher } from "./session.ts";

/** The part of pi's `ctx.ui` the launcher needs. */
export interface EditorUi {
  editor(title: string, prefill?: string): Promise<string | undefined>;
}

/**
 * Opens the note prefilled in `ui.editor` and writes back the result when it
 * changed. The UI editor takes no cursor position, so `OpenOptions.line` is
 * not applied and a new note opens at the top.
 */
export function uiEditorLauncher(ui: EditorUi): Launcher {
  return async (file) => {
    const content = readFileSync(file, "utf-8");
    const edited = await ui.editor(basename(file), content);
    if (edited !== undefined && edited !== content) {
      writeFileSync(file, edited, "utf-8");
    }
  };
}
