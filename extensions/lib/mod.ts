/**
 * extensions/lib/mod.ts
 *
 * Barrel exports for the wiki core.
 *
 * Important: do NOT name this file index.ts, otherwise pi will treat
 * extensions/lib/ as an extension entry point during discovery.
 */

export type { OrgEntry, OrgLink } from "./org-entry.ts";
export {
  NOTE_EXTENSION,
  TITLE_MARKER,
  KEYWORDS_MARKER,
  SECTION_HEADER,
  WIKI_SCHEME,
  TEMPLATE_CURSOR_LINE,
  renderTemplate,
  parseEntry,
  parseLink,
  extractLinks,
  formatLink,
  topicFromFileName,
} from "./org-entry.ts";

export type { WikiErrorCode } from "./errors.ts";
export { WikiError, isWikiError, errorMessage } from "./errors.ts";

export type { LinkHandler } from "./link-registry.ts";
export { LinkRegistry } from "./link-registry.ts";

export type { SearchHit, Searcher } from "./search.ts";
export {
  KEYWORD_PATTERN,
  backlinkPattern,
  escapeRegex,
  filterByKeywords,
  formatHits,
  parseRipgrepJson,
  RipgrepSearcher,
} from "./search.ts";

export type {
  OpenBuffer,
  OpenOptions,
  EditorHost,
  PromptRequest,
  Prompter,
  VisitResult,
  KillResult,
  WikiEntry,
  WikiStoreOptions,
} from "./wiki-store.ts";
export { WikiStore, MODE_SUFFIX } from "./wiki-store.ts";

export type { SessionBuffer, SessionState, Launcher, SessionHostOptions } from "./session.ts";
export { SessionHost, loadSession, saveSession, resolveEditor, editorLauncher } from "./session.ts";

export type { EditorUi } from "./ui-editor.ts";
export { uiEditorLauncher } from "./ui-editor.ts";
