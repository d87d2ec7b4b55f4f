/**
 * extensions/lib/org-entry.ts — Org note format: header template, header
 * parsing, and the inline `[[wiki:topic][description]]` link syntax.
 */

// ---- Constants ----

export const NOTE_EXTENSION = ".org";
export const TITLE_MARKER = "#+TITLE: ";
export const KEYWORDS_MARKER = "#+KEYWORDS: ";
export const SECTION_HEADER = "* ";
export const WIKI_SCHEME = "wiki";

/** 1-based line the cursor lands on in a freshly created note. */
export const TEMPLATE_CURSOR_LINE = 4;

// ---- Types ----

export interface OrgEntry {
  title: string;
  keywords: string;
  body: string;
}

export interface OrgLink {
  scheme: string;
  target: string;
  description?: string;
}

// ---- Template ----

/**
 * Render the skeleton written into a note when it is first created.
 */
export function renderTemplate(title: string, keywords: string): string {
  return [
    `${TITLE_MARKER}${title}`,
    `${KEYWORDS_MARKER}${keywords.trim()}`,
    "",
    SECTION_HEADER,
    "",
  ].join("\n");
}

/**
 * Split a note into its header fields and body.
 * Header lines are only recognized at the top of the file; the body starts
 * at the first line that is neither a header field nor blank.
 */
export function parseEntry(content: string): OrgEntry {
  const lines = content.split(/\r?\n/);
  let title = "";
  let keywords = "";
  let i = 0;

  for (; i < lines.length; i++) {
    const line = lines[i];
    if (line.startsWith(TITLE_MARKER.trimEnd())) {
      title = line.slice(TITLE_MARKER.trimEnd().length).trim();
    } else if (line.startsWith(KEYWORDS_MARKER.trimEnd())) {
      keywords = line.slice(KEYWORDS_MARKER.trimEnd().length).trim();
    } else if (line.trim() !== "") {
      break;
    }
  }

  return { title, keywords, body: lines.slice(i).join("\n") };
}

/** Base file name without the note extension. */
export function topicFromFileName(fileName: string): string {
  return fileName.endsWith(NOTE_EXTENSION)
    ? fileName.slice(0, -NOTE_EXTENSION.length)
    : fileName;
}

// ---- Links ----

const BRACKET_LINK_RE = /\[\[([A-Za-z][\w-]*):([^\]]+)\](?:\[([^\]]*)\])?\]/g;
const BARE_LINK_RE = /^([A-Za-z][\w-]*):(.+)$/;

/**
 * Parse a single link, either bracketed (`[[wiki:foo]]`, `[[wiki:foo][Foo]]`)
 * or bare (`wiki:foo`). Returns null when the text is not a link.
 */
export function parseLink(text: string): OrgLink | null {
  const trimmed = text.trim();

  const bracketed = new RegExp(`^${BRACKET_LINK_RE.source}$`).exec(trimmed);
  if (bracketed) {
    return toLink(bracketed[1], bracketed[2], bracketed[3]);
  }

  const bare = BARE_LINK_RE.exec(trimmed);
  if (bare && !bare[2].startsWith("//")) {
    return toLink(bare[1], bare[2], undefined);
  }

  return null;
}

/** Every bracketed link in a body of text, in order of appearance. */
export function extractLinks(text: string): OrgLink[] {
  const links: OrgLink[] = [];
  for (const m of text.matchAll(BRACKET_LINK_RE)) {
    links.push(toLink(m[1], m[2], m[3]));
  }
  return links;
}

export function formatLink(topic: string, description?: string): string {
  const target = `${WIKI_SCHEME}:${topic}`;
  return description ? `[[${target}][${description}]]` : `[[${target}]]`;
}

function toLink(scheme: string, target: string, description: string | undefined): OrgLink {
  const link: OrgLink = { scheme, target: target.trim() };
  if (description !== undefined && description.trim() !== "") {
    link.description = description.trim();
  }
  return link;
}
