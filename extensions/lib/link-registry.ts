/**
 * extensions/lib/link-registry.ts — Scheme → handler map for following links.
 */

import { WikiError } from "./errors.ts";
import { parseLink, type OrgLink } from "./org-entry.ts";

export type LinkHandler = (target: string, link: OrgLink) => Promise<void> | void;

export class LinkRegistry {
  private readonly handlers = new Map<string, LinkHandler>();

  register(scheme: string, handler: LinkHandler): void {
    this.handlers.set(scheme, handler);
  }

  unregister(scheme: string): boolean {
    return this.handlers.delete(scheme);
  }

  has(scheme: string): boolean {
    return this.handlers.has(scheme);
  }

  schemes(): string[] {
    return [...this.handlers.keys()].sort();
  }

  /**
   * Parse `text` as a link and hand its target to the scheme's handler.
   */
  async follow(text: string): Promise<OrgLink> {
    const link = parseLink(text);
    if (!link) {
      throw new WikiError("INVALID_LINK", `Not a link: ${text.trim()}`);
    }

    const handler = this.handlers.get(link.scheme);
    if (!handler) {
      throw new WikiError("UNKNOWN_SCHEME", `No handler for link scheme "${link.scheme}"`);
    }

    await handler(link.target, link);
    return link;
  }
}
