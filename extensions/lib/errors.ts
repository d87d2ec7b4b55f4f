/**
 * extensions/lib/errors.ts — Errors raised by the wiki core.
 *
 * File-system errors are not wrapped; they reach the caller as thrown by node:fs.
 */

export type WikiErrorCode =
  | "INVALID_TOPIC"
  | "NO_MODE"
  | "INVALID_LINK"
  | "UNKNOWN_SCHEME"
  | "SEARCH_UNAVAILABLE"
  | "SEARCH_FAILED";

export class WikiError extends Error {
  readonly code: WikiErrorCode;

  constructor(code: WikiErrorCode, message: string) {
    super(message);
    this.name = "WikiError";
    this.code = code;
  }
}

export function isWikiError(err: unknown, code?: WikiErrorCode): err is WikiError {
  return err instanceof WikiError && (code === undefined || err.code === code);
}

/** Message of any thrown value, for console and UI output. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
