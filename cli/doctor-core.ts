/**
 * cli/doctor-core.ts — Pure doctor check logic, no filesystem IO.
 *
 * Each check function takes structured input and returns a CheckResult.
 * The IO layer (commands/doctor.ts) gathers system state and feeds it here.
 */

import type { ValidationResult } from "./config.ts";

// ---- Types ----

export interface CheckResult {
  status: "ok" | "warn" | "fail";
  message: string;
  fix?: string;
}

export interface CategorizedCheck {
  category: string;
  label: string;
  result: CheckResult;
}

export interface BinaryInfo {
  version: string | null;
  exists: boolean;
}

export interface DoctorInput {
  nodeVersion: string | null;
  searchTool: { command: string } & BinaryInfo;
  editor: { command: string } & BinaryInfo;
  config: { path: string; exists: boolean; parseError: string | null; validation: ValidationResult | null };
  notesDir: { path: string; exists: boolean; noteCount: number };
  session: { open: number; missing: string[] };
}

// ---- Minimum versions ----

const MIN_NODE_MAJOR = 20;

// ---- Individual check functions ----

/**
 * Check Node.js version meets minimum requirement.
 */
export function checkNodeVersion(version: string | null): CheckResult {
  if (!version) {
    return {
      status: "fail",
      message: "Node.js not found",
      fix: "Install Node.js v20 or later",
    };
  }

  const match = version.match(/^v?(\d+)/);
  if (!match) {
    return {
      status: "fail",
      message: `Cannot parse Node.js version: ${version}`,
      fix: "Install Node.js v20 or later",
    };
  }

  const major = parseInt(match[1], 10);
  if (major < MIN_NODE_MAJOR) {
    return {
      status: "fail",
      message: `Node.js ${version} is too old (minimum: v${MIN_NODE_MAJOR})`,
      fix: `Upgrade Node.js to v${MIN_NODE_MAJOR} or later`,
    };
  }

  // Strip leading 'v' for display
  const display = version.startsWith("v") ? version.slice(1) : version;
  return { status: "ok", message: `Node.js ${display}` };
}

/**
 * Check if a binary exists on the system.
 * @param name Binary name
 * @param version Detected version (null if not found)
 * @param exists Whether the binary was found
 * @param required If true, missing is "fail" instead of "warn"
 */
export function checkBinaryExists(
  name: string,
  version: string | null,
  exists: boolean,
  required: boolean = false,
): CheckResult {
  if (!exists) {
    return {
      status: required ? "fail" : "warn",
      message: `${name} not found`,
      fix: `Install ${name}`,
    };
  }

  const display = version ? `${name} ${version}` : name;
  return { status: "ok", message: display };
}

/**
 * Check config.toml. It is optional: without it the defaults apply.
 */
export function checkConfigFile(
  filePath: string,
  exists: boolean,
  parseError: string | null,
  validation: ValidationResult | null,
): CheckResult {
  if (!exists) {
    return {
      status: "warn",
      message: `${filePath} not found (using defaults)`,
      fix: "Run `orgwiki init` to create it",
    };
  }

  if (parseError) {
    return {
      status: "fail",
      message: `${filePath}: ${parseError}`,
      fix: `Fix the syntax in ${filePath}`,
    };
  }

  if (validation && !validation.valid) {
    return {
      status: "fail",
      message: `Invalid config: ${validation.errors.join("; ")}`,
      fix: `Edit ${filePath}`,
    };
  }

  if (validation && validation.warnings.length > 0) {
    return {
      status: "warn",
      message: validation.warnings.join("; "),
    };
  }

  return { status: "ok", message: "config.toml valid" };
}

/**
 * Check the notes directory exists.
 */
export function checkNotesDir(dir: string, exists: boolean, noteCount: number): CheckResult {
  if (!exists) {
    return {
      status: "fail",
      message: `${dir} not found`,
      fix: "Run `orgwiki init` to create the notes directory",
    };
  }

  return {
    status: "ok",
    message: `${dir} (${noteCount} note${noteCount === 1 ? "" : "s"})`,
  };
}

/**
 * Check the open-note session for entries whose files are gone.
 */
export function checkSession(open: number, missing: string[]): CheckResult {
  if (missing.length > 0) {
    return {
      status: "warn",
      message: `${missing.length} of ${open} open note${open === 1 ? "" : "s"} no longer exist${missing.length === 1 ? "s" : ""}: ${missing.join(", ")}`,
      fix: "Run `orgwiki close-all` to clear the session",
    };
  }

  return { status: "ok", message: `${open} open note${open === 1 ? "" : "s"}` };
}

// ---- Run all checks ----

/**
 * Run all doctor checks given structured input.
 * Returns categorized results for display.
 */
export function runAllChecks(input: DoctorInput): CategorizedCheck[] {
  const results: CategorizedCheck[] = [];

  // -- System --
  results.push({
    category: "System",
    label: "Node.js",
    result: checkNodeVersion(input.nodeVersion),
  });
  results.push({
    category: "System",
    label: "Search tool",
    result: checkBinaryExists(input.searchTool.command, input.searchTool.version, input.searchTool.exists, true),
  });
  results.push({
    category: "System",
    label: "Editor",
    result: checkBinaryExists(input.editor.command, input.editor.version, input.editor.exists),
  });

  // -- Config --
  results.push({
    category: "Config",
    label: "config.toml",
    result: checkConfigFile(
      input.config.path,
      input.config.exists,
      input.config.parseError,
      input.config.validation,
    ),
  });

  // -- Wiki --
  results.push({
    category: "Wiki",
    label: "Notes directory",
    result: checkNotesDir(input.notesDir.path, input.notesDir.exists, input.notesDir.noteCount),
  });
  results.push({
    category: "Wiki",
    label: "Session",
    result: checkSession(input.session.open, input.session.missing),
  });

  return results;
}

// ---- Formatting ----

const STATUS_ICONS: Record<string, string> = {
  ok: "✓",
  warn: "!",
  fail: "✗",
};

/**
 * Format check results for terminal display.
 */
export function formatResults(checks: CategorizedCheck[]): string {
  const lines: string[] = [];
  let currentCategory = "";

  for (const check of checks) {
    if (check.category !== currentCategory) {
      if (currentCategory !== "") lines.push("");
      lines.push(check.category);
      currentCategory = check.category;
    }

    const icon = STATUS_ICONS[check.result.status] ?? "?";
    lines.push(`  ${icon} ${check.result.message}`);

    if (check.result.fix && check.result.status !== "ok") {
      lines.push(`    ${check.result.fix}`);
    }
  }

  return lines.join("\n");
}

/**
 * Count results by status.
 */
export function summaryCounts(checks: CategorizedCheck[]): {
  ok: number;
  warn: number;
  fail: number;
  total: number;
} {
  let ok = 0;
  let warn = 0;
  let fail = 0;

  for (const check of checks) {
    switch (check.result.status) {
      case "ok":
        ok++;
        break;
      case "warn":
        warn++;
        break;
      case "fail":
        fail++;
        break;
    }
  }

  return { ok, warn, fail, total: checks.length };
}
