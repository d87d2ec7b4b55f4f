/**
 * Wiki Extension -- a flat wiki of Org notes for pi
 *
 * Provides a `/wiki` slash command and a `wiki` tool over the notes
 * directory configured in ~/.orgwiki/config.toml (default ~/org/wiki).
 * Notes opened from the command are edited in pi's editor and share the
 * open-note session with the `orgwiki` CLI.
 *
 * Usage:
 *   /wiki                  -- Pick a note (or type a new topic) and open it
 *   /wiki open <topic>     -- Open or create a note
 *   /wiki mode <name>      -- Open the note for an editing mode
 *   /wiki close-all        -- Close every open note
 *   /wiki links [file]     -- Backlinks to a note (default: last opened)
 *   /wiki keywords [a|b]   -- Keyword lines, optionally filtered
 *   /wiki follow <link>    -- Follow a [[wiki:topic]] link
 *
 * The LLM can also use the wiki tool directly:
 *   wiki(action="open", topic="...", keywords?)
 *   wiki(action="list")
 *   wiki(action="links", topic="...")
 *   wiki(action="keywords", query?)
 *   wiki(action="follow", link="...")
 */

import { readFileSync } from "node:fs";

import type { AgentToolResult, ExtensionAPI, ExtensionContext } from "@mariozechner/pi-coding-agent";
import { StringEnum } from "@mariozechner/pi-ai";
import { Text } from "@mariozechner/pi-tui";
import { Type } from "@sinclair/typebox";

import {
  WikiStore,
  SessionHost,
  RipgrepSearcher,
  errorMessage,
  formatHits,
  uiEditorLauncher,
  type Launcher,
  type Prompter,
  type VisitResult,
} from "./lib/mod.ts";
import { loadSettings } from "../cli/config.ts";

const NEW_NOTE = "+ New note";

// ---- Store wiring ----

function createStore(launch: Launcher, prompter: Prompter, mode?: string): WikiStore {
  const settings = loadSettings();
  return new WikiStore({
    dir: settings.dir,
    host: new SessionHost({ statePath: settings.sessionPath, launch, mode }),
    prompter,
    searcher: new RipgrepSearcher(settings.searchCommand),
  });
}

function uiPrompter(ctx: ExtensionContext): Prompter {
  return {
    async prompt(request) {
      if (request.kind === "keywords") {
        return ctx.ui.input(request.title, "e.g. rust async");
      }
      const choice = await ctx.ui.select(request.title, [...request.choices, NEW_NOTE]);
      if (choice === NEW_NOTE) return ctx.ui.input("New topic:", "");
      return choice;
    },
  };
}

/** Tool calls cannot prompt: keywords come from the parameters. */
function toolPrompter(keywords: string | undefined): Prompter {
  return {
    async prompt(request) {
      return request.kind === "keywords" ? keywords ?? "" : undefined;
    },
  };
}

const recordOnly: Launcher = async () => {};

function describeVisit(result: VisitResult | undefined): string {
  if (!result) return "Cancelled.";
  return `${result.created ? "Created" : "Opened"} ${result.topic}`;
}

export default function (pi: ExtensionAPI) {
  // ---- Tool registration ----

  pi.registerTool({
    name: "wiki",
    label: "Wiki",
    description:
      "Personal wiki of Org notes (one .org file per topic). Actions: open (read a note, creating it if missing), " +
      "list (all topics), links (notes linking to a topic), keywords (keyword lines, optional a|b filter), " +
      "follow (resolve a [[wiki:topic]] link). Link notes with [[wiki:topic]] or [[wiki:topic][description]].",
    parameters: Type.Object({
      action: StringEnum(["open", "list", "links", "keywords", "follow"] as const),
      topic: Type.Optional(
        Type.String({ description: "Topic name (for open/links actions)" })
      ),
      keywords: Type.Optional(
        Type.String({ description: "Keywords for a note created by open" })
      ),
      query: Type.Optional(
        Type.String({ description: "Keyword filter, alternatives separated by | (for keywords action)" })
      ),
      link: Type.Optional(
        Type.String({ description: "Link text such as [[wiki:topic]] (for follow action)" })
      ),
    }),

    async execute(_toolCallId, params): Promise<AgentToolResult<unknown>> {
      const store = createStore(recordOnly, toolPrompter(params.keywords));

      try {
        switch (params.action) {
          case "open": {
            const result = await store.visit(params.topic || "");
            if (!result) {
              return {
                content: [{ type: "text", text: "Error: topic is required" }],
                details: { action: "open", ok: false },
              };
            }
            const text = readFileSync(result.path, "utf-8");
            return {
              content: [{ type: "text", text: `${describeVisit(result)} (${result.path})\n\n${text}` }],
              details: { action: "open", ok: true, created: result.created, path: result.path },
            };
          }

          case "list": {
            const topics = store.listTopics();
            return {
              content: [{ type: "text", text: topics.length > 0 ? topics.join("\n") : "No notes." }],
              details: { action: "list", ok: true, count: topics.length },
            };
          }

          case "links": {
            const file = params.topic ? store.resolvePath(params.topic) : undefined;
            const hits = await store.linksHere(file);
            return {
              content: [{ type: "text", text: hits.length > 0 ? formatHits(hits) : "No backlinks." }],
              details: { action: "links", ok: true, count: hits.length },
            };
          }

          case "keywords": {
            const hits = await store.findKeyword(params.query);
            return {
              content: [{ type: "text", text: hits.length > 0 ? formatHits(hits) : "No matching keywords." }],
              details: { action: "keywords", ok: true, count: hits.length },
            };
          }

          case "follow": {
            const link = await store.followLink(params.link || "");
            const path = store.resolvePath(link.target);
            const text = path ? readFileSync(path, "utf-8") : "";
            return {
              content: [{ type: "text", text: `Followed ${link.scheme}:${link.target}\n\n${text}` }],
              details: { action: "follow", ok: true, path },
            };
          }

          default:
            return {
              content: [
                {
                  type: "text",
                  text: "Error: Unknown action. Use: open, list, links, keywords, follow",
                },
              ],
              details: { error: true },
            };
        }
      } catch (err) {
        return {
          content: [{ type: "text", text: `Error: ${errorMessage(err)}` }],
          details: { action: params.action, ok: false },
        };
      }
    },

    renderCall(args, theme) {
      let text = theme.fg("toolTitle", theme.bold("wiki ")) + theme.fg("muted", args.action);
      const subject = args.topic || args.query || args.link;
      if (subject) {
        text += " " + theme.fg("accent", subject.length > 50 ? subject.slice(0, 47) + "..." : subject);
      }
      return new Text(text, 0, 0);
    },

    renderResult(result, _options, theme) {
      const details = result.details as { action: string; ok: boolean; count?: number } | undefined;
      const first = result.content[0];
      const body = first?.type === "text" ? first.text : "";

      if (details && !details.ok) {
        return new Text(theme.fg("error", body || "Error"), 0, 0);
      }
      if (details?.count === 0) {
        return new Text(theme.fg("dim", body), 0, 0);
      }
      // Only the first line; note bodies are for the model
      return new Text(theme.fg("success", ">> ") + body.split("\n")[0], 0, 0);
    },
  });

  // ---- Slash command ----

  pi.registerCommand("wiki", {
    description:
      "Wiki: /wiki (pick), /wiki open <topic>, /wiki mode <name>, /wiki close-all, /wiki links [file], /wiki keywords [q], /wiki follow <link>",
    handler: async (args, ctx) => {
      const parts = args.trim().split(/\s+/);
      const subcmd = parts[0] || "";
      const rest = parts.slice(1).join(" ").trim();

      const store = createStore(uiEditorLauncher(ctx.ui), uiPrompter(ctx), subcmd === "mode" ? rest : undefined);

      try {
        switch (subcmd) {
          case "":
          case "find": {
            const result = await store.findEntryInteractive();
            ctx.ui.notify(describeVisit(result), result ? "success" : "info");
            break;
          }

          case "open": {
            if (!rest) {
              ctx.ui.notify("Usage: /wiki open <topic>", "warning");
              return;
            }
            const result = await store.visit(rest);
            ctx.ui.notify(describeVisit(result), result ? "success" : "info");
            break;
          }

          case "mode": {
            if (!rest) {
              ctx.ui.notify("Usage: /wiki mode <mode-name>", "warning");
              return;
            }
            const result = await store.findEntryForCurrentMode();
            ctx.ui.notify(describeVisit(result), result ? "success" : "info");
            break;
          }

          case "close-all": {
            const result = await store.killAllEntries();
            const n = result.closed.length;
            ctx.ui.notify(`Closed ${n} note${n === 1 ? "" : "s"}.`, "success");
            break;
          }

          case "links": {
            // A bare topic or a path to the note
            const file = !rest ? undefined : /[/\\]/.test(rest) ? rest : store.resolvePath(rest);
            const hits = await store.linksHere(file);
            ctx.ui.notify(hits.length > 0 ? formatHits(hits) : "No backlinks.", "info");
            break;
          }

          case "keywords": {
            const hits = await store.findKeyword(rest);
            ctx.ui.notify(hits.length > 0 ? formatHits(hits) : "No matching keywords.", "info");
            break;
          }

          case "follow": {
            if (!rest) {
              ctx.ui.notify("Usage: /wiki follow <link>", "warning");
              return;
            }
            const link = await store.followLink(rest);
            ctx.ui.notify(`Followed ${link.scheme}:${link.target}`, "success");
            break;
          }

          default:
            ctx.ui.notify(
              "Usage: /wiki [find | open <topic> | mode <name> | close-all | links [file] | keywords [q] | follow <link>]",
              "warning"
            );
        }
      } catch (err) {
        ctx.ui.notify(errorMessage(err), "error");
      }
    },
  });
}
