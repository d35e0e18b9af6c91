/**
 * Vault Picker Extension - fuzzy note navigation for pi
 *
 * Routes the vault's note and reference prompts through a fuzzy picker with
 * live preview, and adds navigation commands on top of the note graph.
 *
 * Usage:
 *   /vault-search [text]      - Full-text search (ripgrep by default)
 *   /vault-backlinks [note]   - Notes linking to the note (default: current)
 *   /vault-links [note]       - Notes the note links to (default: current)
 *   /vault-find-file          - Pick any vault file
 *   /vault-node [title]       - Find a note, or create it from the typed title
 *   /vault-ref                - Find a note by reference key
 *   /vault-insert             - Insert a [[link]] into the editor
 *   /vault-picker-toggle      - Switch note prompts between list and fuzzy picker
 *
 * The LLM can use the vault_links tool:
 *   vault_links(action="backlinks" | "links" | "files", note?)
 *
 * Config: ~/.vault-picker/config.toml ([vault] dir, [picker] search, override)
 */

import type { AgentToolResult, ExtensionAPI, ExtensionContext } from "@mariozechner/pi-coding-agent";
import { StringEnum } from "@mariozechner/pi-ai";
import { Type } from "@sinclair/typebox";

import {
  NoteGraph,
  PromptRegistry,
  FilePreviewHost,
  VaultPickerError,
  SEARCH_FUNCTIONS,
  loadConfig,
  backlinkIds,
  forwardLinkIds,
  searchNotes,
  showBacklinks,
  showForwardLinks,
  findFile,
  findNode,
  findRef,
  insertLink,
  type Candidate,
  type CompletionBackend,
  type NavContext,
  type NavState,
  type ReadOptions,
  type Selection,
} from "../lib/mod.ts";
import { PickerComponent } from "./picker-view.ts";

const STATUS_KEY = "vault-picker";

/** The fuzzy picker and plain prompts on top of pi's UI. */
function createBackend(ctx: ExtensionContext): CompletionBackend {
  return {
    read<T>(candidates: readonly Candidate<T>[], options: ReadOptions<T>) {
      return ctx.ui.custom<Selection<T>>((tui, theme, _kb, done) => new PickerComponent(tui, theme, candidates, options, done), {
        overlay: true,
        overlayOptions: {
          anchor: "center",
          width: "80%",
          minWidth: 50,
          maxHeight: "80%",
        },
      });
    },
    choose(prompt, labels) {
      return ctx.ui.select(prompt, labels);
    },
    ask(prompt) {
      return ctx.ui.input(prompt);
    },
  };
}

export default function (pi: ExtensionAPI) {
  if (process.env.VAULT_PICKER_SUBAGENT === "1") return;

  const { config, warnings } = loadConfig();
  const prompts = new PromptRegistry();
  const previews = new FilePreviewHost();
  const state: NavState = {};

  function updateStatus(ctx: ExtensionContext): void {
    ctx.ui.setStatus(STATUS_KEY, prompts.isEnabled ? "picker: fuzzy" : undefined);
  }

  function navFor(ctx: ExtensionContext): NavContext {
    const nav: NavContext = {
      graph: NoteGraph.load(config.vault.dir),
      backend: createBackend(ctx),
      previews,
      prompts,
      state,
      search: SEARCH_FUNCTIONS[config.picker.search],
      open(file, line) {
        const text = ctx.ui.getEditorText();
        const ref = `@${nav.graph.relative(file)}`;
        ctx.ui.setEditorText(text.trim() ? `${text.trimEnd()} ${ref} ` : `${ref} `);
        ctx.ui.notify(`${ref}:${line}`, "info");
      },
      insert(text) {
        ctx.ui.setEditorText(ctx.ui.getEditorText() + text);
      },
      reload() {
        return NoteGraph.load(config.vault.dir);
      },
    };
    return nav;
  }

  /** Run an interactive command, turning vault-picker errors into notifications. */
  function interactive(name: string, run: (nav: NavContext, args: string) => Promise<unknown>) {
    return async (args: string, ctx: ExtensionContext) => {
      if (!ctx.hasUI) {
        ctx.ui.notify(`${name} requires interactive mode`, "error");
        return;
      }
      try {
        await run(navFor(ctx), args.trim());
      } catch (err) {
        if (err instanceof VaultPickerError) {
          ctx.ui.notify(err.message, "error");
          return;
        }
        throw err;
      }
    };
  }

  // ---- Lifecycle ----

  pi.on("session_start", async (_event, ctx) => {
    for (const w of warnings) ctx.ui.notify(`vault-picker: ${w}`, "warning");
    if (config.picker.override) prompts.enable();
    updateStatus(ctx);
  });

  pi.on("session_shutdown", async () => {
    prompts.reset();
  });

  // ---- Commands ----

  pi.registerCommand("vault-search", {
    description: "Full-text search in the vault (usage: /vault-search [text])",
    handler: interactive("vault-search", (nav, args) => searchNotes(nav, args || undefined)),
  });

  pi.registerCommand("vault-backlinks", {
    description: "Pick from notes linking to a note (default: current note)",
    handler: interactive("vault-backlinks", (nav, args) => showBacklinks(nav, args || undefined)),
  });

  pi.registerCommand("vault-links", {
    description: "Pick from notes a note links to (default: current note)",
    handler: interactive("vault-links", (nav, args) => showForwardLinks(nav, args || undefined)),
  });

  pi.registerCommand("vault-find-file", {
    description: "Pick any file in the vault",
    handler: interactive("vault-find-file", (nav) => findFile(nav)),
  });

  pi.registerCommand("vault-node", {
    description: "Find a note, or create one from the typed title",
    handler: interactive("vault-node", (nav, args) => findNode(nav, args || undefined)),
  });

  pi.registerCommand("vault-ref", {
    description: "Find a note by reference key",
    handler: interactive("vault-ref", (nav) => findRef(nav)),
  });

  pi.registerCommand("vault-insert", {
    description: "Insert a [[link]] to a note into the editor",
    handler: interactive("vault-insert", (nav) => insertLink(nav)),
  });

  pi.registerCommand("vault-picker-toggle", {
    description: "Switch note prompts between the plain list and the fuzzy picker",
    handler: async (_args, ctx) => {
      const enabled = prompts.toggle();
      updateStatus(ctx);
      ctx.ui.notify(`Vault picker ${enabled ? "enabled" : "disabled"}`, "info");
    },
  });

  // ---- Tool ----

  pi.registerTool({
    name: "vault_links",
    label: "Vault Links",
    description:
      "Read-only view of the vault link graph. Actions: backlinks (notes linking to a note), " +
      "links (notes a note links to), files (all vault files).",
    parameters: Type.Object({
      action: StringEnum(["backlinks", "links", "files"] as const),
      note: Type.Optional(Type.String({ description: "Note id, title or path (for backlinks/links)" })),
    }),

    async execute(
      _toolCallId,
      params,
    ): Promise<AgentToolResult<{ action?: string; note?: string; count?: number; error?: boolean }>> {
      const graph = NoteGraph.load(config.vault.dir);

      if (params.action === "files") {
        const files = graph.listFiles().map((f) => graph.relative(f));
        return {
          content: [{ type: "text", text: files.length > 0 ? files.join("\n") : "Vault is empty." }],
          details: { action: "files", count: files.length },
        };
      }

      if (!params.note) {
        return {
          content: [{ type: "text", text: `Error: note required for ${params.action}` }],
          details: { error: true },
        };
      }
      const node = graph.resolve(params.note);
      if (!node) {
        return {
          content: [{ type: "text", text: `Note not found: ${params.note}` }],
          details: { error: true, note: params.note },
        };
      }

      const ids = params.action === "backlinks" ? backlinkIds(graph, node) : forwardLinkIds(graph, node);
      const lines = [...ids].map((id) => {
        const n = graph.nodeById(id);
        return n ? `- ${n.title} (${n.id}) ${graph.relative(n.file)}` : `- ${id} (missing)`;
      });
      const header = params.action === "backlinks" ? `Backlinks to ${node.title}` : `Links from ${node.title}`;
      return {
        content: [{ type: "text", text: lines.length > 0 ? `${header}:\n${lines.join("\n")}` : `${header}: none` }],
        details: { action: params.action, note: node.id, count: lines.length },
      };
    },
  });
}
