/**
 * vault-nav.ts — the navigation commands behind /vault-*.
 *
 * Each function takes a NavContext (graph, prompts, UI hooks) built fresh by
 * the extension for one command, and throws a VaultPickerError when there is
 * nothing to show. Note prompts go through the PromptRegistry, so whichever
 * prompt implementation is active is used here too.
 */

import { extractTypedLinks } from "./vault-lib.ts";
import { selectFrom, type Selection } from "./picker-core.ts";
import { EmptyResultError, NoContextError } from "./errors.ts";
import type { NoteGraph, VaultNode, VaultRef } from "./note-graph.ts";
import type { PromptEnv, PromptRegistry } from "./prompt-registry.ts";

// ---- Types ----

export interface SearchHit {
  file: string;
  line: number;
  text: string;
}

export type SearchFunction = (nav: NavContext, initialInput?: string) => Promise<SearchHit | undefined>;

/** Survives between commands. */
export interface NavState {
  currentFile?: string;
}

export interface NavContext extends PromptEnv {
  prompts: PromptRegistry;
  state: NavState;
  search: SearchFunction;
  /** Open a file for editing at a line. */
  open(file: string, line: number): void;
  /** Insert text into the editor. */
  insert(text: string): void;
  /** Rebuild the graph after a note was created. */
  reload(): NoteGraph;
}

// ---- Helpers ----

export function currentNode(nav: NavContext): VaultNode | undefined {
  return nav.state.currentFile ? nav.graph.nodeForFile(nav.state.currentFile) : undefined;
}

export function visitFile(nav: NavContext, file: string, line: number): void {
  nav.open(file, line);
  nav.state.currentFile = file;
}

function visitNode(nav: NavContext, node: VaultNode): VaultNode {
  visitFile(nav, node.file, node.line);
  return node;
}

/** The note named by `query`, else the current note. */
function targetNode(nav: NavContext, command: string, query?: string): VaultNode {
  const q = query?.trim();
  if (q) {
    const node = nav.graph.resolve(q);
    if (!node) throw new EmptyResultError(`${command}: no note matches "${q}"`);
    return node;
  }
  const node = currentNode(nav);
  if (!node) throw new NoContextError(command);
  return node;
}

/** Create a note for free text typed at a prompt. */
function createFromText(nav: NavContext, text: string): VaultNode | undefined {
  const title = text.trim();
  if (!title) return undefined;
  const created = nav.graph.createNote(title);
  nav.graph = nav.reload();
  return nav.graph.nodeById(created.id) ?? created;
}

function selectedNode(nav: NavContext, selection: Selection<VaultNode>): VaultNode | undefined {
  switch (selection.kind) {
    case "found":
      return selection.value;
    case "not-found":
      return createFromText(nav, selection.text);
    case "cancelled":
      return undefined;
  }
}

// ---- Link sets ----

/** Distinct ids of notes with an `id` link to `node`. */
export function backlinkIds(graph: NoteGraph, node: VaultNode): Set<string> {
  return new Set(graph.queryLinkEdges(node.id, "id").map((e) => e.source));
}

/** Distinct ids `node` links to, read from its content. Dangling targets keep their raw text. */
export function forwardLinkIds(graph: NoteGraph, node: VaultNode): Set<string> {
  return new Set(extractTypedLinks(graph.readContent(node), "id").map((t) => graph.resolveLink(t)));
}

// ---- Commands ----

export function searchNotes(nav: NavContext, initialInput?: string): Promise<SearchHit | undefined> {
  return nav.search(nav, initialInput);
}

export async function showBacklinks(nav: NavContext, query?: string): Promise<VaultNode | undefined> {
  const node = targetNode(nav, "backlinks", query);
  const ids = backlinkIds(nav.graph, node);
  if (ids.size === 0) throw new EmptyResultError(`No backlinks to "${node.title}"`);

  const selection = await nav.prompts.readNode(nav, {
    prompt: `Backlinks to ${node.title}: `,
    filter: (n) => ids.has(n.id),
    requireMatch: true,
  });
  return selection.kind === "found" ? visitNode(nav, selection.value) : undefined;
}

export async function showForwardLinks(nav: NavContext, query?: string): Promise<VaultNode | undefined> {
  const node = targetNode(nav, "links", query);
  const ids = new Set([...forwardLinkIds(nav.graph, node)].filter((id) => nav.graph.nodeById(id)));
  if (ids.size === 0) throw new EmptyResultError(`No links in "${node.title}"`);

  const selection = await nav.prompts.readNode(nav, {
    prompt: `Links from ${node.title}: `,
    filter: (n) => ids.has(n.id),
    requireMatch: true,
  });
  return selection.kind === "found" ? visitNode(nav, selection.value) : undefined;
}

export async function findFile(nav: NavContext): Promise<string | undefined> {
  const candidates = nav.graph.listFiles().map((file) => ({ label: nav.graph.relative(file), value: file }));
  const selection = await selectFrom(nav.backend, nav.previews, candidates, {
    prompt: "Find file: ",
    requireMatch: true,
    locate: (file) => ({ file, line: 1 }),
  });
  if (selection.kind !== "found") return undefined;
  visitFile(nav, selection.value, 1);
  return selection.value;
}

/** Visit a note, creating it when the typed title matches nothing. */
export async function findNode(nav: NavContext, initialInput?: string): Promise<VaultNode | undefined> {
  const selection = await nav.prompts.readNode(nav, { prompt: "Find note: ", initialInput });
  const node = selectedNode(nav, selection);
  return node ? visitNode(nav, node) : undefined;
}

export async function findRef(nav: NavContext): Promise<VaultRef | undefined> {
  const selection = await nav.prompts.readRef(nav, { prompt: "Find reference: ", requireMatch: true });
  if (selection.kind !== "found") return undefined;
  visitNode(nav, selection.value.node);
  return selection.value;
}

/** Insert `[[id]]` for a chosen note, creating it when needed. */
export async function insertLink(nav: NavContext): Promise<VaultNode | undefined> {
  const selection = await nav.prompts.readNode(nav, { prompt: "Insert link: " });
  const node = selectedNode(nav, selection);
  if (node) nav.insert(`[[${node.id}]]`);
  return node;
}
