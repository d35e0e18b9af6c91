/**
 * note-graph.ts — in-memory graph of a markdown vault.
 *
 * One node per note file. Links between notes come from wikilinks and
 * `id:` markdown links; hashtags and URL links are kept as typed edges too,
 * so callers filter by type.
 *
 * Commands rebuild the graph from disk on every call. Nothing writes back
 * except createNote().
 */

import { readFileSync, writeFileSync, existsSync, readdirSync, mkdirSync } from "node:fs";
import { join, relative, resolve, basename, isAbsolute } from "node:path";
import { homedir } from "node:os";

import {
  parseFrontmatter,
  parseLinks,
  extractTitle,
  bodyStartLine,
  frontmatterList,
  frontmatterString,
  type LinkType,
} from "./vault-lib.ts";
import { NoteExistsError } from "./errors.ts";
import type { Candidate } from "./picker-core.ts";

// ---- Types ----

export interface VaultNode {
  id: string;
  title: string;
  file: string; // absolute
  line: number; // 1-based start of body
  tags: string[];
  aliases: string[];
}

export interface VaultRef {
  key: string;
  node: VaultNode;
}

export interface LinkEdge {
  source: string;
  dest: string;
  type: LinkType;
}

export type NodeFilter = (node: VaultNode) => boolean;
export type NodeSort = (a: VaultNode, b: VaultNode) => number;

// ---- Helpers ----

export function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return join(homedir(), p.slice(2));
  return p;
}

export function slugify(title: string): string {
  return title
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function listMarkdown(dir: string): string[] {
  const out: string[] = [];
  const walk = (d: string) => {
    for (const entry of readdirSync(d, { withFileTypes: true })) {
      if (entry.name.startsWith(".")) continue;
      const full = join(d, entry.name);
      if (entry.isDirectory()) walk(full);
      else if (entry.isFile() && entry.name.endsWith(".md")) out.push(full);
    }
  };
  walk(dir);
  return out.sort();
}

export function nodeLabel(node: VaultNode): string {
  const tags = node.tags.length > 0 ? "  " + node.tags.map((t) => `#${t}`).join(" ") : "";
  return `${node.title}${tags}`;
}

// ---- Graph ----

export class NoteGraph {
  readonly dir: string;
  /** Files whose id was already taken by an earlier file. */
  readonly duplicates: string[] = [];

  private files: string[];
  private nodes: VaultNode[] = [];
  private byId = new Map<string, VaultNode>();
  private byFile = new Map<string, VaultNode>();
  private refs: VaultRef[] = [];
  private edges: LinkEdge[] = [];
  private contents: Map<string, string>;

  private constructor(dir: string, files: string[], contents: Map<string, string>) {
    this.dir = dir;
    this.files = files;
    this.contents = contents;

    const pendingRefs: { key: string; id: string }[] = [];
    for (const file of files) {
      const content = contents.get(file) ?? "";
      const fm = parseFrontmatter(content);
      const slug = basename(file, ".md");
      const node: VaultNode = {
        id: frontmatterString(fm, "id") ?? slug,
        title: frontmatterString(fm, "title") ?? extractTitle(content) ?? slug,
        file,
        line: bodyStartLine(content),
        tags: frontmatterList(fm, "tags"),
        aliases: frontmatterList(fm, "aliases"),
      };
      if (this.byId.has(node.id)) {
        this.duplicates.push(file);
        continue;
      }
      this.nodes.push(node);
      this.byId.set(node.id, node);
      this.byFile.set(file, node);
      for (const key of frontmatterList(fm, "refs")) {
        pendingRefs.push({ key: key.replace(/^@/, ""), id: node.id });
      }
    }

    for (const { key, id } of pendingRefs) {
      const node = this.byId.get(id);
      if (node) this.refs.push({ key, node });
    }

    for (const node of this.nodes) {
      for (const link of parseLinks(contents.get(node.file) ?? "")) {
        const dest = link.type === "id" ? this.resolveLink(link.target) : link.target;
        this.edges.push({ source: node.id, dest, type: link.type });
      }
    }
  }

  /** Scan a vault directory. A missing directory gives an empty graph. */
  static load(dir: string): NoteGraph {
    const root = resolve(expandHome(dir));
    const files = existsSync(root) ? listMarkdown(root) : [];
    const contents = new Map<string, string>();
    for (const f of files) contents.set(f, readFileSync(f, "utf-8"));
    return new NoteGraph(root, files, contents);
  }

  /** Build a graph from in-memory notes keyed by path relative to `dir`. */
  static fromContents(dir: string, notes: Record<string, string>): NoteGraph {
    const root = resolve(dir);
    const contents = new Map<string, string>();
    for (const [rel, content] of Object.entries(notes)) contents.set(join(root, rel), content);
    return new NoteGraph(root, [...contents.keys()].sort(), contents);
  }

  /** Map a wikilink target to a node id (by id, title, then alias). */
  resolveLink(target: string): string {
    if (this.byId.has(target)) return target;
    const lower = target.toLowerCase();
    const byTitle = this.nodes.find((n) => n.title.toLowerCase() === lower);
    if (byTitle) return byTitle.id;
    const byAlias = this.nodes.find((n) => n.aliases.some((a) => a.toLowerCase() === lower));
    return byAlias ? byAlias.id : target;
  }

  listFiles(): string[] {
    return [...this.files];
  }

  listNodes(): VaultNode[] {
    return [...this.nodes];
  }

  nodeById(id: string): VaultNode | undefined {
    return this.byId.get(id);
  }

  nodeForFile(file: string): VaultNode | undefined {
    return this.byFile.get(resolve(this.dir, file));
  }

  /** Look a node up by id, file path, title or alias. */
  resolve(query: string): VaultNode | undefined {
    const q = query.trim();
    if (!q) return undefined;
    const direct = this.byId.get(q);
    if (direct) return direct;
    const path = isAbsolute(q) ? q : join(this.dir, q);
    const byPath = this.byFile.get(path) ?? this.byFile.get(`${path}.md`);
    if (byPath) return byPath;
    const id = this.resolveLink(q);
    return this.byId.get(id);
  }

  relative(file: string): string {
    return relative(this.dir, file);
  }

  nodeCandidates(filter?: NodeFilter, sort?: NodeSort): Candidate<VaultNode>[] {
    let nodes = filter ? this.nodes.filter(filter) : [...this.nodes];
    if (sort) nodes = nodes.sort(sort);
    return nodes.map((n) => ({ label: nodeLabel(n), value: n }));
  }

  refCandidates(): Candidate<VaultRef>[] {
    return this.refs.map((r) => ({ label: `@${r.key}  ${r.node.title}`, value: r }));
  }

  queryLinkEdges(dest: string, type: LinkType): LinkEdge[] {
    return this.edges.filter((e) => e.dest === dest && e.type === type);
  }

  /** File content as of the last load. */
  fileContent(file: string): string {
    return this.contents.get(file) ?? readFileSync(file, "utf-8");
  }

  readContent(node: VaultNode): string {
    return this.fileContent(node.file);
  }

  /**
   * Create `<slug>.md` for a new note and return its node. The graph itself
   * is not updated; callers reload it.
   */
  createNote(title: string): VaultNode {
    const id = slugify(title) || `note-${Date.now()}`;
    const file = join(this.dir, `${id}.md`);
    if (existsSync(file) || this.byId.has(id)) throw new NoteExistsError(file);

    const content = `---\nid: ${id}\ntitle: ${title}\n---\n# ${title}\n\n`;
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(file, content, "utf-8");
    return { id, title, file, line: bodyStartLine(content), tags: [], aliases: [] };
  }
}
