/**
 * search.ts — full-text search over the vault.
 *
 * Two search functions share one picker: ripgrep (default) and a builtin
 * line scan for machines without `rg`. Either way the hits are shown with a
 * preview at the matching line and the chosen one is opened.
 */

import { execFileSync } from "node:child_process";
import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { selectFrom } from "./picker-core.ts";
import { EmptyResultError, SearchUnavailableError } from "./errors.ts";
import { visitFile, type NavContext, type SearchFunction, type SearchHit } from "./vault-nav.ts";
import type { NoteGraph } from "./note-graph.ts";
import type { SearchName } from "./config.ts";

const RG_MAX_BUFFER = 16 * 1024 * 1024;

// ---- Ripgrep ----

/** Parse `rg --null --line-number --no-heading` output. */
export function parseRipgrepOutput(output: string, dir: string): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const raw of output.split("\n")) {
    const nul = raw.indexOf("\0");
    if (nul < 0) continue;
    const m = /^(\d+):(.*)$/.exec(raw.slice(nul + 1));
    if (!m) continue;
    hits.push({ file: resolve(dir, raw.slice(0, nul)), line: Number(m[1]), text: m[2] });
  }
  return hits;
}

export function runRipgrep(dir: string, query: string): SearchHit[] {
  if (!existsSync(dir)) return [];
  const args = [
    "--null",
    "--line-number",
    "--no-heading",
    "--color",
    "never",
    "--smart-case",
    "--glob",
    "*.md",
    "-e",
    query,
    ".",
  ];
  try {
    const out = execFileSync("rg", args, { cwd: dir, encoding: "utf-8", maxBuffer: RG_MAX_BUFFER });
    return parseRipgrepOutput(out, dir);
  } catch (err) {
    // rg exits 1 when nothing matched
    if (err instanceof Error && "status" in err && err.status === 1) return [];
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new SearchUnavailableError('ripgrep (rg) is not installed. Set picker.search = "builtin".');
    }
    throw err;
  }
}

// ---- Builtin ----

/** Substring scan, case-insensitive unless the query has capitals. */
export function grepVault(graph: NoteGraph, query: string): SearchHit[] {
  const smart = query === query.toLowerCase();
  const needle = smart ? query.toLowerCase() : query;
  const hits: SearchHit[] = [];
  for (const file of graph.listFiles()) {
    const lines = graph.fileContent(file).split("\n");
    lines.forEach((text, i) => {
      const hay = smart ? text.toLowerCase() : text;
      if (hay.includes(needle)) hits.push({ file, line: i + 1, text });
    });
  }
  return hits;
}

// ---- Picker ----

async function queryFor(nav: NavContext, initialInput?: string): Promise<string | undefined> {
  const seeded = initialInput?.trim();
  if (seeded) return seeded;
  return (await nav.backend.ask("Search notes"))?.trim() || undefined;
}

export function hitLabel(graph: NoteGraph, hit: SearchHit): string {
  return `${graph.relative(hit.file)}:${hit.line}: ${hit.text.trim()}`;
}

async function pickHit(nav: NavContext, query: string, hits: SearchHit[]): Promise<SearchHit | undefined> {
  if (hits.length === 0) throw new EmptyResultError(`No matches for "${query}"`);
  const candidates = hits.map((hit) => ({ label: hitLabel(nav.graph, hit), value: hit }));
  const selection = await selectFrom(nav.backend, nav.previews, candidates, {
    prompt: `${query}: `,
    requireMatch: true,
    locate: (hit) => ({ file: hit.file, line: hit.line }),
  });
  if (selection.kind !== "found") return undefined;
  visitFile(nav, selection.value.file, selection.value.line);
  return selection.value;
}

function searchWith(find: (nav: NavContext, query: string) => SearchHit[]): SearchFunction {
  return async (nav, initialInput) => {
    const query = await queryFor(nav, initialInput);
    if (!query) return undefined;
    return pickHit(nav, query, find(nav, query));
  };
}

export const ripgrepSearch: SearchFunction = searchWith((nav, query) => runRipgrep(nav.graph.dir, query));
export const builtinSearch: SearchFunction = searchWith((nav, query) => grepVault(nav.graph, query));

export const SEARCH_FUNCTIONS: Record<SearchName, SearchFunction> = {
  ripgrep: ripgrepSearch,
  builtin: builtinSearch,
};
