/**
 * vault-lib.ts — markdown parsing for vault notes.
 *
 * Frontmatter, titles and typed links. Pure functions, no filesystem access.
 */

// ---- Types ----

export type FrontmatterValue = string | string[];
export type Frontmatter = Record<string, FrontmatterValue>;

/** `id` for note links, `tag` for hashtags, otherwise the URL scheme. */
export type LinkType = "id" | "tag" | (string & {});

export interface ParsedLink {
  type: LinkType;
  target: string;
  line: number; // 1-based, in the full file
}

// ---- Frontmatter ----

const FENCE = "---";

function unquote(s: string): string {
  const t = s.trim();
  if (t.length >= 2 && ((t.startsWith('"') && t.endsWith('"')) || (t.startsWith("'") && t.endsWith("'")))) {
    return t.slice(1, -1);
  }
  return t;
}

/** Index of the closing `---` line, or -1 when the file has no frontmatter. */
function frontmatterEnd(lines: string[]): number {
  if (lines.length === 0 || lines[0].trim() !== FENCE) return -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === FENCE) return i;
  }
  return -1;
}

/**
 * Parse a flat YAML-ish frontmatter block. Supports `key: value`,
 * inline lists `key: [a, b]` and block lists (`key:` followed by `- item`).
 */
export function parseFrontmatter(content: string): Frontmatter {
  const lines = content.split("\n");
  const end = frontmatterEnd(lines);
  const result: Frontmatter = {};
  if (end < 0) return result;

  let listKey: string | null = null;
  for (const raw of lines.slice(1, end)) {
    const line = raw.replace(/\r$/, "");
    if (!line.trim() || line.trim().startsWith("#")) continue;

    const item = /^\s+-\s+(.*)$/.exec(line) ?? /^-\s+(.*)$/.exec(line);
    if (item && listKey) {
      const current = result[listKey];
      const list = Array.isArray(current) ? current : [];
      list.push(unquote(item[1]));
      result[listKey] = list;
      continue;
    }

    const kv = /^([A-Za-z_][\w-]*)\s*:\s*(.*)$/.exec(line);
    if (!kv) continue;
    const key = kv[1];
    const value = kv[2].trim();
    listKey = null;

    if (value === "") {
      listKey = key;
      result[key] = [];
    } else if (value.startsWith("[") && value.endsWith("]")) {
      result[key] = value
        .slice(1, -1)
        .split(",")
        .map(unquote)
        .filter(Boolean);
    } else {
      result[key] = unquote(value);
    }
  }
  return result;
}

/** 1-based line where the note body begins. */
export function bodyStartLine(content: string): number {
  const end = frontmatterEnd(content.split("\n"));
  return end < 0 ? 1 : end + 2;
}

export function stripFrontmatter(content: string): string {
  const lines = content.split("\n");
  const end = frontmatterEnd(lines);
  return end < 0 ? content : lines.slice(end + 1).join("\n");
}

/** First `# ` heading of the body, if any. */
export function extractTitle(content: string): string | undefined {
  for (const line of stripFrontmatter(content).split("\n")) {
    const m = /^#\s+(.+?)\s*#*\s*$/.exec(line);
    if (m) return m[1];
  }
  return undefined;
}

/** Read a frontmatter field as a list, accepting a single string. */
export function frontmatterList(fm: Frontmatter, key: string): string[] {
  const v = fm[key];
  if (v === undefined) return [];
  return Array.isArray(v) ? v : v.split(",").map((s) => s.trim()).filter(Boolean);
}

export function frontmatterString(fm: Frontmatter, key: string): string | undefined {
  const v = fm[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

// ---- Links ----

const WIKILINK_RE = /\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|[^\]]*)?\]\]/g;
const MDLINK_RE = /(?<!!)\[[^\]]*\]\(([A-Za-z][\w+.-]*):([^)\s]+)\)/g;
const TAG_RE = /(^|\s)#([A-Za-z][\w/-]*)/g;
const CODE_SPAN_RE = /(`+)[^`]*?\1/g;

interface Hit {
  index: number;
  link: ParsedLink;
}

/**
 * All links in a note body, in reading order. Frontmatter, fenced code
 * blocks and inline code spans are skipped.
 */
export function parseLinks(content: string): ParsedLink[] {
  const lines = content.split("\n");
  const start = bodyStartLine(content) - 1;
  const links: ParsedLink[] = [];
  let inFence = false;

  for (let i = start; i < lines.length; i++) {
    if (/^\s*(```|~~~)/.test(lines[i])) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const line = i + 1;
    const hits: Hit[] = [];
    // blank out inline code, same length so indexes stay put
    const text = lines[i].replace(CODE_SPAN_RE, (span) => " ".repeat(span.length));

    for (const m of text.matchAll(WIKILINK_RE)) {
      hits.push({ index: m.index ?? 0, link: { type: "id", target: m[1].trim(), line } });
    }
    for (const m of text.matchAll(MDLINK_RE)) {
      const scheme = m[1].toLowerCase();
      const target = scheme === "id" ? m[2] : `${m[1]}:${m[2]}`;
      hits.push({ index: m.index ?? 0, link: { type: scheme, target, line } });
    }
    for (const m of text.matchAll(TAG_RE)) {
      hits.push({ index: (m.index ?? 0) + m[1].length, link: { type: "tag", target: m[2], line } });
    }

    hits.sort((a, b) => a.index - b.index);
    for (const h of hits) links.push(h.link);
  }

  return links;
}

/** Targets of every link of one type, in reading order (duplicates kept). */
export function extractTypedLinks(content: string, type: LinkType): string[] {
  return parseLinks(content)
    .filter((l) => l.type === type)
    .map((l) => l.target);
}
