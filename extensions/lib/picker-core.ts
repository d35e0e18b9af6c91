/**
 * picker-core.ts — headless selection logic for the vault picker.
 *
 * Candidates are labelled values. PickerState does the fuzzy matching and
 * decides what a submit means; the TUI component only feeds it keystrokes
 * and renders it. selectFrom() is the entry point used by the prompts: it
 * applies filter/sort, wires up previews and hands the list to a backend.
 */

import Fuse from "fuse.js";

import { withPreviewSession, type PreviewHost, type PreviewTarget, type PreviewView } from "./preview.ts";

// ---- Types ----

export interface Candidate<T> {
  label: string;
  value: T;
}

/** Outcome of a prompt. `not-found` carries free text the user typed. */
export type Selection<T> =
  | { kind: "found"; value: T; label: string }
  | { kind: "not-found"; text: string }
  | { kind: "cancelled" };

export type SubmitResult<T> = Selection<T> | { kind: "rejected"; text: string };

export interface SelectorOptions<T> {
  /** Shown before the input. Default `"Select: "`. */
  prompt?: string;
  /** Text the input starts with. Default empty. */
  initialInput?: string;
  /** Keep a candidate when this returns true. Default keeps all. */
  filter?: (value: T) => boolean;
  /** Display order. Default keeps the source order. */
  sort?: (a: T, b: T) => number;
  /** Refuse to submit text that matches nothing. Default false. */
  requireMatch?: boolean;
  /** Where to preview a candidate. No previews without it. */
  locate?: (value: T) => PreviewTarget | undefined;
}

export interface ResolvedSelectorOptions<T> {
  prompt: string;
  initialInput: string;
  filter: (value: T) => boolean;
  sort: ((a: T, b: T) => number) | null;
  requireMatch: boolean;
  locate: ((value: T) => PreviewTarget | undefined) | null;
}

export interface ReadOptions<T> {
  prompt: string;
  initialInput: string;
  requireMatch: boolean;
  /** Called whenever the highlighted candidate changes. */
  preview?: (value: T) => PreviewView | null;
}

/** The interactive side of a prompt, implemented on top of pi's UI. */
export interface CompletionBackend {
  /** Fuzzy picker. Resolves once the user confirms or cancels. */
  read<T>(candidates: readonly Candidate<T>[], options: ReadOptions<T>): Promise<Selection<T>>;
  /** Plain list selection, no filtering or free text. */
  choose(prompt: string, labels: string[]): Promise<string | undefined>;
  /** Free-form single line input. */
  ask(prompt: string): Promise<string | undefined>;
}

// ---- Options ----

export const SELECTOR_DEFAULTS = {
  prompt: "Select: ",
  initialInput: "",
  requireMatch: false,
} as const;

export function resolveSelectorOptions<T>(options: SelectorOptions<T> = {}): ResolvedSelectorOptions<T> {
  return {
    prompt: options.prompt ?? SELECTOR_DEFAULTS.prompt,
    initialInput: options.initialInput ?? SELECTOR_DEFAULTS.initialInput,
    filter: options.filter ?? (() => true),
    sort: options.sort ?? null,
    requireMatch: options.requireMatch ?? SELECTOR_DEFAULTS.requireMatch,
    locate: options.locate ?? null,
  };
}

export function prepareCandidates<T>(
  candidates: readonly Candidate<T>[],
  options: ResolvedSelectorOptions<T>,
): Candidate<T>[] {
  const kept = candidates.filter((c) => options.filter(c.value));
  const sort = options.sort;
  return sort ? kept.sort((a, b) => sort(a.value, b.value)) : kept;
}

// ---- State ----

const FUSE_THRESHOLD = 0.4;

export interface PickerStateOptions {
  initialInput?: string;
  requireMatch?: boolean;
}

export class PickerState<T> {
  private fuse: Fuse<Candidate<T>>;
  private query = "";
  private matched: Candidate<T>[] = [];
  private cursor = 0;
  private requireMatch: boolean;

  constructor(
    readonly candidates: readonly Candidate<T>[],
    options: PickerStateOptions = {},
  ) {
    this.requireMatch = options.requireMatch ?? false;
    this.fuse = new Fuse([...candidates], {
      keys: ["label"],
      threshold: FUSE_THRESHOLD,
      ignoreLocation: true,
    });
    this.setQuery(options.initialInput ?? "");
  }

  get text(): string {
    return this.query;
  }

  get matches(): readonly Candidate<T>[] {
    return this.matched;
  }

  get cursorIndex(): number {
    return this.cursor;
  }

  setQuery(query: string): void {
    this.query = query;
    this.matched = this.match(query);
    this.cursor = 0;
  }

  /** Exact label matches first, then fuse.js ranking. */
  private match(query: string): Candidate<T>[] {
    const q = query.trim();
    if (!q) return [...this.candidates];
    const exact = this.candidates.filter((c) => c.label.trim() === q);
    const fuzzy = this.fuse
      .search(q)
      .map((r) => r.item)
      .filter((c) => !exact.includes(c));
    return [...exact, ...fuzzy];
  }

  current(): Candidate<T> | undefined {
    return this.matched[this.cursor];
  }

  /** Move the highlight, wrapping at both ends. */
  move(delta: number): void {
    const n = this.matched.length;
    if (n === 0) return;
    this.cursor = (((this.cursor + delta) % n) + n) % n;
  }

  submit(): SubmitResult<T> {
    const hit = this.current();
    if (hit) return { kind: "found", value: hit.value, label: hit.label };
    if (this.requireMatch) return { kind: "rejected", text: this.query };
    return { kind: "not-found", text: this.query };
  }

  /** Submit the typed text as is, ignoring any matches. */
  submitInput(): SubmitResult<T> {
    if (this.requireMatch || !this.query.trim()) return { kind: "rejected", text: this.query };
    return { kind: "not-found", text: this.query };
  }
}

// ---- Selector ----

/**
 * Filter, sort and present candidates. A preview session is attached only
 * when there is something to preview, and it is closed when the backend
 * returns, however it returns.
 */
export async function selectFrom<T>(
  backend: CompletionBackend,
  previews: PreviewHost,
  candidates: readonly Candidate<T>[],
  options: SelectorOptions<T> = {},
): Promise<Selection<T>> {
  const opts = resolveSelectorOptions(options);
  const prepared = prepareCandidates(candidates, opts);
  const base: ReadOptions<T> = {
    prompt: opts.prompt,
    initialInput: opts.initialInput,
    requireMatch: opts.requireMatch,
  };

  const locate = opts.locate;
  if (prepared.length === 0 || !locate) return backend.read(prepared, base);

  return withPreviewSession(previews, (session) =>
    backend.read(prepared, {
      ...base,
      preview: (value) => {
        const target = locate(value);
        if (!target) {
          session.clear();
          return null;
        }
        return session.show(target);
      },
    }),
  );
}
