/**
 * Test doubles shared by the picker tests: a scripted completion backend,
 * a counting preview host and a NavContext builder. No pi imports.
 */

import { PickerState } from "../extensions/lib/picker-core.ts";
import type { Candidate, CompletionBackend, ReadOptions, Selection } from "../extensions/lib/picker-core.ts";
import type { PreviewHost, PreviewView } from "../extensions/lib/preview.ts";
import { PromptRegistry } from "../extensions/lib/prompt-registry.ts";
import type { NoteGraph } from "../extensions/lib/note-graph.ts";
import type { NavContext, NavState, SearchFunction } from "../extensions/lib/vault-nav.ts";

// ---- Scripted backend ----

export type Action =
  | { kind: "type"; text: string }
  | { kind: "move"; delta: number }
  | { kind: "submit" }
  | { kind: "submitInput" }
  | { kind: "cancel" };

export const typeText = (text: string): Action => ({ kind: "type", text });
export const moveBy = (delta: number): Action => ({ kind: "move", delta });
export const submit: Action = { kind: "submit" };
export const submitInput: Action = { kind: "submitInput" };
export const cancel: Action = { kind: "cancel" };

export interface ReadCall {
  labels: string[];
  prompt: string;
  requireMatch: boolean;
  hasPreview: boolean;
  rejected: number;
}

/**
 * Plays a list of actions against a PickerState, the way the TUI component
 * would. Running out of actions cancels.
 */
export class ScriptedBackend implements CompletionBackend {
  reads: ReadCall[] = [];
  chooses: { prompt: string; labels: string[] }[] = [];
  asks: string[] = [];

  constructor(
    private script: Action[] = [],
    private chooseAnswer: (labels: string[]) => string | undefined = () => undefined,
    private askAnswers: (string | undefined)[] = [],
  ) {}

  async read<T>(candidates: readonly Candidate<T>[], options: ReadOptions<T>): Promise<Selection<T>> {
    const call: ReadCall = {
      labels: candidates.map((c) => c.label),
      prompt: options.prompt,
      requireMatch: options.requireMatch,
      hasPreview: options.preview !== undefined,
      rejected: 0,
    };
    this.reads.push(call);

    const state = new PickerState(candidates, {
      initialInput: options.initialInput,
      requireMatch: options.requireMatch,
    });
    const preview = () => {
      const hit = state.current();
      if (hit && options.preview) options.preview(hit.value);
    };
    preview();

    for (const action of this.script) {
      switch (action.kind) {
        case "type":
          state.setQuery(action.text);
          preview();
          break;
        case "move":
          state.move(action.delta);
          preview();
          break;
        case "cancel":
          return { kind: "cancelled" };
        case "submit":
        case "submitInput": {
          const result = action.kind === "submit" ? state.submit() : state.submitInput();
          if (result.kind !== "rejected") return result;
          call.rejected++;
          break;
        }
      }
    }
    return { kind: "cancelled" };
  }

  async choose(prompt: string, labels: string[]): Promise<string | undefined> {
    this.chooses.push({ prompt, labels });
    return this.chooseAnswer(labels);
  }

  async ask(prompt: string): Promise<string | undefined> {
    this.asks.push(prompt);
    return this.askAnswers.shift();
  }
}

// ---- Preview host ----

export class CountingPreviewHost implements PreviewHost {
  opened: string[] = [];
  closed: string[] = [];

  open(file: string): PreviewView {
    this.opened.push(file);
    return { file, lines: [`preview of ${file}`], line: 1 };
  }

  close(view: PreviewView): void {
    this.closed.push(view.file);
  }
}

// ---- Nav ----

export interface TestNav extends NavContext {
  opened: { file: string; line: number }[];
  inserted: string[];
}

export function makeNav(
  graph: NoteGraph,
  backend: CompletionBackend,
  opts: { prompts?: PromptRegistry; state?: NavState; search?: SearchFunction; previews?: PreviewHost } = {},
): TestNav {
  const nav: TestNav = {
    graph,
    backend,
    previews: opts.previews ?? new CountingPreviewHost(),
    prompts: opts.prompts ?? new PromptRegistry(),
    state: opts.state ?? {},
    search: opts.search ?? (async () => undefined),
    opened: [],
    inserted: [],
    open(file, line) {
      nav.opened.push({ file, line });
    },
    insert(text) {
      nav.inserted.push(text);
    },
    reload() {
      return graph;
    },
  };
  return nav;
}
