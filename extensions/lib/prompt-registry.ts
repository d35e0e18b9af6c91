/**
 * prompt-registry.ts — the two vault prompts and the switch between them.
 *
 * Everything that asks the user for a note or a reference goes through
 * PromptRegistry.readNode / readRef. Out of the box those use the plain
 * list prompts; enabling the override routes every call to the fuzzy
 * picker with live preview. Disabling (or reset at shutdown) goes back.
 */

import {
  selectFrom,
  type Candidate,
  type CompletionBackend,
  type Selection,
} from "./picker-core.ts";
import type { PreviewHost } from "./preview.ts";
import type { NoteGraph, NodeFilter, NodeSort, VaultNode, VaultRef } from "./note-graph.ts";

// ---- Types ----

export interface NodePromptRequest {
  prompt?: string;
  initialInput?: string;
  filter?: NodeFilter;
  sort?: NodeSort;
  requireMatch?: boolean;
}

export interface RefPromptRequest {
  prompt?: string;
  initialInput?: string;
  requireMatch?: boolean;
}

/** What a prompt needs from the running extension. */
export interface PromptEnv {
  graph: NoteGraph;
  backend: CompletionBackend;
  previews: PreviewHost;
}

export interface PromptProvider {
  readonly name: string;
  readNode(env: PromptEnv, request?: NodePromptRequest): Promise<Selection<VaultNode>>;
  readRef(env: PromptEnv, request?: RefPromptRequest): Promise<Selection<VaultRef>>;
}

// ---- Standard prompts ----

/** Make labels unique so a plain select can be mapped back to its value. */
function uniqueLabels<T>(candidates: Candidate<T>[]): string[] {
  const seen = new Map<string, number>();
  return candidates.map((c) => {
    const n = (seen.get(c.label) ?? 0) + 1;
    seen.set(c.label, n);
    return n === 1 ? c.label : `${c.label} (${n})`;
  });
}

/**
 * Narrow to labels containing `initialInput`. Text that matches nothing is
 * returned as not-found, or ignored when a match is required.
 */
async function chooseFrom<T>(
  backend: CompletionBackend,
  prompt: string,
  all: Candidate<T>[],
  requireMatch: boolean,
  initialInput = "",
): Promise<Selection<T>> {
  const seed = initialInput.trim();
  let candidates = all;
  if (seed) {
    const needle = seed.toLowerCase();
    const narrowed = all.filter((c) => c.label.toLowerCase().includes(needle));
    if (narrowed.length > 0) candidates = narrowed;
    else if (!requireMatch) return { kind: "not-found", text: seed };
  }
  if (candidates.length === 0) {
    if (requireMatch) return { kind: "cancelled" };
    const text = await backend.ask(prompt);
    return text ? { kind: "not-found", text } : { kind: "cancelled" };
  }
  const labels = uniqueLabels(candidates);
  const picked = await backend.choose(prompt, labels);
  if (picked === undefined) return { kind: "cancelled" };
  const index = labels.indexOf(picked);
  if (index < 0) return { kind: "cancelled" };
  return { kind: "found", value: candidates[index].value, label: candidates[index].label };
}

export const listPrompts: PromptProvider = {
  name: "list",

  readNode(env, request = {}) {
    const candidates = env.graph.nodeCandidates(request.filter, request.sort);
    return chooseFrom(env.backend, request.prompt ?? "Node", candidates, request.requireMatch ?? false, request.initialInput);
  },

  readRef(env, request = {}) {
    const candidates = env.graph.refCandidates();
    return chooseFrom(env.backend, request.prompt ?? "Reference", candidates, request.requireMatch ?? false, request.initialInput);
  },
};

// ---- Fuzzy prompts ----

export const fuzzyPrompts: PromptProvider = {
  name: "fuzzy",

  readNode(env, request = {}) {
    return selectFrom(env.backend, env.previews, env.graph.nodeCandidates(), {
      prompt: request.prompt ?? "Node: ",
      initialInput: request.initialInput,
      filter: request.filter,
      sort: request.sort,
      requireMatch: request.requireMatch,
      locate: (node) => ({ file: node.file, line: node.line }),
    });
  },

  readRef(env, request = {}) {
    return selectFrom(env.backend, env.previews, env.graph.refCandidates(), {
      prompt: request.prompt ?? "Reference: ",
      initialInput: request.initialInput,
      requireMatch: request.requireMatch,
      locate: (ref) => ({ file: ref.node.file, line: ref.node.line }),
    });
  },
};

// ---- Registry ----

export class PromptRegistry {
  private enabled = false;

  constructor(
    private readonly standard: PromptProvider = listPrompts,
    private readonly override: PromptProvider = fuzzyPrompts,
  ) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  get active(): PromptProvider {
    return this.enabled ? this.override : this.standard;
  }

  /** Returns false when the override was already on. */
  enable(): boolean {
    if (this.enabled) return false;
    this.enabled = true;
    return true;
  }

  /** Returns false when the override was already off. */
  disable(): boolean {
    if (!this.enabled) return false;
    this.enabled = false;
    return true;
  }

  /** Flip the switch and return the new state. */
  toggle(): boolean {
    if (this.enabled) this.disable();
    else this.enable();
    return this.enabled;
  }

  reset(): void {
    this.disable();
  }

  readNode(env: PromptEnv, request?: NodePromptRequest): Promise<Selection<VaultNode>> {
    return this.active.readNode(env, request);
  }

  readRef(env: PromptEnv, request?: RefPromptRequest): Promise<Selection<VaultRef>> {
    return this.active.readRef(env, request);
  }
}
