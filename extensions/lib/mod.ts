/**
 * extensions/lib/mod.ts
 *
 * Barrel exports for shared extension libraries.
 *
 * Important: do NOT name this file index.ts, otherwise pi will treat
 * extensions/lib/ as an extension entry point during discovery.
 */

export type { Frontmatter, FrontmatterValue, LinkType, ParsedLink } from "./vault-lib.ts";
export {
  parseFrontmatter,
  stripFrontmatter,
  bodyStartLine,
  extractTitle,
  parseLinks,
  extractTypedLinks,
} from "./vault-lib.ts";

export type { VaultNode, VaultRef, LinkEdge, NodeFilter, NodeSort } from "./note-graph.ts";
export { NoteGraph, nodeLabel, slugify, expandHome } from "./note-graph.ts";

export type {
  Candidate,
  Selection,
  SubmitResult,
  SelectorOptions,
  ResolvedSelectorOptions,
  ReadOptions,
  CompletionBackend,
  PickerStateOptions,
} from "./picker-core.ts";
export {
  SELECTOR_DEFAULTS,
  PickerState,
  resolveSelectorOptions,
  prepareCandidates,
  selectFrom,
} from "./picker-core.ts";

export type { PreviewTarget, PreviewView, PreviewHost } from "./preview.ts";
export { PreviewSession, FilePreviewHost, withPreviewSession } from "./preview.ts";

export type { NodePromptRequest, RefPromptRequest, PromptEnv, PromptProvider } from "./prompt-registry.ts";
export { PromptRegistry, listPrompts, fuzzyPrompts } from "./prompt-registry.ts";

export type { SearchHit, SearchFunction, NavState, NavContext } from "./vault-nav.ts";
export {
  currentNode,
  visitFile,
  backlinkIds,
  forwardLinkIds,
  searchNotes,
  showBacklinks,
  showForwardLinks,
  findFile,
  findNode,
  findRef,
  insertLink,
} from "./vault-nav.ts";

export { SEARCH_FUNCTIONS, ripgrepSearch, builtinSearch, runRipgrep, parseRipgrepOutput, grepVault, hitLabel } from "./search.ts";

export type { PickerConfig, LoadedConfig, SearchName } from "./config.ts";
export { CONFIG_PATH, DEFAULT_CONFIG, SEARCH_NAMES, parseConfigToml, loadConfig } from "./config.ts";

export {
  VaultPickerError,
  NoContextError,
  EmptyResultError,
  SearchUnavailableError,
  NoteExistsError,
} from "./errors.ts";
