/**
 * preview.ts — transient file views shown while a picker is open.
 *
 * A PreviewSession holds at most one open view. Moving to a candidate in a
 * different file closes the old view before opening the new one, and end()
 * closes whatever is left. After end() the session opens nothing more, so
 * opens and closes always balance.
 */

import { readFileSync } from "node:fs";

// ---- Types ----

export interface PreviewTarget {
  file: string;
  line: number; // 1-based
}

export interface PreviewView {
  readonly file: string;
  readonly lines: readonly string[];
  /** Line the preview is scrolled to, 1-based. */
  line: number;
}

export interface PreviewHost {
  open(file: string): PreviewView;
  close(view: PreviewView): void;
}

// ---- Session ----

export class PreviewSession {
  private view: PreviewView | null = null;
  private ended = false;
  private opens = 0;
  private closes = 0;

  constructor(private host: PreviewHost) {}

  /** Show a target, reusing the open view when the file is the same. */
  show(target: PreviewTarget): PreviewView | null {
    if (this.ended) return null;
    if (this.view && this.view.file === target.file) {
      this.view.line = target.line;
      return this.view;
    }
    this.clear();
    const view = this.host.open(target.file);
    this.opens++;
    view.line = target.line;
    this.view = view;
    return view;
  }

  clear(): void {
    if (!this.view) return;
    const view = this.view;
    this.view = null;
    this.closes++;
    this.host.close(view);
  }

  end(): void {
    this.clear();
    this.ended = true;
  }

  get current(): PreviewView | null {
    return this.view;
  }

  get stats(): { opened: number; closed: number } {
    return { opened: this.opens, closed: this.closes };
  }
}

/** Run `fn` with a fresh session and end it on every exit path. */
export async function withPreviewSession<R>(
  host: PreviewHost,
  fn: (session: PreviewSession) => Promise<R>,
): Promise<R> {
  const session = new PreviewSession(host);
  try {
    return await fn(session);
  } finally {
    session.end();
  }
}

// ---- File-backed host ----

class FileView implements PreviewView {
  line = 1;
  constructor(
    readonly file: string,
    readonly lines: readonly string[],
  ) {}
}

/** Reads the whole file on open. Unreadable files become a one-line view. */
export class FilePreviewHost implements PreviewHost {
  private openViews = new Set<PreviewView>();

  open(file: string): PreviewView {
    let lines: string[];
    try {
      lines = readFileSync(file, "utf-8").split("\n");
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      lines = [`(cannot preview ${file}: ${msg})`];
    }
    const view = new FileView(file, lines);
    this.openViews.add(view);
    return view;
  }

  close(view: PreviewView): void {
    this.openViews.delete(view);
  }

  get openCount(): number {
    return this.openViews.size;
  }
}
