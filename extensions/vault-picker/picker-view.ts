/**
 * Fuzzy picker overlay.
 *
 * Keys:
 *   type       - Filter candidates
 *   ↑/↓ C-p/n  - Move highlight
 *   PgUp/Dn    - Move one page
 *   Tab        - Complete input to the highlighted label
 *   Enter      - Confirm (free text when nothing matches, unless a match is required)
 *   Alt+Enter  - Use the typed text even when something matches
 *   Esc / C-c  - Cancel
 */

import { Input, matchesKey, Key, truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import type { TUI } from "@mariozechner/pi-tui";
import type { Theme } from "@mariozechner/pi-coding-agent";

import { PickerState } from "../lib/picker-core.ts";
import type { Candidate, ReadOptions, Selection } from "../lib/picker-core.ts";
import type { PreviewView } from "../lib/preview.ts";

const OVERLAY_HEIGHT = 0.8;

export class PickerComponent<T> {
	private state: PickerState<T>;
	private input = new Input();
	private scrollTop = 0;
	private flash = "";
	private view: PreviewView | null = null;
	private finished = false;

	constructor(
		private tui: TUI,
		private theme: Theme,
		candidates: readonly Candidate<T>[],
		private options: ReadOptions<T>,
		private done: (result: Selection<T>) => void,
	) {
		this.state = new PickerState(candidates, {
			initialInput: options.initialInput,
			requireMatch: options.requireMatch,
		});
		this.input.setValue(options.initialInput);
		this.input.onSubmit = () => this.submit();
		this.input.onEscape = () => this.finish({ kind: "cancelled" });
		this.refreshPreview();
	}

	private finish(result: Selection<T>): void {
		if (this.finished) return;
		this.finished = true;
		this.done(result);
	}

	private submit(asTyped = false): void {
		const result = asTyped ? this.state.submitInput() : this.state.submit();
		if (result.kind === "rejected") {
			this.flash = this.options.requireMatch ? "[match required]" : "[empty input]";
			this.tui.requestRender();
			return;
		}
		this.finish(result);
	}

	private refreshPreview(): void {
		const hit = this.state.current();
		this.view = hit && this.options.preview ? this.options.preview(hit.value) : null;
	}

	private move(delta: number): void {
		this.state.move(delta);
		this.refreshPreview();
		this.tui.requestRender();
	}

	handleInput(data: string): void {
		if (this.finished) return;
		this.flash = "";

		if (matchesKey(data, Key.escape) || matchesKey(data, Key.ctrl("c"))) {
			this.finish({ kind: "cancelled" });
		} else if (matchesKey(data, Key.up) || matchesKey(data, Key.ctrl("p"))) {
			this.move(-1);
		} else if (matchesKey(data, Key.down) || matchesKey(data, Key.ctrl("n"))) {
			this.move(1);
		} else if (matchesKey(data, Key.pageUp)) {
			this.move(-this.layout().listRows);
		} else if (matchesKey(data, Key.pageDown)) {
			this.move(this.layout().listRows);
		} else if (matchesKey(data, Key.alt("enter"))) {
			this.submit(true);
		} else if (matchesKey(data, Key.tab)) {
			const hit = this.state.current();
			if (hit) this.setQuery(hit.label);
		} else {
			this.input.handleInput(data);
			const value = this.input.getValue();
			if (value !== this.state.text) this.setQuery(value, false);
			this.tui.requestRender();
		}
	}

	private setQuery(query: string, syncInput = true): void {
		if (syncInput) this.input.setValue(query);
		this.state.setQuery(query);
		this.scrollTop = 0;
		this.refreshPreview();
		this.tui.requestRender();
	}

	private layout(): { listRows: number; previewRows: number } {
		const total = Math.max(8, Math.floor((process.stdout.rows || 24) * OVERLAY_HEIGHT));
		// top border, input, bottom border; plus a separator when previewing
		const hasPreview = this.options.preview !== undefined;
		const body = total - 3 - (hasPreview ? 1 : 0);
		if (!hasPreview) return { listRows: body, previewRows: 0 };
		const listRows = Math.max(3, Math.floor(body * 0.4));
		return { listRows, previewRows: Math.max(1, body - listRows) };
	}

	render(width: number): string[] {
		const th = this.theme;
		const innerW = Math.max(1, width - 2);
		const border = (c: string) => th.fg("border", c);
		const accent = (c: string) => th.fg("accent", c);
		const dim = (c: string) => th.fg("dim", c);
		const row = (content: string) => border("│") + truncateToWidth(content, innerW, "…", true) + border("│");
		const { listRows, previewRows } = this.layout();
		const result: string[] = [];

		// ── Top border: prompt + counts ──
		const matches = this.state.matches;
		const titleLeft = ` ${this.options.prompt.trim()} `;
		const titleRight = ` ${matches.length}/${this.state.candidates.length}${this.flash ? " " + this.flash : ""} `;
		const fillW = Math.max(0, innerW - visibleWidth(titleLeft) - visibleWidth(titleRight));
		result.push(border("╭") + accent(titleLeft) + border("─".repeat(fillW)) + dim(titleRight) + border("╮"));

		// ── Input ──
		const inputLine = this.input.render(innerW - 3)[0] ?? "";
		result.push(row(accent(" › ") + inputLine));

		// ── Candidates ──
		const cursor = this.state.cursorIndex;
		if (cursor < this.scrollTop) this.scrollTop = cursor;
		if (cursor >= this.scrollTop + listRows) this.scrollTop = cursor - listRows + 1;
		const slice = matches.slice(this.scrollTop, this.scrollTop + listRows);
		slice.forEach((c, i) => {
			const selected = this.scrollTop + i === cursor;
			result.push(row(selected ? accent(`▸ ${c.label}`) : `  ${c.label}`));
		});
		if (matches.length === 0) {
			const hint = this.options.requireMatch ? "no matches" : "no matches · enter creates";
			result.push(row(dim(`  ${hint}`)));
		}
		const used = Math.max(slice.length, matches.length === 0 ? 1 : 0);
		for (let i = used; i < listRows; i++) result.push(row(""));

		// ── Preview ──
		if (previewRows > 0) {
			const name = this.view ? ` ${this.view.file} ` : "";
			const sepFill = Math.max(0, innerW - visibleWidth(name));
			result.push(border("├") + dim(truncateToWidth(name, innerW, "…")) + border("─".repeat(sepFill)) + border("┤"));
			const lines = this.view ? this.view.lines.slice(this.view.line - 1, this.view.line - 1 + previewRows) : [];
			lines.forEach((text, i) => {
				const num = dim(String((this.view?.line ?? 1) + i).padStart(4) + " ");
				result.push(row(num + (i === 0 ? accent(text) : text)));
			});
			for (let i = lines.length; i < previewRows; i++) result.push(row(""));
		}

		// ── Bottom border: hints ──
		const hint = (key: string, desc: string) => th.fg("dim", key) + th.fg("muted", " " + desc);
		const hints = [hint("enter", "select"), hint("esc", "cancel"), hint("↑↓", "move"), hint("tab", "complete")];
		if (!this.options.requireMatch) hints.splice(1, 0, hint("alt+enter", "as typed"));
		const hintsStr = " " + hints.join(th.fg("border", " · ")) + " ";
		const hintFill = Math.max(0, innerW - visibleWidth(hintsStr));
		result.push(border("╰") + truncateToWidth(hintsStr, innerW, "") + border("─".repeat(hintFill)) + border("╯"));

		return result;
	}

	invalidate(): void {
		this.input.invalidate();
	}
}
