/**
 * Errors surfaced to the user by vault-picker commands.
 *
 * Every command wraps its handler and turns a VaultPickerError into an
 * error notification. Anything else propagates to pi.
 */

export class VaultPickerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The command needs a current note and there is none. */
export class NoContextError extends VaultPickerError {
  constructor(command: string) {
    super(`${command}: no current note. Open one with /vault-node or pass a note id.`);
  }
}

/** A lookup produced zero results. */
export class EmptyResultError extends VaultPickerError {}

export class SearchUnavailableError extends VaultPickerError {}

export class NoteExistsError extends VaultPickerError {
  constructor(readonly file: string) {
    super(`Note already exists: ${file}`);
  }
}
