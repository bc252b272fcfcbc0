/**
 * Host Collaborator Contracts
 *
 * The controller never talks to a keyboard, IME or clipboard directly. The host
 * supplies these capabilities and the controller drives them.
 */

/**
 * Side of the live input session the controller calls into
 */
export interface InputConnection {
  /** False once the host has torn the session down */
  readonly attached: boolean;

  /** Replace the host's editing buffer with the accepted value and caret position */
  setEditingState(value: string, cursor: number): void;

  /** Ask the host to show its keyboard */
  show(): void;

  close(): void;
}

/**
 * Side the host calls into when the user edits or submits
 */
export interface InputClient {
  /** Full-string candidate reported by the host, never a partial delta */
  handleEdit(candidate: string): void;

  /** "Done" / submit action pressed on the host keyboard */
  handleAction(): void;
}

/**
 * Opens input sessions for a client
 */
export interface InputTransport {
  attach(client: InputClient): InputConnection;
}

/**
 * Plain-text clipboard access
 */
export interface ClipboardSource {
  /** Resolves null when the clipboard holds no text */
  readText(): Promise<string | null>;
  writeText(text: string): Promise<void>;
}
