/**
 * Test doubles for the host collaborators
 */

import type {
  ClipboardSource,
  InputClient,
  InputConnection,
  InputTransport,
} from '../src/types/transport';

export interface EditingState {
  value: string;
  cursor: number;
}

export class FakeConnection implements InputConnection {
  attached = true;
  showCount = 0;
  readonly editingStates: EditingState[] = [];

  setEditingState(value: string, cursor: number): void {
    this.editingStates.push({ value, cursor });
  }

  show(): void {
    this.showCount += 1;
  }

  close(): void {
    this.attached = false;
  }

  get lastEditingState(): EditingState | undefined {
    return this.editingStates[this.editingStates.length - 1];
  }
}

/**
 * In-process keyboard: records sessions and forwards typed text to the client
 */
export class FakeTransport implements InputTransport {
  readonly connections: FakeConnection[] = [];
  private client: InputClient | null = null;

  attach(client: InputClient): FakeConnection {
    this.client = client;
    const connection = new FakeConnection();
    this.connections.push(connection);
    return connection;
  }

  get current(): FakeConnection | undefined {
    return this.connections[this.connections.length - 1];
  }

  type(candidate: string): void {
    this.client?.handleEdit(candidate);
  }

  submit(): void {
    this.client?.handleAction();
  }
}

export class FakeClipboard implements ClipboardSource {
  readonly writes: string[] = [];

  constructor(private text: string | null = null) {}

  async readText(): Promise<string | null> {
    return this.text;
  }

  async writeText(text: string): Promise<void> {
    this.text = text;
    this.writes.push(text);
  }
}

/**
 * Clipboard whose read stays pending until the test resolves it
 */
export function createPendingClipboard() {
  let resolveRead: (text: string | null) => void = () => undefined;

  const clipboard: ClipboardSource = {
    readText: () =>
      new Promise<string | null>((resolve) => {
        resolveRead = resolve;
      }),
    writeText: async () => undefined,
  };

  return {
    clipboard,
    resolve: (text: string | null) => resolveRead(text),
  };
}

export function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
