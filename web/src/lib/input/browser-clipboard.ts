/**
 * Browser Clipboard
 *
 * ClipboardSource over the async Clipboard API. Reads resolve null when the API
 * is missing or the user denies access.
 */

import type { ClipboardSource } from '@core/types';

function getClipboard(): Clipboard | null {
  if (typeof navigator === 'undefined' || !navigator.clipboard) return null;
  return navigator.clipboard;
}

export class BrowserClipboard implements ClipboardSource {
  async readText(): Promise<string | null> {
    const clipboard = getClipboard();
    if (!clipboard) return null;

    try {
      return await clipboard.readText();
    } catch (error) {
      console.error('Clipboard read error:', error);
      return null;
    }
  }

  async writeText(text: string): Promise<void> {
    const clipboard = getClipboard();
    if (!clipboard) return;

    await clipboard.writeText(text);
  }
}
