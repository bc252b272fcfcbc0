/**
 * Focus Node
 *
 * Focus capability owned by a code input controller. Renderers observe it, the
 * controller requests and releases it.
 */

import { createStore } from 'zustand/vanilla';

interface FocusState {
  hasFocus: boolean;
}

export type FocusListener = (hasFocus: boolean) => void;

export class FocusNode {
  private readonly store = createStore<FocusState>()(() => ({ hasFocus: false }));
  private disposed = false;

  get hasFocus(): boolean {
    return this.store.getState().hasFocus;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  requestFocus(): void {
    this.setFocus(true);
  }

  unfocus(): void {
    this.setFocus(false);
  }

  /**
   * Listeners run only on an actual focus change
   */
  addListener(listener: FocusListener): () => void {
    return this.store.subscribe((state, previous) => {
      if (state.hasFocus !== previous.hasFocus) {
        listener(state.hasFocus);
      }
    });
  }

  dispose(): void {
    if (this.disposed) return;

    this.store.setState({ hasFocus: false });
    this.disposed = true;
  }

  private setFocus(hasFocus: boolean): void {
    if (this.disposed || this.hasFocus === hasFocus) return;
    this.store.setState({ hasFocus });
  }
}
