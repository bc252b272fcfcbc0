/**
 * DOM Input Transport
 *
 * Binds a hidden <input> element to the code input transport contract. The
 * element's full value is reported on every `input` event; Enter is the submit
 * action.
 */

import type { InputClient, InputConnection, InputTransport } from '@core/types';

export class DomInputTransport implements InputTransport {
  constructor(private readonly element: HTMLInputElement) {}

  attach(client: InputClient): InputConnection {
    const { element } = this;
    let attached = true;

    const handleInput = () => client.handleEdit(element.value);

    const handleKeyDown = (event: KeyboardEvent) => {
      if (event.key !== 'Enter') return;

      event.preventDefault();
      client.handleAction();
    };

    element.addEventListener('input', handleInput);
    element.addEventListener('keydown', handleKeyDown);

    return {
      get attached() {
        return attached;
      },

      setEditingState(value: string, cursor: number) {
        element.value = value;
        element.setSelectionRange(cursor, cursor);
      },

      show() {
        if (element.ownerDocument.activeElement !== element) {
          element.focus({ preventScroll: true });
        }
      },

      close() {
        if (!attached) return;

        attached = false;
        element.removeEventListener('input', handleInput);
        element.removeEventListener('keydown', handleKeyDown);

        if (element.ownerDocument.activeElement === element) {
          element.blur();
        }
      },
    };
  }
}
