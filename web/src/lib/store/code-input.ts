/**
 * Code Input Store Hooks
 *
 * React bindings over the controller's zustand store
 */

import { useStore } from 'zustand';
import type { CodeInputController, CodeInputSnapshot } from '@core/domain';

export function useCodeInput(controller: CodeInputController): CodeInputSnapshot {
  return useStore(controller.store);
}

