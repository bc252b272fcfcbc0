/**
 * Domain Layer Exports
 */

export { CodeInputController } from './code-input.controller';
export type {
  CodeInputOptions,
  CodeInputSnapshot,
  CodeInputListener,
} from './code-input.controller';

export { FocusNode } from './focus-node';
export type { FocusListener } from './focus-node';

export { createCodeInput } from './code-input.factory';
export type { CreateCodeInputOptions } from './code-input.factory';
