/**
 * Web layer exports
 */

export { CodeInputField } from './components/patterns';
export type { CodeInputDecoration, CodeInputFieldProps } from './components/patterns';
export { BrowserClipboard, DomInputTransport } from './lib/input';
export { useCodeInput } from './lib/store/code-input';
