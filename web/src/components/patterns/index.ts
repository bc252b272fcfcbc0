export { CodeInputField } from './CodeInputField';
export type { CodeInputDecoration, CodeInputFieldProps } from './CodeInputField';
