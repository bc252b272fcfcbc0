/**
 * Code Input Configuration
 *
 * Field defaults and named presets for common code formats. Preset patterns use
 * `*` quantifiers so an empty value (a cleared field) still validates.
 */

export const CODE_INPUT_DEFAULTS = {
  length: 6,
  obscure: false,
  obscuringCharacter: '•',
  spacing: 8,
} as const;

export interface InputPreset {
  length: number;
  pattern: string;
  inputMode: 'numeric' | 'text';
}

export const INPUT_PRESETS = {
  pin: { length: 4, pattern: '^[0-9]*$', inputMode: 'numeric' },
  sms: { length: 6, pattern: '^[0-9]*$', inputMode: 'numeric' },
  otp: { length: 6, pattern: '^[0-9A-Z]*$', inputMode: 'text' },
  // DDMMYYYY, every prefix of a plausible date is accepted
  date: {
    length: 8,
    pattern: '^(?:[0-3](?:[0-9](?:[01](?:[0-9]{1,5})?)?)?)?$',
    inputMode: 'numeric',
  },
  alphanumeric: { length: 6, pattern: '^[0-9A-Za-z]*$', inputMode: 'text' },
} as const satisfies Record<string, InputPreset>;

export type InputPresetName = keyof typeof INPUT_PRESETS;
