/**
 * Preset-based construction of code input controllers
 */

import { CodeInputController } from './code-input.controller';
import { CODE_INPUT_DEFAULTS, INPUT_PRESETS, type InputPresetName } from '../config/presets';

export interface CreateCodeInputOptions {
  value?: string;
  obscure?: boolean;
  /** Overrides the preset length */
  length?: number;
}

/**
 * Create a controller already configured for a named preset
 */
export function createCodeInput(
  preset: InputPresetName,
  options: CreateCodeInputOptions = {}
): CodeInputController {
  const { length, pattern } = INPUT_PRESETS[preset];

  const controller = new CodeInputController({
    value: options.value,
    inputPattern: pattern,
  });
  controller.configure(options.length ?? length, options.obscure ?? CODE_INPUT_DEFAULTS.obscure);

  return controller;
}
