/**
 * Code Input Field
 *
 * Segmented code field drawn from a CodeInputController. Keyboard input arrives
 * through a hidden <input>; the visible slots only reflect controller state.
 */

import {
  useEffect,
  useMemo,
  useRef,
  type ClipboardEvent,
  type ReactNode,
} from 'react';
import { motion, AnimatePresence } from 'motion/react';
import type { CodeInputController } from '@core/domain';
import { CODE_INPUT_DEFAULTS } from '@core/config/presets';
import { BrowserClipboard, DomInputTransport } from '@/lib/input';
import { useCodeInput } from '@/lib/store/code-input';
import { cn, displayChar } from '@/lib/utils';

const LONG_PRESS_MS = 500;

/**
 * Styling for the default slot look, ignored when `renderItem` is given
 */
export interface CodeInputDecoration {
  boxClassName?: string;
  focusedBoxClassName?: string;
  disabledClassName?: string;
  textClassName?: string;
  obscuringCharacter?: string;
}

export interface CodeInputFieldProps {
  controller: CodeInputController;
  length?: number;
  obscure?: boolean;
  spacing?: number;
  autoFocus?: boolean;
  enabled?: boolean;
  inputMode?: 'numeric' | 'text';
  decoration?: CodeInputDecoration;
  error?: string;
  /** Custom slot renderer */
  renderItem?: (index: number, focused: boolean) => ReactNode;
}

export function CodeInputField({
  controller,
  length = CODE_INPUT_DEFAULTS.length,
  obscure = CODE_INPUT_DEFAULTS.obscure,
  spacing = CODE_INPUT_DEFAULTS.spacing,
  autoFocus = false,
  enabled = true,
  inputMode = 'numeric',
  decoration = {},
  error,
  renderItem,
}: CodeInputFieldProps) {
  const snapshot = useCodeInput(controller);
  const inputRef = useRef<HTMLInputElement>(null);
  const longPressTimer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const clipboard = useMemo(() => new BrowserClipboard(), []);

  // Re-applied whenever the declared length or obscure setting changes
  useEffect(() => {
    controller.configure(length, obscure);
  }, [controller, length, obscure]);

  useEffect(() => {
    const element = inputRef.current;
    if (!element) return;

    return controller.attachTransport(new DomInputTransport(element));
  }, [controller]);

  useEffect(() => {
    if (!enabled) {
      controller.unfocus();
    } else if (autoFocus) {
      controller.focus();
    }
  }, [controller, enabled, autoFocus]);

  useEffect(() => cancelLongPress, []);

  function cancelLongPress() {
    if (longPressTimer.current !== null) {
      clearTimeout(longPressTimer.current);
      longPressTimer.current = null;
    }
  }

  const handleTap = () => {
    if (!enabled) return;

    if (controller.hasFocus) {
      // Tapping a focused field brings the keyboard back
      inputRef.current?.focus();
    } else {
      controller.focus();
    }
  };

  const handleLongPressStart = () => {
    if (!enabled) return;

    cancelLongPress();
    longPressTimer.current = setTimeout(() => {
      longPressTimer.current = null;
      controller.pasteFromClipboard(clipboard).catch((pasteError: unknown) => {
        console.error('Clipboard paste error:', pasteError);
      });
    }, LONG_PRESS_MS);
  };

  const handlePaste = (e: ClipboardEvent<HTMLInputElement>) => {
    if (!enabled) return;

    e.preventDefault();
    controller.applyExternalPaste(e.clipboardData.getData('text'));
  };

  const obscuringCharacter = decoration.obscuringCharacter ?? CODE_INPUT_DEFAULTS.obscuringCharacter;

  return (
    <div className="flex flex-col items-center">
      <div
        className="relative flex"
        style={{ gap: spacing }}
        onClick={handleTap}
        onPointerDown={handleLongPressStart}
        onPointerUp={cancelLongPress}
        onPointerLeave={cancelLongPress}
      >
        <input
          ref={inputRef}
          type="text"
          inputMode={inputMode}
          autoComplete="one-time-code"
          autoCorrect="off"
          spellCheck={false}
          disabled={!enabled}
          onFocus={() => controller.focus()}
          onBlur={() => controller.unfocus()}
          onPaste={handlePaste}
          className="absolute h-px w-px opacity-0 pointer-events-none"
          aria-label={`Code of ${length} characters`}
        />

        {Array.from({ length }).map((_, index) => {
          const focused = enabled && controller.isFocused(index, true);
          const char = displayChar(controller.charAt(index), snapshot.obscured, obscuringCharacter);

          if (renderItem) {
            return <div key={index}>{renderItem(index, focused)}</div>;
          }

          return (
            <motion.div
              key={index}
              className={cn(
                'w-12 h-14 flex items-center justify-center',
                'border-b-2 transition-colors duration-150',
                focused
                  ? cn('border-[var(--color-brand-primary)]', decoration.focusedBoxClassName)
                  : cn('border-[var(--border-default)]', decoration.boxClassName),
                !snapshot.focused && 'opacity-50',
                error && 'border-red-500',
                !enabled && cn('opacity-50 cursor-not-allowed', decoration.disabledClassName)
              )}
              animate={error ? { x: [0, -4, 4, -4, 4, 0] } : undefined}
              transition={{ duration: 0.4, ease: 'easeInOut' }}
            >
              <AnimatePresence mode="popLayout">
                {char !== '' && (
                  <motion.span
                    key={char}
                    className={cn(
                      'text-2xl font-semibold text-[var(--text-primary)]',
                      decoration.textClassName
                    )}
                    initial={{ scale: 0 }}
                    animate={{ scale: 1 }}
                    exit={{ scale: 0 }}
                    transition={{ type: 'spring', stiffness: 500, damping: 30 }}
                  >
                    {char}
                  </motion.span>
                )}
              </AnimatePresence>
            </motion.div>
          );
        })}
      </div>

      {/* Error message */}
      <AnimatePresence>
        {error && (
          <motion.p
            initial={{ opacity: 0, y: -10 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, y: -10 }}
            className="mt-3 text-sm text-red-500"
          >
            {error}
          </motion.p>
        )}
      </AnimatePresence>
    </div>
  );
}
