/**
 * Code Input Controller
 *
 * Owns the value of a segmented code field (PIN, SMS, OTP, date) and keeps it
 * consistent with the host keyboard session.
 *
 * Handles:
 * - Length and obscure configuration with truncation
 * - Whole-value pattern validation
 * - Completion callback when the last slot fills
 * - Focus and input session bookkeeping
 * - Clipboard paste through the same validation path as keystrokes
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { FocusNode } from './focus-node';
import { CodeInputErrors, ValidationErrors } from '../types/errors';
import type {
  ClipboardSource,
  InputClient,
  InputConnection,
  InputTransport,
} from '../types/transport';

// ============================================
// TYPES
// ============================================

export interface CodeInputOptions {
  /** Initial value, dropped when it does not match the pattern */
  value?: string;

  /** Regular expression source matched against the whole value */
  inputPattern?: string;
}

/**
 * State published to subscribers and renderers
 */
export interface CodeInputSnapshot {
  value: string;
  requiredLength: number;
  obscured: boolean;
  focused: boolean;
}

export type CodeInputListener = (
  snapshot: CodeInputSnapshot,
  previous: CodeInputSnapshot
) => void;

// ============================================
// CODE INPUT CONTROLLER
// ============================================

export class CodeInputController implements InputClient {
  readonly focusNode = new FocusNode();

  private readonly state: StoreApi<CodeInputSnapshot>;
  private readonly releaseFocusListener: () => void;
  private transport: InputTransport | null = null;
  private connection: InputConnection | null = null;
  private completeCallback: (() => void) | undefined;
  private pattern: string | undefined;
  private compiledPattern: RegExp | null = null;
  private disposed = false;

  constructor(options: CodeInputOptions = {}) {
    this.pattern = options.inputPattern;

    // No completion callback can be registered yet, so a pre-filled value never completes.
    const initial = options.value;
    const value = initial !== undefined && this.validate(initial) ? initial : '';

    this.state = createStore<CodeInputSnapshot>()(() => ({
      value,
      requiredLength: 0,
      obscured: false,
      focused: false,
    }));

    this.releaseFocusListener = this.focusNode.addListener((hasFocus) =>
      this.handleFocusChange(hasFocus)
    );
  }

  // ============================================
  // READ SURFACE
  // ============================================

  get store(): StoreApi<CodeInputSnapshot> {
    return this.state;
  }

  get value(): string {
    return this.state.getState().value;
  }

  /** Number of slots, 0 until configured */
  get requiredLength(): number {
    return this.state.getState().requiredLength;
  }

  /** Next slot to fill */
  get activeIndex(): number {
    return this.value.length;
  }

  get filledCount(): number {
    return this.value.length;
  }

  get isInitialized(): boolean {
    return this.requiredLength > 0;
  }

  get isFilled(): boolean {
    return this.isInitialized && this.filledCount === this.requiredLength;
  }

  get isObscured(): boolean {
    return this.state.getState().obscured;
  }

  get hasFocus(): boolean {
    return this.focusNode.hasFocus;
  }

  get inputPattern(): string | undefined {
    return this.pattern;
  }

  /** True while the host input session is attached */
  get inputActive(): boolean {
    return this.connection?.attached ?? false;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getSnapshot(): CodeInputSnapshot {
    return this.state.getState();
  }

  subscribe(listener: CodeInputListener): () => void {
    return this.state.subscribe(listener);
  }

  /**
   * Character at the given slot, or an empty string for an unfilled slot
   */
  charAt(index: number): string {
    const { value } = this;
    return index >= 0 && index < value.length ? value.charAt(index) : '';
  }

  /**
   * Whether the slot at `index` should be highlighted
   *
   * With `clamp`, a filled field keeps highlighting its last slot instead of the
   * out-of-range next one.
   */
  isFocused(index: number, clamp = false): boolean {
    if (!this.hasFocus) return false;

    const active = clamp && this.isFilled
      ? Math.min(this.activeIndex, this.requiredLength - 1)
      : this.activeIndex;

    return active === index;
  }

  /**
   * Test a candidate against the input pattern
   * @throws CodeInputError when the pattern source does not compile
   */
  validate(candidate: string): boolean {
    const pattern = this.compilePattern();
    return pattern === null || pattern.test(candidate);
  }

  // ============================================
  // CONFIGURATION
  // ============================================

  /**
   * Apply the owning field's length and obscure settings
   *
   * A value longer than the new length is truncated through the regular update path.
   */
  configure(length: number, obscure: boolean): void {
    if (this.isMisused('configure')) return;

    if (!Number.isInteger(length) || length < 1) {
      throw ValidationErrors.OUT_OF_RANGE('length', 1);
    }

    const { requiredLength, obscured } = this.state.getState();
    if (requiredLength !== length || obscured !== obscure) {
      this.state.setState({ requiredLength: length, obscured: obscure });
    }

    if (this.value.length > length) {
      this.setValue(this.value);
    }
  }

  /**
   * @throws CodeInputError before the controller is configured
   */
  setObscure(obscure: boolean): void {
    if (this.isMisused('setObscure')) return;

    if (!this.isInitialized) {
      throw CodeInputErrors.NOT_INITIALIZED();
    }

    if (this.isObscured === obscure) return;

    this.state.setState({ obscured: obscure });
  }

  /**
   * Replace the pattern; it is compiled on the next validation
   */
  setInputPattern(pattern: string | undefined): void {
    if (this.isMisused('setInputPattern')) return;

    this.pattern = pattern;
    this.compiledPattern = null;
  }

  /**
   * Register the callback fired when the last slot is filled
   */
  onComplete(callback: (() => void) | undefined): void {
    this.completeCallback = callback;
  }

  // ============================================
  // MUTATIONS
  // ============================================

  /**
   * Single path for every value change
   *
   * Over-long candidates are truncated to the configured length. Subscribers
   * are notified before the completion callback runs. A candidate that is still
   * too long or fails validation is ignored and the host session is put back on
   * the last accepted value.
   */
  applyCandidate(candidate: string | null): void {
    if (this.isMisused('applyCandidate')) return;

    const { requiredLength } = this;
    let text = candidate ?? '';

    if (requiredLength > 0 && text.length > requiredLength) {
      text = text.substring(0, requiredLength);
    }

    if (text === this.value) return;

    // Unconfigured controllers hold no slots, so every non-empty candidate is over-long.
    if (text.length > requiredLength || !this.validate(text)) {
      this.syncConnection();
      return;
    }

    this.state.setState({ value: text });

    if (requiredLength > 0 && text.length === requiredLength) {
      this.complete();
    }

    if (candidate !== null && text !== candidate) {
      this.syncConnection();
    }
  }

  /**
   * Programmatic update; the host session always mirrors the result
   */
  setValue(text: string | null): void {
    if (this.isMisused('setValue')) return;

    this.applyCandidate(text);
    this.syncConnection();
  }

  clear(): void {
    this.setValue(null);
  }

  /**
   * Apply text pasted by the user when the whole text validates
   */
  applyExternalPaste(text: string): void {
    if (this.isMisused('applyExternalPaste')) return;

    if (this.validate(text)) {
      this.setValue(text);
    }
  }

  /**
   * Read the clipboard and paste its text
   *
   * A controller disposed while the read is pending is left untouched.
   */
  async pasteFromClipboard(clipboard: ClipboardSource): Promise<void> {
    if (this.isMisused('pasteFromClipboard')) return;

    const text = await clipboard.readText();
    if (this.disposed || text === null) return;

    this.applyExternalPaste(text);
  }

  copyToClipboard(clipboard: ClipboardSource): Promise<void> {
    return clipboard.writeText(this.value);
  }

  // ============================================
  // FOCUS AND INPUT SESSION
  // ============================================

  focus(): void {
    if (this.isMisused('focus')) return;
    this.focusNode.requestFocus();
  }

  unfocus(): void {
    if (this.isMisused('unfocus')) return;
    this.focusNode.unfocus();
  }

  /**
   * Bind the host transport used to open input sessions
   * @returns function that unbinds the transport and closes its session
   */
  attachTransport(transport: InputTransport): () => void {
    if (this.isMisused('attachTransport')) return () => undefined;

    this.closeConnection();
    this.transport = transport;

    if (this.hasFocus) {
      this.openConnection();
    }

    return () => {
      if (this.transport !== transport) return;

      this.closeConnection();
      this.transport = null;
    };
  }

  handleEdit(candidate: string): void {
    this.applyCandidate(candidate);
  }

  handleAction(): void {
    if (this.isMisused('handleAction')) return;
    this.complete();
  }

  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.releaseFocusListener();
    this.closeConnection();

    if (this.state.getState().focused) {
      this.state.setState({ focused: false });
    }

    this.transport = null;
    this.completeCallback = undefined;
    this.focusNode.dispose();
  }

  // ============================================
  // PRIVATE HELPERS
  // ============================================

  private handleFocusChange(hasFocus: boolean): void {
    if (hasFocus) {
      this.openConnection();
    } else {
      this.connection?.close();
    }

    this.state.setState({ focused: hasFocus });
  }

  private openConnection(): void {
    if (!this.transport) return;

    let connection = this.connection;
    if (!connection || !connection.attached) {
      connection = this.transport.attach(this);
      this.connection = connection;
      connection.setEditingState(this.value, this.activeIndex);
    }

    connection.show();
  }

  private closeConnection(): void {
    this.connection?.close();
    this.connection = null;
  }

  private syncConnection(): void {
    if (this.connection && this.connection.attached) {
      this.connection.setEditingState(this.value, this.activeIndex);
    }
  }

  private complete(): void {
    this.completeCallback?.();
  }

  private compilePattern(): RegExp | null {
    const source = this.pattern;
    if (source === undefined) return null;
    if (this.compiledPattern) return this.compiledPattern;

    try {
      // Compiled on its own first so a malformed source cannot be rescued by the anchors.
      new RegExp(source);
      this.compiledPattern = new RegExp(`^(?:${source})$`);
    } catch (error) {
      throw CodeInputErrors.INVALID_PATTERN(
        source,
        error instanceof Error ? error.message : String(error)
      );
    }

    return this.compiledPattern;
  }

  /**
   * Operations on a disposed controller are ignored
   */
  private isMisused(operation: string): boolean {
    if (!this.disposed) return false;

    console.warn('Code input misuse:', CodeInputErrors.DISPOSED(operation).toJSON());
    return true;
  }
}
