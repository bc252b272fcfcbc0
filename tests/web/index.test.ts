/**
 * Web Layer Export Tests
 */

import { describe, it, expect } from 'vitest';
import * as web from '../../web/src';

describe('web layer exports', () => {
  it('should expose the field, adapters and hook', () => {
    expect(typeof web.CodeInputField).toBe('function');
    expect(typeof web.DomInputTransport).toBe('function');
    expect(typeof web.BrowserClipboard).toBe('function');
    expect(typeof web.useCodeInput).toBe('function');
  });
});
