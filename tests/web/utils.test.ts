/**
 * Web Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { cn, displayChar } from '../../web/src/lib/utils';

describe('displayChar', () => {
  it('should mask a filled slot when obscured', () => {
    expect(displayChar('7', true, '•')).toBe('•');
  });

  it('should leave an empty slot empty when obscured', () => {
    expect(displayChar('', true, '•')).toBe('');
  });

  it('should show the character when not obscured', () => {
    expect(displayChar('7', false, '•')).toBe('7');
  });
});

describe('cn', () => {
  it('should let the later Tailwind class win', () => {
    expect(cn('border-b-2', false, 'border-b-4')).toBe('border-b-4');
  });
});
