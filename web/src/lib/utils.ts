/**
 * Utility Functions
 */

import { type ClassValue, clsx } from 'clsx';
import { twMerge } from 'tailwind-merge';

/**
 * Merge class names with Tailwind conflict resolution
 */
export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}

/**
 * Character shown in a slot, masked when obscured
 */
export function displayChar(char: string, obscured: boolean, obscuringCharacter: string): string {
  return obscured && char !== '' ? obscuringCharacter : char;
}
