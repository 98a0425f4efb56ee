/**
 * Name validation utilities.
 */

import { PAYLOAD_ENTRY } from './store.js';
import { InvalidNameError, InvalidRefNameError } from './types.js';

/**
 * Validate a file name as recorded by a Root: one path segment, not `.`,
 * `..`, or the reserved payload entry.
 */
export function validateName(name: string): string {
  if (!name) throw new InvalidNameError('Name must not be empty');
  if (name.includes('/') || name.includes('\\')) {
    throw new InvalidNameError(`Name must be a single segment: '${name}'`);
  }
  if (name === '.' || name === '..') throw new InvalidNameError(`Invalid name: '${name}'`);
  if (name === PAYLOAD_ENTRY) throw new InvalidNameError(`Reserved name: '${name}'`);
  return name;
}

/**
 * Reject ref names containing ':', space, tab, or newline.
 */
export function validateRefName(name: string): void {
  const bad: [string, string][] = [
    [':', 'colon'],
    [' ', 'space'],
    ['\t', 'tab'],
    ['\n', 'newline'],
  ];
  for (const [ch, label] of bad) {
    if (name.includes(ch)) {
      throw new InvalidRefNameError(`Invalid ref name '${name}': contains ${label}`);
    }
  }
}
