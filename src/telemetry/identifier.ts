/**
 * Identifiers for spans and traces.
 */

import { randomInt } from 'crypto';

const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

export const IDENTIFIER_LENGTH = 16;

/**
 * Generate a 16 character identifier over [0-9A-Za-z].
 * ~95 bits of entropy; collisions are possible but not expected below
 * roughly 1e14 identifiers.
 */
export function newIdentifier(): string {
  let result = '';
  for (let i = 0; i < IDENTIFIER_LENGTH; i++) {
    result += ALPHABET[randomInt(ALPHABET.length)];
  }
  return result;
}
