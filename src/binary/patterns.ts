/**
 * Byte subsequence search. Brute-force O(n*m) scans; fine for the short
 * markers these are meant for.
 */

function matchesAt(bytes: Uint8Array, pattern: Uint8Array, offset: number): boolean {
  if (offset + pattern.length > bytes.length) return false;
  for (let j = 0; j < pattern.length; j++) {
    if (bytes[offset + j] !== pattern[j]) return false;
  }
  return true;
}

/**
 * Every start offset where `pattern` occurs; overlapping matches are all
 * reported. An empty pattern matches nowhere.
 */
export function findPattern(bytes: Uint8Array, pattern: Uint8Array): number[] {
  if (pattern.length === 0) return [];
  const out: number[] = [];
  for (let i = 0; i + pattern.length <= bytes.length; i++) {
    if (matchesAt(bytes, pattern, i)) out.push(i);
  }
  return out;
}

/**
 * Single left-to-right pass: on a match emit `replacement` and skip past the
 * match, otherwise copy one byte. Output is never re-scanned, so a
 * replacement that creates a new match is left alone.
 */
export function replacePattern(bytes: Uint8Array, oldPattern: Uint8Array, replacement: Uint8Array): Uint8Array {
  if (oldPattern.length === 0) return bytes.slice();
  const out: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    if (matchesAt(bytes, oldPattern, i)) {
      for (const b of replacement) out.push(b);
      i += oldPattern.length;
    } else {
      out.push(bytes[i]);
      i++;
    }
  }
  return Uint8Array.from(out);
}

export const startsWith = (bytes: Uint8Array, prefix: Uint8Array): boolean => matchesAt(bytes, prefix, 0);

export const endsWith = (bytes: Uint8Array, suffix: Uint8Array): boolean =>
  suffix.length <= bytes.length && matchesAt(bytes, suffix, bytes.length - suffix.length);
