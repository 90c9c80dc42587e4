/**
 * Deterministic asset name suffixes from structural paths
 *
 * Media nested inside lists and structs share a column, so their file names
 * get a suffix derived from where they sit in the cell. The suffix must be
 * stable across runs for asset URLs to be reproducible.
 *
 * @module features/path-hash
 */

import type { StructuralPath } from '../types/row'

const ADLER_MOD = 65521

/**
 * Adler-32 checksum of a byte sequence
 *
 * @returns Unsigned 32-bit checksum
 */
export function adler32(data: Uint8Array): number {
  let a = 1
  let b = 0
  for (const byte of data) {
    a = (a + byte) % ADLER_MOD
    b = (b + a) % ADLER_MOD
  }
  return ((b << 16) | a) >>> 0
}

/**
 * JSON string literal escaped to ASCII
 *
 * Non-ASCII code units become lowercase `\uXXXX` escapes so the encoded
 * bytes are the same whatever the string's script.
 */
function asciiJsonString(value: string): string {
  let out = '"'
  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i)
    const code = value.charCodeAt(i)
    switch (char) {
      case '"':
        out += '\\"'
        break
      case '\\':
        out += '\\\\'
        break
      case '\n':
        out += '\\n'
        break
      case '\r':
        out += '\\r'
        break
      case '\t':
        out += '\\t'
        break
      case '\b':
        out += '\\b'
        break
      case '\f':
        out += '\\f'
        break
      default:
        out += code < 0x20 || code > 0x7e ? `\\u${code.toString(16).padStart(4, '0')}` : char
    }
  }
  return out + '"'
}

/**
 * Canonical serialization of a structural path
 *
 * @example
 * ```typescript
 * serializePath([0, 'a']) // '[0, "a"]'
 * ```
 */
export function serializePath(path: StructuralPath): string {
  const items = path.map(item => (typeof item === 'number' ? String(item) : asciiJsonString(item)))
  return `[${items.join(', ')}]`
}

/**
 * Append a hash of the structural path to a base name
 *
 * - no suffix if the path is empty
 * - otherwise `{base}-{hex}` with an 8-digit lowercase hex Adler-32 of the path
 *
 * @example
 * ```typescript
 * appendHashSuffix('image')        // 'image'
 * appendHashSuffix('image', [0])   // 'image-01d100e9'
 * ```
 */
export function appendHashSuffix(base: string, path: StructuralPath = []): string {
  if (path.length === 0) {
    return base
  }
  const checksum = adler32(new TextEncoder().encode(serializePath(path)))
  return `${base}-${checksum.toString(16).padStart(8, '0')}`
}
