/**
 * Short printable excerpts of arbitrary cell values for error messages
 */

import { MAX_VALUE_EXCERPT_LENGTH } from '../constants'

/**
 * Render a value for an error message, truncated with '...'
 *
 * @example
 * ```typescript
 * describeValue({ a: 1 })  // '{"a":1}'
 * describeValue(new Uint8Array(3)) // 'Uint8Array(3)'
 * ```
 */
export function describeValue(value: unknown, maxLength = MAX_VALUE_EXCERPT_LENGTH): string {
  let text: string
  if (value instanceof Uint8Array) {
    text = `${value.constructor.name}(${value.length})`
  } else if (typeof value === 'string') {
    text = JSON.stringify(value)
  } else {
    try {
      text =
        JSON.stringify(value, (_key, v: unknown) =>
          v instanceof Uint8Array ? `<${v.length} bytes>` : v
        ) ?? String(value)
    } catch {
      // Cyclic or otherwise unserializable
      text = Object.prototype.toString.call(value)
    }
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text
}

/**
 * Plain object check (not an array, not a class instance such as Uint8Array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Byte sequence check; Node Buffers are Uint8Arrays too
 */
export function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array
}
