/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  ArityMismatchError,
  ConfigurationError,
  EncodingExhaustedError,
  ErrorCode,
  FileNotFoundError,
  MissingExtensionError,
  PathTraversalError,
  RowAssetsError,
  StorageError,
  TypeMismatchError,
  UnknownFeatureTypeError,
  isRowAssetsError,
  isStorageError,
  wrapError,
} from '../../src/errors'

describe('RowAssetsError', () => {
  it('defaults to the UNKNOWN code and an empty context', () => {
    const error = new RowAssetsError('boom')
    expect(error.code).toBe(ErrorCode.UNKNOWN)
    expect(error.context).toEqual({})
    expect(error).toBeInstanceOf(Error)
  })

  it('serializes with its context and cause', () => {
    const cause = new FileNotFoundError('a/b.png')
    const error = new RowAssetsError('failed', ErrorCode.INTERNAL, { column: 'image' }, cause)
    const json = error.toJSON()

    expect(json.name).toBe('RowAssetsError')
    expect(json.code).toBe(ErrorCode.INTERNAL)
    expect(json.context).toEqual({ column: 'image' })
    expect(json.cause?.code).toBe(ErrorCode.FILE_NOT_FOUND)
    expect(json.cause?.message).toBe('File not found: a/b.png')
  })

  it('leaves the context out when it is empty', () => {
    expect(new RowAssetsError('x').toJSON().context).toBeUndefined()
  })

  it('round-trips through fromJSON', () => {
    const original = new RowAssetsError('failed', ErrorCode.TYPE_MISMATCH, { rowIdx: 2 })
    const restored = RowAssetsError.fromJSON(original.toJSON())
    expect(restored.message).toBe('failed')
    expect(restored.is(ErrorCode.TYPE_MISMATCH)).toBe(true)
    expect(restored.context).toEqual({ rowIdx: 2 })
  })
})

describe('cell errors', () => {
  it('TypeMismatchError keeps where the cell is', () => {
    const error = new TypeMismatchError('not a list', {
      column: 'images',
      rowIdx: 4,
      path: [1],
      expected: 'List',
    })
    expect(error).toBeInstanceOf(RowAssetsError)
    expect(error.name).toBe('TypeMismatchError')
    expect(error.code).toBe(ErrorCode.TYPE_MISMATCH)
    expect(error.context).toEqual({ column: 'images', rowIdx: 4, path: [1], expected: 'List' })
  })

  it('ArityMismatchError reports both lengths', () => {
    const error = new ArityMismatchError(2, 3)
    expect(error.message).toBe('List cell length should be 2 as declared by its feature, got 3')
    expect(error.expectedLength).toBe(2)
    expect(error.actualLength).toBe(3)
  })

  it('UnknownFeatureTypeError exposes the feature type', () => {
    expect(new UnknownFeatureTypeError('Hologram').featureType).toBe('Hologram')
  })

  it('EncodingExhaustedError lists the formats tried', () => {
    const error = new EncodingExhaustedError('Image', ['JPEG', 'PNG'])
    expect(error.message).toBe('Image cannot be written as JPEG or PNG')
    expect(error.formats).toEqual(['JPEG', 'PNG'])
  })

  it('MissingExtensionError names the offending path', () => {
    expect(new MissingExtensionError('video', 'clip').message).toBe(
      `A video sample should have a 'path' with a file name and extension, but got "clip"`
    )
    expect(new MissingExtensionError('video', null).message).toBe(
      `A video sample should have a 'path' with a file name and extension, but got no path`
    )
  })
})

describe('storage errors', () => {
  it('are StorageErrors with a path', () => {
    const notFound = new FileNotFoundError('x.bin')
    const traversal = new PathTraversalError('../x')
    expect(isStorageError(notFound)).toBe(true)
    expect(notFound.path).toBe('x.bin')
    expect(traversal).toBeInstanceOf(StorageError)
    expect(traversal.code).toBe(ErrorCode.PATH_TRAVERSAL)
  })
})

describe('ConfigurationError', () => {
  it('records the offending variable', () => {
    const error = new ConfigurationError('bad', 'ROW_ASSETS_CONCURRENCY')
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG)
    expect(error.context).toEqual({ variable: 'ROW_ASSETS_CONCURRENCY' })
  })
})

describe('wrapError', () => {
  it('returns library errors unchanged', () => {
    const error = new TypeMismatchError('x')
    expect(wrapError(error)).toBe(error)
  })

  it('wraps other errors as INTERNAL with the original as cause', () => {
    const original = new Error('disk on fire')
    const wrapped = wrapError(original, { step: 'write' })
    expect(isRowAssetsError(wrapped)).toBe(true)
    expect(wrapped.code).toBe(ErrorCode.INTERNAL)
    expect(wrapped.cause).toBe(original)
    expect(wrapped.context).toEqual({ step: 'write' })
  })

  it('wraps thrown non-errors as UNKNOWN', () => {
    const wrapped = wrapError('nope')
    expect(wrapped.message).toBe('nope')
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN)
  })
})
