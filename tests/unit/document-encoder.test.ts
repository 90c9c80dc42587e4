/**
 * PDF encoder tests
 */

import { describe, it, expect } from 'vitest'
import { PDFDocument } from 'pdf-lib'
import { encodeDocument } from '../../src/features/encoders/document'
import { TypeMismatchError } from '../../src/errors'
import type { AssetContext } from '../../src/features/encoders/context'
import type { StructuralPath } from '../../src/types/row'
import { assetKey, assetUrl, createAssetContext, createPdf, createTempDir } from '../helpers'

function input(context: AssetContext, value: unknown, path: StructuralPath = []) {
  return { context, rowIdx: 1, value, column: 'pdf', path }
}

describe('encodeDocument', () => {
  it('returns null for a null cell', async () => {
    const { context } = createAssetContext()
    expect(await encodeDocument(input(context, undefined))).toBeNull()
  })

  it('stores PDF bytes with their size and page count', async () => {
    const { context, backend } = createAssetContext()
    const bytes = await createPdf(3)

    const result = await encodeDocument(input(context, { bytes, path: 'paper.pdf' }))

    expect(result).toEqual({
      src: assetUrl(1, 'pdf', 'document.pdf'),
      sizeBytes: bytes.length,
      pageCount: 3,
    })
    const key = assetKey(1, 'pdf', 'document.pdf')
    expect(await backend.read(key)).toEqual(bytes)
    expect((await backend.stat(key))?.contentType).toBe('application/pdf')
  })

  it('accepts raw bytes and in-memory documents', async () => {
    const { context } = createAssetContext()
    const document = await PDFDocument.create()
    document.addPage()
    document.addPage()

    expect((await encodeDocument(input(context, await createPdf(1))))?.pageCount).toBe(1)
    expect(await encodeDocument(input(context, document, [1]))).toMatchObject({
      src: assetUrl(1, 'pdf', 'document-01d300ea.pdf'),
      pageCount: 2,
    })
  })

  it('reads a PDF from an existing local path', async () => {
    const dir = await createTempDir()
    try {
      const path = await dir.writeFile('paper.pdf', await createPdf(2))
      const { context } = createAssetContext()
      expect((await encodeDocument(input(context, { path })))?.pageCount).toBe(2)
    } finally {
      await dir.cleanup()
    }
  })

  it('rejects values that are not PDFs', async () => {
    const { context } = createAssetContext()
    await expect(encodeDocument(input(context, 'paper.pdf'))).rejects.toThrow(TypeMismatchError)
    await expect(encodeDocument(input(context, { bytes: new Uint8Array(0) }))).rejects.toThrow(
      'PDF cell must be a PDF document or an encoded dict of a PDF, but got {"bytes":"<0 bytes>"}'
    )
  })
})
