/**
 * PDF cells to stored document assets
 *
 * @module features/encoders/document
 */

import { PDFDocument, openPdf, savePdf, type OpenedPdf } from '../../codecs/pdf'
import { TypeMismatchError } from '../../errors'
import { createPdfFile } from '../../assets/writers'
import { localFileExists, readLocalFile } from '../../assets/local-files'
import type { DocumentSource } from '../../types/row'
import { describeValue, isBytes, isPlainObject } from '../../utils/describe'
import { appendHashSuffix } from '../path-hash'
import { errorContext, type EncoderInput } from './context'

async function toOpenedPdf(input: EncoderInput): Promise<OpenedPdf> {
  const { value } = input
  if (value instanceof PDFDocument) {
    return savePdf(value)
  }
  if (isBytes(value)) {
    return openPdf(value)
  }
  if (isPlainObject(value)) {
    if (isBytes(value.bytes) && value.bytes.length > 0) {
      return openPdf(value.bytes)
    }
    if (typeof value.path === 'string' && (await localFileExists(value.path))) {
      return openPdf(await readLocalFile(value.path))
    }
  }
  throw new TypeMismatchError(
    `PDF cell must be a PDF document or an encoded dict of a PDF, but got ${describeValue(value)}`,
    { ...errorContext(input), expected: 'Pdf' }
  )
}

/**
 * Store a PDF cell with its size and page count
 *
 * @returns null for a null cell
 */
export async function encodeDocument(input: EncoderInput): Promise<DocumentSource | null> {
  const { value, context, rowIdx, column, path } = input
  if (value === null || value === undefined) {
    return null
  }
  const pdf = await toOpenedPdf(input)
  return createPdfFile({
    client: context.storage,
    target: {
      location: context.location,
      rowIdx,
      column,
      filename: `${appendHashSuffix('document', path)}.pdf`,
    },
    pdf,
  })
}
