/**
 * PDF documents on top of pdf-lib
 *
 * @module codecs/pdf
 */

import { PDFDocument } from 'pdf-lib'

export { PDFDocument }

/** A parsed document with the bytes it should be stored as */
export interface OpenedPdf {
  bytes: Uint8Array
  pageCount: number
}

/**
 * Parse PDF bytes, keeping the original bytes for storage
 */
export async function openPdf(bytes: Uint8Array): Promise<OpenedPdf> {
  const document = await PDFDocument.load(bytes)
  return { bytes, pageCount: document.getPageCount() }
}

/**
 * Serialize an in-memory document
 */
export async function savePdf(document: PDFDocument): Promise<OpenedPdf> {
  const bytes = await document.save()
  return { bytes, pageCount: document.getPageCount() }
}
