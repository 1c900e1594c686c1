import type { ContentBlock } from '@aws-sdk/client-bedrock-runtime'
import path from 'node:path'
import { DecodingError } from './errors'
import type { FileType } from './file-types'
import { buildExtractionPrompt } from './prompts'
import type { SpecField } from './spec-fields'

/**
 * Bedrock only accepts letters, digits, hyphens, parentheses, square brackets
 * and single spaces in a document name.
 */
export const documentNameFor = (key: string): string => {
  const base = path.basename(key, path.extname(key))
  const cleaned = base
    .replace(/[^A-Za-z0-9\s\-()[\]]/g, '-')
    .replace(/\s+/g, ' ')
    .trim()
  return cleaned || 'document'
}

export const decodeText = (bytes: Uint8Array): string => {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch (err) {
    throw new DecodingError('Text file is not valid UTF-8', { cause: err })
  }
}

const fileBlock = (
  fileType: FileType,
  bytes: Uint8Array,
  documentName: string
): ContentBlock => {
  switch (fileType.kind) {
    case 'image':
      return { image: { format: fileType.format, source: { bytes } } }
    case 'document':
      return {
        document: {
          format: fileType.format,
          name: documentName,
          source: { bytes }
        }
      }
    case 'text':
      return { text: decodeText(bytes) }
  }
}

/** File first, instruction last. */
export const buildContent = (
  fileType: FileType,
  bytes: Uint8Array,
  documentName: string,
  fields: SpecField[]
): ContentBlock[] => [
  fileBlock(fileType, bytes, documentName),
  { text: buildExtractionPrompt(fields) }
]
