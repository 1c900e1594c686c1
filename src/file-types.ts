import path from 'node:path'

export type FileType =
  | { kind: 'image'; format: 'png' | 'jpeg' }
  | { kind: 'document'; format: 'pdf' }
  | { kind: 'text' }

export const SUPPORTED_EXTENSIONS: ReadonlyMap<string, FileType> = new Map<
  string,
  FileType
>([
  ['.png', { kind: 'image', format: 'png' }],
  ['.jpg', { kind: 'image', format: 'jpeg' }],
  ['.jpeg', { kind: 'image', format: 'jpeg' }],
  ['.pdf', { kind: 'document', format: 'pdf' }],
  ['.txt', { kind: 'text' }]
])

export type Classification =
  | { supported: true; fileType: FileType }
  | { supported: false; extension: string }

/** Suffix-only, case-insensitive. The bytes are never inspected. */
export const classifyKey = (key: string): Classification => {
  const extension = path.extname(key).toLowerCase()
  const fileType = SUPPORTED_EXTENSIONS.get(extension)
  return fileType
    ? { supported: true, fileType }
    : { supported: false, extension }
}

// png | jpeg | pdf | text
export const formatLabel = (fileType: FileType): string =>
  fileType.kind === 'text' ? 'text' : fileType.format
