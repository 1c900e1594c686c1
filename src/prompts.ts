import type { SpecField } from './spec-fields'

export const EXTRACTION_SYSTEM_PROMPT = `
You are a PC-listing extraction function. Respond only with data, not commentary.
The user supplies one hardware listing (a screenshot, a PDF flyer or plain text)
and you report its specifications through the provided tool.
`

const EXTRACTION_FOOTER = `
Return ONLY a valid JSON object with these fields. If a field is not found or cannot be determined,
use an empty string for string fields and 0 for numeric fields.
`

/** Instruction block that always follows the uploaded content. */
export const buildExtractionPrompt = (fields: SpecField[]): string =>
  [
    'Extract the following PC specifications and format them as JSON:',
    ...fields.map((field) => `- ${field.label}`),
    EXTRACTION_FOOTER
  ].join('\n')
