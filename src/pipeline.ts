import type { S3Event } from 'aws-lambda'
import { buildContent, documentNameFor } from './build-content'
import type { PipelineConfig } from './config'
import { MalformedEventError } from './errors'
import { extractSpecs, type ModelInvoker } from './extract-specs'
import { fetchObject, type ObjectReader } from './fetch-object'
import { classifyKey, formatLabel } from './file-types'
import { normalizeSpecs } from './normalize'
import { SPEC_SCHEMAS } from './spec-fields'
import { ensureName, storeRecord, type RecordWriter } from './store-record'

export interface PipelineDeps {
  s3: ObjectReader
  bedrock: ModelInvoker
  ddb: RecordWriter
  config: PipelineConfig
  generateName?: () => string
}

export type ObjectOutcome =
  | { status: 'stored'; key: string; name: string; format: string }
  | { status: 'rejected'; key: string; extension: string }

export interface HandlerResult {
  statusCode: 200 | 400
  body: string
}

// S3 notifications URL-encode keys and turn spaces into '+'
export const decodeObjectKey = (key: string): string =>
  decodeURIComponent(key.replace(/\+/g, ' '))

const logFailure = (key: string, err: unknown): void => {
  console.error('Error processing file', {
    key,
    error: err instanceof Error ? err.message : String(err)
  })
}

export const processObject = async (
  deps: PipelineDeps,
  bucket: string,
  key: string
): Promise<ObjectOutcome> => {
  const { config } = deps

  const classification = classifyKey(key)
  if (!classification.supported) {
    console.error('Unsupported file type', {
      key,
      extension: classification.extension
    })
    return { status: 'rejected', key, extension: classification.extension }
  }

  const { fileType } = classification
  const format = formatLabel(fileType)
  console.log('Processing file', { key, bucket, format })

  try {
    const fields = SPEC_SCHEMAS[config.specSchema]
    const bytes = await fetchObject(deps.s3, bucket, key)
    const content = buildContent(fileType, bytes, documentNameFor(key), fields)
    const raw = await extractSpecs(deps.bedrock, config.modelId, content, fields)
    const specs = config.normalizeResult ? normalizeSpecs(raw, fields) : raw
    const record = ensureName(specs, deps.generateName)
    await storeRecord(deps.ddb, config.tableName, record)

    return { status: 'stored', key, name: record.name, format }
  } catch (err) {
    logFailure(key, err)
    throw err
  }
}

const messageFor = (outcome: ObjectOutcome): string =>
  outcome.status === 'stored'
    ? `Successfully processed PC specs from ${outcome.format} file`
    : `Unsupported file type: ${outcome.extension}`

/**
 * Builds the Lambda handler around injected clients. Records are processed
 * one after another; the first fatal error stops the batch and is re-thrown
 * so Lambda's retry and failure destinations apply.
 */
export const createHandler =
  (deps: PipelineDeps) =>
  async (event: S3Event): Promise<HandlerResult> => {
    const records = event.Records ?? []
    if (records.length === 0)
      throw new MalformedEventError('S3 event contains no records')

    const outcomes: ObjectOutcome[] = []
    for (const record of records) {
      const bucket = record.s3.bucket.name
      const rawKey = record.s3.object.key
      let key: string
      try {
        key = decodeObjectKey(rawKey)
      } catch (err) {
        logFailure(rawKey, err)
        throw err
      }
      outcomes.push(await processObject(deps, bucket, key))
    }

    const rejected = outcomes.some((outcome) => outcome.status === 'rejected')
    return {
      statusCode: rejected ? 400 : 200,
      body: JSON.stringify(outcomes.map(messageFor).join('\n'))
    }
  }
