import { PutCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb'
import crypto from 'node:crypto'

export type RecordWriter = Pick<DynamoDBDocumentClient, 'send'>

export type PcSpecRecord = Record<string, unknown> & { name: string }

export const generateRecordName = (): string => `pc-${crypto.randomUUID()}`

/** The table's partition key must never be blank. */
export const ensureName = (
  specs: Record<string, unknown>,
  generateName: () => string = generateRecordName
): PcSpecRecord => {
  const { name } = specs
  return typeof name === 'string' && name.trim() !== ''
    ? { ...specs, name }
    : { ...specs, name: generateName() }
}

// unconditional put: a colliding name overwrites the earlier item
export const storeRecord = async (
  ddb: RecordWriter,
  tableName: string,
  record: PcSpecRecord
): Promise<void> => {
  await ddb.send(new PutCommand({ TableName: tableName, Item: record }))
  console.log('Stored PC specs', { name: record.name })
}
