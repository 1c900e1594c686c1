import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime'
import { DynamoDBClient } from '@aws-sdk/client-dynamodb'
import { S3Client } from '@aws-sdk/client-s3'
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb'
import { loadConfig } from './config'
import { createHandler } from './pipeline'

// fails the cold start when the table or model id is missing
const config = loadConfig()

const s3 = new S3Client({})
const bedrock = new BedrockRuntimeClient({})
const ddb = DynamoDBDocumentClient.from(new DynamoDBClient({}), {
  marshallOptions: { removeUndefinedValues: true }
})

export const handler = createHandler({ s3, bedrock, ddb, config })
