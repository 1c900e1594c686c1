#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib'
import {
  DEFAULT_MODEL_ID,
  PcSpecsPipelineStack
} from '../lib/pc-specs-pipeline-stack'
import { SPEC_SCHEMA_NAMES, type SpecSchemaName } from '../src/spec-fields'

const app = new cdk.App()

const appName = 'pc-specs'
const environment = app.node.tryGetContext('environment') || 'dev'
const modelId = app.node.tryGetContext('modelId') || DEFAULT_MODEL_ID

const isSpecSchemaName = (value: unknown): value is SpecSchemaName =>
  SPEC_SCHEMA_NAMES.some((name) => name === value)

const specSchema: unknown =
  app.node.tryGetContext('specSchema') ?? 'dimensions'
if (!isSpecSchemaName(specSchema))
  throw new Error(
    `Unknown specSchema "${String(specSchema)}", expected one of ${SPEC_SCHEMA_NAMES.join(', ')}`
  )

// `-c normalizeResult=false` arrives as a string
const normalizeResult =
  String(app.node.tryGetContext('normalizeResult') ?? 'true') !== 'false'

const pipelineStack = new PcSpecsPipelineStack(
  app,
  `${appName}-${environment}-pipeline-stack`,
  {
    appName,
    environment,
    modelId,
    specSchema,
    normalizeResult,
    description: 'PC specs extraction pipeline (S3 -> Bedrock -> DynamoDB)',
    env: {
      account: process.env.CDK_DEFAULT_ACCOUNT,
      region: process.env.CDK_DEFAULT_REGION
    }
  }
)

// Add tags to all stacks
const tags = {
  Environment: environment,
  Service: 'pc-specs-pipeline',
  Application: appName
}

Object.entries(tags).forEach(([key, value]) => {
  cdk.Tags.of(pipelineStack).add(key, value)
})
