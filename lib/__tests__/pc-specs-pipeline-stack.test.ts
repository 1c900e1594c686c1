import * as cdk from 'aws-cdk-lib'
import { Match, Template } from 'aws-cdk-lib/assertions'
import { describe, expect, it } from 'vitest'
import {
  DEFAULT_MODEL_ID,
  PcSpecsPipelineStack,
  bedrockModelArns,
  type PcSpecsPipelineStackProps
} from '../pc-specs-pipeline-stack'

const synth = (overrides: Partial<PcSpecsPipelineStackProps> = {}) => {
  // skip esbuild: the template is all that is asserted
  const app = new cdk.App({ context: { 'aws:cdk:bundling-stacks': [] } })
  const stack = new PcSpecsPipelineStack(app, 'PipelineTestStack', {
    appName: 'pc-specs',
    environment: 'test',
    env: { account: '123456789012', region: 'us-east-1' },
    ...overrides
  })
  return Template.fromStack(stack)
}

describe('PcSpecsPipelineStack', () => {
  const template = synth()

  it('keys the record table by name', () => {
    template.hasResource('AWS::DynamoDB::Table', {
      Properties: {
        KeySchema: [{ AttributeName: 'name', KeyType: 'HASH' }],
        AttributeDefinitions: [{ AttributeName: 'name', AttributeType: 'S' }],
        BillingMode: 'PAY_PER_REQUEST'
      },
      DeletionPolicy: 'Delete'
    })
  })

  it('runs the handler on Node.js 20 with a 60 second timeout', () => {
    template.hasResourceProperties('AWS::Lambda::Function', {
      Runtime: 'nodejs20.x',
      MemorySize: 512,
      Timeout: 60,
      Environment: {
        Variables: {
          DYNAMODB_TABLE_NAME: Match.anyValue(),
          BEDROCK_MODEL_ID: DEFAULT_MODEL_ID,
          SPEC_SCHEMA: 'dimensions',
          NORMALIZE_RESULT: 'true'
        }
      }
    })
  })

  it('notifies the function for every supported suffix in both cases', () => {
    const [notifications] = Object.values(
      template.findResources('Custom::S3BucketNotifications')
    )
    const configs =
      notifications.Properties.NotificationConfiguration
        .LambdaFunctionConfigurations
    const suffixes = configs.map(
      (config: { Filter: { Key: { FilterRules: { Value: string }[] } } }) =>
        config.Filter.Key.FilterRules[0].Value
    )

    expect(suffixes).toEqual([
      '.png',
      '.PNG',
      '.jpg',
      '.JPG',
      '.jpeg',
      '.JPEG',
      '.pdf',
      '.PDF',
      '.txt',
      '.TXT'
    ])
  })

  it('scopes Bedrock access to the configured inference profile', () => {
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: 'bedrock:InvokeModel',
            Effect: 'Allow',
            Resource: [
              `arn:aws:bedrock:us-east-1:123456789012:inference-profile/${DEFAULT_MODEL_ID}`,
              'arn:aws:bedrock:*::foundation-model/anthropic.claude-sonnet-4-20250514-v1:0'
            ]
          })
        ])
      }
    })
  })

  it('grants read on the bucket and put on the table only', () => {
    template.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: Match.arrayWith(['s3:GetObject*']),
            Effect: 'Allow'
          }),
          Match.objectLike({ Action: 'dynamodb:PutItem', Effect: 'Allow' })
        ])
      }
    })
  })

  it('exports resource names under the app and environment', () => {
    template.hasOutput('BucketName', {
      Export: { Name: 'pc-specs-test-bucket-name' }
    })
    template.hasOutput('TableName', {
      Export: { Name: 'pc-specs-test-table-name' }
    })
  })

  it('passes schema and normalization settings to the function', () => {
    const custom = synth({
      modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
      specSchema: 'resolution',
      normalizeResult: false
    })

    custom.hasResourceProperties('AWS::Lambda::Function', {
      Environment: {
        Variables: Match.objectLike({
          BEDROCK_MODEL_ID: 'anthropic.claude-3-haiku-20240307-v1:0',
          SPEC_SCHEMA: 'resolution',
          NORMALIZE_RESULT: 'false'
        })
      }
    })
    custom.hasResourceProperties('AWS::IAM::Policy', {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: 'bedrock:InvokeModel',
            Resource:
              'arn:aws:bedrock:us-east-1::foundation-model/anthropic.claude-3-haiku-20240307-v1:0'
          })
        ])
      }
    })
  })
})

describe('bedrockModelArns', () => {
  it('covers the profile and its foundation model in every region', () => {
    expect(
      bedrockModelArns(
        'eu.anthropic.claude-3-haiku-20240307-v1:0',
        'eu-west-1',
        '111122223333'
      )
    ).toEqual([
      'arn:aws:bedrock:eu-west-1:111122223333:inference-profile/eu.anthropic.claude-3-haiku-20240307-v1:0',
      'arn:aws:bedrock:*::foundation-model/anthropic.claude-3-haiku-20240307-v1:0'
    ])
  })

  it('uses the regional foundation model for plain model ids', () => {
    expect(
      bedrockModelArns(
        'anthropic.claude-3-haiku-20240307-v1:0',
        'us-west-2',
        '111122223333'
      )
    ).toEqual([
      'arn:aws:bedrock:us-west-2::foundation-model/anthropic.claude-3-haiku-20240307-v1:0'
    ])
  })
})
