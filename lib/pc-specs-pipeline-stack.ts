import * as cdk from 'aws-cdk-lib'
import { Construct } from 'constructs'
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb'
import * as lambda from 'aws-cdk-lib/aws-lambda'
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs'
import { Duration, RemovalPolicy } from 'aws-cdk-lib'
import * as s3 from 'aws-cdk-lib/aws-s3'
import * as s3n from 'aws-cdk-lib/aws-s3-notifications'
import * as iam from 'aws-cdk-lib/aws-iam'
import { SUPPORTED_EXTENSIONS } from '../src/file-types'
import type { SpecSchemaName } from '../src/spec-fields'

export const DEFAULT_MODEL_ID = 'us.anthropic.claude-sonnet-4-20250514-v1:0'

export interface PcSpecsPipelineStackProps extends cdk.StackProps {
  appName: string
  environment: string
  modelId?: string
  specSchema?: SpecSchemaName
  normalizeResult?: boolean
}

const INFERENCE_PROFILE_PREFIX = /^(us|eu|apac|us-gov|global)\./

/**
 * ARNs a Converse call on `modelId` needs. A cross-region inference profile
 * routes to the foundation model in any region of its geography.
 */
export const bedrockModelArns = (
  modelId: string,
  region: string,
  account: string
): string[] => {
  const profile = INFERENCE_PROFILE_PREFIX.exec(modelId)
  if (!profile)
    return [`arn:aws:bedrock:${region}::foundation-model/${modelId}`]

  const baseModelId = modelId.slice(profile[0].length)
  return [
    `arn:aws:bedrock:${region}:${account}:inference-profile/${modelId}`,
    `arn:aws:bedrock:*::foundation-model/${baseModelId}`
  ]
}

export class PcSpecsPipelineStack extends cdk.Stack {
  readonly bucket: s3.Bucket
  readonly table: dynamodb.Table
  readonly processUploadFn: nodejs.NodejsFunction

  constructor(scope: Construct, id: string, props: PcSpecsPipelineStackProps) {
    super(scope, id, props)
    const {
      appName,
      environment,
      modelId = DEFAULT_MODEL_ID,
      specSchema = 'dimensions',
      normalizeResult = true
    } = props

    /* -------------------------------------------------------- */
    /* 1.  Upload bucket and record table                       */
    /* -------------------------------------------------------- */

    this.bucket = new s3.Bucket(this, 'PcSpecsFilesBucket', {
      removalPolicy: RemovalPolicy.DESTROY,
      autoDeleteObjects: true
    })

    this.table = new dynamodb.Table(this, 'PcSpecsTable', {
      partitionKey: { name: 'name', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: RemovalPolicy.DESTROY
    })

    /* -------------------------------------------------------- */
    /* 2.  Lambda                                               */
    /* -------------------------------------------------------- */

    this.processUploadFn = new nodejs.NodejsFunction(this, 'ProcessUploadFn', {
      entry: 'src/process-upload.ts',
      runtime: lambda.Runtime.NODEJS_20_X,
      memorySize: 512,
      timeout: Duration.seconds(60),
      environment: {
        DYNAMODB_TABLE_NAME: this.table.tableName,
        BEDROCK_MODEL_ID: modelId,
        SPEC_SCHEMA: specSchema,
        NORMALIZE_RESULT: String(normalizeResult)
      },
      bundling: { nodeModules: ['@aws-sdk/client-bedrock-runtime'] }
    })

    this.bucket.grantRead(this.processUploadFn)
    this.table.grant(this.processUploadFn, 'dynamodb:PutItem')

    // least-privilege permission
    const { region, account } = cdk.Stack.of(this)
    this.processUploadFn.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['bedrock:InvokeModel'],
        resources: bedrockModelArns(modelId, region, account)
      })
    )

    /* -------------------------------------------------------- */
    /* 3.  One notification per supported suffix                */
    /* -------------------------------------------------------- */

    // suffix filters are case-sensitive, classification is not
    for (const extension of SUPPORTED_EXTENSIONS.keys()) {
      for (const suffix of [extension, extension.toUpperCase()]) {
        this.bucket.addEventNotification(
          s3.EventType.OBJECT_CREATED,
          new s3n.LambdaDestination(this.processUploadFn),
          { suffix }
        )
      }
    }

    /* -------------------------------------------------------- */
    /* 4.  Outputs                                              */
    /* -------------------------------------------------------- */

    const exportPrefix = `${appName}-${environment}`
    new cdk.CfnOutput(this, 'BucketName', {
      value: this.bucket.bucketName,
      exportName: `${exportPrefix}-bucket-name`
    })
    new cdk.CfnOutput(this, 'TableName', {
      value: this.table.tableName,
      exportName: `${exportPrefix}-table-name`
    })
    new cdk.CfnOutput(this, 'FunctionName', {
      value: this.processUploadFn.functionName,
      exportName: `${exportPrefix}-process-upload-fn-name`
    })
  }
}
