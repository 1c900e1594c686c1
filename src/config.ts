import { z } from 'zod'
import { ConfigurationError } from './errors'
import { SPEC_SCHEMA_NAMES, type SpecSchemaName } from './spec-fields'

const EnvSchema = z.object({
  DYNAMODB_TABLE_NAME: z.string().min(1, 'DYNAMODB_TABLE_NAME is required'),
  BEDROCK_MODEL_ID: z.string().min(1, 'BEDROCK_MODEL_ID is required'),
  SPEC_SCHEMA: z.enum(SPEC_SCHEMA_NAMES).default('dimensions'),
  NORMALIZE_RESULT: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true')
})

export interface PipelineConfig {
  tableName: string
  modelId: string
  specSchema: SpecSchemaName
  normalizeResult: boolean
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): PipelineConfig => {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid environment: ${issues}`)
  }

  const { DYNAMODB_TABLE_NAME, BEDROCK_MODEL_ID, SPEC_SCHEMA, NORMALIZE_RESULT } =
    parsed.data
  return {
    tableName: DYNAMODB_TABLE_NAME,
    modelId: BEDROCK_MODEL_ID,
    specSchema: SPEC_SCHEMA,
    normalizeResult: NORMALIZE_RESULT
  }
}
