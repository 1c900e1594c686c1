import {
  ConverseCommand,
  type BedrockRuntimeClient,
  type ContentBlock,
  type ConverseCommandOutput
} from '@aws-sdk/client-bedrock-runtime'
import { InferenceError } from './errors'
import { EXTRACTION_SYSTEM_PROMPT } from './prompts'
import { buildToolConfig, type SpecField } from './spec-fields'

export type ModelInvoker = Pick<BedrockRuntimeClient, 'send'>

/** Tool input as returned by the model, before normalization. */
export type RawSpecs = Record<string, unknown>

const isRecord = (value: unknown): value is RawSpecs =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/** Input of the last tool-use block in the assistant message. */
export const toolInputFrom = (resp: ConverseCommandOutput): RawSpecs => {
  const toolUses = (resp.output?.message?.content ?? []).flatMap((block) =>
    block.toolUse ? [block.toolUse] : []
  )
  const input = toolUses.pop()?.input

  // an empty object carries no extraction either
  if (!isRecord(input) || Object.keys(input).length === 0)
    throw new InferenceError('Failed to extract PC specs from Bedrock response')

  return input
}

export const extractSpecs = async (
  client: ModelInvoker,
  modelId: string,
  content: ContentBlock[],
  fields: SpecField[]
): Promise<RawSpecs> => {
  const resp = await client.send(
    new ConverseCommand({
      modelId,
      system: [{ text: EXTRACTION_SYSTEM_PROMPT }],
      messages: [{ role: 'user', content }],
      toolConfig: buildToolConfig(fields),
      inferenceConfig: { maxTokens: 4096, temperature: 0 }
    })
  )

  console.log('Bedrock responded', {
    stopReason: resp.stopReason,
    usage: resp.usage
  })

  return toolInputFrom(resp)
}
