import type {
  Tool,
  ToolConfiguration
} from '@aws-sdk/client-bedrock-runtime'

export type SpecValue = string | number

export interface SpecField {
  key: string
  type: 'string' | 'number'
  /** Line used in the instruction prompt. */
  label: string
  /** Description carried in the tool's JSON schema. */
  description: string
}

const NAME_AND_CPU: SpecField[] = [
  {
    key: 'name',
    type: 'string',
    label: 'name of pc',
    description: 'Name of the PC'
  },
  {
    key: 'cpu',
    type: 'string',
    label: 'name of cpu',
    description: 'Name of the CPU'
  },
  {
    key: 'ram',
    type: 'number',
    label: 'amount of RAM (in GB)',
    description: 'Amount of RAM in GB'
  },
  {
    key: 'storage',
    type: 'number',
    label: 'amount of storage (in GB)',
    description: 'Amount of storage in GB'
  }
]

const MONITOR_AND_PRICE: SpecField[] = [
  {
    key: 'monitor_size',
    type: 'number',
    label: 'size of monitor (in inches)',
    description: 'Size of monitor in inches'
  },
  {
    key: 'price',
    type: 'number',
    label: 'price (in yen)',
    description: 'Price in Japanese yen'
  }
]

/**
 * Field sets the extraction tool can declare. `dimensions` is the canonical
 * one; `resolution` keeps the monitor resolution as a single `1920x1080`
 * style string.
 */
export const SPEC_SCHEMAS = {
  dimensions: [
    ...NAME_AND_CPU,
    {
      key: 'resolution_width',
      type: 'number',
      label: 'resolution width (in pixels)',
      description: 'Width of monitor resolution in pixels'
    },
    {
      key: 'resolution_height',
      type: 'number',
      label: 'resolution height (in pixels)',
      description: 'Height of monitor resolution in pixels'
    },
    ...MONITOR_AND_PRICE
  ],
  resolution: [
    ...NAME_AND_CPU,
    {
      key: 'resolution',
      type: 'string',
      label: 'resolution of monitor (like 1920x1080)',
      description: 'Resolution of monitor (like 1920x1080)'
    },
    ...MONITOR_AND_PRICE
  ]
} satisfies Record<string, SpecField[]>

export type SpecSchemaName = keyof typeof SPEC_SCHEMAS

export const SPEC_SCHEMA_NAMES = [
  'dimensions',
  'resolution'
] as const satisfies readonly SpecSchemaName[]

export const TOOL_NAME = 'json_tool'

export const defaultFor = (field: SpecField): SpecValue =>
  field.type === 'string' ? '' : 0

export const buildTool = (fields: SpecField[]): Tool => {
  const properties: Record<string, { type: string; description: string }> = {}
  for (const field of fields)
    properties[field.key] = {
      type: field.type,
      description: field.description
    }

  return {
    toolSpec: {
      name: TOOL_NAME,
      description: 'Generate a JSON object with PC specifications',
      inputSchema: {
        json: {
          type: 'object',
          properties,
          required: fields.map((field) => field.key)
        }
      }
    }
  }
}

// the model must answer through the tool, never in free text
export const buildToolConfig = (fields: SpecField[]): ToolConfiguration => ({
  tools: [buildTool(fields)],
  toolChoice: { tool: { name: TOOL_NAME } }
})
