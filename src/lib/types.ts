export type Resource = {
  name: string
  parentName?: string
}

export type Node = {
  name: string
  children: Node[]
}

/**
 * Structured shape of a node as emitted in JSON and YAML output.
 * `children` is left out for leaves.
 */
export type SerializedNode = {
  name: string
  children?: SerializedNode[]
}

export const outputFormats = ['tree', 'json', 'yaml'] as const

export type OutputFormat = typeof outputFormats[number]

export type Config = {
  kubeconfig?: string
  outputFormat: OutputFormat
  parentAnnotation: string
  verbose: boolean
}
