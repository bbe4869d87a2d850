import { Config, OutputFormat, outputFormats } from './types'
import { ConfigError } from './errors'
import { resolvePath } from './utils'

export const defaultParentAnnotation = 'hnc.x-k8s.io/subnamespace-of'

export const isOutputFormat = (value: string): value is OutputFormat =>
  outputFormats.some((format) => format === value)

type ConfigInput = {
  kubeconfig?: string
  output?: string
  annotation?: string
  verbose?: boolean
}

export const createConfig = ({
  kubeconfig,
  output = 'tree',
  annotation = defaultParentAnnotation,
  verbose = false
}: ConfigInput): Config => {
  if (!isOutputFormat(output)) {
    throw new ConfigError(
      `Unknown output format '${output}', expected one of: ${outputFormats.join(', ')}`
    )
  }

  return {
    kubeconfig: resolvePath(kubeconfig),
    outputFormat: output,
    parentAnnotation: annotation,
    verbose
  }
}
