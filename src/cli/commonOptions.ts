import { Option } from 'commander'
import { defaultParentAnnotation } from '../lib/config'
import { outputFormats } from '../lib/types'
import { getDefaultKubeconfigPath } from '../lib/utils'

type OptionMeta2 = [string, string]
type OptionMeta3 = [string, string, string | undefined]

const defaultKubeconfig = getDefaultKubeconfigPath()

export const kubeconfigOption: OptionMeta3 = [
  '--kubeconfig <path>',
  defaultKubeconfig
    ? '(optional) absolute path to the kubeconfig file'
    : 'absolute path to the kubeconfig file',
  defaultKubeconfig
]

export type KubeconfigOptionType = {
  kubeconfig?: string
}

export const outputOption = new Option('-o, --output <format>', 'output format')
  .choices(outputFormats)
  .default('tree')

export type OutputOptionType = {
  output: string
}

export const annotationOption: OptionMeta3 = [
  '-a, --annotation <key>',
  'namespace annotation that holds the name of the parent namespace',
  defaultParentAnnotation
]

export type AnnotationOptionType = {
  annotation: string
}

export const verboseOption: OptionMeta2 = [
  '--verbose',
  'print current action information'
]

export type VerboseOptionType = {
  verbose?: boolean
}
