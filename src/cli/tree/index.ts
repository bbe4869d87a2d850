import { Command } from 'commander'
import * as colors from 'colorette'
import { InputParams } from './types'
import {
  annotationOption,
  kubeconfigOption,
  outputOption,
  verboseOption
} from '../commonOptions'
import { buildForest } from '../../lib/buildForest'
import { createConfig } from '../../lib/config'
import { fetchResources } from '../../lib/namespaces'
import { renderForest } from '../../lib/render'
import { Config, Resource } from '../../lib/types'

const createLogger = (verbose: boolean) => (...args: unknown[]) => {
  if (verbose) {
    console.error(colors.dim(args.join(' ')))
  }
}

export const runTree = async (
  config: Config,
  fetch: (config: Config) => Promise<Resource[]> = fetchResources
) => {
  const log = createLogger(config.verbose)

  log('Loading kubeconfig from', config.kubeconfig ?? 'default locations')
  const resources = await fetch(config)
  log('Found', resources.length, 'namespaces')

  const roots = buildForest(resources)
  log('Built forest with', roots.length, 'roots')

  renderForest(roots, config.outputFormat)
}

export default function createTree(program: Command) {
  program
    .description(
      'Print the hierarchy of namespaces, read from the parent annotation of each namespace'
    )
    .option(...kubeconfigOption)
    .addOption(outputOption)
    .option(...annotationOption)
    .option(...verboseOption)
    .action((data: InputParams) => runTree(createConfig(data)))
}
