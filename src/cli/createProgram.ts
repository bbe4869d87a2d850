import { Command } from 'commander'
import * as colors from 'colorette'
//eslint-disable-next-line
const pkg = require('../../package.json')

import createTree from './tree'
import { getErrorMessage } from '../lib/errors'

export function createProgram() {
  const program = new Command('namespace-tree')

  program.version(pkg.version, '-v, --version')

  createTree(program)

  return program
}

export const run = (argv: string[], program = createProgram()) =>
  program.parseAsync(argv).then(
    () => undefined,
    (err: unknown) => {
      console.error(colors.red(`error: ${getErrorMessage(err)}`))
      process.exitCode = 1
    }
  )
