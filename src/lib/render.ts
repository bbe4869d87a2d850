import { stringify } from 'yaml'
import { getErrorMessage, SerializationError } from './errors'
import { toSerializableForest } from './serialize'
import { Node, OutputFormat } from './types'

const branch = '├── '
const lastBranch = '└── '
const pipe = '│   '
const gap = '    '

const childrenToLines = (children: Node[], prefix: string): string[] =>
  children.flatMap((child, index) => {
    const isLast = index === children.length - 1
    return [
      `${prefix}${isLast ? lastBranch : branch}${child.name}`,
      ...childrenToLines(child.children, prefix + (isLast ? gap : pipe))
    ]
  })

export const formatTree = (roots: Node[]) =>
  roots
    .flatMap((root) => [root.name, ...childrenToLines(root.children, '')])
    .map((line) => `${line}\n`)
    .join('')

export const formatJson = (roots: Node[]) => {
  try {
    return JSON.stringify(toSerializableForest(roots), null, 2) + '\n'
  } catch (e) {
    throw new SerializationError(
      `Failed to serialize namespaces to JSON: ${getErrorMessage(e)}`,
      e
    )
  }
}

export const formatYaml = (roots: Node[]) => {
  try {
    return stringify(toSerializableForest(roots))
  } catch (e) {
    throw new SerializationError(
      `Failed to serialize namespaces to YAML: ${getErrorMessage(e)}`,
      e
    )
  }
}

const formatters: Record<OutputFormat, (roots: Node[]) => string> = {
  tree: formatTree,
  json: formatJson,
  yaml: formatYaml
}

export const renderTree = (roots: Node[]) => {
  process.stdout.write(formatTree(roots))
}

export const renderJson = (roots: Node[]) => {
  process.stdout.write(formatJson(roots))
}

export const renderYaml = (roots: Node[]) => {
  process.stdout.write(formatYaml(roots))
}

export const renderForest = (roots: Node[], format: OutputFormat) => {
  process.stdout.write(formatters[format](roots))
}
