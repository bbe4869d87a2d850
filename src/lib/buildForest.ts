import { Node, Resource } from './types'

type WorkingNode = {
  node: Node
  parentName?: string
}

const byName = (a: Node, b: Node) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0

/**
 * Builds the forest described by the parent references of `resources`.
 *
 * A resource whose parent is not part of the input is dropped, together with
 * everything below it. Resources on a parent cycle are never reachable from a
 * root, so they are dropped as well.
 */
export const buildForest = (resources: Resource[]): Node[] => {
  const nodes = new Map<string, WorkingNode>()

  resources.forEach(({ name, parentName }) => {
    nodes.set(name, { node: { name, children: [] }, parentName })
  })

  const claimed = new Set<string>()

  nodes.forEach(({ node, parentName }) => {
    if (!parentName) {
      return
    }
    const parent = nodes.get(parentName)
    if (parent) {
      parent.node.children.push(node)
      claimed.add(node.name)
    }
  })

  const roots: Node[] = []

  nodes.forEach(({ node, parentName }) => {
    // orphans are neither claimed nor roots
    if (!claimed.has(node.name) && !parentName) {
      roots.push(node)
    }
    node.children.sort(byName)
  })

  return roots.sort(byName)
}
