import { Node, SerializedNode } from './types'

export const toSerializable = (node: Node): SerializedNode =>
  node.children.length > 0
    ? { name: node.name, children: node.children.map(toSerializable) }
    : { name: node.name }

export const toSerializableForest = (roots: Node[]) =>
  roots.map(toSerializable)
