import { buildForest } from '../buildForest'
import { Node, Resource } from '../types'

const leaf = (name: string): Node => ({ name, children: [] })

const collectNames = (nodes: Node[]): string[] =>
  nodes.flatMap((node) => [node.name, ...collectNames(node.children)])

const expectSorted = (nodes: Node[]) => {
  for (let i = 1; i < nodes.length; i++) {
    expect(nodes[i - 1].name < nodes[i].name).toBe(true)
  }
  nodes.forEach((node) => expectSorted(node.children))
}

describe('buildForest', () => {
  it('should attach children to their parent in name order', () => {
    const forest = buildForest([
      { name: 'a' },
      { name: 'c', parentName: 'a' },
      { name: 'b', parentName: 'a' }
    ])

    expect(forest).toEqual([{ name: 'a', children: [leaf('b'), leaf('c')] }])
  })

  it('should sort roots by name', () => {
    const forest = buildForest([{ name: 'z' }, { name: 'a' }])

    expect(forest.map(({ name }) => name)).toEqual(['a', 'z'])
  })

  it('should return an empty forest for empty input', () => {
    expect(buildForest([])).toEqual([])
  })

  it('should drop a resource whose parent does not exist', () => {
    expect(buildForest([{ name: 'a', parentName: 'missing' }])).toEqual([])
  })

  it('should drop the descendants of an orphan', () => {
    const forest = buildForest([
      { name: 'root' },
      { name: 'orphan', parentName: 'missing' },
      { name: 'orphan-child', parentName: 'orphan' }
    ])

    expect(forest).toEqual([leaf('root')])
  })

  it('should drop resources on a parent cycle', () => {
    const forest = buildForest([
      { name: 'a', parentName: 'b' },
      { name: 'b', parentName: 'a' },
      { name: 'c' }
    ])

    expect(collectNames(forest)).toEqual(['c'])
  })

  it('should drop a resource that is its own parent', () => {
    expect(buildForest([{ name: 'self', parentName: 'self' }])).toEqual([])
  })

  it('should treat an empty parent name as no parent', () => {
    expect(buildForest([{ name: 'x', parentName: '' }])).toEqual([leaf('x')])
  })

  it('should not depend on input order', () => {
    const resources: Resource[] = [
      { name: 'team-b' },
      { name: 'prod', parentName: 'team-a' },
      { name: 'team-a' },
      { name: 'web', parentName: 'prod' },
      { name: 'dev', parentName: 'team-a' },
      { name: 'api', parentName: 'prod' }
    ]

    expect(buildForest([...resources].reverse())).toEqual(
      buildForest(resources)
    )
  })

  it('should sort children at every depth', () => {
    const forest = buildForest([
      { name: 'org' },
      { name: 'team-z', parentName: 'org' },
      { name: 'team-m', parentName: 'org' },
      { name: 'svc-b', parentName: 'team-m' },
      { name: 'svc-a', parentName: 'team-m' },
      { name: 'svc-c', parentName: 'team-m' },
      { name: 'infra' }
    ])

    expectSorted(forest)
    expect(collectNames(forest)).toEqual([
      'infra',
      'org',
      'team-m',
      'svc-a',
      'svc-b',
      'svc-c',
      'team-z'
    ])
  })
})
