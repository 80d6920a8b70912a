/**
 * Operation dependency graph
 *
 * Nodes live in an arena and edges are arena indices, so ordering never
 * holds references between operations.
 */

export interface TopologicalOrder {
  /** Arena indices, prerequisites first */
  order: number[]
  /** One dependency cycle (arena indices) when ordering is impossible; empty otherwise */
  cycle: number[]
}

export class DependencyGraph<T> {
  private readonly nodes: T[] = []
  /** prerequisites[i] = indices node i waits for */
  private readonly prerequisites: Set<number>[] = []

  add(node: T): number {
    this.nodes.push(node)
    this.prerequisites.push(new Set())
    return this.nodes.length - 1
  }

  get size(): number {
    return this.nodes.length
  }

  node(index: number): T {
    const node = this.nodes[index]
    if (node === undefined) {
      throw new RangeError(`No node at index ${index}`)
    }
    return node
  }

  /**
   * `dependent` waits for `prerequisite`. Self edges are ignored.
   */
  addEdge(prerequisite: number, dependent: number): void {
    this.node(prerequisite)
    this.node(dependent)
    if (prerequisite !== dependent) {
      this.prerequisites[dependent].add(prerequisite)
    }
  }

  prerequisitesOf(index: number): number[] {
    this.node(index)
    return [...this.prerequisites[index]].sort((a, b) => a - b)
  }

  /**
   * Kahn's algorithm. Among ready nodes the lowest index goes first, so
   * independent nodes keep insertion order.
   */
  topologicalOrder(): TopologicalOrder {
    const count = this.nodes.length
    const inDegree = this.prerequisites.map(p => p.size)
    const dependents: number[][] = Array.from({ length: count }, () => [])
    this.prerequisites.forEach((prereqs, dependent) => {
      for (const p of prereqs) dependents[p].push(dependent)
    })

    const ready: number[] = []
    inDegree.forEach((degree, i) => {
      if (degree === 0) ready.push(i)
    })

    const order: number[] = []
    while (ready.length > 0) {
      ready.sort((a, b) => a - b)
      const next = ready.shift()
      if (next === undefined) break
      order.push(next)
      for (const dependent of dependents[next]) {
        inDegree[dependent]--
        if (inDegree[dependent] === 0) ready.push(dependent)
      }
    }

    if (order.length === count) {
      return { order, cycle: [] }
    }
    return { order, cycle: this.findCycle(new Set(order)) }
  }

  /**
   * Every unordered node has an unordered prerequisite, so walking
   * prerequisites from any of them must revisit a node.
   */
  private findCycle(ordered: Set<number>): number[] {
    const start = this.nodes.findIndex((_, i) => !ordered.has(i))
    if (start < 0) return []

    const path: number[] = []
    const position = new Map<number, number>()
    let current = start

    while (!position.has(current)) {
      position.set(current, path.length)
      path.push(current)
      const next = this.prerequisitesOf(current).find(p => !ordered.has(p))
      if (next === undefined) return []
      current = next
    }

    // path runs dependent → prerequisite; report prerequisite first
    return path.slice(position.get(current)).reverse()
  }
}
