import { describe, it, expect } from 'vitest'
import { DisjointSet } from '../../../src/graph/union-find.js'

describe('DisjointSet', () => {
  it('starts with every index in its own set', () => {
    const forest = new DisjointSet(3)
    expect(forest.components()).toEqual([[0], [1], [2]])
  })

  it('joins sets and reports whether anything changed', () => {
    const forest = new DisjointSet(4)
    expect(forest.union(0, 2)).toBe(true)
    expect(forest.union(2, 0)).toBe(false)
    expect(forest.find(0)).toBe(forest.find(2))
    expect(forest.find(0)).not.toBe(forest.find(1))
  })

  it('lists components by smallest member with ascending members', () => {
    const forest = new DisjointSet(6)
    forest.union(5, 3)
    forest.union(4, 1)
    forest.union(3, 1)
    expect(forest.components()).toEqual([[0], [1, 3, 4, 5], [2]])
  })

  it('handles long chains', () => {
    const forest = new DisjointSet(1000)
    for (let i = 1; i < 1000; i++) {
      forest.union(i - 1, i)
    }
    expect(forest.find(999)).toBe(forest.find(0))
    expect(forest.components()).toHaveLength(1)
  })

  it('accepts an empty forest', () => {
    expect(new DisjointSet(0).components()).toEqual([])
  })
})
