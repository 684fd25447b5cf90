import { describe, it, expect } from 'vitest'
import {
  CaseInsensitiveSet,
  compareCanonical,
  foldCase,
  sortCanonical,
  uniqueAsWritten,
} from '../../../src/utils/strings.js'

describe('foldCase', () => {
  it('lower-cases without any other normalization', () => {
    expect(foldCase('NCIt:C2926')).toBe('ncit:c2926')
    expect(foldCase(' Lung  Cancer ')).toBe(' lung  cancer ')
  })
})

describe('compareCanonical', () => {
  it('orders by folded value, then by raw value', () => {
    expect(['b', 'A', 'a', 'B'].sort(compareCanonical)).toEqual(['A', 'a', 'B', 'b'])
  })

  it('returns 0 only for identical strings', () => {
    expect(compareCanonical('NSCLC', 'NSCLC')).toBe(0)
    expect(compareCanonical('NSCLC', 'nsclc')).toBeLessThan(0)
  })
})

describe('sortCanonical', () => {
  it('returns a sorted copy', () => {
    const input = ['mondo:0005233', 'DOID:3908', 'ncit:C2926']
    expect(sortCanonical(input)).toEqual(['DOID:3908', 'mondo:0005233', 'ncit:C2926'])
    expect(input).toEqual(['mondo:0005233', 'DOID:3908', 'ncit:C2926'])
  })
})

describe('CaseInsensitiveSet', () => {
  it('keeps the first casing added', () => {
    const set = new CaseInsensitiveSet()
    expect(set.add('NSCLC')).toBe(true)
    expect(set.add('nsclc')).toBe(false)
    expect(set.size).toBe(1)
    expect(set.has('Nsclc')).toBe(true)
    expect(set.toSortedArray()).toEqual(['NSCLC'])
  })

  it('ignores empty and missing values', () => {
    const set = new CaseInsensitiveSet()
    expect(set.add('')).toBe(false)
    expect(set.add(null)).toBe(false)
    expect(set.add(undefined)).toBe(false)
    expect(set.size).toBe(0)
  })

  it('never adds excluded values', () => {
    const set = new CaseInsensitiveSet(['Lung Carcinoma'])
    set.addAll(['LUNG CARCINOMA', 'Lung Cancer'])
    expect(set.toSortedArray()).toEqual(['Lung Cancer'])
  })
})

describe('uniqueAsWritten', () => {
  it('removes exact duplicates only', () => {
    expect(uniqueAsWritten(['a', 'A', 'a', 'b'])).toEqual(['a', 'A', 'b'])
  })
})
