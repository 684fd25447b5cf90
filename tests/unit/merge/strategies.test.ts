import { describe, it, expect } from 'vitest'
import { anyTrue, preferNonEmpty, unionCaseInsensitive } from '../../../src/merge/strategies.js'

describe('preferNonEmpty', () => {
  it('returns the first non-empty value', () => {
    expect(preferNonEmpty([null, '', 'Lung Carcinoma', 'lung cancer'])).toBe('Lung Carcinoma')
  })

  it('returns an empty string when every value is empty', () => {
    expect(preferNonEmpty([undefined, null, ''])).toBe('')
    expect(preferNonEmpty([])).toBe('')
  })
})

describe('unionCaseInsensitive', () => {
  it('deduplicates across lists and emits canonical order', () => {
    expect(
      unionCaseInsensitive([['NSCLC'], ['nsclc', 'Non-small cell lung cancer']])
    ).toEqual(['Non-small cell lung cancer', 'NSCLC'])
  })

  it('keeps the casing of the earliest list', () => {
    expect(unionCaseInsensitive([['umls:C0007131'], ['UMLS:C0007131']])).toEqual([
      'umls:C0007131',
    ])
  })

  it('does not depend on the order inside a list', () => {
    expect(unionCaseInsensitive([['nsclc', 'NSCLC']])).toEqual(['NSCLC'])
    expect(unionCaseInsensitive([['NSCLC', 'nsclc']])).toEqual(['NSCLC'])
  })

  it('leaves out excluded values', () => {
    expect(
      unionCaseInsensitive([['Lung Carcinoma', 'Lung Cancer']], ['lung carcinoma'])
    ).toEqual(['Lung Cancer'])
  })
})

describe('anyTrue', () => {
  it('is true when any value is true', () => {
    expect(anyTrue([null, false, true])).toBe(true)
  })

  it('is false when some value is false and none is true', () => {
    expect(anyTrue([null, false, undefined])).toBe(false)
  })

  it('is null when nothing was asserted', () => {
    expect(anyTrue([undefined, null])).toBeNull()
    expect(anyTrue([])).toBeNull()
  })
})
