import { describe, it, expect } from 'vitest'
import { createCodeTable } from './codeTable'
import { createDictionary } from './dictionary'
import { ResultShapeError } from './errors'
import { meanResult, quantileTable, resultAsMeansAndErrs, tableCatvar, tableContvar } from './statsTables'

const sesbth = createCodeTable('SESBTH', [
  { code: 1, label: 'Professional' },
  { code: 2, label: 'Clerical' },
  { code: 3, label: 'Semi-skilled' },
])

describe('tableCatvar', () => {
  it('gives percentages per category in code order', () => {
    const table = tableCatvar([2, 1, null, 2, 9], sesbth)
    expect(table.dimensions).toEqual([{ name: 'SESBTH', labels: ['Professional (%)', 'Clerical (%)', '9 (%)'] }])
    expect(table.values).toEqual([25, 50, 25])
    expect(table.meta).toEqual({ varname: 'SESBTH' })
  })

  it('can be described by a dictionary', () => {
    const dict = createDictionary([{ Varname: 'SESBTH', Description: 'Socio-economic status at birth' }])
    expect(dict.resolveDescription(tableCatvar([1, 3], sesbth))).toBe('Socio-economic status at birth')
  })
})

describe('tableContvar', () => {
  it('bins into right-closed intervals and counts the rest as NA', () => {
    const table = tableContvar([1, 3, 5, 8, 20, null], [0, 4, 8, 15], 'bwkg')
    expect(table.dimensions[0].labels).toEqual(['(0,4]', '(4,8]', '(8,15]', 'NA'])
    const [a, b, c, na] = table.values
    expect(a).toBeCloseTo(33.333, 2)
    expect(b).toBeCloseTo(33.333, 2)
    expect(c).toBe(0)
    expect(na).toBeCloseTo(33.333, 2)
  })

  it('leaves out NA when every value is binned', () => {
    const table = tableContvar([1, 2, 5, 6], [0, 4, 8, 15], 'bwkg')
    expect(table.dimensions[0].labels).toEqual(['(0,4]', '(4,8]', '(8,15]'])
    expect(table.values).toEqual([50, 50, 0])
  })

  it('rejects unusable breaks', () => {
    expect(() => tableContvar([1], [0], 'bwkg')).toThrow(ResultShapeError)
    expect(() => tableContvar([1], [0, 4, 4], 'bwkg')).toThrow("breaks for 'bwkg' must be strictly increasing")
  })
})

describe('quantileTable', () => {
  it('labels quantiles by percentage', () => {
    const values = [5, 1, 3, 9, 7]
    const table = quantileTable(values, [0, 0.5, 1], 'kids')
    expect(table.dimensions).toEqual([{ name: 'kids', labels: ['0%', '50%', '100%'] }])
    expect(table.values).toEqual([1, 5, 9])
    expect(values).toEqual([5, 1, 3, 9, 7])
  })

  it('rejects empty samples and probabilities outside [0, 1]', () => {
    expect(() => quantileTable([], [0.5], 'kids')).toThrow(ResultShapeError)
    expect(() => quantileTable([1], [1.5], 'kids')).toThrow('quantile probability 1.5 is outside [0, 1]')
  })
})

describe('meanResult', () => {
  it('tags the mean with its metadata', () => {
    expect(meanResult([2, 4, 6], { varname: 'kids', set: 'all' })).toEqual({
      kind: 'value',
      value: 4,
      meta: { varname: 'kids', set: 'all' },
    })
  })
})

describe('resultAsMeansAndErrs', () => {
  it('splits means from error amounts', () => {
    const row = { '0% Mean': 5, '0% Lower': 4, '0% Upper': 6, '20% Mean': 9, '20% Lower': 7, '20% Upper': 11 }
    expect(resultAsMeansAndErrs(row)).toEqual({
      means: { '0%': 5, '20%': 9 },
      errs: { '0%': 1, '20%': 2 },
    })
  })

  it('treats a row without Lower values as all means', () => {
    expect(resultAsMeansAndErrs({ '0%': 5, '20%': 9 })).toEqual({
      means: { '0%': 5, '20%': 9 },
      errs: { '0%': 0, '20%': 0 },
    })
  })

  it('rejects rows with unpaired Mean and Lower values', () => {
    expect(() => resultAsMeansAndErrs({ Mean: 1, Upper: 2 })).toThrow('result row has 1 Mean and 0 Lower values')
  })
})
