import { describe, it, expect } from 'vitest'
import { createCodeTable, reverseCodeTable } from './codeTable'
import { DuplicateCodeError } from './errors'

const sesbth = [
  { code: 1, label: 'Professional' },
  { code: 2, label: 'Clerical' },
  { code: 3, label: 'Semi-skilled' },
]

describe('createCodeTable', () => {
  it('keeps entries in the order given', () => {
    const table = createCodeTable('SESBTH', [sesbth[2], sesbth[0], sesbth[1]])
    expect(table.codes).toEqual([3, 1, 2])
    expect(table.labels).toEqual(['Semi-skilled', 'Professional', 'Clerical'])
  })

  it('looks up labels by code, comparing string forms', () => {
    const table = createCodeTable('SESBTH', sesbth)
    expect(table.label(2)).toBe('Clerical')
    expect(table.label('3')).toBe('Semi-skilled')
    expect(table.label(4)).toBeUndefined()
    expect(table.labelsFor([3, '1', 7])).toEqual(['Semi-skilled', 'Professional', undefined])
  })

  it('supports string codes', () => {
    const table = createCodeTable('sex', [
      { code: 'M', label: 'Male' },
      { code: 'F', label: 'Female' },
    ])
    expect(table.labelsFor(['F', 'M'])).toEqual(['Female', 'Male'])
  })

  it('rejects repeated codes', () => {
    expect(() => createCodeTable('SESBTH', [...sesbth, { code: '2', label: 'Other' }])).toThrow(
      "coding for 'SESBTH' repeats code 2"
    )
    expect(() => createCodeTable('SESBTH', [...sesbth, { code: 1, label: 'Other' }])).toThrow(DuplicateCodeError)
  })

  it('is immutable and does not share the caller array', () => {
    const entries = sesbth.map((e) => ({ ...e }))
    const table = createCodeTable('SESBTH', entries)
    entries[0].label = 'Changed'
    expect(table.label(1)).toBe('Professional')
    expect(Object.isFrozen(table)).toBe(true)
    expect(Object.isFrozen(table.entries)).toBe(true)
    expect(Object.isFrozen(table.entries[0])).toBe(true)
  })
})

describe('reverseCodeTable', () => {
  it('maps labels back to their codes', () => {
    const reverse = reverseCodeTable(createCodeTable('SESBTH', sesbth))
    expect(reverse.get('Clerical')).toBe(2)
    expect([...reverse.keys()]).toEqual(['Professional', 'Clerical', 'Semi-skilled'])
  })
})
