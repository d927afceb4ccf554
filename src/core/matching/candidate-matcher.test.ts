import type { OcrEvidence, RecoveredBlob } from '../../shared/types'
import {
  bestCandidate,
  duplicateCounts,
  relativeError,
  suggestNames,
  toAssignment
} from './candidate-matcher'

function blob(name: string, size: number): RecoveredBlob {
  return { path: `/out/${name}/${name}.NQF.00000000_ESET.out`, size }
}

function ev(name: string, size: number, line = 0): OcrEvidence {
  return { name, size, line }
}

describe('relativeError', () => {
  it('is measured against the candidate size', () => {
    expect(relativeError(112, 100)).toBe(0.12)
    expect(relativeError(88, 100)).toBe(0.12)
  })

  it('never matches a non-positive candidate', () => {
    expect(relativeError(5, 0)).toBe(Infinity)
    expect(relativeError(5, -1)).toBe(Infinity)
  })
})

describe('suggestNames', () => {
  it('accepts an error of exactly 12%', () => {
    const [s] = suggestNames([blob('A', 112)], [ev('a.zip', 100)])
    expect(s.name).toBe('a.zip')
  })

  it('rejects an error just over 12%', () => {
    const [s] = suggestNames([blob('A', 11201)], [ev('a.zip', 10000)])
    expect(s).toEqual({ blob: blob('A', 11201), name: '' })
  })

  it('picks the closest candidate and reports its error', () => {
    const [s] = suggestNames([blob('A', 1010)], [ev('far.zip', 1100), ev('near.zip', 1000)])
    expect(s.name).toBe('near.zip')
    expect(s.relativeError).toBeCloseTo(0.01, 10)
  })

  it('breaks ties by candidate order', () => {
    const [s] = suggestNames([blob('A', 100)], [ev('first.rar', 100), ev('second.rar', 100)])
    expect(s.name).toBe('first.rar')
  })

  it('skips zero-size evidence', () => {
    const [s] = suggestNames([blob('A', 0)], [ev('empty.zip', 0)])
    expect(s.name).toBe('')
  })

  it('leaves every blob unresolved without evidence', () => {
    const suggestions = suggestNames([blob('A', 10), blob('B', 20)], [])
    expect(suggestions.map((s) => s.name)).toEqual(['', ''])
  })

  it('lets two blobs share a name', () => {
    const suggestions = suggestNames([blob('A', 1000), blob('B', 1010)], [ev('x.zip', 1000)])
    expect(suggestions.map((s) => s.name)).toEqual(['x.zip', 'x.zip'])
  })

  it('honours a tighter tolerance', () => {
    const [s] = suggestNames([blob('A', 1100)], [ev('a.zip', 1000)], { tolerance: 0.05 })
    expect(s.name).toBe('')
  })
})

describe('bestCandidate', () => {
  it('returns null when no candidate is usable', () => {
    expect(bestCandidate(blob('A', 10), [ev('z.zip', 0)])).toBeNull()
  })
})

describe('duplicateCounts', () => {
  it('counts names used by more than one blob and ignores unresolved ones', () => {
    const counts = duplicateCounts(['x.zip', '', 'x.zip', 'y.rar', ''])
    expect([...counts]).toEqual([
      ['x.zip', 2],
      ['y.rar', 1]
    ])
  })
})

describe('toAssignment', () => {
  it('has one entry per blob', () => {
    const suggestions = suggestNames([blob('A', 1000), blob('B', 5)], [ev('x.zip', 1000)])
    expect([...toAssignment(suggestions)]).toEqual([
      [blob('A', 1000).path, 'x.zip'],
      [blob('B', 5).path, '']
    ])
  })
})
