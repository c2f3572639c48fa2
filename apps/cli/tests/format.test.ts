import { describe, it, expect } from 'vitest'
import { formatDuration, formatEpoch, formatPercent, formatSpan } from '../src/format.js'

describe('formatDuration', () => {
  it('formats hours, minutes and seconds', () => {
    expect(formatDuration(200)).toBe('00h 03m 20s')
  })

  it('adds days when present', () => {
    expect(formatDuration(93784)).toBe('1d 02h 03m 04s')
  })

  it('rounds to the nearest second', () => {
    expect(formatDuration(59.6)).toBe('00h 01m 00s')
  })

  it('renders the open sentinel as a dash', () => {
    expect(formatDuration(-1)).toBe('-')
  })
})

describe('formatSpan', () => {
  it('prints raw seconds on request', () => {
    expect(formatSpan(12.5, { seconds: true })).toBe('12.5')
    expect(formatSpan(-1, { seconds: true })).toBe('-')
  })

  it('formats durations by default', () => {
    expect(formatSpan(3600)).toBe('01h 00m 00s')
  })
})

describe('formatEpoch', () => {
  it('formats in UTC', () => {
    expect(formatEpoch(0, { utc: true })).toBe('1970-01-01 00:00:00')
    expect(formatEpoch(1700000000, { utc: true })).toBe('2023-11-14 22:13:20')
  })

  it('renders the open sentinel as a dash', () => {
    expect(formatEpoch(-1)).toBe('-')
  })

  it('formats local time with the same layout', () => {
    expect(formatEpoch(1700000000)).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/)
  })
})

describe('formatPercent', () => {
  it('appends a percent sign', () => {
    expect(formatPercent(87.5)).toBe('87.5%')
  })
})
