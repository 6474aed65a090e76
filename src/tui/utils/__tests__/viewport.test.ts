import { describe, expect, it } from 'vitest'
import { spinnerFrame, truncate, windowStart } from '../viewport'

describe('windowStart', () => {
  it('starts at the top when everything fits', () => {
    expect(windowStart(5, 4, 10)).toBe(0)
  })

  it('centers the selection', () => {
    expect(windowStart(100, 50, 10)).toBe(45)
  })

  it('clamps at both ends', () => {
    expect(windowStart(100, 2, 10)).toBe(0)
    expect(windowStart(100, 98, 10)).toBe(90)
  })

  it('starts at the top without a selection', () => {
    expect(windowStart(100, null, 10)).toBe(0)
  })
})

describe('truncate', () => {
  it('keeps short text and shortens long text with an ellipsis', () => {
    expect(truncate('abc', 5)).toBe('abc')
    expect(truncate('abcdef', 4)).toBe('abc…')
    expect(truncate('abcdef', 0)).toBe('')
  })
})

describe('spinnerFrame', () => {
  it('cycles through the frames', () => {
    expect(spinnerFrame(0)).toBe('⠋')
    expect(spinnerFrame(11)).toBe('⠙')
  })
})
