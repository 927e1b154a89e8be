import { describe, expect, it } from 'vitest'
import { asNumber, asString, parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('reads values, switches and multi-word values', () => {
    expect(parseFlags(['--url', 'https://shop.example.com', '--browser', '--marker', 'Add', 'to', 'Cart'])).toEqual({
      url: 'https://shop.example.com',
      browser: true,
      marker: 'Add to Cart',
    })
  })

  it('skips tokens before the first flag', () => {
    expect(parseFlags(['stray', '--verbose'])).toEqual({ verbose: true })
  })
})

describe('flag coercion', () => {
  it('reads strings', () => {
    expect(asString('abc')).toBe('abc')
    expect(asString(true)).toBe('')
    expect(asString(undefined)).toBe('')
  })

  it('reads integers', () => {
    expect(asNumber('12')).toBe(12)
    expect(asNumber('abc')).toBeUndefined()
    expect(asNumber(true)).toBeUndefined()
  })
})
