import { describe, it, expect } from 'vitest'
import { RingBuffer } from '../ring-buffer'

describe('RingBuffer', () => {
  it('evicts the oldest item once full', () => {
    const buffer = new RingBuffer<number>(3)
    expect(buffer.push(1)).toBeUndefined()
    buffer.push(2)
    buffer.push(3)

    expect(buffer.push(4)).toBe(1)
    expect(buffer.push(5)).toBe(2)
    expect(buffer.toArray()).toEqual([3, 4, 5])
    expect(buffer.size).toBe(3)
  })

  it('counts matching items', () => {
    const buffer = new RingBuffer<boolean>(4)
    for (const value of [true, false, false, true, false]) buffer.push(value)

    expect(buffer.toArray()).toEqual([false, false, true, false])
    expect(buffer.count((value) => !value)).toBe(3)
  })

  it('clears', () => {
    const buffer = new RingBuffer<string>(2)
    buffer.push('a')
    buffer.push('b')
    buffer.push('c')
    buffer.clear()
    buffer.push('d')

    expect(buffer.toArray()).toEqual(['d'])
  })

  it.each([0, -1, 2.5])('rejects capacity %s', (capacity) => {
    expect(() => new RingBuffer(capacity)).toThrow(RangeError)
  })
})
