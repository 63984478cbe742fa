import { describe, expect, it } from 'vitest'
import { Mat3D } from '@/mat3d/modules/Mat3D'
import { Rect } from '@/mat3d/modules/Rect'
import { formatMat3D, parseMat3D } from '@/mat3d/modules/Codec'

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]
const IDENTITY_SOURCE = `[${IDENTITY.join(',')}]`

describe('formatMat3D', () => {
  it('lists the storage and then the rectangle edges', () => {
    const mat3D = new Mat3D(undefined, Rect.fromLTRB(0, 0, 100, 50))
    expect(formatMat3D(mat3D)).toBe('Mat3D[1,0,0,0,0,1,0,0,0,0,1,0,0,0,0,1](0, 0, 100, 50)')
    expect(mat3D.toString()).toBe(formatMat3D(mat3D))
  })

  it('writes fractional and negative values as plain numbers', () => {
    const mat3D = new Mat3D(undefined, Rect.fromLTRB(-10, 5.5, 90, 105.25)).translate(-2.5, 0.125)
    expect(mat3D.toString()).toBe('Mat3D[1,0,0,0,0,1,0,0,0,0,1,0,-2.5,0.125,0,1](-10, 5.5, 90, 105.25)')
  })
})

describe('parseMat3D', () => {
  it('reads back what it formats', () => {
    const original = new Mat3D(undefined, Rect.fromLTRB(-10, 5.5, 90, 105.25))
      .rotate(30)
      .translate(3, -4, 2)
      .scaleY(0.5)
      .tiltX(12)
    const parsed = Mat3D.parse(original.toString())

    for (let i = 0; i < 16; i++) {
      expect(parsed.matrix[i]).toBeCloseTo(original.matrix[i], 9)
    }
    expect(parsed.rect.equals(original.rect)).toBe(true)
  })

  it('reads the identity matrix with a rectangle', () => {
    const parsed = Mat3D.parse(`Mat3D${IDENTITY_SOURCE}(0, 0, 100, 100)`)
    expect(Array.from(parsed.matrix)).toEqual(IDENTITY)
    expect(parsed.rect.equals(Rect.fromLTRB(0, 0, 100, 100))).toBe(true)
  })

  it('accepts spaces and decimal points inside the matrix list', () => {
    const source = `Mat3D[${IDENTITY.map((value) => value.toFixed(1)).join(', ')}](0.0, 0.0, 10.0, 20.0)`
    const { matrix, rect } = parseMat3D(source)
    expect(Array.from(matrix)).toEqual(IDENTITY)
    expect(rect.equals(Rect.fromLTRB(0, 0, 10, 20))).toBe(true)
  })

  it('falls back to the default state for an unrecognized string', () => {
    const parsed = Mat3D.parse('garbage')
    expect(Array.from(parsed.matrix)).toEqual(IDENTITY)
    expect(parsed.rect.equals(Rect.zero)).toBe(true)
  })

  it('requires the prefix at the start of the string', () => {
    const { rect } = parseMat3D(` Mat3D${IDENTITY_SOURCE}(1, 2, 3, 4)`)
    expect(rect.equals(Rect.zero)).toBe(true)
  })

  it('falls back to the default state when a bound is missing entirely', () => {
    const { rect } = parseMat3D(`Mat3D${IDENTITY_SOURCE}(1, 2, 3)`)
    expect(rect.equals(Rect.zero)).toBe(true)
  })

  it('reads empty or malformed bounds as zero', () => {
    const { rect } = parseMat3D(`Mat3D${IDENTITY_SOURCE}(abc, 2, , 4)`)
    expect(rect.equals(Rect.fromLTRB(0, 2, 0, 4))).toBe(true)
  })

  it('reads negative and exponent bounds', () => {
    const { rect } = parseMat3D(`Mat3D${IDENTITY_SOURCE}(-1e3, -2.5, 3, 4)`)
    expect(rect.equals(Rect.fromLTRB(-1000, -2.5, 3, 4))).toBe(true)
  })

  it('tolerates a trailing comma and ignores trailing text', () => {
    expect(parseMat3D(`Mat3D${IDENTITY_SOURCE}(1, 2, 3, 4,)`).rect.equals(Rect.fromLTRB(1, 2, 3, 4))).toBe(true)
    expect(parseMat3D(`Mat3D${IDENTITY_SOURCE}(1, 2, 3, 4) and more`).rect.equals(Rect.fromLTRB(1, 2, 3, 4))).toBe(true)
  })

  it('uses the identity matrix when the list is missing', () => {
    const { matrix, rect } = parseMat3D('Mat3D(1, 2, 3, 4)')
    expect(Array.from(matrix)).toEqual(IDENTITY)
    expect(rect.equals(Rect.fromLTRB(1, 2, 3, 4))).toBe(true)
  })

  it('uses the identity matrix when the list is not 16 numbers', () => {
    for (const list of ['[1,2,x]', '[1,2]', '[]', `[${new Array(16).fill('"1"').join(',')}]`]) {
      const { matrix, rect } = parseMat3D(`Mat3D${list}(1, 2, 3, 4)`)
      expect(Array.from(matrix)).toEqual(IDENTITY)
      expect(rect.equals(Rect.fromLTRB(1, 2, 3, 4))).toBe(true)
    }
  })

  it('returns the default state quickly for padded input without a closing parenthesis', () => {
    const padding = ' '.repeat(40)
    const source = `Mat3D(${[padding, padding, padding, padding].join(',')}x`
    const startedAt = performance.now()
    const { matrix, rect } = parseMat3D(source)
    expect(performance.now() - startedAt).toBeLessThan(500)
    expect(Array.from(matrix)).toEqual(IDENTITY)
    expect(rect.equals(Rect.zero)).toBe(true)
  })

  it('reads bounds surrounded by spaces', () => {
    const { rect } = parseMat3D(`Mat3D${IDENTITY_SOURCE}(   1 ,2,   3   ,  4  )`)
    expect(rect.equals(Rect.fromLTRB(1, 2, 3, 4))).toBe(true)
  })

  it('keeps infinite bounds', () => {
    const mat3D = new Mat3D(undefined, Rect.fromLTRB(-Infinity, 0, Infinity, 10))
    expect(mat3D.toString()).toBe(`Mat3D${IDENTITY_SOURCE}(-Infinity, 0, Infinity, 10)`)
    const { rect } = parseMat3D(mat3D.toString())
    expect([rect.left, rect.top, rect.right, rect.bottom]).toEqual([-Infinity, 0, Infinity, 10])
  })

  it('parses into an independent matrix', () => {
    const source = new Mat3D().scale(2).toString()
    const first = Mat3D.parse(source)
    const second = Mat3D.parse(source)
    first.translateX(1)
    expect(second.matrix[12]).toBe(0)
  })
})
