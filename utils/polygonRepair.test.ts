import { describe, expect, it } from 'vitest'
import type { Point } from '@/types/coverage'
import { polygonArea } from './geometry'
import { isSimpleRing, repairPolygon } from './polygonRepair'

const square: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 }
]

// Two triangles of area 25 meeting at (5, 5)
const bowtie: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 10 },
  { x: 10, y: 0 },
  { x: 0, y: 10 }
]

describe('isSimpleRing', () => {
  it('accepts simple rings', () => {
    expect(isSimpleRing(square)).toBe(true)
    expect(isSimpleRing([{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 2, y: 3 }])).toBe(true)
  })

  it('rejects crossing edges', () => {
    expect(isSimpleRing(bowtie)).toBe(false)
  })

  it('rejects a vertex touching another edge', () => {
    const touching: Point[] = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 5, y: 0 },
      { x: 0, y: 10 }
    ]
    expect(isSimpleRing(touching)).toBe(false)
  })

  it('rejects rings with fewer than three vertices', () => {
    expect(isSimpleRing(square.slice(0, 2))).toBe(false)
  })
})

describe('repairPolygon', () => {
  it('keeps the area of a simple ring', () => {
    const repaired = repairPolygon(square)
    expect(repaired).toHaveLength(4)
    expect(Math.abs(polygonArea(repaired))).toBeCloseTo(100, 9)
  })

  it('keeps the larger half of a bowtie as a simple ring', () => {
    const repaired = repairPolygon(bowtie)
    expect(repaired).toHaveLength(3)
    expect(Math.abs(polygonArea(repaired))).toBeCloseTo(25, 9)
    expect(isSimpleRing(repaired)).toBe(true)
  })

  it('returns nothing for fewer than three vertices', () => {
    expect(repairPolygon(square.slice(0, 2))).toEqual([])
  })
})
