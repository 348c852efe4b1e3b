import { applyFieldEdit, canEditRegion, getFieldRanges } from '@/features/crop/numeric-edit'

const bounds = { width: 800, height: 600 }

describe('numeric-edit', () => {
  it('reports spin-box ranges for the image', () => {
    expect(getFieldRanges(bounds)).toEqual({
      x: { min: 0, max: 790 },
      y: { min: 0, max: 590 },
      width: { min: 10, max: 800 },
      height: { min: 10, max: 600 },
    })
  })

  it('shrinks the width when x moves too far right', () => {
    expect(applyFieldEdit({ x: 100, y: 100, width: 200, height: 100 }, 'x', 700, bounds)).toEqual({
      x: 700,
      y: 100,
      width: 100,
      height: 100,
    })
  })

  it('shifts x back inside when the width grows', () => {
    expect(applyFieldEdit({ x: 100, y: 100, width: 200, height: 100 }, 'width', 900, bounds)).toEqual({
      x: 0,
      y: 100,
      width: 800,
      height: 100,
    })
  })

  it('clamps lengths to the minimum size', () => {
    expect(applyFieldEdit({ x: 100, y: 100, width: 200, height: 100 }, 'height', 5, bounds)).toEqual({
      x: 100,
      y: 100,
      width: 200,
      height: 10,
    })
  })

  it('rounds fractional input', () => {
    expect(applyFieldEdit({ x: 100, y: 100, width: 200, height: 100 }, 'y', 12.5, bounds)).toEqual({
      x: 100,
      y: 13,
      width: 200,
      height: 100,
    })
  })

  it('starts from a minimum-size square when nothing is selected', () => {
    expect(applyFieldEdit({ x: 0, y: 0, width: 0, height: 0 }, 'width', 50, bounds)).toEqual({
      x: 0,
      y: 0,
      width: 50,
      height: 10,
    })
  })

  it('rejects non-numeric values and images smaller than the minimum size', () => {
    const region = { x: 0, y: 0, width: 20, height: 20 }
    expect(applyFieldEdit(region, 'x', Number.NaN, bounds)).toBeNull()
    expect(canEditRegion({ width: 5, height: 5 })).toBe(false)
    expect(applyFieldEdit(region, 'x', 1, { width: 5, height: 5 })).toBeNull()
  })
})
