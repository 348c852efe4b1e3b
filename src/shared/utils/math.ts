/**
 * Clamps a number between min and max values.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/**
 * Rounds .5 away from zero on both sides (Math.round rounds -2.5 to -2).
 * Every image/viewport conversion goes through this so both directions agree.
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.round(Math.abs(value))
  if (value < 0 && rounded !== 0) return -rounded
  return rounded
}
