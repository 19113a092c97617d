const MS_PER_DAY = 24 * 60 * 60 * 1000

export const DEFAULT_HALF_LIFE_DAYS = 90

export function ageInDays(createdAt: Date, now: Date): number {
  return Math.max(0, (now.getTime() - createdAt.getTime()) / MS_PER_DAY)
}

/**
 * Recency weight in (0, 1]. `halfLifeDays` is the e-folding time: after that
 * many days the weight is 1/e (~0.37). Always recomputed from `createdAt`.
 */
export function recency(ageDays: number, halfLifeDays: number = DEFAULT_HALF_LIFE_DAYS): number {
  if (!(halfLifeDays > 0)) throw new RangeError('halfLifeDays must be positive')
  const age = Math.max(0, ageDays)
  return Math.exp(-age / halfLifeDays)
}

export function recencyAt(createdAt: Date, now: Date, halfLifeDays: number = DEFAULT_HALF_LIFE_DAYS): number {
  return recency(ageInDays(createdAt, now), halfLifeDays)
}
