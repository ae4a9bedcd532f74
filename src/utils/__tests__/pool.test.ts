import { describe, expect, it } from 'vitest'

import { mapWithConcurrency } from '#utils/pool'

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe('mapWithConcurrency', () => {
  it('keeps input order whatever order items finish in', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms)
      return `${index}:${ms}`
    })

    expect(results).toEqual(['0:30', '1:10', '2:20'])
  })

  it('never runs more than the limit at once', async () => {
    let inFlight = 0
    let maxInFlight = 0

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight += 1
      maxInFlight = Math.max(maxInFlight, inFlight)
      await delay(2)
      inFlight -= 1
    })

    expect(maxInFlight).toBe(3)
  })

  it('hands each item to exactly one worker', async () => {
    const seen: number[] = []

    await mapWithConcurrency([0, 1, 2, 3, 4, 5], 4, async (item) => {
      seen.push(item)
      await delay(1)
    })

    expect([...seen].sort()).toEqual([0, 1, 2, 3, 4, 5])
  })

  it('treats a limit below one as one', async () => {
    let inFlight = 0
    let maxInFlight = 0

    await mapWithConcurrency([1, 2, 3], 0, async () => {
      inFlight += 1
      maxInFlight = Math.max(maxInFlight, inFlight)
      await delay(1)
      inFlight -= 1
    })

    expect(maxInFlight).toBe(1)
  })

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([])
  })

  it('rejects when a mapper throws', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (item) => {
        if (item === 2) throw new Error('boom')
        return item
      }),
    ).rejects.toThrow('boom')
  })
})
