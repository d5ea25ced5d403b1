import { afterAll, beforeEach, describe, expect, it } from "vitest"
import type { Pool } from "pg"
import { closeTestDb, getTestPool } from "../../test/pglite-helper.js"
import {
  countDurations,
  durationKey,
  getDurationTimestamps,
  hasDuration,
  upsertDuration,
} from "./durations.js"
import {
  clearRefreshFailure,
  getFailedShowIds,
  getRefreshFailure,
  recordRefreshFailure,
} from "./refresh-failures.js"
import { insertShowsIfAbsent } from "./shows.js"

describe("durations repository", () => {
  let pool: Pool

  beforeEach(async () => {
    pool = await getTestPool()
    await insertShowsIfAbsent(pool, [
      { id: 1, title: "Film", originalTitle: null, type: "Movie" },
      { id: 2, title: "Series", originalTitle: null, type: "Series" },
    ])
  })

  afterAll(async () => {
    await closeTestDb()
  })

  it("keeps one row per movie even when written twice", async () => {
    await upsertDuration(pool, 1, null, null, 5400)
    await upsertDuration(pool, 1, null, null, 5460.4)

    expect(await countDurations(pool, 1)).toBe(1)
    expect(await hasDuration(pool, 1, null, null)).toBe(true)

    const result = await pool.query<{ duration_seconds: number }>(
      "SELECT duration_seconds FROM show_durations WHERE show_id = 1"
    )
    expect(result.rows[0]?.duration_seconds).toBe(5460)
  })

  it("stores series durations per episode", async () => {
    await upsertDuration(pool, 2, 1, 1, 2700)
    await upsertDuration(pool, 2, 1, 2, 2650)

    expect(await countDurations(pool, 2)).toBe(2)
    expect(await hasDuration(pool, 2, 1, 2)).toBe(true)
    expect(await hasDuration(pool, 2, 1, 3)).toBe(false)
    expect(await hasDuration(pool, 2, null, null)).toBe(false)
  })

  it("maps update timestamps by duration key", async () => {
    await upsertDuration(pool, 1, null, null, 5400)
    await upsertDuration(pool, 2, 3, 4, 2700)

    const timestamps = await getDurationTimestamps(pool, [1, 2, 2])
    expect([...timestamps.keys()].sort()).toEqual(["1|-|-", "2|3|4"])
    expect(timestamps.get(durationKey(2, 3, 4))).toBeInstanceOf(Date)
  })

  it("returns an empty map without querying for no shows", async () => {
    expect((await getDurationTimestamps(pool, [])).size).toBe(0)
  })
})

describe("refresh failures repository", () => {
  let pool: Pool

  beforeEach(async () => {
    pool = await getTestPool()
    await insertShowsIfAbsent(pool, [
      { id: 1, title: "Film", originalTitle: null, type: "Movie" },
      { id: 2, title: "Other", originalTitle: null, type: "Movie" },
    ])
  })

  afterAll(async () => {
    await closeTestDb()
  })

  it("counts repeated failures and clears them", async () => {
    await recordRefreshFailure(pool, 1, "durations", "no playlist")
    await recordRefreshFailure(pool, 1, "durations", "timeout")
    await recordRefreshFailure(pool, 2, "details", "not found")

    const failure = await getRefreshFailure(pool, 1, "durations")
    expect(failure?.attempts).toBe(2)
    expect(failure?.error).toBe("timeout")
    expect(await getFailedShowIds(pool, "durations")).toEqual([1])

    await clearRefreshFailure(pool, 1, "durations")
    expect(await getFailedShowIds(pool, "durations")).toEqual([])
    expect(await getFailedShowIds(pool, "details")).toEqual([2])
  })
})
