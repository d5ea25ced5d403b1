import { afterAll, afterEach, beforeEach, describe, expect, it } from "vitest"
import { page } from "../../test/fake-browser.js"
import { playerPageHtml } from "../../test/fixtures.js"
import { createHarness, scanContext, type Harness } from "../../test/harness.js"
import { closeTestDb } from "../../test/pglite-helper.js"
import { hasDuration, upsertDuration } from "../db/durations.js"
import { getRefreshFailure, recordRefreshFailure } from "../db/refresh-failures.js"
import { insertShowsIfAbsent } from "../db/shows.js"
import { ConfigurationError } from "../errors.js"
import { runUpdateDurations, selectDurationCandidates } from "./update-durations.js"

describe("update durations", () => {
  let harness: Harness

  beforeEach(async () => {
    harness = await createHarness()
  })

  afterEach(async () => {
    await harness.cleanup()
  })

  afterAll(async () => {
    await closeTestDb()
  })

  async function seedCatalog(): Promise<void> {
    await insertShowsIfAbsent(harness.pool, [
      { id: 1, title: "Failed movie", originalTitle: null, type: "Movie" },
      { id: 2, title: "Bare movie", originalTitle: null, type: "Movie" },
      { id: 3, title: "Timed movie", originalTitle: null, type: "Movie" },
      { id: 4, title: "Failed series", originalTitle: null, type: "Series" },
      { id: 5, title: "Bare series", originalTitle: null, type: "Series" },
    ])
    await upsertDuration(harness.pool, 3, null, null, 6000)
    await recordRefreshFailure(harness.pool, 1, "durations", "no playlist")
    await recordRefreshFailure(harness.pool, 4, "durations", "no playlist")
  }

  describe("selectDurationCandidates", () => {
    beforeEach(seedCatalog)

    it("puts shows with a recorded failure first", async () => {
      const shows = await selectDurationCandidates(scanContext(harness), 2)

      expect(shows.map((show) => show.id)).toEqual([1, 4])
    })

    it("fills the rest of the limit with shows lacking durations", async () => {
      const shows = await selectDurationCandidates(scanContext(harness), 3)
      const ids = shows.map((show) => show.id)

      expect(ids.slice(0, 2)).toEqual([1, 4])
      expect([2, 5]).toContain(ids[2])
      expect(ids).toHaveLength(3)
    })

    it("restricts a movie category to its type", async () => {
      const shows = await selectDurationCandidates(scanContext(harness), 5, { type: "movie" })

      expect(shows.map((show) => show.id)).toEqual([1, 2])
    })

    it("takes every show of a series category regardless of the limit", async () => {
      const shows = await selectDurationCandidates(scanContext(harness), 0, { type: "serial" })

      expect(shows.map((show) => show.id)).toEqual([4, 5])
    })

    it("rejects a non-positive limit without a series category", async () => {
      await expect(selectDurationCandidates(scanContext(harness), 0)).rejects.toBeInstanceOf(
        ConfigurationError
      )
    })
  })

  describe("runUpdateDurations", () => {
    beforeEach(async () => {
      await insertShowsIfAbsent(harness.pool, [
        { id: 1, title: "Failed movie", originalTitle: null, type: "Movie" },
        { id: 2, title: "Bare movie", originalTitle: null, type: "Movie" },
      ])
      await recordRefreshFailure(harness.pool, 1, "durations", "no playlist")
    })

    it("stores durations and reports shows that still have none", async () => {
      harness.site.route("item/play/1/s0e1", page(playerPageHtml([{ duration: 5400 }])))

      const result = await runUpdateDurations(scanContext(harness), 2)

      expect(result).toEqual({ processed: 1, added: 1, candidates: 2, failed: [2] })
      expect(await hasDuration(harness.pool, 1, null, null)).toBe(true)
      expect(await getRefreshFailure(harness.pool, 1, "durations")).toBeNull()
      expect(await getRefreshFailure(harness.pool, 2, "durations")).toMatchObject({
        error: "player playlist has no duration",
      })
    })

    it("waits the duration delay after every player page", async () => {
      await runUpdateDurations(scanContext(harness), 2)

      expect(harness.slept).toEqual([15000, 15000])
    })

    it("schedules a backup only when rows were written", async () => {
      await runUpdateDurations(scanContext(harness), 2)
      expect(harness.backup.requests).toEqual([])

      harness.site.route("item/play/2/s0e1", page(playerPageHtml([{ duration: 3600 }])))
      await runUpdateDurations(scanContext(harness), 2)
      expect(harness.backup.requests).toEqual(["store"])
    })
  })
})
