import { afterAll, afterEach, beforeEach, describe, expect, it } from "vitest"
import { page } from "../../test/fake-browser.js"
import { historyPageHtml, playerPageHtml, proRequiredPageHtml } from "../../test/fixtures.js"
import { createHarness, scanContext, type Harness } from "../../test/harness.js"
import { closeTestDb } from "../../test/pglite-helper.js"
import { hasDuration } from "../db/durations.js"
import { insertShowsIfAbsent } from "../db/shows.js"
import { getViewHistoryForShow, insertViewHistory } from "../db/view-history.js"
import { ConfigurationError } from "../errors.js"
import { getSyncRuns } from "../sync-runs.js"
import type { ScanContext } from "./context.js"
import { historyPagePath, runHistoryScan } from "./history-scan.js"

describe("runHistoryScan", () => {
  let harness: Harness
  let ctx: ScanContext

  const episodes = (pageNumber: number) => historyPagePath("test-user", "episodes", pageNumber)
  const movies = (pageNumber: number) => historyPagePath("test-user", "movies", pageNumber)

  beforeEach(async () => {
    harness = await createHarness()
    ctx = scanContext(harness)
  })

  afterEach(async () => {
    await harness.cleanup()
  })

  afterAll(async () => {
    await closeTestDb()
  })

  function routeEpisodePages(): void {
    harness.site
      .route(
        episodes(1),
        page(
          historyPageHtml(
            [
              { header: "10 Май", year: 2024, items: [{ id: 10, title: "Десять", badge: "Сезон 1. Эпизод 2" }] },
              { header: "5 Май", year: 2024, items: [{ id: 11, title: "Одиннадцать", badge: "Сезон 2. Эпизод 1" }] },
            ],
            3
          )
        )
      )
      .route(
        episodes(2),
        page(
          historyPageHtml(
            [{ header: "20 Апрель", year: 2024, items: [{ id: 12, title: "Двенадцать", badge: "Сезон 1. Эпизод 1" }] }],
            3
          )
        )
      )
      .route(
        episodes(3),
        page(
          historyPageHtml(
            [{ header: "1 Март", year: 2024, items: [{ id: 13, title: "Тринадцать", badge: "Сезон 1. Эпизод 1" }] }],
            3
          )
        )
      )
  }

  function routeMoviePage(): void {
    harness.site.route(
      movies(1),
      page(historyPageHtml([{ header: "5 Май", year: 2024, items: [{ id: 20, title: "Фильм" }] }]))
    )
  }

  async function seedLatestEpisode(viewDate: string): Promise<void> {
    await insertShowsIfAbsent(harness.pool, [
      { id: 1, title: "Old", originalTitle: null, type: "Series" },
    ])
    await insertViewHistory(harness.pool, [{ showId: 1, viewDate, season: 1, episode: 1 }])
  }

  function visited(path: string): boolean {
    return harness.site.navigations.includes(harness.site.url(path))
  }

  it("stops after the page that reaches the newest stored date", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()

    const result = await runHistoryScan(ctx)

    expect(result.modes[0]).toEqual({
      mode: "episodes",
      added: 3,
      processed: 3,
      pagesVisited: 2,
      stoppedEarly: true,
      proRequired: false,
    })
    expect(visited(episodes(3))).toBe(false)
    expect(await getViewHistoryForShow(harness.pool, 10)).toHaveLength(1)
    expect(await getViewHistoryForShow(harness.pool, 12)).toHaveLength(1)
    expect(await getViewHistoryForShow(harness.pool, 13)).toEqual([])
  })

  it("walks every page of a mode with no stored history", async () => {
    routeEpisodePages()
    routeMoviePage()

    const result = await runHistoryScan(ctx)

    expect(result.modes[0]?.pagesVisited).toBe(3)
    expect(result.modes[0]?.stoppedEarly).toBe(false)
    expect(result.added).toBe(5)
  })

  it("stores movie watches as season 0 and reports totals", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()

    const result = await runHistoryScan(ctx)

    expect(result.modes[1]).toEqual({
      mode: "movies",
      added: 1,
      processed: 1,
      pagesVisited: 1,
      stoppedEarly: false,
      proRequired: false,
    })
    expect(await getViewHistoryForShow(harness.pool, 20)).toEqual([
      { id: expect.any(Number), show_id: 20, view_date: "2024-05-05", season_number: 0, episode_number: 0 },
    ])
    expect(result.added).toBe(4)
    expect(result.processed).toBe(4)
  })

  it("inserts nothing when the same pages are read again", async () => {
    routeEpisodePages()
    routeMoviePage()
    await runHistoryScan(ctx)

    const again = await runHistoryScan(ctx)

    expect(again.added).toBe(0)
  })

  it("caches durations of newly watched episodes", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()
    harness.site.route(
      "item/play/10/s1e1",
      page(playerPageHtml([{ season: 1, episode: 2, duration: 1500 }]))
    )

    const result = await runHistoryScan(ctx)

    expect(result.durations).toBe(1)
    expect(await hasDuration(harness.pool, 10, 1, 2)).toBe(true)
  })

  it("restarts the session when the browser dies while caching durations", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()
    harness.site
      .route("item/play/10/s1e1", page(playerPageHtml([{ season: 1, episode: 2, duration: 1500 }])))
      .failOnce("item/play/10/s1e1", new Error("Target page, context or browser has been closed"))

    const result = await runHistoryScan(ctx)

    expect(result.added).toBe(4)
    expect(result.durations).toBe(1)
    expect(await hasDuration(harness.pool, 10, 1, 2)).toBe(true)
    expect(harness.factory.created).toHaveLength(2)
  })

  it("pauses between history pages", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()

    await runHistoryScan(ctx)

    expect(harness.slept).toEqual([2000])
  })

  it("skips a mode that needs a PRO account and still scans the other", async () => {
    harness.site.route(episodes(1), page(proRequiredPageHtml()))
    routeMoviePage()

    const result = await runHistoryScan(ctx)

    expect(result.modes[0]).toMatchObject({ mode: "episodes", added: 0, proRequired: true, stoppedEarly: false })
    expect(result.modes[1]?.added).toBe(1)
  })

  it("schedules a store backup and records the run", async () => {
    await seedLatestEpisode("2024-05-01")
    routeEpisodePages()
    routeMoviePage()

    await runHistoryScan(ctx)

    expect(harness.backup.requests).toEqual(["store"])
    const [run] = await getSyncRuns(harness.pool, "history")
    expect(run?.status).toBe("success")
    expect(run?.items_added).toBe(4)
  })

  it("does not schedule a backup when nothing changed", async () => {
    harness.site.route(episodes(1), page(historyPageHtml([])))
    harness.site.route(movies(1), page(historyPageHtml([])))

    const result = await runHistoryScan(ctx)

    expect(result.added).toBe(0)
    expect(harness.backup.requests).toEqual([])
  })

  it("requires the account login", async () => {
    const noLogin = scanContext(harness, {
      identities: {
        main: { baseUrl: harness.site.baseUrl },
        auxiliary: { baseUrl: harness.site.baseUrl },
      },
    })

    await expect(runHistoryScan(noLogin)).rejects.toBeInstanceOf(ConfigurationError)
  })
})
