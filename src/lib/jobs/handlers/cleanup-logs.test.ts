import type { Pool } from "pg"
import { afterAll, beforeEach, describe, expect, it } from "vitest"
import { fakeJob, testDependencies } from "../../../test/jobs.js"
import { closeTestDb, getTestPool } from "../../../test/pglite-helper.js"
import { CleanupLogsHandler } from "./cleanup-logs.js"

async function seed(pool: Pool): Promise<void> {
  await pool.query(
    `INSERT INTO error_logs (level, source, message, created_at) VALUES
       ('error', 'job', 'ancient', NOW() - INTERVAL '100 days'),
       ('error', 'job', 'recent', NOW() - INTERVAL '10 days')`
  )
  await pool.query(
    `INSERT INTO scan_checkpoints (scan_type, category, page, created_at) VALUES
       ('full', 'movie', 4, NOW() - INTERVAL '40 days'),
       ('full', 'serial', 2, NOW() - INTERVAL '5 days')`
  )
}

describe("CleanupLogsHandler", () => {
  let pool: Pool

  beforeEach(async () => {
    pool = await getTestPool()
    await seed(pool)
  })

  afterAll(async () => {
    await closeTestDb()
  })

  it("applies the default retention windows", async () => {
    const handler = new CleanupLogsHandler(testDependencies(pool))

    const result = await handler.execute(fakeJob("cleanup-logs", {}))

    expect(result).toEqual({
      success: true,
      data: { errorLogsDeleted: 1, checkpointsDeleted: 1 },
    })
    const logs = await pool.query<{ message: string }>("SELECT message FROM error_logs")
    expect(logs.rows).toEqual([{ message: "recent" }])
    const checkpoints = await pool.query<{ category: string }>(
      "SELECT category FROM scan_checkpoints"
    )
    expect(checkpoints.rows).toEqual([{ category: "serial" }])
  })

  it("honours retention windows from the payload", async () => {
    const handler = new CleanupLogsHandler(testDependencies(pool))

    const result = await handler.execute(
      fakeJob("cleanup-logs", { errorLogDays: 7, checkpointDays: 60 })
    )

    expect(result.data).toEqual({ errorLogsDeleted: 2, checkpointsDeleted: 0 })
  })
})
