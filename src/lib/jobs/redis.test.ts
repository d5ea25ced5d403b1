/**
 * Tests for Redis jobs client
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import type { RedisOptions } from "ioredis"

const { FakeRedis } = vi.hoisted(() => {
  class FakeRedis {
    static instances: FakeRedis[] = []
    readonly quit = vi.fn(async () => "OK")
    readonly disconnect = vi.fn()
    readonly on = vi.fn(() => this)

    constructor(
      readonly url: string,
      readonly options: RedisOptions
    ) {
      FakeRedis.instances.push(this)
    }
  }
  return { FakeRedis }
})

vi.mock("ioredis", () => ({ Redis: FakeRedis }))

vi.mock("../logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

import { _resetForTesting, closeRedisJobsClient, getRedisJobsClient } from "./redis.js"

describe("Redis jobs client", () => {
  let originalEnv: string | undefined

  beforeEach(() => {
    originalEnv = process.env.REDIS_JOBS_URL
    _resetForTesting()
    FakeRedis.instances = []
  })

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.REDIS_JOBS_URL
    } else {
      process.env.REDIS_JOBS_URL = originalEnv
    }
  })

  describe("getRedisJobsClient", () => {
    it("throws error when REDIS_JOBS_URL is not set", () => {
      delete process.env.REDIS_JOBS_URL

      expect(() => getRedisJobsClient()).toThrow(
        "REDIS_JOBS_URL environment variable is required for job queue"
      )
    })

    it("creates one client for the configured URL", () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      const client1 = getRedisJobsClient()
      const client2 = getRedisJobsClient()

      expect(client1).toBe(client2)
      expect(FakeRedis.instances).toHaveLength(1)
      expect(FakeRedis.instances[0]?.url).toBe("redis://localhost:6380")
    })

    it("supports BullMQ-compatible configuration", () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      getRedisJobsClient()
      const options = FakeRedis.instances[0]?.options

      expect(options?.maxRetriesPerRequest).toBe(null)
      expect(options?.enableReadyCheck).toBe(false)
    })
  })

  describe("retry strategy", () => {
    it("implements exponential backoff", () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      getRedisJobsClient()
      const retryStrategy = FakeRedis.instances[0]?.options.retryStrategy

      expect(retryStrategy?.(1)).toBe(100) // 50 * 2^1
      expect(retryStrategy?.(2)).toBe(200)
      expect(retryStrategy?.(4)).toBe(800)
      expect(retryStrategy?.(10)).toBe(3000) // Capped at 3000ms
    })

    it("reconnects only on READONLY errors", () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      getRedisJobsClient()
      const reconnectOnError = FakeRedis.instances[0]?.options.reconnectOnError

      expect(reconnectOnError?.(new Error("READONLY You can't write against a replica"))).toBe(true)
      expect(reconnectOnError?.(new Error("ECONNRESET"))).toBe(false)
    })
  })

  describe("closeRedisJobsClient", () => {
    it("quits the connection and forgets the client", async () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      getRedisJobsClient()
      await closeRedisJobsClient()

      expect(FakeRedis.instances[0]?.quit).toHaveBeenCalledTimes(1)

      getRedisJobsClient()
      expect(FakeRedis.instances).toHaveLength(2)
    })

    it("logs instead of throwing when quit fails", async () => {
      process.env.REDIS_JOBS_URL = "redis://localhost:6380"

      getRedisJobsClient()
      FakeRedis.instances[0]?.quit.mockRejectedValueOnce(new Error("Connection error"))

      await expect(closeRedisJobsClient()).resolves.toBeUndefined()
    })

    it("does nothing if client not initialized", async () => {
      await closeRedisJobsClient()

      expect(FakeRedis.instances).toHaveLength(0)
    })
  })
})
