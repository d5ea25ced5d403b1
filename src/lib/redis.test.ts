import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"

// Mock ioredis with a class-like factory
const mockConnect = vi.fn()
const mockQuit = vi.fn()
const mockDisconnect = vi.fn()
const mockPing = vi.fn()
const mockOn = vi.fn()
const mockSet = vi.fn()
const mockEval = vi.fn()
const mockGet = vi.fn()
const mockSadd = vi.fn()
const mockSpop = vi.fn()

// Store event handlers to simulate events
const eventHandlers: Record<string, ((...args: unknown[]) => void)[]> = {}

const MockRedis = vi.fn(function (this: unknown) {
  mockOn.mockImplementation((event: string, handler: (...args: unknown[]) => void) => {
    if (!eventHandlers[event]) {
      eventHandlers[event] = []
    }
    eventHandlers[event].push(handler)
    return this
  })
  return {
    connect: mockConnect,
    quit: mockQuit,
    disconnect: mockDisconnect,
    ping: mockPing,
    on: mockOn,
    set: mockSet,
    eval: mockEval,
    get: mockGet,
    sadd: mockSadd,
    spop: mockSpop,
  }
})

vi.mock("ioredis", () => ({
  Redis: MockRedis,
}))

// Mock logger
vi.mock("./logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}))

function emitEvent(event: string, ...args: unknown[]) {
  if (eventHandlers[event]) {
    eventHandlers[event].forEach((handler) => handler(...args))
  }
}

async function connectedModule() {
  process.env.REDIS_URL = "redis://localhost:6379"
  const redis = await import("./redis.js")
  redis.getRedisClient()
  emitEvent("connect")
  return redis
}

describe("redis", () => {
  beforeEach(async () => {
    vi.resetModules()
    vi.clearAllMocks()

    Object.keys(eventHandlers).forEach((key) => delete eventHandlers[key])

    mockConnect.mockResolvedValue(undefined)
    mockQuit.mockResolvedValue("OK")
    mockPing.mockResolvedValue("PONG")

    delete process.env.REDIS_URL
  })

  afterEach(async () => {
    const { _resetForTesting } = await import("./redis.js")
    _resetForTesting()
    delete process.env.REDIS_URL
  })

  describe("getRedisClient", () => {
    it("returns null when REDIS_URL is not set", async () => {
      const { getRedisClient } = await import("./redis.js")
      expect(getRedisClient()).toBeNull()
    })

    it("creates the client lazily and returns it once connected", async () => {
      process.env.REDIS_URL = "redis://localhost:6379"
      const { getRedisClient, isRedisAvailable } = await import("./redis.js")

      expect(getRedisClient()).toBeNull()
      expect(MockRedis).toHaveBeenCalledWith("redis://localhost:6379", expect.any(Object))
      expect(mockConnect).toHaveBeenCalledTimes(1)

      emitEvent("connect")

      expect(getRedisClient()).not.toBeNull()
      expect(isRedisAvailable()).toBe(true)
    })

    it("reports unavailable after the connection closes", async () => {
      const { isRedisAvailable } = await connectedModule()

      emitEvent("close")

      expect(isRedisAvailable()).toBe(false)
    })
  })

  describe("initRedis", () => {
    it("returns false when REDIS_URL is not set", async () => {
      const { initRedis } = await import("./redis.js")
      expect(await initRedis()).toBe(false)
      expect(MockRedis).not.toHaveBeenCalled()
    })

    it("connects and pings", async () => {
      process.env.REDIS_URL = "redis://localhost:6379"
      const { initRedis } = await import("./redis.js")

      expect(await initRedis()).toBe(true)
      expect(mockPing).toHaveBeenCalled()
    })

    it("returns false when the connection fails", async () => {
      process.env.REDIS_URL = "redis://localhost:6379"
      mockConnect.mockRejectedValue(new Error("ECONNREFUSED"))
      const { initRedis } = await import("./redis.js")

      expect(await initRedis()).toBe(false)
    })
  })

  describe("closeRedis", () => {
    it("quits the client", async () => {
      const { closeRedis, isRedisAvailable } = await connectedModule()

      await closeRedis()

      expect(mockQuit).toHaveBeenCalled()
      expect(isRedisAvailable()).toBe(false)
    })
  })

  describe("acquireLock", () => {
    it("returns false and warns when Redis is not available", async () => {
      const { logger } = await import("./logger.js")
      const { acquireLock } = await import("./redis.js")

      expect(await acquireLock("backup_lock", "value-1")).toBe(false)
      expect(logger.warn).toHaveBeenCalledWith(
        { lockName: "backup_lock" },
        "Redis unavailable, cannot acquire distributed lock"
      )
    })

    it("sets the key only if absent, with a TTL", async () => {
      mockSet.mockResolvedValue("OK")
      const { acquireLock } = await connectedModule()

      expect(await acquireLock("backup_lock", "value-1", 300000)).toBe(true)
      expect(mockSet).toHaveBeenCalledWith("lock:backup_lock", "value-1", "PX", 300000, "NX")
    })

    it("returns false when another holder has the lock", async () => {
      mockSet.mockResolvedValue(null)
      const { acquireLock } = await connectedModule()

      expect(await acquireLock("backup_lock", "value-2", 300000)).toBe(false)
    })

    it("returns false when the command fails", async () => {
      mockSet.mockRejectedValue(new Error("READONLY"))
      const { acquireLock } = await connectedModule()

      expect(await acquireLock("backup_lock", "value-1", 300000)).toBe(false)
    })
  })

  describe("releaseLock", () => {
    it("returns false when Redis is not available", async () => {
      const { releaseLock } = await import("./redis.js")
      expect(await releaseLock("backup_lock", "value-1")).toBe(false)
    })

    it("deletes the key when the value matches", async () => {
      mockEval.mockResolvedValue(1)
      const { releaseLock } = await connectedModule()

      expect(await releaseLock("backup_lock", "value-1")).toBe(true)
      expect(mockEval).toHaveBeenCalledWith(expect.any(String), 1, "lock:backup_lock", "value-1")
    })

    it("leaves another holder's lock alone", async () => {
      mockEval.mockResolvedValue(0)
      const { releaseLock } = await connectedModule()

      expect(await releaseLock("backup_lock", "value-1")).toBe(false)
    })
  })

  describe("isLockHeld", () => {
    it("returns false when Redis is not available", async () => {
      const { isLockHeld } = await import("./redis.js")
      expect(await isLockHeld("backup_lock")).toBe(false)
    })

    it("reflects the current holder", async () => {
      mockGet.mockResolvedValue("value-1")
      const { isLockHeld, getLockHolder } = await connectedModule()

      expect(await isLockHeld("backup_lock")).toBe(true)
      expect(await getLockHolder("backup_lock")).toBe("value-1")
    })
  })

  describe("ID sets", () => {
    it("degrades to nothing without Redis", async () => {
      const { addToSet, popFromSet } = await import("./redis.js")

      expect(await addToSet("queue:update_details", ["1"])).toBeNull()
      expect(await popFromSet("queue:update_details", 50)).toEqual([])
    })

    it("adds and pops members", async () => {
      mockSadd.mockResolvedValue(2)
      mockSpop.mockResolvedValue(["7", "9"])
      const { addToSet, popFromSet } = await connectedModule()

      expect(await addToSet("queue:update_details", ["7", "9"])).toBe(2)
      expect(mockSadd).toHaveBeenCalledWith("queue:update_details", "7", "9")
      expect(await popFromSet("queue:update_details", 50)).toEqual(["7", "9"])
      expect(mockSpop).toHaveBeenCalledWith("queue:update_details", 50)
    })

    it("skips the round trip for an empty member list", async () => {
      const { addToSet } = await connectedModule()

      expect(await addToSet("queue:update_details", [])).toBe(0)
      expect(mockSadd).not.toHaveBeenCalled()
    })
  })
})
