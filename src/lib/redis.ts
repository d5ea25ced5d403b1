/**
 * Redis client for distributed locks and the refresh queues.
 * Callers degrade to "lock not acquired" / "queue empty" when Redis is unavailable.
 */
import { Redis } from "ioredis"
import { getErrorMessage } from "./errors.js"
import { logger } from "./logger.js"

let redisClient: Redis | null = null
let isConnected = false

function createClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => {
      if (times > 3) {
        logger.warn("Redis connection failed after 3 retries, giving up")
        return null
      }
      return Math.min(times * 100, 1000)
    },
    lazyConnect: true,
  })

  client.on("connect", () => {
    isConnected = true
    logger.info("Redis connected")
  })

  client.on("ready", () => {
    isConnected = true
  })

  client.on("error", (err) => {
    logger.warn({ err: err.message }, "Redis error")
  })

  client.on("close", () => {
    isConnected = false
    logger.info("Redis connection closed")
  })

  client.on("reconnecting", () => {
    logger.info("Redis reconnecting...")
  })

  return client
}

/**
 * Get or create the Redis client.
 * Returns null if REDIS_URL is not configured or Redis is disconnected.
 */
export function getRedisClient(): Redis | null {
  const url = process.env.REDIS_URL
  if (!url) {
    return null
  }

  if (!redisClient) {
    redisClient = createClient(url)
    redisClient.connect().catch((err: unknown) => {
      logger.warn({ err: getErrorMessage(err) }, "Redis initial connection failed")
    })
  }

  return isConnected ? redisClient : null
}

/**
 * Check if Redis is available.
 */
export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null
}

/**
 * Initialize the connection at process start.
 * Returns true if Redis is available, false otherwise.
 */
export async function initRedis(): Promise<boolean> {
  const url = process.env.REDIS_URL
  if (!url) {
    logger.info("REDIS_URL not set - locks and refresh queues disabled")
    return false
  }

  if (!redisClient) {
    redisClient = createClient(url)
  }

  try {
    await redisClient.connect()
    await redisClient.ping()
    logger.info("Redis connection verified")
    return true
  } catch (err) {
    logger.warn({ err: getErrorMessage(err) }, "Redis not available")
    return false
  }
}

/**
 * Gracefully close Redis connection.
 */
export async function closeRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit()
    } catch (err) {
      logger.debug({ err: getErrorMessage(err) }, "Redis quit failed")
    }
    redisClient = null
    isConnected = false
  }
}

// For testing: reset the module state
export function _resetForTesting(): void {
  if (redisClient) {
    redisClient.disconnect()
  }
  redisClient = null
  isConnected = false
}

// ============================================================================
// Distributed Locking
// ============================================================================

const LOCK_PREFIX = "lock:"

/**
 * Mutual exclusion across processes, keyed by name.
 */
export interface LockProvider {
  acquire(lockName: string, lockValue: string, ttlMs: number): Promise<boolean>
  release(lockName: string, lockValue: string): Promise<boolean>
}

/**
 * Acquire a distributed lock using Redis SET NX PX.
 * Returns true if lock acquired, false if already held by another process.
 *
 * @param lockName - Name of the lock (e.g., "backup_lock")
 * @param lockValue - Value to store (identifies the holder)
 * @param ttlMs - Lock timeout in milliseconds (prevents stuck locks if process crashes)
 */
export async function acquireLock(
  lockName: string,
  lockValue: string,
  ttlMs: number = 600000
): Promise<boolean> {
  const client = getRedisClient()
  if (!client) {
    logger.warn({ lockName }, "Redis unavailable, cannot acquire distributed lock")
    return false
  }

  try {
    const result = await client.set(`${LOCK_PREFIX}${lockName}`, lockValue, "PX", ttlMs, "NX")
    const acquired = result === "OK"

    if (acquired) {
      logger.info({ lockName, lockValue, ttlMs }, "Distributed lock acquired")
    } else {
      logger.info({ lockName }, "Distributed lock already held")
    }

    return acquired
  } catch (err) {
    logger.error({ err, lockName }, "Failed to acquire distributed lock")
    return false
  }
}

/**
 * Release a distributed lock.
 * Only releases if the current value matches (prevents releasing another process's lock).
 */
export async function releaseLock(lockName: string, lockValue: string): Promise<boolean> {
  const client = getRedisClient()
  if (!client) {
    logger.warn({ lockName }, "Redis unavailable, cannot release distributed lock")
    return false
  }

  try {
    // Atomic check-and-delete
    const script = `
      if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
      else
        return 0
      end
    `
    const result = await client.eval(script, 1, `${LOCK_PREFIX}${lockName}`, lockValue)
    const released = result === 1

    if (released) {
      logger.info({ lockName, lockValue }, "Distributed lock released")
    } else {
      logger.warn(
        { lockName, lockValue },
        "Distributed lock not released (value mismatch or already expired)"
      )
    }

    return released
  } catch (err) {
    logger.error({ err, lockName }, "Failed to release distributed lock")
    return false
  }
}

/**
 * Get the current holder of a lock.
 *
 * @returns The lock value if held, null if not held or Redis unavailable
 */
export async function getLockHolder(lockName: string): Promise<string | null> {
  const client = getRedisClient()
  if (!client) {
    return null
  }

  try {
    return await client.get(`${LOCK_PREFIX}${lockName}`)
  } catch (err) {
    logger.error({ err, lockName }, "Failed to get lock holder")
    return null
  }
}

export async function isLockHeld(lockName: string): Promise<boolean> {
  const holder = await getLockHolder(lockName)
  return holder !== null
}

export const redisLockProvider: LockProvider = {
  acquire: acquireLock,
  release: releaseLock,
}

// ============================================================================
// ID sets
// ============================================================================

/**
 * Add members to a set. Returns how many were new, or null without Redis.
 */
export async function addToSet(key: string, members: string[]): Promise<number | null> {
  const client = getRedisClient()
  if (!client) {
    logger.warn({ key }, "Redis unavailable, cannot add to set")
    return null
  }
  if (members.length === 0) {
    return 0
  }
  return client.sadd(key, ...members)
}

/**
 * Remove and return up to `count` random members of a set.
 */
export async function popFromSet(key: string, count: number): Promise<string[]> {
  const client = getRedisClient()
  if (!client) {
    return []
  }
  return client.spop(key, count)
}
