import { describe, it, expect, vi } from "vitest"
import { backoffDelay, withRetry } from "./retry.js"

describe("backoffDelay", () => {
  it("returns a constant delay for fixed schedules", () => {
    expect(backoffDelay({ kind: "fixed", delayMs: 2000 }, 1)).toBe(2000)
    expect(backoffDelay({ kind: "fixed", delayMs: 2000 }, 5)).toBe(2000)
  })

  it("doubles and caps exponential schedules", () => {
    const schedule = { kind: "exponential", baseMs: 100, maxMs: 500 } as const
    expect(backoffDelay(schedule, 1)).toBe(100)
    expect(backoffDelay(schedule, 2)).toBe(200)
    expect(backoffDelay(schedule, 3)).toBe(400)
    expect(backoffDelay(schedule, 4)).toBe(500)
  })

  it("returns zero for none", () => {
    expect(backoffDelay({ kind: "none" }, 3)).toBe(0)
  })
})

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok")
    const sleep = vi.fn().mockResolvedValue(undefined)

    const result = await withRetry(fn, {
      maxAttempts: 3,
      backoff: { kind: "fixed", delayMs: 50 },
      sleep,
    })

    expect(result).toBe("ok")
    expect(fn).toHaveBeenCalledTimes(2)
    expect(fn).toHaveBeenNthCalledWith(1, 1)
    expect(fn).toHaveBeenNthCalledWith(2, 2)
    expect(sleep).toHaveBeenCalledWith(50)
  })

  it("rethrows the last error after maxAttempts", async () => {
    let calls = 0
    const fn = async () => {
      calls++
      throw new Error(`failure ${calls}`)
    }

    await expect(
      withRetry(fn, { maxAttempts: 3, backoff: { kind: "none" } })
    ).rejects.toThrow("failure 3")
    expect(calls).toBe(3)
  })

  it("stops immediately when shouldRetry returns false", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"))

    await expect(
      withRetry(fn, {
        maxAttempts: 5,
        backoff: { kind: "none" },
        shouldRetry: () => false,
      })
    ).rejects.toThrow("fatal")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("runs onRetry before each new attempt", async () => {
    const order: string[] = []
    const fn = vi.fn(async (attempt: number) => {
      order.push(`attempt ${attempt}`)
      if (attempt < 3) throw new Error("dead")
      return attempt
    })

    const result = await withRetry(fn, {
      maxAttempts: 3,
      backoff: { kind: "none" },
      onRetry: (_error, attempt) => {
        order.push(`repair after ${attempt}`)
      },
    })

    expect(result).toBe(3)
    expect(order).toEqual([
      "attempt 1",
      "repair after 1",
      "attempt 2",
      "repair after 2",
      "attempt 3",
    ])
  })
})
