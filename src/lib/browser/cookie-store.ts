/**
 * Cookie persistence for site identities.
 *
 * One JSON file per identity under the cookies directory. A file that cannot
 * be read back is removed and treated as absent, which sends the session
 * controller down the login path.
 */

import fs from "fs/promises"
import path from "path"
import { z } from "zod"

import { createComponentLogger } from "../logger.js"
import type { SessionKind, StoredCookie } from "./types.js"

const log = createComponentLogger("cookie-store")

const storedCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(["Strict", "Lax", "None"]),
})

const cookieFileSchema = z.object({
  kind: z.enum(["main", "auxiliary"]),
  savedAt: z.string(),
  cookies: z.array(storedCookieSchema),
})

export type CookieFile = z.infer<typeof cookieFileSchema>

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export class CookieStore {
  constructor(private readonly directory: string) {}

  filePath(kind: SessionKind): string {
    return path.join(this.directory, `${kind}.json`)
  }

  /**
   * Saved cookies for an identity, or null when none are usable.
   */
  async load(kind: SessionKind): Promise<StoredCookie[] | null> {
    const filePath = this.filePath(kind)

    let raw: string
    try {
      raw = await fs.readFile(filePath, "utf-8")
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      log.warn({ kind, filePath, err: error }, "Cookie file is not valid JSON, removing")
      await this.delete(kind)
      return null
    }

    const result = cookieFileSchema.safeParse(parsed)
    if (!result.success || result.data.kind !== kind) {
      log.warn({ kind, filePath }, "Cookie file has an unexpected shape, removing")
      await this.delete(kind)
      return null
    }

    if (result.data.cookies.length === 0) {
      return null
    }

    return result.data.cookies
  }

  async save(kind: SessionKind, cookies: StoredCookie[]): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true })

    const file: CookieFile = {
      kind,
      savedAt: new Date().toISOString(),
      cookies,
    }
    await fs.writeFile(this.filePath(kind), JSON.stringify(file, null, 2), "utf-8")
    log.info({ kind, count: cookies.length }, "Saved cookies")
  }

  async delete(kind: SessionKind): Promise<void> {
    try {
      await fs.unlink(this.filePath(kind))
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error
      }
    }
  }
}
