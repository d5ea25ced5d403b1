/**
 * NEW_EPISODES Handler
 */

import { runNewEpisodesScan, type NewEpisodesResult } from "../../scans/new-episodes.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, newEpisodesPayloadSchema, type EmptyPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class NewEpisodesHandler extends ScanJobHandler<EmptyPayload, NewEpisodesResult> {
  readonly jobType = JobType.NEW_EPISODES
  protected readonly schema = newEpisodesPayloadSchema

  protected scan(ctx: ScanContext): Promise<NewEpisodesResult> {
    return runNewEpisodesScan(ctx)
  }
}
