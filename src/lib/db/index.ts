/**
 * Database module barrel file.
 *
 * Import pattern:
 *   import { getPool, insertViewHistory } from "./db/index.js"
 *   import * as db from "./db/index.js"
 */

export {
  getPool,
  resetPool,
  queryWithRetry,
  isConnectionError,
  valuesPlaceholders,
  listPlaceholders,
} from "./pool.js"

export type {
  ShowRecord,
  NewShow,
  ViewHistoryInput,
  ViewHistoryRecord,
  ShowDurationRecord,
  CodeRecord,
  CheckpointKind,
  CheckpointRecord,
  RefreshKind,
  RefreshFailureRecord,
} from "./types.js"

export {
  getShow,
  getMaxShowId,
  getExistingIdsInRange,
  getShowsMissingDetails,
  getShowsWithoutDurations,
  getShowsWithRefreshFailure,
  insertShowsIfAbsent,
  getOrCreateShow,
  setShowType,
  updateShowDetails,
} from "./shows.js"

export { insertViewHistory, getLatestViewDate, getViewHistoryForShow } from "./view-history.js"

export {
  durationKey,
  upsertDuration,
  getDurationTimestamps,
  hasDuration,
  countDurations,
} from "./durations.js"

export { attachRelations, getShowRelations, RELATION_KINDS } from "./relations.js"
export type { RelationKind, ShowRelations } from "./relations.js"

export { insertCode, findNewestUnusedCode, deleteCodesReceivedBefore } from "./codes.js"

export {
  recordCheckpoint,
  getLatestCheckpoint,
  deleteCheckpointsBefore,
  getWatermark,
  setWatermark,
} from "./checkpoints.js"

export {
  recordRefreshFailure,
  clearRefreshFailure,
  getFailedShowIds,
  getRefreshFailure,
} from "./refresh-failures.js"

export { getLatestStoreChange } from "./store-changes.js"
