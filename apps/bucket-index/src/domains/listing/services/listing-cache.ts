import {
  type Clock,
  elapsedSince,
  hours,
  type Milliseconds,
  type UnixMs,
} from "@bucket-index/clock"
import { serializeError } from "@bucket-index/errors"
import type { Logger } from "@bucket-index/logger"
import type { Singleflight } from "@bucket-index/singleflight"
import { ListingError } from "../model/listing.errors"
import {
  createSnapshot,
  type EntrySource,
  type RefreshStatus,
  type Snapshot,
} from "../model/listing.model"
import { groupEntries } from "./group-entries"
import type { SnapshotRenderer } from "./snapshot-renderer"

export const SNAPSHOT_EXPIRATION_MS: Milliseconds = hours(12)
export const DEFAULT_REFRESH_COOLDOWN_MS: Milliseconds = 0

const FLIGHT_KEY = "snapshot"

export type ListingCacheDeps = {
  lister: EntrySource
  renderer: SnapshotRenderer
  clock: Clock
  logger: Logger
  singleflight: Singleflight<Snapshot>
}

export type ListingCacheOptions = {
  /**
   * After a failed refresh, keep serving the stale snapshot for this long instead of
   * listing again on every expired request. `0` disables.
   * @default 0
   */
  refreshCooldownMs?: Milliseconds
}

/**
 * Holds one live {@link Snapshot} and rebuilds it lazily once it is older than
 * {@link SNAPSHOT_EXPIRATION_MS}.
 *
 * Concurrent refreshes share one listing. A failed refresh leaves the previous snapshot
 * in place and rejects every caller that joined it.
 */
export class ListingCache {
  private snapshot: Snapshot | undefined
  private lastFailureMs: UnixMs | undefined
  private readonly refreshStatus: Omit<RefreshStatus, "refreshing"> = {
    lastSuccessAt: null,
    lastFailureAt: null,
    lastError: null,
    consecutiveFailures: 0,
  }
  private readonly refreshCooldownMs: Milliseconds

  constructor(
    private readonly deps: ListingCacheDeps,
    options: ListingCacheOptions = {},
  ) {
    this.refreshCooldownMs = Math.max(
      0,
      options.refreshCooldownMs ?? DEFAULT_REFRESH_COOLDOWN_MS,
    )
  }

  isExpired(): boolean {
    if (!this.snapshot) return true

    return elapsedSince(this.deps.clock, this.snapshot.createdAtMs) > SNAPSHOT_EXPIRATION_MS
  }

  async refresh(): Promise<Snapshot> {
    const { value } = await this.deps.singleflight.run(FLIGHT_KEY, () => this.rebuild())

    return value
  }

  /** First build. Rejects so the caller can refuse to start. */
  async initialize(): Promise<Snapshot> {
    return this.refresh()
  }

  /** @throws {ListingError} `listing_not_ready` before the first successful build */
  current(): Snapshot {
    if (!this.snapshot) throw ListingError.notReady()

    return this.snapshot
  }

  /** Read path: fresh snapshot as-is, otherwise refresh first. */
  async get(): Promise<Snapshot> {
    if (!this.isExpired()) return this.current()

    if (this.snapshot && this.coolingDown()) return this.snapshot

    return this.refresh()
  }

  status(): RefreshStatus {
    const { lastSuccessAt, lastFailureAt } = this.refreshStatus

    return {
      ...this.refreshStatus,
      lastSuccessAt: lastSuccessAt && new Date(lastSuccessAt.getTime()),
      lastFailureAt: lastFailureAt && new Date(lastFailureAt.getTime()),
      refreshing: this.deps.singleflight.isInFlight(FLIGHT_KEY),
    }
  }

  isHealthy(): boolean {
    return this.snapshot !== undefined
  }

  private coolingDown(): boolean {
    if (this.refreshCooldownMs === 0 || this.lastFailureMs === undefined) return false

    return elapsedSince(this.deps.clock, this.lastFailureMs) < this.refreshCooldownMs
  }

  private async rebuild(): Promise<Snapshot> {
    const { clock, logger } = this.deps
    const startedMs = clock.nowMs()

    try {
      const entries = await this.deps.lister.listAll()
      const groups = groupEntries(entries)
      const createdAt = clock.now()
      const rendered = await this.deps.renderer.render(groups, createdAt)

      const snapshot = createSnapshot({ entries, groups, createdAt, ...rendered })

      this.snapshot = snapshot
      this.recordSuccess(createdAt)

      logger.info("Listing refreshed", {
        entryCount: entries.length,
        groupCount: groups.length,
        durationMs: elapsedSince(clock, startedMs),
      })

      return snapshot
    } catch (err) {
      const error = err instanceof ListingError ? err : ListingError.failed(err)

      this.recordFailure(error)

      logger.warn("Listing refresh failed", {
        err: error,
        consecutiveFailures: this.refreshStatus.consecutiveFailures,
      })

      throw error
    }
  }

  private recordSuccess(at: Date): void {
    this.lastFailureMs = undefined
    this.refreshStatus.lastSuccessAt = at
    this.refreshStatus.consecutiveFailures = 0
  }

  private recordFailure(error: ListingError): void {
    const now = this.deps.clock.now()

    this.lastFailureMs = now.getTime()
    this.refreshStatus.lastFailureAt = now
    this.refreshStatus.lastError = serializeError(error)
    this.refreshStatus.consecutiveFailures++
  }
}
