import type { Digest } from "../core/digest"
import type { RemoteStorageError } from "../core/errors"

export type RemoteStorageFailed = { kind: "failed"; error: RemoteStorageError }

export type ConnectResult = { kind: "connected" } | RemoteStorageFailed

export type GetResult =
  | { kind: "found"; value: Uint8Array }
  | { kind: "not_found" }
  | RemoteStorageFailed

export type PutResult = { kind: "stored" } | { kind: "skipped" } | RemoteStorageFailed

export type RemoveResult = { kind: "removed" } | { kind: "not_found" } | RemoteStorageFailed

/**
 * A secondary store for build objects, keyed by content digest.
 *
 * @remarks
 * Runtime failures never throw: every outcome is a result value, and a
 * `failed` result tells the caller whether retrying could help
 * (`error.isRetryable`). A missing key is not a failure.
 */
export interface RemoteStorage {
  /** Establish the link if needed. Other operations call this themselves. */
  connect(): Promise<ConnectResult>

  get(digest: Digest): Promise<GetResult>

  /**
   * Store `value` under `digest`.
   *
   * With `onlyIfMissing`, an existing object is left untouched and `skipped`
   * is returned.
   */
  put(digest: Digest, value: Uint8Array, onlyIfMissing?: boolean): Promise<PutResult>

  remove(digest: Digest): Promise<RemoveResult>

  close(): Promise<void>
}
