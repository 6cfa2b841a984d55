import type { Digest } from "../../core/digest"
import { KEY_PREFIX, keyString } from "../../core/key-string"
import type {
  ConnectResult,
  GetResult,
  PutResult,
  RemoteStorage,
  RemoveResult,
} from "../../ports/remote-storage"

/**
 * Process-local {@link RemoteStorage}. Never fails.
 *
 * Values are copied on the way in and out.
 */
export class MemoryRemoteStorage implements RemoteStorage {
  private readonly store = new Map<string, Uint8Array>()

  get size(): number {
    return this.store.size
  }

  async connect(): Promise<ConnectResult> {
    return { kind: "connected" }
  }

  async get(digest: Digest): Promise<GetResult> {
    const value = this.store.get(keyString(KEY_PREFIX, digest))

    return value ? { kind: "found", value: new Uint8Array(value) } : { kind: "not_found" }
  }

  async put(digest: Digest, value: Uint8Array, onlyIfMissing = false): Promise<PutResult> {
    const key = keyString(KEY_PREFIX, digest)

    if (onlyIfMissing && this.store.has(key)) return { kind: "skipped" }

    this.store.set(key, new Uint8Array(value))

    return { kind: "stored" }
  }

  async remove(digest: Digest): Promise<RemoveResult> {
    return this.store.delete(keyString(KEY_PREFIX, digest))
      ? { kind: "removed" }
      : { kind: "not_found" }
  }

  async close(): Promise<void> {}
}
