import type { Digest } from "./digest"

/** Namespace shared with existing caches. Changing it orphans every stored object. */
export const KEY_PREFIX = "ccache"

export function keyString(prefix: string, digest: Digest): string {
  return `${prefix}:${digest.toString()}`
}
