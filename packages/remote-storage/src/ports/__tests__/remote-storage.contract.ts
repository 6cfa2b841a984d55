import { beforeEach, describe, expect, it } from "vitest"
import { bytes, digestOf } from "../../tests/utils/digests"
import type { RemoteStorage } from "../remote-storage"

type CreateRemoteStorage = () => RemoteStorage

export function describeRemoteStorageContract(
  adapterName: string,
  createStorage: CreateRemoteStorage,
): void {
  describe(`RemoteStorage Contract Tests - ${adapterName}`, () => {
    let storage: RemoteStorage

    beforeEach(() => {
      storage = createStorage()
    })

    it("connects", async () => {
      expect(await storage.connect()).toStrictEqual({ kind: "connected" })
    })

    describe("get/put", () => {
      it("returns not_found for an absent digest", async () => {
        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "not_found" })
      })

      it("returns the stored bytes byte-for-byte", async () => {
        const value = bytes(0, 255, 10, 13, 0, 42)

        expect(await storage.put(digestOf(1), value)).toStrictEqual({ kind: "stored" })
        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "found", value })
      })

      it("stores an empty value", async () => {
        await storage.put(digestOf(1), new Uint8Array())

        expect(await storage.get(digestOf(1))).toStrictEqual({
          kind: "found",
          value: new Uint8Array(),
        })
      })

      it("overwrites by default", async () => {
        await storage.put(digestOf(1), bytes(1))
        await storage.put(digestOf(1), bytes(2))

        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "found", value: bytes(2) })
      })

      it("skips and keeps the existing value when onlyIfMissing is set", async () => {
        await storage.put(digestOf(1), bytes(1))

        expect(await storage.put(digestOf(1), bytes(2), true)).toStrictEqual({
          kind: "skipped",
        })
        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "found", value: bytes(1) })
      })

      it("stores when onlyIfMissing is set and the digest is absent", async () => {
        expect(await storage.put(digestOf(1), bytes(7), true)).toStrictEqual({
          kind: "stored",
        })
        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "found", value: bytes(7) })
      })

      it("keeps digests independent", async () => {
        await storage.put(digestOf(1), bytes(1))

        expect(await storage.get(digestOf(2))).toStrictEqual({ kind: "not_found" })
      })

      it("does not alias the caller's buffer", async () => {
        const value = bytes(1, 2, 3)

        await storage.put(digestOf(1), value)
        value[0] = 9

        expect(await storage.get(digestOf(1))).toStrictEqual({
          kind: "found",
          value: bytes(1, 2, 3),
        })
      })
    })

    describe("remove", () => {
      it("removes a stored digest", async () => {
        await storage.put(digestOf(1), bytes(1))

        expect(await storage.remove(digestOf(1))).toStrictEqual({ kind: "removed" })
        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "not_found" })
      })

      it("returns not_found for an absent digest", async () => {
        expect(await storage.remove(digestOf(1))).toStrictEqual({ kind: "not_found" })
      })
    })

    describe("close", () => {
      it("can be used again after close", async () => {
        await storage.put(digestOf(1), bytes(1))
        await storage.close()

        expect(await storage.get(digestOf(1))).toStrictEqual({ kind: "found", value: bytes(1) })
      })
    })
  })
}
