import { RemoteStorageConfigError } from "./errors"

export const DIGEST_SIZE = 20

const HEX_DIGEST = /^[0-9a-fA-F]{40}$/

/**
 * Content hash identifying a cached object.
 *
 * The canonical text form is lowercase hex; it is what ends up in the key.
 */
export class Digest {
  private constructor(private readonly data: Uint8Array) {}

  static fromBytes(bytes: Uint8Array): Digest {
    if (bytes.byteLength !== DIGEST_SIZE) {
      throw new RemoteStorageConfigError(
        "invalid_digest",
        `Digest must be ${DIGEST_SIZE} bytes, got ${bytes.byteLength}`,
        { context: { length: bytes.byteLength } },
      )
    }

    return new Digest(new Uint8Array(bytes))
  }

  static fromHex(text: string): Digest {
    if (!HEX_DIGEST.test(text)) {
      throw new RemoteStorageConfigError(
        "invalid_digest",
        `Digest must be ${DIGEST_SIZE * 2} hex characters`,
        { context: { length: text.length } },
      )
    }

    return new Digest(new Uint8Array(Buffer.from(text, "hex")))
  }

  bytes(): Uint8Array {
    return new Uint8Array(this.data)
  }

  equals(other: Digest): boolean {
    return Buffer.compare(this.data, other.data) === 0
  }

  toString(): string {
    return Buffer.from(this.data.buffer, this.data.byteOffset, this.data.byteLength).toString(
      "hex",
    )
  }
}
