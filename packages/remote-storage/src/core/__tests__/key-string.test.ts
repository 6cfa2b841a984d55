import { Digest } from "../digest"
import { KEY_PREFIX, keyString } from "../key-string"

describe("keyString", () => {
  const digest = Digest.fromHex("ffeeddccbbaa99887766554433221100ffeeddcc")

  it("joins prefix and digest with a colon", () => {
    expect(keyString(KEY_PREFIX, digest)).toBe("ccache:ffeeddccbbaa99887766554433221100ffeeddcc")
  })

  it("uses whatever prefix it is given", () => {
    expect(keyString("other", digest)).toBe("other:ffeeddccbbaa99887766554433221100ffeeddcc")
  })
})
