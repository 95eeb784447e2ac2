import { catchError } from "../../__tests__/catch-error"
import { codecOptionKeys, DEFAULT_CODEC_OPTIONS, parseCodecOptions, resolveCodecOptions } from "../codec-options"

describe("codec options", () => {
  it("has defaults", () => {
    expect(DEFAULT_CODEC_OPTIONS).toEqual({
      maxDepth: 128,
      maxStringLength: 16 * 1024 * 1024,
      maxContainerLength: 1_048_576,
      unsignedOverflow: "error",
      allowTrailingBytes: false,
    })
    expect(Object.isFrozen(DEFAULT_CODEC_OPTIONS)).toBe(true)
  })

  it("lists every option key", () => {
    expect([...codecOptionKeys].sort()).toEqual([
      "allowTrailingBytes",
      "maxContainerLength",
      "maxDepth",
      "maxStringLength",
      "unsignedOverflow",
    ])
  })

  it("fills missing values", () => {
    expect(resolveCodecOptions({ maxDepth: 4 })).toEqual({ ...DEFAULT_CODEC_OPTIONS, maxDepth: 4 })
    expect(resolveCodecOptions()).toBe(DEFAULT_CODEC_OPTIONS)
  })

  it("returns already resolved options unchanged", () => {
    const resolved = resolveCodecOptions({ maxDepth: 4 })

    expect(resolveCodecOptions(resolved)).toBe(resolved)
  })

  it("coerces strings", () => {
    expect(
      parseCodecOptions({ maxDepth: "8", maxStringLength: "1024", allowTrailingBytes: "true", unsignedOverflow: "wrap" }),
    ).toMatchObject({ maxDepth: 8, maxStringLength: 1024, allowTrailingBytes: true, unsignedOverflow: "wrap" })
  })

  it("rejects invalid values with invalid_options", () => {
    const err = catchError(() => resolveCodecOptions({ maxDepth: -1 }))

    expect(err).toMatchObject({ code: "invalid_options", context: { issues: [{ path: "maxDepth" }] } })
    expect(catchError(() => parseCodecOptions({ unsignedOverflow: "saturate" }))).toMatchObject({
      code: "invalid_options",
      context: { issues: [{ path: "unsignedOverflow" }] },
    })
    expect(catchError(() => parseCodecOptions({ allowTrailingBytes: "maybe" }))).toMatchObject({
      code: "invalid_options",
    })
  })
})
