import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("filters by prefix and converts names to camelCase", async () => {
    const env = {
      RENCODE_MAX_DEPTH: "32",
      RENCODE_ALLOW_TRAILING_BYTES: "true",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const result = await new EnvSource({ env }).load()

    expect(result).toEqual({ maxDepth: "32", allowTrailingBytes: "true" })
  })

  it("ignores a variable named only by the prefix", async () => {
    const result = await new EnvSource({ env: { RENCODE_: "x" } }).load()

    expect(result).toEqual({})
  })

  it("takes a custom prefix", async () => {
    const env = { APP_MAX_STRING_LENGTH: "10", RENCODE_MAX_DEPTH: "4" }

    const result = await new EnvSource({ env, prefix: "APP_" }).load()

    expect(result).toEqual({ maxStringLength: "10" })
  })

  it("reads every variable with an empty prefix", async () => {
    const result = await new EnvSource({ env: { MAX_DEPTH: "2" }, prefix: "" }).load()

    expect(result).toEqual({ maxDepth: "2" })
  })

  it("uses injected env over process.env", async () => {
    const result = await new EnvSource({ env: {} }).load()

    expect(result).toEqual({})
  })
})
