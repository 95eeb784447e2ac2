import type { ShapeType } from "../../../ports/shape"
import { catchError } from "../../__tests__/catch-error"
import { decodeWith, encode, encodeWith } from "../../rencode"
import { fromNative } from "../../value/native"
import { i32, optional, record, string } from ".."

const ascii = (text: string) => [...new TextEncoder().encode(text)]

const message = record({ name: string, code: i32 }, { name: "Message" })

// name: "bob", code: -133
const BOB = [104, 132, ...ascii("name"), 131, ...ascii("bob"), 132, ...ascii("code"), 63, 255, 123]

describe("record", () => {
  it("writes fields as a dict in declaration order", () => {
    expect([...encodeWith(message, { name: "bob", code: -133 })]).toEqual(BOB)
  })

  it("reads fields in any order", () => {
    const reordered = Uint8Array.from([
      104,
      ...[132, ...ascii("code"), 63, 255, 123],
      ...[132, ...ascii("name"), 131, ...ascii("bob")],
    ])
    const decoded: ShapeType<typeof message> = decodeWith(message, reordered)

    expect(decoded).toEqual({ name: "bob", code: -133 })
    expect(decodeWith(message, Uint8Array.from(BOB))).toEqual({ name: "bob", code: -133 })
  })

  it("reports a missing field", () => {
    const nameOnly = Uint8Array.from([103, 132, ...ascii("name"), 131, ...ascii("bob")])

    expect(catchError(() => decodeWith(message, nameOnly))).toMatchObject({
      code: "missing_field",
      message: 'Missing field "code" in Message',
      context: { field: "code", record: "Message" },
    })
  })

  it("reports an unknown field unless told to skip it", () => {
    const withExtra = encode(fromNative({ name: "bob", code: -133, extra: [1, { nested: true }] }))

    expect(catchError(() => decodeWith(message, withExtra))).toMatchObject({
      code: "unknown_field",
      context: { field: "extra", record: "Message" },
    })

    const lenient = record({ name: string, code: i32 }, { ignoreUnknown: true })
    expect(decodeWith(lenient, withExtra)).toEqual({ name: "bob", code: -133 })
  })

  it("reports a repeated field", () => {
    const twice = Uint8Array.from([104, 132, ...ascii("name"), 129, 97, 132, ...ascii("name"), 129, 98])

    expect(catchError(() => decodeWith(message, twice))).toMatchObject({
      code: "duplicate_field",
      context: { field: "name" },
    })
  })

  it("does not treat inherited property names as fields", () => {
    const bytes = Uint8Array.from([103, 136, ...ascii("toString"), 1])

    expect(catchError(() => decodeWith(message, bytes))).toMatchObject({
      code: "unknown_field",
      context: { field: "toString", record: "Message" },
    })
  })

  it("requires a dict", () => {
    expect(catchError(() => decodeWith(message, Uint8Array.of(192)))).toMatchObject({
      code: "type_mismatch",
      context: { expected: "a dict (Message)", found: "a list" },
    })
  })

  describe("optional fields", () => {
    const note = record({ title: string, body: optional(string) })

    it("may be absent when decoding", () => {
      const decoded = decodeWith(note, Uint8Array.from([103, 133, ...ascii("title"), 129, 120]))

      expect(decoded).toEqual({ title: "x" })
      expect("body" in decoded).toBe(false)
    })

    it("are written as none when undefined", () => {
      expect([...encodeWith(note, { title: "x" })]).toEqual([
        104,
        ...[133, ...ascii("title"), 129, 120],
        ...[132, ...ascii("body"), 69],
      ])
    })

    it("decode none to undefined", () => {
      const bytes = encodeWith(note, { title: "x", body: undefined })

      expect(decodeWith(note, bytes)).toEqual({ title: "x", body: undefined })
    })
  })
})
