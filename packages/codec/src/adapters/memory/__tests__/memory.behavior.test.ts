import { BufferSink } from "../buffer-sink"
import { BufferSource } from "../buffer-source"

describe("BufferSource behavior", () => {
  it("tracks the bytes left to read", () => {
    const source = new BufferSource(Uint8Array.of(1, 2, 3, 4, 5))

    expect(source.remaining).toBe(5)
    source.read(new Uint8Array(2))
    expect(source.remaining).toBe(3)
    source.read(new Uint8Array(10))
    expect(source.remaining).toBe(0)
  })
})

describe("BufferSink behavior", () => {
  it("grows past its initial capacity", () => {
    const sink = new BufferSink(2)

    sink.write(Uint8Array.of(1, 2, 3))
    sink.write(Uint8Array.of(4, 5, 6, 7, 8))

    expect(sink.size).toBe(8)
    expect([...sink.toBytes()]).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
  })

  it("returns a copy", () => {
    const sink = new BufferSink()
    sink.write(Uint8Array.of(1))

    const bytes = sink.toBytes()
    bytes[0] = 9

    expect([...sink.toBytes()]).toEqual([1])
  })

  it("treats a zero capacity as one", () => {
    const sink = new BufferSink(0)

    sink.write(Uint8Array.of(7, 7))

    expect([...sink.toBytes()]).toEqual([7, 7])
  })
})
