import type { Emitter } from "../../ports/emitter"
import type { Value } from "../../ports/value"
import { sortedEntries } from "../value/value"

/** Emits a generic value. Dict entries go out in key order. */
export function writeValue(emitter: Emitter, value: Value): void {
  switch (value.type) {
    case "none":
      return emitter.none()
    case "bool":
      return emitter.bool(value.value)
    case "i64":
      return emitter.int(value.value)
    case "u64":
      return emitter.uint(value.value)
    case "f64":
      return emitter.f64(value.value)
    case "string":
      return emitter.string(value.value)
    case "list":
      emitter.beginList(value.items.length)
      for (const item of value.items) writeValue(emitter, item)
      return emitter.endList()
    case "dict":
      emitter.beginDict(value.entries.size)
      for (const [key, item] of sortedEntries(value)) {
        emitter.string(key)
        writeValue(emitter, item)
      }
      return emitter.endDict()
  }
}
