import type { Value } from "../../ports/value"
import type { Visitor } from "../../ports/visitor"
import { bool, dict, f64, i64, list, none, str } from "../value/value"

export const stringKeyVisitor: Visitor<string> = {
  expecting: "a string key",
  visitString: (value) => value,
}

/** Builds a generic value from whatever the input holds. */
export const valueVisitor: Visitor<Value> = {
  expecting: "any value",
  visitNone: () => none(),
  visitBool: (value) => bool(value),
  visitI64: (value) => i64(value),
  visitF64: (value) => f64(value),
  visitString: (value) => str(value),

  visitList(access) {
    const items: Value[] = []
    for (let next = access.next(valueVisitor); !next.done; next = access.next(valueVisitor)) {
      items.push(next.value)
    }
    return list(items)
  },

  visitDict(access) {
    const entries = new Map<string, Value>()
    for (let key = access.nextKey(stringKeyVisitor); !key.done; key = access.nextKey(stringKeyVisitor)) {
      entries.set(key.value, access.nextValue(valueVisitor))
    }
    return dict(entries)
  },
}
