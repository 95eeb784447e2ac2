import type { Value } from "../../ports/value"

/**
 * Structural equality for generic values.
 *
 * `i64` and `u64` with the same integer are equal, since the wire does not
 * carry signedness. Floats compare like `Object.is` (NaN equals NaN, 0 and -0
 * differ). Dict entry order is ignored.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.type) {
    case "none":
      return b.type === "none"
    case "bool":
      return b.type === "bool" && a.value === b.value
    case "i64":
    case "u64":
      return (b.type === "i64" || b.type === "u64") && a.value === b.value
    case "f64":
      return b.type === "f64" && Object.is(a.value, b.value)
    case "string":
      return b.type === "string" && a.value === b.value
    case "list":
      return (
        b.type === "list" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i]
          return other !== undefined && valueEquals(item, other)
        })
      )
    case "dict": {
      if (b.type !== "dict" || a.entries.size !== b.entries.size) return false

      for (const [key, value] of a.entries) {
        const other = b.entries.get(key)
        if (other === undefined || !valueEquals(value, other)) return false
      }

      return true
    }
  }
}
