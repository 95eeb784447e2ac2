import type { Shape } from "../../ports/shape"
import type { Value } from "../../ports/value"
import { valueVisitor } from "../decoder/value-visitor"
import { writeValue } from "../encoder/write-value"

export const value: Shape<Value> = {
  name: "value",
  visitor: valueVisitor,
  write: writeValue,
}
