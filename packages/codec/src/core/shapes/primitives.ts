import type { Shape } from "../../ports/shape"

export const bool: Shape<boolean> = {
  name: "bool",
  visitor: { expecting: "a boolean", visitBool: (value) => value },
  write: (emitter, value) => emitter.bool(value),
}

export const string: Shape<string> = {
  name: "string",
  visitor: { expecting: "a string", visitString: (value) => value },
  write: (emitter, value) => emitter.string(value),
}

/** The unit value; decodes none to `null`. */
export const none: Shape<null> = {
  name: "none",
  visitor: { expecting: "none", visitNone: () => null },
  write: (emitter) => emitter.none(),
}
