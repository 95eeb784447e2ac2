import type { Shape, ShapeType } from "../../ports/shape"
import { stringKeyVisitor, valueVisitor } from "../decoder/value-visitor"
import { RencodeError } from "../errors"

export type RecordFields = Record<string, Shape<unknown>>

type OptionalKeys<F extends RecordFields> = {
  [K in keyof F]: F[K] extends { readonly optional: true } ? K : never
}[keyof F]

type Simplify<T> = { [K in keyof T]: T[K] } & {}

/** The object type a record shape reads and writes. */
export type RecordType<F extends RecordFields> = Simplify<
  { [K in Exclude<keyof F, OptionalKeys<F>>]: ShapeType<F[K]> } & {
    [K in OptionalKeys<F>]?: ShapeType<F[K]>
  }
>

export type RecordOptions = {
  /** Name used in field errors. Defaults to "record". */
  name?: string
  /** Skip keys that are not declared instead of failing with `unknown_field`. */
  ignoreUnknown?: boolean
}

/**
 * Objects written as dicts of field name to value, in declaration order.
 *
 * @example
 * ```ts
 * const message = record({ name: string, code: i32, note: optional(string) }, { name: "Message" })
 * type Message = ShapeType<typeof message> // { name: string; code: number; note?: string | undefined }
 * ```
 */
export function record<F extends RecordFields>(fields: F, options: RecordOptions = {}): Shape<RecordType<F>> {
  const name = options.name ?? "record"
  const keys = Object.keys(fields)

  return {
    name,
    visitor: {
      expecting: `a dict (${name})`,
      visitDict(access) {
        const out = new Map<string, unknown>()
        const seen = new Set<string>()

        for (let key = access.nextKey(stringKeyVisitor); !key.done; key = access.nextKey(stringKeyVisitor)) {
          const field = key.value
          if (seen.has(field)) throw RencodeError.duplicateField(field, name)
          seen.add(field)

          const shape = Object.hasOwn(fields, field) ? fields[field] : undefined
          if (shape) {
            out.set(field, access.nextValue(shape.visitor))
          } else if (options.ignoreUnknown) {
            access.nextValue(valueVisitor)
          } else {
            throw RencodeError.unknownField(field, name)
          }
        }

        for (const field of keys) {
          if (!seen.has(field) && !fields[field]?.optional) throw RencodeError.missingField(field, name)
        }

        // fromEntries defines own properties, so a "__proto__" field stays data
        return Object.fromEntries(out) as RecordType<F>
      },
    },
    write(emitter, value) {
      emitter.beginDict(keys.length)
      for (const field of keys) {
        const shape = fields[field]
        if (!shape) continue
        emitter.string(field)
        shape.write(emitter, readField(value, field))
      }
      emitter.endDict()
    },
  }
}

function readField(value: unknown, field: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, field) : undefined
}
