import type { Shape } from "../../ports/shape"
import { stringKeyVisitor } from "../decoder/value-visitor"
import { compareKeys } from "../value/key-order"

export type OptionalShape<T> = Shape<T | undefined> & { readonly optional: true }

/** `undefined` is written as none, and none decodes to `undefined`. */
export function optional<T>(shape: Shape<T>): OptionalShape<T> {
  return {
    name: `optional<${shape.name}>`,
    optional: true,
    visitor: {
      ...shape.visitor,
      expecting: `${shape.visitor.expecting} or none`,
      visitNone: () => undefined,
    },
    write(emitter, value) {
      if (value === undefined) emitter.none()
      else shape.write(emitter, value)
    },
  }
}

export function list<T>(element: Shape<T>): Shape<T[]> {
  return {
    name: `list<${element.name}>`,
    visitor: {
      expecting: `a list of ${element.name}`,
      visitList(access) {
        const items: T[] = []
        for (let next = access.next(element.visitor); !next.done; next = access.next(element.visitor)) {
          items.push(next.value)
        }
        return items
      },
    },
    write(emitter, value) {
      emitter.beginList(value.length)
      for (const item of value) element.write(emitter, item)
      emitter.endList()
    },
  }
}

/** String-keyed dicts. Keys are written in UTF-8 byte order. */
export function dict<T>(entry: Shape<T>): Shape<Map<string, T>> {
  return {
    name: `dict<${entry.name}>`,
    visitor: {
      expecting: `a dict of ${entry.name}`,
      visitDict(access) {
        const out = new Map<string, T>()
        for (let key = access.nextKey(stringKeyVisitor); !key.done; key = access.nextKey(stringKeyVisitor)) {
          out.set(key.value, access.nextValue(entry.visitor))
        }
        return out
      },
    },
    write(emitter, value) {
      emitter.beginDict(value.size)
      for (const [key, item] of [...value].sort(([a], [b]) => compareKeys(a, b))) {
        emitter.string(key)
        entry.write(emitter, item)
      }
      emitter.endDict()
    },
  }
}

/** Dicts with keys of any shape, written in the map's iteration order. */
export function map<K, V>(key: Shape<K>, value: Shape<V>): Shape<Map<K, V>> {
  return {
    name: `map<${key.name}, ${value.name}>`,
    visitor: {
      expecting: `a dict of ${key.name} to ${value.name}`,
      visitDict(access) {
        const out = new Map<K, V>()
        for (let k = access.nextKey(key.visitor); !k.done; k = access.nextKey(key.visitor)) {
          out.set(k.value, access.nextValue(value.visitor))
        }
        return out
      },
    },
    write(emitter, entries) {
      emitter.beginDict(entries.size)
      for (const [k, v] of entries) {
        key.write(emitter, k)
        value.write(emitter, v)
      }
      emitter.endDict()
    },
  }
}
