const utf8 = new TextEncoder()

/** Unsigned byte-wise comparison of the keys' UTF-8 encodings (memcmp order). */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0

  const ab = utf8.encode(a)
  const bb = utf8.encode(b)
  const m = Math.min(ab.length, bb.length)

  for (let i = 0; i < m; i++) {
    const x = ab[i] ?? 0
    const y = bb[i] ?? 0
    if (x !== y) return x < y ? -1 : 1
  }

  if (ab.length === bb.length) return 0
  return ab.length < bb.length ? -1 : 1
}

export function sortKeys(keys: Iterable<string>): string[] {
  return [...keys].sort(compareKeys)
}
