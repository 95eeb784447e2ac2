/**
 * Producer side of the visitation contract: a value describes itself as a
 * sequence of primitive emit calls.
 *
 * @remarks
 * Containers are bracketed by `begin*`/`end*`. A known `length` lets the
 * encoder use the compact fixed-count header; the number of elements (pairs for
 * dicts) emitted must then match it. Dict entries are emitted as key, value,
 * key, value.
 *
 * `int` and `uint` accept safe-integer numbers or bigints.
 */
export interface Emitter {
  none(): void
  bool(value: boolean): void
  int(value: number | bigint): void
  uint(value: number | bigint): void
  f32(value: number): void
  f64(value: number): void
  string(value: string): void

  beginList(length?: number): void
  endList(): void

  beginDict(length?: number): void
  endDict(): void
}
