export { map, dict, list, optional, type OptionalShape } from "./collections"
export { f32, f64, i8, i16, i32, i64, u8, u16, u32, u64 } from "./numbers"
export { bool, none, string } from "./primitives"
export { record, type RecordFields, type RecordOptions, type RecordType } from "./record"
export { value } from "./value"
