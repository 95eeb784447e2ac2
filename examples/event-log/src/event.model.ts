import { type ShapeType, shapes } from "@rencode/codec"

export const auditEvent = shapes.record(
  {
    id: shapes.u32,
    actor: shapes.string,
    action: shapes.string,
    at: shapes.i64,
    tags: shapes.list(shapes.string),
    note: shapes.optional(shapes.string),
  },
  { name: "AuditEvent" },
)

export type AuditEvent = ShapeType<typeof auditEvent>
