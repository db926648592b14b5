/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
    meta: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  });
}

// ============================================================================
// Domain Schemas
// ============================================================================

export const StringMapSchema = Type.Record(Type.String(), Type.String());

export const ExtAttrsSchema = Type.Record(
  Type.String(),
  Type.Object({ value: Type.String() })
);

export const NetworkRecordSchema = Type.Object({
  subnet: Type.String({ minLength: 1 }),
  account: Type.String(),
  region: Type.String(),
  tags: StringMapSchema,
  rawFields: StringMapSchema,
  mappedAttributes: Type.Optional(ExtAttrsSchema),
});

export const AttributeConflictSchema = Type.Object({
  attribute: Type.String(),
  sourceValue: Type.String(),
  targetValue: Type.String(),
});

export const ReconciledRecordSchema = Type.Object({
  subnet: Type.String(),
  account: Type.String(),
  region: Type.String(),
  tags: StringMapSchema,
  rawFields: StringMapSchema,
  mappedAttributes: Type.Optional(ExtAttrsSchema),
  targetRef: Type.Optional(Type.String()),
  attributeConflicts: Type.Optional(Type.Array(AttributeConflictSchema)),
});

/** Source tag key -> attribute name; "" skips the tag */
export const MappingTableSchema = StringMapSchema;

export const NetworkViewNameSchema = Type.String({
  minLength: 1,
  maxLength: 255,
});

export const AttributeTypeSchema = Type.Union([
  Type.Literal("STRING"),
  Type.Literal("INTEGER"),
  Type.Literal("EMAIL"),
  Type.Literal("URL"),
  Type.Literal("DATE"),
  Type.Literal("ENUM"),
]);

export const SyncJobStateSchema = Type.Union([
  Type.Literal("Pending"),
  Type.Literal("Running"),
  Type.Literal("Succeeded"),
  Type.Literal("Failed"),
  Type.Literal("Cancelled"),
]);

export const SyncJobSchema = Type.Object({
  id: Type.String(),
  networkView: Type.String(),
  state: SyncJobStateSchema,
  progress: Type.Object({
    current: Type.Integer(),
    total: Type.Integer(),
    message: Type.String(),
  }),
  outcome: Type.Object({
    createdCount: Type.Integer(),
    updatedCount: Type.Integer(),
    failedCount: Type.Integer(),
    errors: Type.Array(Type.String()),
  }),
  error: Type.Union([Type.String(), Type.Null()]),
  createdAt: Type.String({ format: "date-time" }),
  startedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  completedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
});
