/**
 * FORM CATALOG SCHEMA
 *
 * A catalog is the declarative table a form validator is compiled from:
 * - records: named aggregates with ordered fields
 * - unions: tag-discriminated variant sets (one per validation context)
 * - choices: closed sets of literal options
 * - rules: cross-field invariants checked after a node is parsed
 *
 * Catalogs are shipped as JSON (see /catalogs) and decoded with these schemas
 * before the registry is built.
 */

import { Schema as S } from "effect";

// ============================================================================
// FIELD SPECS
// ============================================================================

const FieldCommon = {
  required: S.optional(S.Boolean),
  list: S.optional(S.Boolean),
  minItems: S.optional(S.Int.pipe(S.nonNegative())),
};

export const TextFieldSchema = S.Struct({
  type: S.Literal("text"),
  ...FieldCommon,
});

export const NumericFieldSchema = S.Struct({
  type: S.Literal("number", "integer"),
  minimum: S.optional(S.Number),
  maximum: S.optional(S.Number),
  ...FieldCommon,
});

export const BooleanFieldSchema = S.Struct({
  type: S.Literal("boolean"),
  ...FieldCommon,
});

export const ChoiceFieldSchema = S.Struct({
  type: S.Literal("choice"),
  choices: S.String,
  ...FieldCommon,
});

export const UnionFieldSchema = S.Struct({
  type: S.Literal("union"),
  union: S.String,
  ...FieldCommon,
});

export const RecordFieldSchema = S.Struct({
  type: S.Literal("record"),
  record: S.String,
  ...FieldCommon,
});

export const FieldSpecSchema = S.Union(
  TextFieldSchema,
  NumericFieldSchema,
  BooleanFieldSchema,
  ChoiceFieldSchema,
  UnionFieldSchema,
  RecordFieldSchema
);
export type FieldSpec = S.Schema.Type<typeof FieldSpecSchema>;
export type NumericFieldSpec = S.Schema.Type<typeof NumericFieldSchema>;

export const FieldTableSchema = S.Record({ key: S.String, value: FieldSpecSchema });
export type FieldTable = S.Schema.Type<typeof FieldTableSchema>;

// ============================================================================
// RULES
// ============================================================================

export const ConditionValueSchema = S.Union(S.String, S.Number, S.Boolean);
export type ConditionValue = S.Schema.Type<typeof ConditionValueSchema>;

/** Holds when the sibling `field` equals one of `in` */
export const ConditionSchema = S.Struct({
  field: S.String,
  in: S.NonEmptyArray(ConditionValueSchema),
});
export type Condition = S.Schema.Type<typeof ConditionSchema>;

export const RuleSchema = S.Union(
  S.Struct({ rule: S.Literal("requiredWhen"), field: S.String, when: ConditionSchema }),
  S.Struct({ rule: S.Literal("absentUnless"), field: S.String, when: ConditionSchema }),
  S.Struct({
    rule: S.Literal("minimumWhen"),
    field: S.String,
    minimum: S.Number,
    when: ConditionSchema,
  }),
  S.Struct({ rule: S.Literal("anyOf"), fields: S.NonEmptyArray(S.String) })
);
export type Rule = S.Schema.Type<typeof RuleSchema>;

// ============================================================================
// RECORDS, VARIANTS, CATALOG
// ============================================================================

export const RecordSpecSchema = S.Struct({
  fields: FieldTableSchema,
  rules: S.optional(S.Array(RuleSchema)),
});
export type RecordSpec = S.Schema.Type<typeof RecordSpecSchema>;

/**
 * A variant declares either one `tag` or several `tags` sharing one shape.
 */
export const VariantSpecSchema = S.Struct({
  tag: S.optional(S.String),
  tags: S.optional(S.NonEmptyArray(S.String)),
  attributes: S.optional(FieldTableSchema),
  rules: S.optional(S.Array(RuleSchema)),
}).pipe(
  S.filter((variant) => (variant.tag === undefined) !== (variant.tags === undefined), {
    message: () => "a variant declares exactly one of tag or tags",
  })
);
export type VariantSpec = S.Schema.Type<typeof VariantSpecSchema>;

export const UnionSpecSchema = S.Struct({
  variants: S.NonEmptyArray(VariantSpecSchema),
});
export type UnionSpec = S.Schema.Type<typeof UnionSpecSchema>;

export const FormCatalogSchema = S.Struct({
  name: S.NonEmptyString,
  title: S.String,
  discriminator: S.NonEmptyString,
  root: S.String,
  records: S.Record({ key: S.String, value: RecordSpecSchema }),
  unions: S.Record({ key: S.String, value: UnionSpecSchema }),
  choices: S.Record({ key: S.String, value: S.NonEmptyArray(S.String) }),
});
export type FormCatalog = S.Schema.Type<typeof FormCatalogSchema>;

/** Parse unknown data (usually an imported JSON file) into a FormCatalog */
export const decodeFormCatalog = S.decodeUnknownEither(FormCatalogSchema, { errors: "all" });

/** Tags declared by a variant, whichever form it uses */
export const variantTags = (variant: VariantSpec): ReadonlyArray<string> =>
  variant.tags ?? (variant.tag === undefined ? [] : [variant.tag]);
