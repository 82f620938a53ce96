/**
 * FORM ENGINE
 *
 * Compiles a decoded FormCatalog into a registry and walks untrusted payloads
 * against it. Every defect is collected with its field path; nothing here
 * throws for malformed input. Only a broken catalog throws (CatalogError).
 *
 * Output is canonical: union nodes carry the tag first, then attributes in
 * catalog order; record fields follow catalog order; absent optionals are
 * omitted and unknown attributes are dropped.
 */

import { Either } from "effect";
import {
  decodeFormCatalog,
  variantTags,
  type Condition,
  type FieldSpec,
  type FieldTable,
  type FormCatalog,
  type NumericFieldSpec,
  type RecordSpec,
  type Rule,
  type VariantSpec,
} from "../schemas/formCatalog";
import {
  CatalogError,
  ConditionalPresenceError,
  formatParseError,
  IssueCollector,
  PayloadShapeError,
  RangeViolationError,
  UnknownTagError,
  type FormIssue,
} from "./errors";

// ============================================================================
// TYPES
// ============================================================================

export type FormScalar = string | number | boolean;
export type FormValue = FormScalar | FormObject | ReadonlyArray<FormValue>;
export interface FormObject {
  readonly [field: string]: FormValue;
}
export type FormRecord = FormObject;

export interface FormRegistry {
  readonly name: string;
  readonly title: string;
  readonly discriminator: string;
  readonly root: string;
  readonly records: ReadonlyMap<string, RecordSpec>;
  readonly unions: ReadonlyMap<string, ReadonlyMap<string, VariantSpec>>;
  readonly choices: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface FormValidationResult {
  readonly record: FormRecord | null;
  readonly issues: ReadonlyArray<FormIssue>;
}

// ============================================================================
// REGISTRY
// ============================================================================

const checkFieldTable = (
  catalog: FormCatalog,
  owner: string,
  fields: FieldTable,
  problems: string[]
): void => {
  for (const [name, spec] of Object.entries(fields)) {
    const where = `${owner}.${name}`;
    switch (spec.type) {
      case "choice":
        if (!(spec.choices in catalog.choices)) problems.push(`${where} references unknown choice set "${spec.choices}"`);
        break;
      case "union":
        if (!(spec.union in catalog.unions)) problems.push(`${where} references unknown union "${spec.union}"`);
        break;
      case "record":
        if (!(spec.record in catalog.records)) problems.push(`${where} references unknown record "${spec.record}"`);
        break;
      case "number":
      case "integer":
        if (spec.minimum !== undefined && spec.maximum !== undefined && spec.minimum > spec.maximum) {
          problems.push(`${where} has minimum above maximum`);
        }
        break;
      default:
        break;
    }
    if (spec.minItems !== undefined && spec.list !== true) {
      problems.push(`${where} declares minItems without list`);
    }
  }
};

const checkRules = (
  owner: string,
  known: ReadonlySet<string>,
  rules: ReadonlyArray<Rule> | undefined,
  problems: string[]
): void => {
  for (const rule of rules ?? []) {
    const named = rule.rule === "anyOf" ? rule.fields : [rule.field, rule.when.field];
    for (const field of named) {
      if (!known.has(field)) problems.push(`${owner} rule ${rule.rule} references unknown field "${field}"`);
    }
  }
};

/**
 * Compile a catalog into lookup maps. Throws CatalogError listing every
 * dangling reference, unknown rule field and duplicate tag at once.
 */
export const buildRegistry = (catalog: FormCatalog): FormRegistry => {
  const problems: string[] = [];

  if (!(catalog.root in catalog.records)) {
    problems.push(`root record "${catalog.root}" is not declared`);
  }

  const records = new Map<string, RecordSpec>();
  for (const [name, spec] of Object.entries(catalog.records)) {
    checkFieldTable(catalog, name, spec.fields, problems);
    checkRules(name, new Set(Object.keys(spec.fields)), spec.rules, problems);
    records.set(name, spec);
  }

  const unions = new Map<string, ReadonlyMap<string, VariantSpec>>();
  for (const [name, spec] of Object.entries(catalog.unions)) {
    const variants = new Map<string, VariantSpec>();
    for (const variant of spec.variants) {
      const attributes = variant.attributes ?? {};
      const tags = variantTags(variant);
      const owner = `${name}[${tags.join(" | ")}]`;
      checkFieldTable(catalog, owner, attributes, problems);
      checkRules(owner, new Set([catalog.discriminator, ...Object.keys(attributes)]), variant.rules, problems);
      for (const tag of tags) {
        if (variants.has(tag)) problems.push(`union "${name}" declares tag "${tag}" twice`);
        variants.set(tag, variant);
      }
    }
    unions.set(name, variants);
  }

  const choices = new Map<string, ReadonlySet<string>>();
  for (const [name, options] of Object.entries(catalog.choices)) {
    const set = new Set(options);
    if (set.size !== options.length) problems.push(`choice set "${name}" repeats an option`);
    choices.set(name, set);
  }

  if (problems.length > 0) {
    throw new CatalogError({ catalog: catalog.name, problems });
  }

  return {
    name: catalog.name,
    title: catalog.title,
    discriminator: catalog.discriminator,
    root: catalog.root,
    records,
    unions,
    choices,
  };
};

/**
 * Decode raw catalog data (an imported JSON file) and compile it
 */
export const loadRegistry = (label: string, data: unknown): FormRegistry =>
  Either.match(decodeFormCatalog(data), {
    onLeft: (error) => {
      throw new CatalogError({ catalog: label, problems: formatParseError(error) });
    },
    onRight: buildRegistry,
  });

/** Counts used in startup logs */
export const registryStats = (registry: FormRegistry) => {
  let variants = 0;
  for (const tags of registry.unions.values()) variants += tags.size;
  return {
    records: registry.records.size,
    unions: registry.unions.size,
    tags: variants,
    choices: registry.choices.size,
  };
};

// ============================================================================
// WALKER
// ============================================================================

const ABSENT: unique symbol = Symbol("absent");
const INVALID: unique symbol = Symbol("invalid");
type Outcome = FormValue | typeof ABSENT | typeof INVALID;
type MutableNode = { [field: string]: FormValue };

interface Walk {
  readonly registry: FormRegistry;
  readonly issues: IssueCollector;
}

const isPlainObject = (value: unknown): value is { readonly [key: string]: unknown } =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const joinPath = (base: string, key: string): string => (base === "" ? key : `${base}.${key}`);

const resolve = <V>(registry: FormRegistry, value: V | undefined, what: string): V => {
  // Unreachable for registries built by buildRegistry
  if (value === undefined) {
    throw new CatalogError({ catalog: registry.name, problems: [`unresolved ${what}`] });
  }
  return value;
};

const isPresent = (value: FormValue | undefined): boolean =>
  value !== undefined && !(Array.isArray(value) && value.length === 0);

const holds = (condition: Condition, node: MutableNode): boolean => {
  const actual: FormValue | undefined = node[condition.field];
  return actual !== undefined && condition.in.some((option) => option === actual);
};

const validateNumber = (
  spec: NumericFieldSpec,
  value: unknown,
  path: string,
  walk: Walk
): Outcome => {
  const expected = spec.type === "integer" ? "an integer" : "a number";
  if (typeof value !== "number" || !Number.isFinite(value)) {
    walk.issues.add(new PayloadShapeError({ path, expected }));
    return INVALID;
  }
  if (spec.type === "integer" && !Number.isInteger(value)) {
    walk.issues.add(new PayloadShapeError({ path, expected }));
    return INVALID;
  }
  if (spec.minimum !== undefined && value < spec.minimum) {
    walk.issues.add(new RangeViolationError({ path, value, bound: "minimum", limit: spec.minimum }));
    return INVALID;
  }
  if (spec.maximum !== undefined && value > spec.maximum) {
    walk.issues.add(new RangeViolationError({ path, value, bound: "maximum", limit: spec.maximum }));
    return INVALID;
  }
  return value;
};

const validateScalar = (spec: FieldSpec, value: unknown, path: string, walk: Walk): Outcome => {
  switch (spec.type) {
    case "text": {
      if (typeof value !== "string") {
        walk.issues.add(new PayloadShapeError({ path, expected: "a string" }));
        return INVALID;
      }
      const trimmed = value.trim();
      return trimmed === "" ? ABSENT : trimmed;
    }
    case "number":
    case "integer":
      return validateNumber(spec, value, path, walk);
    case "boolean":
      if (typeof value !== "boolean") {
        walk.issues.add(new PayloadShapeError({ path, expected: "a boolean" }));
        return INVALID;
      }
      return value;
    case "choice": {
      if (typeof value !== "string") {
        walk.issues.add(new PayloadShapeError({ path, expected: "a string" }));
        return INVALID;
      }
      const option = value.trim();
      if (option === "") return ABSENT;
      const options = resolve(walk.registry, walk.registry.choices.get(spec.choices), `choice set ${spec.choices}`);
      if (!options.has(option)) {
        walk.issues.add(new UnknownTagError({ path, value: option, context: spec.choices }));
        return INVALID;
      }
      return option;
    }
    case "union":
      return validateUnion(spec.union, value, path, walk);
    case "record":
      return validateRecord(spec.record, value, path, walk);
  }
};

const validateField = (spec: FieldSpec, value: unknown, path: string, walk: Walk): Outcome => {
  if (value === undefined || value === null) return ABSENT;
  if (spec.list !== true) return validateScalar(spec, value, path, walk);

  if (!Array.isArray(value)) {
    walk.issues.add(new PayloadShapeError({ path, expected: "a list" }));
    return INVALID;
  }
  const entries: ReadonlyArray<unknown> = value;
  const items: FormValue[] = [];
  let failed = false;
  entries.forEach((entry, index) => {
    const itemPath = `${path}[${index}]`;
    const outcome = entry === undefined || entry === null ? ABSENT : validateScalar(spec, entry, itemPath, walk);
    if (outcome === INVALID) {
      failed = true;
    } else if (outcome === ABSENT) {
      walk.issues.add(new ConditionalPresenceError({ path: itemPath, requirement: { kind: "required" } }));
      failed = true;
    } else {
      items.push(outcome);
    }
  });
  if (failed) return INVALID;

  if (spec.minItems !== undefined && items.length < spec.minItems) {
    walk.issues.add(
      new RangeViolationError({ path, value: items.length, bound: "minItems", limit: spec.minItems })
    );
    return INVALID;
  }
  return items;
};

const validateFields = (
  table: FieldTable,
  source: { readonly [key: string]: unknown },
  path: string,
  walk: Walk,
  tag?: string
): MutableNode | typeof INVALID => {
  const node: MutableNode = {};
  let failed = false;
  for (const [name, spec] of Object.entries(table)) {
    const fieldPath = joinPath(path, name);
    const outcome = validateField(spec, source[name], fieldPath, walk);
    if (outcome === INVALID) {
      failed = true;
      continue;
    }
    if (outcome === ABSENT) {
      if (spec.required === true) {
        walk.issues.add(
          new ConditionalPresenceError({
            path: fieldPath,
            requirement: tag === undefined ? { kind: "required" } : { kind: "requiredForTag", tag },
          })
        );
        failed = true;
      }
      continue;
    }
    node[name] = outcome;
  }
  return failed ? INVALID : node;
};

/**
 * Post-parse invariant pass. Runs only on nodes whose fields all parsed.
 */
const applyRules = (
  rules: ReadonlyArray<Rule> | undefined,
  node: MutableNode,
  path: string,
  walk: Walk
): boolean => {
  let ok = true;
  for (const rule of rules ?? []) {
    switch (rule.rule) {
      case "requiredWhen":
        if (holds(rule.when, node) && !isPresent(node[rule.field])) {
          walk.issues.add(
            new ConditionalPresenceError({
              path: joinPath(path, rule.field),
              requirement: { kind: "requiredWhen", field: rule.when.field, values: rule.when.in },
            })
          );
          ok = false;
        }
        break;
      case "absentUnless":
        if (!holds(rule.when, node) && isPresent(node[rule.field])) {
          walk.issues.add(
            new ConditionalPresenceError({
              path: joinPath(path, rule.field),
              requirement: { kind: "absentUnless", field: rule.when.field, values: rule.when.in },
            })
          );
          ok = false;
        }
        break;
      case "minimumWhen": {
        const actual: FormValue | undefined = node[rule.field];
        if (holds(rule.when, node) && (typeof actual !== "number" || actual < rule.minimum)) {
          walk.issues.add(
            new RangeViolationError({
              path: joinPath(path, rule.field),
              value: typeof actual === "number" ? actual : undefined,
              bound: "minimum",
              limit: rule.minimum,
              condition: { field: rule.when.field, values: rule.when.in },
            })
          );
          ok = false;
        }
        break;
      }
      case "anyOf":
        if (!rule.fields.some((field) => isPresent(node[field]))) {
          walk.issues.add(
            new ConditionalPresenceError({ path, requirement: { kind: "anyOf", fields: rule.fields } })
          );
          ok = false;
        }
        break;
    }
  }
  return ok;
};

function validateRecord(name: string, value: unknown, path: string, walk: Walk): FormObject | typeof INVALID {
  if (!isPlainObject(value)) {
    walk.issues.add(new PayloadShapeError({ path, expected: "an object" }));
    return INVALID;
  }
  const spec = resolve(walk.registry, walk.registry.records.get(name), `record ${name}`);
  const node = validateFields(spec.fields, value, path, walk);
  if (node === INVALID) return INVALID;
  return applyRules(spec.rules, node, path, walk) ? node : INVALID;
}

function validateUnion(name: string, value: unknown, path: string, walk: Walk): FormObject | typeof INVALID {
  const discriminator = walk.registry.discriminator;
  if (!isPlainObject(value)) {
    walk.issues.add(new PayloadShapeError({ path, expected: `an object with a "${discriminator}" tag` }));
    return INVALID;
  }

  const tagPath = joinPath(path, discriminator);
  const raw = value[discriminator];
  if (raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "")) {
    walk.issues.add(new ConditionalPresenceError({ path: tagPath, requirement: { kind: "required" } }));
    return INVALID;
  }
  if (typeof raw !== "string") {
    walk.issues.add(new PayloadShapeError({ path: tagPath, expected: "a string" }));
    return INVALID;
  }

  const tag = raw.trim();
  const variants = resolve(walk.registry, walk.registry.unions.get(name), `union ${name}`);
  const variant = variants.get(tag);
  if (variant === undefined) {
    walk.issues.add(new UnknownTagError({ path: tagPath, value: tag, context: name }));
    return INVALID;
  }

  const attributes = validateFields(variant.attributes ?? {}, value, path, walk, tag);
  if (attributes === INVALID) return INVALID;

  const node: MutableNode = { [discriminator]: tag, ...attributes };
  return applyRules(variant.rules, node, path, walk) ? node : INVALID;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Validate one payload against a registry's root record
 */
export const validateWithRegistry = (registry: FormRegistry, payload: unknown): FormValidationResult => {
  const walk: Walk = { registry, issues: new IssueCollector() };
  const record = validateRecord(registry.root, payload, "", walk);
  if (record === INVALID || walk.issues.hasIssues()) {
    return { record: null, issues: walk.issues.getAll() };
  }
  return { record, issues: [] };
};

/** Stable JSON for a canonical record (key order is already canonical) */
export const serializeForm = (record: FormRecord): string => JSON.stringify(record);

/**
 * Serialize then re-validate. A canonical record comes back structurally equal.
 */
export const roundTripForm = (registry: FormRegistry, record: FormRecord): FormValidationResult => {
  const reparsed: unknown = JSON.parse(serializeForm(record));
  return validateWithRegistry(registry, reparsed);
};
