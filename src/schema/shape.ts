import type { StandardSchemaV1 } from '@standard-schema/spec';

/** Tags of every declared shape. */
export type ShapeKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'literal'
  | 'unknown'
  | 'nullable'
  | 'optional'
  | 'array'
  | 'object';

/** Issue reported by a declared shape, with the mismatch spelled out. */
export interface ShapeIssue extends StandardSchemaV1.Issue {
  /** Description of what the shape declared */
  readonly expected: string;
  /** Description of what the payload held */
  readonly actual: string;
}

/** Common part of every shape: its tag plus the Standard Schema entrypoint. */
export interface ShapeBase<Kind extends ShapeKind, Output> extends StandardSchemaV1<unknown, Output> {
  readonly kind: Kind;
}

/** Scalar value allowed in a literal shape. */
export type Literal = string | number | boolean | null;

export interface StringShape extends ShapeBase<'string', string> {}
export interface NumberShape extends ShapeBase<'number', number> {}
export interface IntegerShape extends ShapeBase<'integer', number> {}
export interface BooleanShape extends ShapeBase<'boolean', boolean> {}
export interface UnknownShape extends ShapeBase<'unknown', unknown> {}

export interface LiteralShape<Value extends Literal> extends ShapeBase<'literal', Value> {
  readonly value: Value;
}

export interface NullableShape<Inner extends Shape> extends ShapeBase<'nullable', InferShape<Inner> | null> {
  readonly inner: Inner;
}

/**
 * Field that may be absent from the payload. With a fallback the absent field is
 * bound to `fallback.value`, without one it stays absent.
 */
export interface OptionalShape<Inner extends Shape, Output> extends ShapeBase<'optional', Output> {
  readonly inner: Inner;
  readonly fallback: { readonly value: InferShape<Inner> } | null;
}

/** Homogeneous sequence. */
export interface ArrayShape<Item extends Shape> extends ShapeBase<'array', InferShape<Item>[]> {
  readonly item: Item;
}

/** Object with declared fields; undeclared keys are dropped when binding. */
export interface ObjectShape<Fields extends ShapeFields> extends ShapeBase<'object', InferFields<Fields>> {
  readonly fields: Fields;
}

/** Any declared shape. */
export type Shape =
  | StringShape
  | NumberShape
  | IntegerShape
  | BooleanShape
  | UnknownShape
  | LiteralShape<Literal>
  | NullableShape<Shape>
  | OptionalShape<Shape, unknown>
  | ArrayShape<Shape>
  | ObjectShape<ShapeFields>;

/** Field map of an {@link ObjectShape}. */
export type ShapeFields = { readonly [field: string]: Shape };

/** Output type of a shape (or of any Standard Schema). */
export type InferShape<S extends StandardSchemaV1> = StandardSchemaV1.InferOutput<S>;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type OptionalFields<Fields extends ShapeFields> = {
  [K in keyof Fields]: undefined extends InferShape<Fields[K]> ? K : never;
}[keyof Fields];

/** Output type of an object shape: fields that may be `undefined` become optional keys. */
export type InferFields<Fields extends ShapeFields> = Simplify<
  { [K in Exclude<keyof Fields, OptionalFields<Fields>>]: InferShape<Fields[K]> } & {
    [K in OptionalFields<Fields>]?: InferShape<Fields[K]>;
  }
>;

type Check = { ok: true; value: unknown } | { ok: false; issue: ShapeIssue };

const VENDOR = 'restshape';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Short type description of a payload value, as reported in `actual`. */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
}

/** Short description of what a shape accepts, as reported in `expected`. */
export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case 'literal':
      return JSON.stringify(shape.value);
    case 'nullable':
      return `${describeShape(shape.inner)} | null`;
    case 'optional':
      return `${describeShape(shape.inner)} | undefined`;
    default:
      return shape.kind;
  }
}

function mismatch(shape: Shape, value: unknown, path: readonly PropertyKey[], actual = describeValue(value)): Check {
  const expected = describeShape(shape);
  return { ok: false, issue: { message: `expected ${expected}, got ${actual}`, path, expected, actual } };
}

/**
 * Walks a payload against a declared shape and stops at the first mismatch.
 * Values are never coerced.
 */
function check(shape: Shape, value: unknown, path: readonly PropertyKey[]): Check {
  switch (shape.kind) {
    case 'unknown':
      return { ok: true, value };
    case 'string':
      return typeof value === 'string' ? { ok: true, value } : mismatch(shape, value, path);
    case 'boolean':
      return typeof value === 'boolean' ? { ok: true, value } : mismatch(shape, value, path);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value) ? { ok: true, value } : mismatch(shape, value, path);
    case 'integer':
      return Number.isInteger(value) ? { ok: true, value } : mismatch(shape, value, path);
    case 'literal':
      if (value === shape.value) {
        return { ok: true, value: shape.value };
      }

      return mismatch(shape, value, path, typeof value === typeof shape.value ? JSON.stringify(value) : undefined);
    case 'nullable':
      return value === null ? { ok: true, value: null } : check(shape.inner, value, path);
    case 'optional':
      if (value === undefined) {
        return { ok: true, value: shape.fallback?.value };
      }

      return check(shape.inner, value, path);
    case 'array': {
      if (!Array.isArray(value)) {
        return mismatch(shape, value, path);
      }

      const items: unknown[] = [];
      for (const [index, item] of value.entries()) {
        const result = check(shape.item, item, [...path, index]);
        if (!result.ok) {
          return result;
        }

        items.push(result.value);
      }

      return { ok: true, value: items };
    }
    case 'object': {
      if (!isRecord(value)) {
        return mismatch(shape, value, path);
      }

      const bound: Record<string, unknown> = {};
      for (const [key, field] of Object.entries(shape.fields)) {
        const present = Object.hasOwn(value, key);
        if (!present && field.kind !== 'optional') {
          return mismatch(field, undefined, [...path, key], 'missing');
        }

        const result = check(field, present ? value[key] : undefined, [...path, key]);
        if (!result.ok) {
          return result;
        }

        if (result.value !== undefined) {
          bound[key] = result.value;
        }
      }

      return { ok: true, value: bound };
    }
  }
}

/**
 * Standard Schema entrypoint shared by every shape. `check` is exhaustive over the
 * shape it walks, so a successful value is the shape's output type.
 */
function standardProps<Output>(resolve: () => Shape): StandardSchemaV1.Props<unknown, Output> {
  return {
    version: 1,
    vendor: VENDOR,
    validate(value: unknown): StandardSchemaV1.Result<Output> {
      const result = check(resolve(), value, []);
      if (!result.ok) {
        return { issues: [result.issue] };
      }

      return { value: result.value as Output };
    },
  };
}

export function string(): StringShape {
  const self: StringShape = { kind: 'string', '~standard': standardProps(() => self) };
  return self;
}

export function number(): NumberShape {
  const self: NumberShape = { kind: 'number', '~standard': standardProps(() => self) };
  return self;
}

export function integer(): IntegerShape {
  const self: IntegerShape = { kind: 'integer', '~standard': standardProps(() => self) };
  return self;
}

export function boolean(): BooleanShape {
  const self: BooleanShape = { kind: 'boolean', '~standard': standardProps(() => self) };
  return self;
}

/** Accepts any JSON value as-is. */
export function unknown(): UnknownShape {
  const self: UnknownShape = { kind: 'unknown', '~standard': standardProps(() => self) };
  return self;
}

export function literal<const Value extends Literal>(value: Value): LiteralShape<Value> {
  const self: LiteralShape<Value> = { kind: 'literal', value, '~standard': standardProps(() => self) };
  return self;
}

export function nullable<Inner extends Shape>(inner: Inner): NullableShape<Inner> {
  const self: NullableShape<Inner> = { kind: 'nullable', inner, '~standard': standardProps(() => self) };
  return self;
}

export function optional<Inner extends Shape>(inner: Inner): OptionalShape<Inner, InferShape<Inner> | undefined>;
export function optional<Inner extends Shape>(
  inner: Inner,
  fallback: InferShape<Inner>,
): OptionalShape<Inner, InferShape<Inner>>;
export function optional<Inner extends Shape>(
  inner: Inner,
  ...fallback: [] | [InferShape<Inner>]
): OptionalShape<Inner, InferShape<Inner> | undefined> {
  const self: OptionalShape<Inner, InferShape<Inner> | undefined> = {
    kind: 'optional',
    inner,
    fallback: fallback.length === 1 ? { value: fallback[0] } : null,
    '~standard': standardProps(() => self),
  };
  return self;
}

export function array<Item extends Shape>(item: Item): ArrayShape<Item> {
  const self: ArrayShape<Item> = { kind: 'array', item, '~standard': standardProps(() => self) };
  return self;
}

export function object<const Fields extends ShapeFields>(fields: Fields): ObjectShape<Fields> {
  const self: ObjectShape<Fields> = { kind: 'object', fields, '~standard': standardProps(() => self) };
  return self;
}

/**
 * Declarative response shapes.
 *
 * @example
 * const user = shape.object({ id: shape.integer(), name: shape.string(), tags: shape.optional(shape.array(shape.string()), []) });
 * type User = InferShape<typeof user>; // { id: number; name: string; tags: string[] }
 */
export const shape = {
  string,
  number,
  integer,
  boolean,
  unknown,
  literal,
  nullable,
  optional,
  array,
  object,
} as const;

/** Whether a Standard Schema is one of the declared shapes above. */
export function isShape(schema: StandardSchemaV1): schema is Shape {
  return schema['~standard'].vendor === VENDOR && 'kind' in schema;
}
