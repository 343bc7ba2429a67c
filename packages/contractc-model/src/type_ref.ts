// Type references for contract declarations.
//
// A declaration describes its signatures with these references rather than
// with source text, so the compiler can compare, rewrite and render them:
// - Named types with generic arguments (path)
// - Borrowed references (ref)
// - Tuples, including the unit type (tuple)
// - Slices (slice)

// ============================================================================
// Type Reference Kinds
// ============================================================================

/** A named type such as `String`, `Option<&Human>` or `crate::model::Droid`. */
export interface PathType {
  kind: "path";
  /** Fully qualified name, segments separated by `::`. */
  name: string;
  args: TypeArg[];
}

/** A borrowed reference `&'a T` or `&mut T`. */
export interface RefType {
  kind: "ref";
  mutable: boolean;
  /** Lifetime name without the leading quote, e.g. `a` or `_`. */
  lifetime?: string;
  inner: TypeRef;
}

/** A tuple `(A, B)`. The empty tuple is the unit type `()`. */
export interface TupleType {
  kind: "tuple";
  elements: TypeRef[];
}

/** A slice `[T]`. */
export interface SliceType {
  kind: "slice";
  element: TypeRef;
}

/** A lifetime argument inside a path, e.g. the `'a` of `Cow<'a, str>`. */
export interface LifetimeArg {
  kind: "lifetime";
  name: string;
}

/** Union of all type references. */
export type TypeRef = PathType | RefType | TupleType | SliceType;

/** Generic argument of a path: a type or a lifetime. */
export type TypeArg = TypeRef | LifetimeArg;

/** Name given to every lifetime once it has been erased. */
export const ANONYMOUS_LIFETIME = "_";

// ============================================================================
// Constructors
// ============================================================================

export function pathType(name: string, args: TypeArg[] = []): PathType {
  return { kind: "path", name, args };
}

export function refType(inner: TypeRef, mutable = false, lifetime?: string): RefType {
  return lifetime === undefined
    ? { kind: "ref", mutable, inner }
    : { kind: "ref", mutable, lifetime, inner };
}

export function unitType(): TupleType {
  return { kind: "tuple", elements: [] };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Structural identity of two type arguments.
 *
 * Two references are equal when they spell the same type: same names, same
 * mutability and the same lifetimes.
 */
export function typeEquals(a: TypeArg, b: TypeArg): boolean {
  switch (a.kind) {
    case "lifetime":
      return b.kind === "lifetime" && a.name === b.name;
    case "path":
      return (
        b.kind === "path" &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => typeEquals(arg, b.args[i]))
      );
    case "ref":
      return (
        b.kind === "ref" &&
        a.mutable === b.mutable &&
        a.lifetime === b.lifetime &&
        typeEquals(a.inner, b.inner)
      );
    case "tuple":
      return (
        b.kind === "tuple" &&
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => typeEquals(el, b.elements[i]))
      );
    case "slice":
      return b.kind === "slice" && typeEquals(a.element, b.element);
  }
}

/** Check if a type is the unit type `()`. */
export function isUnit(ty: TypeRef): boolean {
  return ty.kind === "tuple" && ty.elements.length === 0;
}

/**
 * Last `::` segment of a path name.
 *
 * @returns The bare type name, or null for non-path types
 */
export function lastSegment(ty: TypeRef): string | null {
  if (ty.kind !== "path") return null;
  const segments = ty.name.split("::");
  return segments[segments.length - 1];
}

/**
 * If `ty` is a bare single-segment path without arguments, return its name.
 *
 * Generic parameters are referenced this way, so this is how a type is
 * matched against a declaration's own generic parameters.
 */
export function bareIdent(ty: TypeRef): string | null {
  if (ty.kind !== "path" || ty.args.length > 0 || ty.name.includes("::")) {
    return null;
  }
  return ty.name;
}

// ============================================================================
// Rewrites
// ============================================================================

/** Strip one outer reference: `&Context` becomes `Context`. */
export function unreferenced(ty: TypeRef): TypeRef {
  return ty.kind === "ref" ? ty.inner : ty;
}

/**
 * Deep copy of a type reference.
 *
 * Everything the compiler hands out is copied from the declaration, so that
 * editing a compiled model never reaches back into its input.
 */
export function cloneType(ty: TypeRef): TypeRef {
  switch (ty.kind) {
    case "path":
      return clonePath(ty);
    case "ref":
      return refType(cloneType(ty.inner), ty.mutable, ty.lifetime);
    case "tuple":
      return { kind: "tuple", elements: ty.elements.map(cloneType) };
    case "slice":
      return { kind: "slice", element: cloneType(ty.element) };
  }
}

export function clonePath(ty: PathType): PathType {
  return pathType(
    ty.name,
    ty.args.map((arg) => (arg.kind === "lifetime" ? { kind: "lifetime", name: arg.name } : cloneType(arg))),
  );
}

/**
 * Replace every named lifetime with the anonymous lifetime `'_`.
 *
 * Field types describe shapes, not borrow relationships, so fields never
 * carry the lifetimes of the method they came from. Returns a new reference;
 * the input is not modified.
 */
export function eraseLifetimes(ty: TypeRef): TypeRef {
  switch (ty.kind) {
    case "path":
      return {
        kind: "path",
        name: ty.name,
        args: ty.args.map((arg) =>
          arg.kind === "lifetime"
            ? { kind: "lifetime", name: ANONYMOUS_LIFETIME }
            : eraseLifetimes(arg),
        ),
      };
    case "ref":
      return ty.lifetime === undefined
        ? { kind: "ref", mutable: ty.mutable, inner: eraseLifetimes(ty.inner) }
        : {
            kind: "ref",
            mutable: ty.mutable,
            lifetime: ANONYMOUS_LIFETIME,
            inner: eraseLifetimes(ty.inner),
          };
    case "tuple":
      return { kind: "tuple", elements: ty.elements.map(eraseLifetimes) };
    case "slice":
      return { kind: "slice", element: eraseLifetimes(ty.element) };
  }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render a type reference as source text.
 *
 * Used in diagnostics and as the stable key of a type.
 */
export function renderType(ty: TypeArg): string {
  switch (ty.kind) {
    case "lifetime":
      return `'${ty.name}`;
    case "path":
      return ty.args.length === 0 ? ty.name : `${ty.name}<${ty.args.map(renderType).join(", ")}>`;
    case "ref": {
      const lifetime = ty.lifetime === undefined ? "" : `'${ty.lifetime} `;
      const mutability = ty.mutable ? "mut " : "";
      return `&${lifetime}${mutability}${renderType(ty.inner)}`;
    }
    case "tuple":
      if (ty.elements.length === 1) {
        return `(${renderType(ty.elements[0])},)`;
      }
      return `(${ty.elements.map(renderType).join(", ")})`;
    case "slice":
      return `[${renderType(ty.element)}]`;
  }
}
