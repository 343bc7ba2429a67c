// Input types: an annotated contract declaration.
//
// These are produced by the directive extractor, which turns annotation text
// into structured option bags. Every option keeps the span it was written at
// so that diagnostics can point back to it.

import type { PathType, TypeRef } from "./type_ref.ts";

// ============================================================================
// Spans
// ============================================================================

/** Source location, 1-based. */
export interface Span {
  line: number;
  column: number;
}

/** A value together with the location it was declared at. */
export interface Spanned<T> {
  value: T;
  span: Span;
}

/** Structured failure reported by the directive extractor. */
export interface DirectiveParseFailure {
  message: string;
  span: Span;
}

/**
 * Outcome of extracting directives for one declaration, method or argument.
 *
 * Extraction failures are values, not exceptions.
 */
export type Extracted<T> = { ok: true; value: T } | { ok: false; failure: DirectiveParseFailure };

/** JSON value accepted as an argument default. */
export type DefaultValue =
  | null
  | boolean
  | number
  | string
  | DefaultValue[]
  | { [key: string]: DefaultValue };

// ============================================================================
// Directive Option Bags
// ============================================================================

/** Binding of an implementer type to a free downcast function. */
export interface ExternalDowncast {
  type: TypeRef;
  function: Spanned<string>;
}

/**
 * Requested dispatch representation.
 *
 * - open: dynamic dispatch through an alias named `alias`
 * - closed: tagged union, named `name` or derived from the contract
 */
export type DispatchMode =
  | { mode: "open"; alias: Spanned<string> }
  | { mode: "closed"; name?: Spanned<string> };

/** Directives placed on the contract declaration itself. */
export interface DeclarationOptions {
  name?: Spanned<string>;
  description?: Spanned<string>;
  scalar?: Spanned<TypeRef>;
  implementers?: Spanned<TypeRef>[];
  externalDowncasts?: ExternalDowncast[];
  context?: Spanned<TypeRef>;
  dispatch?: DispatchMode;
  asynchronous?: Span;
  /** Marks a system-level contract, allowed to use `__`-prefixed names. */
  internal?: Span;
}

/** Directives placed on a contract method. */
export interface MethodOptions {
  name?: Spanned<string>;
  description?: Spanned<string>;
  /** Deprecation, with an optional reason. */
  deprecated?: Spanned<string | null>;
  ignore?: Span;
  downcast?: Span;
}

/** Directives placed on a method parameter. */
export interface ArgumentOptions {
  name?: Spanned<string>;
  description?: Spanned<string>;
  default?: Spanned<DefaultValue>;
  context?: Span;
  executor?: Span;
}

// ============================================================================
// Declarations
// ============================================================================

export type Visibility = "public" | "crate" | "private";

export type GenericParam =
  | { kind: "type"; name: string; default?: TypeRef }
  | { kind: "lifetime"; name: string }
  | { kind: "const"; name: string; type: TypeRef };

/**
 * Method receiver.
 *
 * - shared: `&self`
 * - mutable: `&mut self`
 * - owned: `self`
 * - typed: `self: Box<Self>` and friends
 */
export type Receiver =
  | { form: "shared"; span: Span }
  | { form: "mutable"; span: Span }
  | { form: "owned"; span: Span }
  | { form: "typed"; type: TypeRef; span: Span };

/**
 * Binding pattern of a parameter.
 *
 * Identifiers may be raw (`r#type`); the prefix is removed before naming.
 */
export type ParamPattern = { kind: "ident"; name: string } | { kind: "destructure"; text: string };

export interface ParamDeclaration {
  pattern: ParamPattern;
  type: TypeRef;
  span: Span;
  options: Extracted<ArgumentOptions>;
}

export interface MethodDeclaration {
  kind: "method";
  ident: string;
  span: Span;
  /** null when the method takes no receiver at all. */
  receiver: Receiver | null;
  params: ParamDeclaration[];
  /** Omitted for methods returning the unit type. */
  output?: TypeRef;
  isAsync: boolean;
  /** Whether the contract supplies a default body. */
  hasDefault: boolean;
  options: Extracted<MethodOptions>;
}

/** Associated type declared by the contract. */
export interface AssociatedTypeDeclaration {
  kind: "type";
  ident: string;
  generics: string[];
  span: Span;
}

/** Associated constant declared by the contract. */
export interface ConstDeclaration {
  kind: "const";
  ident: string;
  type: TypeRef;
  span: Span;
}

export type ContractItem = MethodDeclaration | AssociatedTypeDeclaration | ConstDeclaration;

/** A behavioral contract to compile into an interface. */
export interface ContractDeclaration {
  ident: string;
  span: Span;
  visibility: Visibility;
  generics: GenericParam[];
  items: ContractItem[];
  options: Extracted<DeclarationOptions>;
}

/** Directives placed on an implementation block. */
export interface ImplementationOptions {
  scalar?: Spanned<TypeRef>;
  asynchronous?: Span;
}

/**
 * A block implementing a contract for a concrete type.
 *
 * `contract` is the implemented contract's path; its type arguments are
 * rewritten when the payload parameter is threaded through.
 */
export interface ImplementationDeclaration {
  contract: PathType;
  self: TypeRef;
  span: Span;
  generics: GenericParam[];
  methods: MethodDeclaration[];
  options: Extracted<ImplementationOptions>;
}

/** Methods of a contract, in declaration order. */
export function contractMethods(decl: ContractDeclaration): MethodDeclaration[] {
  return decl.items.filter((item): item is MethodDeclaration => item.kind === "method");
}
