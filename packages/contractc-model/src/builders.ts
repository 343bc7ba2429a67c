// Builders for contract declarations.
//
// The directive extractor produces declarations from annotated source; these
// helpers build the same structures by hand, for tools generating contracts
// programmatically and for tests.

import type {
  ArgumentOptions,
  ContractDeclaration,
  ContractItem,
  DeclarationOptions,
  DirectiveParseFailure,
  Extracted,
  GenericParam,
  ImplementationDeclaration,
  ImplementationOptions,
  MethodDeclaration,
  MethodOptions,
  ParamDeclaration,
  Receiver,
  Span,
  Spanned,
  Visibility,
} from "./declaration.ts";
import { type PathType, type TypeRef, pathType } from "./type_ref.ts";

export function at(line: number, column = 1): Span {
  return { line, column };
}

export function spanned<T>(value: T, span: Span = at(1)): Spanned<T> {
  return { value, span };
}

/** Options either extracted successfully or failed with a parse error. */
type OptionsInit<T> = { options?: T; failure?: DirectiveParseFailure };

function extracted<T>(init: OptionsInit<T>, empty: T): Extracted<T> {
  if (init.failure !== undefined) {
    return { ok: false, failure: init.failure };
  }
  return { ok: true, value: init.options ?? empty };
}

// ============================================================================
// Parameters
// ============================================================================

export interface ParamInit extends OptionsInit<ArgumentOptions> {
  span?: Span;
}

/** A parameter bound to a single identifier. */
export function param(name: string, type: TypeRef, init: ParamInit = {}): ParamDeclaration {
  return {
    pattern: { kind: "ident", name },
    type,
    span: init.span ?? at(1),
    options: extracted(init, {}),
  };
}

/** A parameter bound by a destructuring pattern, e.g. `(a, b): (i32, i32)`. */
export function destructured(text: string, type: TypeRef, init: ParamInit = {}): ParamDeclaration {
  return {
    pattern: { kind: "destructure", text },
    type,
    span: init.span ?? at(1),
    options: extracted(init, {}),
  };
}

// ============================================================================
// Methods
// ============================================================================

export interface MethodInit extends OptionsInit<MethodOptions> {
  /** Receiver form. Defaults to "shared"; null for no receiver. */
  receiver?: Receiver["form"] | null;
  params?: ParamDeclaration[];
  output?: TypeRef;
  isAsync?: boolean;
  hasDefault?: boolean;
  span?: Span;
}

export function method(ident: string, init: MethodInit = {}): MethodDeclaration {
  const span = init.span ?? at(1);
  const form = init.receiver === undefined ? "shared" : init.receiver;

  let receiver: Receiver | null;
  if (form === null) {
    receiver = null;
  } else if (form === "typed") {
    receiver = { form, type: pathType("Box", [pathType("Self")]), span };
  } else {
    receiver = { form, span };
  }

  const declaration: MethodDeclaration = {
    kind: "method",
    ident,
    span,
    receiver,
    params: init.params ?? [],
    isAsync: init.isAsync ?? false,
    hasDefault: init.hasDefault ?? false,
    options: extracted(init, {}),
  };
  if (init.output !== undefined) {
    declaration.output = init.output;
  }
  return declaration;
}

// ============================================================================
// Contracts
// ============================================================================

export interface ContractInit extends OptionsInit<DeclarationOptions> {
  items?: ContractItem[];
  generics?: GenericParam[];
  visibility?: Visibility;
  span?: Span;
}

export function contract(ident: string, init: ContractInit = {}): ContractDeclaration {
  return {
    ident,
    span: init.span ?? at(1),
    visibility: init.visibility ?? "public",
    generics: init.generics ?? [],
    items: init.items ?? [],
    options: extracted(init, {}),
  };
}

export interface ImplementationInit extends OptionsInit<ImplementationOptions> {
  methods?: MethodDeclaration[];
  generics?: GenericParam[];
  span?: Span;
}

export function implementation(
  contractPath: PathType,
  self: TypeRef,
  init: ImplementationInit = {},
): ImplementationDeclaration {
  return {
    contract: contractPath,
    self,
    span: init.span ?? at(1),
    generics: init.generics ?? [],
    methods: init.methods ?? [],
    options: extracted(init, {}),
  };
}
