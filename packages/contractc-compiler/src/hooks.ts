// Compile hooks.
//
// Hooks observe the pipeline stage by stage, enabling patterns like logging,
// timing and collecting intermediate results. They cannot change the outcome
// of a stage.

import type { Diagnostic } from "@contractc/model";

/**
 * Extensions provide type-safe, symbol-keyed storage for hook state.
 *
 * Each hook can define a unique symbol and store/retrieve typed data
 * without conflicts with other hooks.
 *
 * @example
 * ```typescript
 * const STARTED = Symbol("started");
 * ctx.extensions.set(STARTED, Date.now());
 * const started = ctx.extensions.get<number>(STARTED);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }
}

/** Pipeline stages, in execution order. */
export const STAGES = [
  "options",
  "externalDowncasts",
  "classify",
  "methodDowncasts",
  "context",
  "scalar",
  "async",
  "dispatch",
  "assemble",
] as const;

export type StageName = (typeof STAGES)[number];

/**
 * Context passed to hooks.
 *
 * One context is shared by every stage of a single compilation.
 */
export interface CompileContext {
  /** Identifier of the contract being compiled. */
  readonly contract: string;

  extensions: Extensions;
}

/**
 * Outcome of a stage.
 *
 * A stage fails when the pipeline aborts after it; `diagnostics` then holds
 * everything reported so far.
 */
export type StageOutcome =
  | { ok: true; value: unknown }
  | { ok: false; diagnostics: readonly Diagnostic[] };

/**
 * Compile hooks interface.
 *
 * @example
 * ```typescript
 * const timing: CompileHooks = {
 *   pre(ctx, stage) {
 *     ctx.extensions.set(STARTED, performance.now());
 *   },
 *   post(ctx, stage, outcome) {
 *     const started = ctx.extensions.get<number>(STARTED);
 *     record(stage, performance.now() - (started ?? 0));
 *   },
 * };
 * ```
 */
export interface CompileHooks {
  /** Called before a stage runs. */
  pre?(ctx: CompileContext, stage: StageName): void;

  /** Called after a stage, with its result or the diagnostics that stopped the pipeline. */
  post?(ctx: CompileContext, stage: StageName, outcome: StageOutcome): void;
}
