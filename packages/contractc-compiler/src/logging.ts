// Logging hooks for the contract compiler.
//
// Provides per-stage logging with timing information.
// Uses the DEBUG environment variable pattern matching (like npm's debug package).

import { formatDiagnostic } from "@contractc/model";
import type { CompileContext, CompileHooks, StageName, StageOutcome } from "./hooks.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "contractc:compile".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "contractc:*" or "*".
   */
  namespace?: string;

  /**
   * Log each stage's result. Defaults to false (models can be large).
   */
  logResults?: boolean;

  /**
   * Log the diagnostics of a failed stage. Defaults to true.
   */
  logDiagnostics?: boolean;

  /**
   * Minimum duration (ms) to log. Stages faster than this are skipped.
   * Defaults to 0 (log all stages).
   */
  minDuration?: number;

  /**
   * Pattern list to match against. Defaults to `process.env.DEBUG`, read on
   * every stage so that it can be changed at run time.
   */
  debug?: string;
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create hooks that log every pipeline stage with timing information.
 * Logging is controlled by DEBUG (like npm's debug package).
 *
 * ```sh
 * DEBUG='contractc:*' npm test        # all compiler logging
 * DEBUG='*,-contractc:compile' ...    # everything but stage logging
 * ```
 *
 * Logs structured objects to the console:
 * - Stage start: { type: "stage", contract, stage }
 * - Stage end: { type: "stage-done", contract, stage, duration, ok, ... }
 *
 * @example
 * ```typescript
 * const result = compileContract(declaration, { hooks: [loggingHooks()] });
 * // → Character.classify
 * // ← Character.classify: ✓ 0.04ms
 * ```
 */
export function loggingHooks(options: LoggingOptions = {}): CompileHooks {
  const namespace = options.namespace ?? "contractc:compile";
  const logResults = options.logResults ?? false;
  const logDiagnostics = options.logDiagnostics ?? true;
  const minDuration = options.minDuration ?? 0;
  const enabled = (): boolean => isEnabled(namespace, options.debug ?? process.env.DEBUG);

  return {
    pre(ctx: CompileContext, stage: StageName): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!enabled()) return;

      console.log(`→ ${ctx.contract}.${stage}`, {
        type: "stage",
        contract: ctx.contract,
        stage,
      });
    },

    post(ctx: CompileContext, stage: StageName, outcome: StageOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;

      if (duration < minDuration) return;

      if (!enabled()) return;

      const logObj: Record<string, unknown> = {
        type: "stage-done",
        contract: ctx.contract,
        stage,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults) {
          logObj.result = outcome.value;
        }
        console.log(`← ${ctx.contract}.${stage}: ✓ ${duration.toFixed(2)}ms`, logObj);
      } else {
        logObj.ok = false;
        logObj.errorCount = outcome.diagnostics.length;
        if (logDiagnostics) {
          logObj.diagnostics = outcome.diagnostics.map(formatDiagnostic);
        }
        console.log(`← ${ctx.contract}.${stage}: ✗ ${duration.toFixed(2)}ms`, logObj);
      }
    },
  };
}
