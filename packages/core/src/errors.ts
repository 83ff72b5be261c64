/**
 * packages/core/src/errors.ts — Runtime error taxonomy.
 *
 * Every violation the runtime raises on purpose is a LoomError carrying one of
 * the codes below. The frame loop branches on the code: render and init
 * failures are recovered with a full redraw, anything else is fatal.
 */

/**
 * Deterministic error codes for runtime failures.
 *
 *   - LOOM_COMPONENT_RENDER: one node's paint step threw; the node is skipped
 *   - LOOM_INITIALIZATION: a screen's init hook threw inside pushScreen()
 *   - LOOM_DISPATCH: an action handler threw (only ever seen in results/logs)
 *   - LOOM_FATAL: an unclassified error reached the frame-loop boundary
 *   - LOOM_INVALID_PROPS: bad argument or configuration value
 *   - LOOM_INVALID_STATE: lifecycle misuse (start twice, use after stop)
 *   - LOOM_BACKEND_ERROR: terminal backend failed to start, write or stop
 */
export type LoomErrorCode =
  | "LOOM_COMPONENT_RENDER"
  | "LOOM_INITIALIZATION"
  | "LOOM_DISPATCH"
  | "LOOM_FATAL"
  | "LOOM_INVALID_PROPS"
  | "LOOM_INVALID_STATE"
  | "LOOM_BACKEND_ERROR";

/** Codes the frame loop recovers from instead of stopping. */
const RECOVERABLE_CODES: ReadonlySet<LoomErrorCode> = new Set<LoomErrorCode>([
  "LOOM_COMPONENT_RENDER",
  "LOOM_INITIALIZATION",
]);

export class LoomError extends Error {
  override readonly name = "LoomError";
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message?: string, opts?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError);
    }
  }
}

export function isLoomError(v: unknown, code?: LoomErrorCode): v is LoomError {
  if (!(v instanceof LoomError)) return false;
  return code === undefined || v.code === code;
}

/** Whether the frame loop keeps running after this error. */
export function isRecoverableError(v: unknown): boolean {
  return v instanceof LoomError && RECOVERABLE_CODES.has(v.code);
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

/** Message of a thrown value without the error name prefix. */
export function thrownMessage(v: unknown): string {
  if (v instanceof Error) return v.message;
  return String(v);
}

export function toError(v: unknown): Error {
  return v instanceof Error ? v : new Error(String(v));
}

export function invalidProps(detail: string): never {
  throw new LoomError("LOOM_INVALID_PROPS", detail);
}
