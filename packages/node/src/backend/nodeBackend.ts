/**
 * packages/node/src/backend/nodeBackend.ts — Terminal backend over Node streams.
 *
 * Input: stdin in raw mode, decoded with decodeKeys() as chunks arrive. An
 * escape sequence cut off at the end of a chunk waits for the next one.
 * Output: ANSI frames written to stdout as-is.
 * Resize: stdout "resize" events; size() reads stdout.columns/rows.
 *
 * start() enters the alternate screen and hides the cursor; stop() restores
 * the terminal. While started, SIGTERM, SIGHUP and stdin errors are reported
 * to onShutdown() listeners. Streams and the signal source are injectable so
 * tests run over PassThrough pairs and a plain EventEmitter.
 */

import {
  LoomError,
  TERMINAL_RESTORE,
  TERMINAL_SETUP,
  type KeyEvent,
  type TerminalBackend,
  type TerminalSize,
  type Unsubscribe,
  decodeKeys,
  splitIncompleteEscape,
} from "@termloom/core";

export type TerminalInput = NodeJS.ReadableStream &
  Readonly<{
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
  }>;

export type TerminalOutput = NodeJS.WritableStream &
  Partial<Pick<NodeJS.WriteStream, "columns" | "rows">>;

/** Where termination signals arrive; process unless given. */
export type SignalSource = Readonly<{
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}>;

export type ShutdownReason =
  | Readonly<{ kind: "signal"; signal: NodeJS.Signals }>
  | Readonly<{ kind: "input-error"; error: Error }>;

export type NodeBackendOptions = Readonly<{
  stdin?: TerminalInput;
  stdout?: TerminalOutput;
  signals?: SignalSource;
  /** Used while the output stream reports no size (not a TTY). Default 80x24. */
  fallbackSize?: TerminalSize;
}>;

const DEFAULT_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });
const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = Object.freeze(["SIGTERM", "SIGHUP"]);

function positiveOr(v: number | undefined, fallback: number): number {
  return v !== undefined && Number.isInteger(v) && v > 0 ? v : fallback;
}

export class NodeTerminalBackend implements TerminalBackend {
  private readonly stdin: TerminalInput;
  private readonly stdout: TerminalOutput;
  private readonly signals: SignalSource;
  private readonly fallbackSize: TerminalSize;
  private readonly inputListeners = new Set<(key: KeyEvent) => void>();
  private readonly resizeListeners = new Set<(size: TerminalSize) => void>();
  private readonly shutdownListeners = new Set<(reason: ShutdownReason) => void>();
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();
  private pendingInput = "";
  private started = false;
  private rawModeEntered = false;

  constructor(opts: NodeBackendOptions = {}) {
    this.stdin = opts.stdin ?? process.stdin;
    this.stdout = opts.stdout ?? process.stdout;
    this.signals = opts.signals ?? process;
    this.fallbackSize = opts.fallbackSize ?? DEFAULT_SIZE;
  }

  get isStarted(): boolean {
    return this.started;
  }

  private readonly handleData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    const { complete, rest } = splitIncompleteEscape(this.pendingInput + text);
    this.pendingInput = rest;
    for (const key of decodeKeys(complete)) {
      for (const listener of [...this.inputListeners]) listener(key);
    }
  };

  private readonly handleResize = (): void => {
    const size = this.size();
    for (const listener of [...this.resizeListeners]) listener(size);
  };

  private readonly handleInputError = (error: Error): void => {
    this.emitShutdown({ kind: "input-error", error });
  };

  private emitShutdown(reason: ShutdownReason): void {
    for (const listener of [...this.shutdownListeners]) listener(reason);
  }

  async start(): Promise<void> {
    if (this.started) throw new LoomError("LOOM_INVALID_STATE", "backend already started");
    if (this.stdin.isTTY === true && this.stdin.setRawMode !== undefined) {
      this.stdin.setRawMode(true);
      this.rawModeEntered = true;
    }
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", this.handleData);
    this.stdin.on("error", this.handleInputError);
    this.stdin.resume();
    this.stdout.on("resize", this.handleResize);
    for (const signal of SHUTDOWN_SIGNALS) {
      const handler = (): void => {
        this.signalHandlers.delete(signal);
        this.emitShutdown({ kind: "signal", signal });
      };
      this.signalHandlers.set(signal, handler);
      this.signals.once(signal, handler);
    }
    this.started = true;
    this.stdout.write(TERMINAL_SETUP);
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.stdin.off("data", this.handleData);
    this.stdin.off("error", this.handleInputError);
    this.stdout.off("resize", this.handleResize);
    for (const [signal, handler] of this.signalHandlers) this.signals.off(signal, handler);
    this.signalHandlers.clear();
    this.pendingInput = "";
    this.stdout.write(TERMINAL_RESTORE);
    if (this.rawModeEntered && this.stdin.setRawMode !== undefined) {
      this.stdin.setRawMode(false);
      this.rawModeEntered = false;
    }
    this.stdin.pause();
  }

  write(output: string): void {
    if (!this.started) throw new LoomError("LOOM_INVALID_STATE", "write before start");
    this.stdout.write(output);
  }

  size(): TerminalSize {
    return {
      cols: positiveOr(this.stdout.columns, this.fallbackSize.cols),
      rows: positiveOr(this.stdout.rows, this.fallbackSize.rows),
    };
  }

  onInput(listener: (key: KeyEvent) => void): Unsubscribe {
    this.inputListeners.add(listener);
    return () => {
      this.inputListeners.delete(listener);
    };
  }

  onResize(listener: (size: TerminalSize) => void): Unsubscribe {
    this.resizeListeners.add(listener);
    return () => {
      this.resizeListeners.delete(listener);
    };
  }

  /** A termination signal or a failed input stream asks the owner to stop. */
  onShutdown(listener: (reason: ShutdownReason) => void): Unsubscribe {
    this.shutdownListeners.add(listener);
    return () => {
      this.shutdownListeners.delete(listener);
    };
  }
}

/** Backend over process.stdin/stdout unless streams are given. */
export function createNodeBackend(opts: NodeBackendOptions = {}): NodeTerminalBackend {
  return new NodeTerminalBackend(opts);
}
