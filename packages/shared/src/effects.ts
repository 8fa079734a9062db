export type Effect<Env, A> = (env: Env, signal: AbortSignal) => Promise<A>;

export type RunHandle<A> = {
  promise: Promise<A>;
  cancel: () => void;
};

export type Runtime<Env> = {
  env: Env;
  run: <A>(effect: Effect<Env, A>) => RunHandle<A>;
};

export type Clock = {
  nowMs: () => number;
  nowIso: () => string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class CancelledError extends Error {
  constructor() {
    super("Cancelled");
    this.name = "CancelledError";
  }
}

export const Effect = {
  sleep<Env>(ms: number): Effect<Env, void> {
    return (_env, signal) => new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(id);
        reject(new CancelledError());
      };
      const id = setTimeout(() => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  },
};

export function createRuntime<Env>(env: Env): Runtime<Env> {
  return {
    env,
    run<A>(effect: Effect<Env, A>): RunHandle<A> {
      const controller = new AbortController();
      const promise = effect(env, controller.signal);
      return {
        promise,
        cancel: () => controller.abort()
      };
    }
  };
}

export function createClock(): Clock {
  return {
    nowMs: () => Date.now(),
    nowIso: () => new Date().toISOString()
  };
}

/** Clock pinned to a single instant; `advance` moves it forward. */
export function createFixedClock(startIso: string): Clock & { advance: (ms: number) => void } {
  let now = Date.parse(startIso);
  return {
    nowMs: () => now,
    nowIso: () => new Date(now).toISOString(),
    advance: (ms) => {
      now += ms;
    }
  };
}

export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  return {
    debug: (message, meta) => { if (enabled("debug")) console.debug(message, meta ?? ""); },
    info: (message, meta) => { if (enabled("info")) console.log(message, meta ?? ""); },
    warn: (message, meta) => { if (enabled("warn")) console.warn(message, meta ?? ""); },
    error: (message, meta) => { if (enabled("error")) console.error(message, meta ?? ""); }
  };
}
