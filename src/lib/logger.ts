/**
 * Structured logging utility
 *
 * Level is taken from LOG_LEVEL (debug | info | warn | error, default info).
 * DEBUG=1 is accepted as a shorthand for LOG_LEVEL=debug.
 */

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLevel(value: string): value is Level {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  if (process.env.DEBUG) {
    return LEVEL_ORDER.debug;
  }
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function enabled(level: Level): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatMeta(meta?: Record<string, unknown>): string {
  return meta ? JSON.stringify(meta) : "";
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("debug")) {
      console.log(`[DEBUG] ${msg}`, formatMeta(meta));
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("info")) {
      console.log(`[INFO] ${msg}`, formatMeta(meta));
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("warn")) {
      console.warn(`[WARN] ${msg}`, formatMeta(meta));
    }
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error instanceof Error ? error.message : error ?? "");
  },
};

/**
 * Render an unknown thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
