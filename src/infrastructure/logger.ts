import type { Logger } from "../domain/types.js";

export function createLogger(debugEnabled = process.env.DEBUG_TRAILERS === "1", prefix = "[trailerbridge]"): Logger {
  return {
    log: (...a: unknown[]) => console.log(prefix, ...a),
    err: (...a: unknown[]) => console.error(prefix, ...a),
    debug: debugEnabled ? (...a: unknown[]) => console.debug(prefix, "(debug)", ...a) : () => {},
  };
}
