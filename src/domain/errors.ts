import type { CallPhase } from "./types.js";

/** Raised when a propagation rule cannot be built from the given configuration. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class IllegalTransitionError extends Error {
  readonly from: CallPhase;
  readonly to: CallPhase;

  constructor(from: CallPhase, to: CallPhase) {
    super(`illegal call transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === "string" && error) return error;
  return fallback;
}
