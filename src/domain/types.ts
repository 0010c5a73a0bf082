export const STATUS_NAMES = [
  "OK",
  "CANCELLED",
  "UNKNOWN",
  "INVALID_ARGUMENT",
  "DEADLINE_EXCEEDED",
  "NOT_FOUND",
  "ALREADY_EXISTS",
  "PERMISSION_DENIED",
  "RESOURCE_EXHAUSTED",
  "FAILED_PRECONDITION",
  "ABORTED",
  "OUT_OF_RANGE",
  "UNIMPLEMENTED",
  "INTERNAL",
  "UNAVAILABLE",
  "DATA_LOSS",
  "UNAUTHENTICATED",
] as const;

/** gRPC status code name, e.g. "UNAUTHENTICATED". */
export type StatusName = (typeof STATUS_NAMES)[number];

export interface CallStatus {
  code: StatusName;
  message: string;
}

export type CallKind = "unary" | "serverStream" | "clientStream" | "bidi";

export type CallPhase =
  | "STARTED"
  | "HANDLER_RUNNING"
  | "SUCCESS"
  | "FAILED"
  | "TRAILERS_MERGED"
  | "SENT"
  | "CANCELLED";

export type PropagationMode = "all" | "allow" | "deny";

export type PropagationRuleConfig =
  | { mode: "all" }
  | { mode: "allow"; headers: string[] }
  | { mode: "deny"; headers: string[] };

export interface Principal {
  id: string;
  name: string;
}

export type LogFn = (...args: unknown[]) => void;

export interface Logger {
  log: LogFn;
  err: LogFn;
  debug: LogFn;
}
