import { IllegalTransitionError } from "./errors.js";
import { HeaderSet } from "./headerSet.js";
import type { CallPhase, CallStatus } from "./types.js";

const TRANSITIONS: Record<CallPhase, readonly CallPhase[]> = {
  STARTED: ["HANDLER_RUNNING"],
  HANDLER_RUNNING: ["SUCCESS", "FAILED", "CANCELLED"],
  SUCCESS: ["TRAILERS_MERGED"],
  FAILED: ["TRAILERS_MERGED"],
  TRAILERS_MERGED: ["SENT"],
  SENT: [],
  CANCELLED: [],
};

/**
 * Per-call scratch state. One instance per call, never shared.
 *
 * `headers` is the call's own HeaderSet (held by reference, so attachments made
 * by downstream handlers are visible here); `propagated` holds what the merge
 * step copied and is only set once.
 */
export class CallContext {
  readonly headers: HeaderSet;
  private current: CallPhase = "STARTED";
  private finalStatus: CallStatus | undefined;
  private propagatedHeaders: HeaderSet | undefined;
  private faulted = false;

  constructor(headers: HeaderSet) {
    this.headers = headers;
  }

  get phase(): CallPhase {
    return this.current;
  }

  get status(): CallStatus | undefined {
    return this.finalStatus;
  }

  /** The filtered headers copied into trailers, once the merge has run. */
  get propagated(): HeaderSet | undefined {
    return this.propagatedHeaders;
  }

  get fault(): boolean {
    return this.faulted;
  }

  /** True once trailers have been merged or the call can no longer send any. */
  get finalized(): boolean {
    return this.current === "TRAILERS_MERGED" || this.current === "SENT" || this.current === "CANCELLED";
  }

  transition(to: CallPhase): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
  }

  begin(): void {
    this.transition("HANDLER_RUNNING");
  }

  succeed(): void {
    this.finalStatus = { code: "OK", message: "" };
    this.transition("SUCCESS");
  }

  fail(status: CallStatus, fault = false): void {
    this.finalStatus = { ...status };
    this.faulted = fault;
    this.transition("FAILED");
  }

  recordMerge(propagated: HeaderSet): void {
    this.transition("TRAILERS_MERGED");
    this.propagatedHeaders = propagated;
  }

  /** Partial headers of a cancelled call are discarded, never sent. */
  cancel(): void {
    this.transition("CANCELLED");
    this.headers.clear();
  }

  markSent(): void {
    this.transition("SENT");
  }
}
