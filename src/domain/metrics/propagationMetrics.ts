/**
 * Counters for calls that went through the header-to-trailer pipeline.
 *
 * Recorded by the transport binding once a call is over; the middleware
 * itself never touches them.
 */

import type { CallPhase, StatusName } from "../types.js";

export interface PropagationMetrics {
  calls_total: number;
  /** Calls whose trailers carried at least one propagated header */
  propagated_calls_total: number;
  /** Individual header values copied into trailers */
  propagated_values_total: number;
  cancelled_total: number;
  faults_total: number;
  /** Faulted calls whose captured headers could not be attached */
  dropped_total: number;
  calls_by_status: Record<string, number>;
}

export interface CallRecord {
  status: StatusName;
  phase: CallPhase;
  propagatedValues: number;
  fault: boolean;
}

export class PropagationMetricsTracker {
  private calls = 0;
  private propagatedCalls = 0;
  private propagatedValues = 0;
  private cancelled = 0;
  private faults = 0;
  private dropped = 0;
  private byStatus: Map<string, number> = new Map();

  record(call: CallRecord): void {
    this.calls++;
    this.byStatus.set(call.status, (this.byStatus.get(call.status) || 0) + 1);

    if (call.phase === "CANCELLED") {
      this.cancelled++;
      return;
    }
    if (call.fault) {
      this.faults++;
      if (call.phase !== "TRAILERS_MERGED" && call.phase !== "SENT") this.dropped++;
    }
    if (call.propagatedValues > 0) {
      this.propagatedCalls++;
      this.propagatedValues += call.propagatedValues;
    }
  }

  getMetrics(): PropagationMetrics {
    return {
      calls_total: this.calls,
      propagated_calls_total: this.propagatedCalls,
      propagated_values_total: this.propagatedValues,
      cancelled_total: this.cancelled,
      faults_total: this.faults,
      dropped_total: this.dropped,
      calls_by_status: Object.fromEntries(this.byStatus),
    };
  }

  reset(): void {
    this.calls = 0;
    this.propagatedCalls = 0;
    this.propagatedValues = 0;
    this.cancelled = 0;
    this.faults = 0;
    this.dropped = 0;
    this.byStatus.clear();
  }
}
