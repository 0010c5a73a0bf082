import type { PropagationMetrics } from "../domain/metrics/propagationMetrics.js";
import type { PropagationRuleConfig } from "../domain/types.js";

export interface StatusResponse {
  grpc_port: number;
  service: string;
  methods: string[];
  propagation: PropagationRuleConfig;
  metrics: PropagationMetrics;
}
