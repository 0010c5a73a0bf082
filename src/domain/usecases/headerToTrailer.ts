/**
 * Header-to-trailer propagation.
 *
 * Handlers that run before the final status is known (authentication above
 * all) can only write response headers. When the call then fails, gRPC answers
 * with a trailers-only response and those headers never reach the client.
 * This middleware wraps the handler chain, waits for it to settle and copies
 * the eligible headers into the call's trailing metadata, so the early-phase
 * code never needs to know how trailers are emitted.
 *
 * Lifecycle per call:
 *   STARTED -> HANDLER_RUNNING -> (SUCCESS | FAILED) -> TRAILERS_MERGED -> SENT
 * The transport binding performs the last step once the status is written.
 */

import { CallContext } from "../callContext.js";
import { errorMessage } from "../errors.js";
import type { HeaderSet } from "../headerSet.js";
import type { CallHandler, CallOutcome, CallStage, ServerCall } from "../pipeline.js";
import { PropagationRule } from "../propagationRule.js";
import type { LogFn, PropagationRuleConfig } from "../types.js";

export interface HeaderToTrailerOptions {
  debug?: LogFn;
}

const noop: LogFn = () => {};

export class HeaderToTrailerMiddleware {
  readonly rule: PropagationRule;
  private readonly debug: LogFn;

  /** @throws ConfigurationError when `rule` is self-contradictory */
  constructor(rule: PropagationRule | PropagationRuleConfig, options: HeaderToTrailerOptions = {}) {
    this.rule = rule instanceof PropagationRule ? rule : new PropagationRule(rule);
    this.debug = options.debug ?? noop;
    Object.freeze(this);
  }

  async wrap<Req, Res>(call: ServerCall<Req, Res>, next: CallHandler<Req, Res>): Promise<CallOutcome<Res>> {
    const ctx = new CallContext(call.headers);
    call.context = ctx;
    ctx.begin();

    let outcome: CallOutcome<Res>;
    try {
      outcome = await next(call);
    } catch (error) {
      if (call.signal.aborted) {
        ctx.cancel();
        throw error;
      }
      ctx.fail({ code: "INTERNAL", message: errorMessage(error, "handler fault") }, true);
      this.attachToFault(call);
      throw error;
    }

    if (call.signal.aborted) {
      ctx.cancel();
      this.debug(`[trailers] ${call.path} cancelled; captured headers discarded`);
      return outcome;
    }

    if (outcome.ok) ctx.succeed();
    else ctx.fail(outcome.status);
    try {
      this.mergeTrailers(call);
    } catch (mergeError) {
      this.debug(`[trailers] ${call.path} merge failed:`, errorMessage(mergeError, "unknown error"));
    }
    return outcome;
  }

  /**
   * Copies the eligible headers into `call.trailers`, after any trailer values
   * the handler set itself. Runs once per call; later invocations return the
   * same trailer set untouched.
   */
  mergeTrailers<Req, Res>(call: ServerCall<Req, Res>): HeaderSet {
    const ctx = call.context;
    if (!ctx) throw new Error(`${call.path} was not wrapped by the header-to-trailer middleware`);
    if (ctx.propagated) return call.trailers;

    const propagated = this.rule.filter(ctx.headers);
    ctx.recordMerge(propagated);
    call.trailers.appendAll(propagated);
    for (const [key, value] of propagated.entries()) {
      this.debug(`[trailers] ${call.path} copied header '${key}' with value '${value}' to trailers`);
    }
    return call.trailers;
  }

  asStage<Req, Res>(): CallStage<Req, Res> {
    return (call, next) => this.wrap(call, next);
  }

  private attachToFault<Req, Res>(call: ServerCall<Req, Res>): void {
    if (!call.permitsFaultTrailers) {
      this.debug(`[trailers] ${call.path} faulted; transport carries no trailers, headers dropped`);
      return;
    }
    try {
      this.mergeTrailers(call);
    } catch (mergeError) {
      this.debug(`[trailers] ${call.path} faulted; headers dropped:`, errorMessage(mergeError, "unknown error"));
    }
  }
}

export function createHeaderToTrailerMiddleware(
  config: PropagationRuleConfig,
  options: HeaderToTrailerOptions = {}
): HeaderToTrailerMiddleware {
  return new HeaderToTrailerMiddleware(config, options);
}
