/**
 * Protocol-agnostic call model shared by the middleware, the authentication
 * stage and service handlers.
 *
 * Transport bindings turn their native call objects into a ServerCall, run a
 * composed handler chain over it, and translate the CallOutcome back.
 */

import type { CallContext } from "./callContext.js";
import { HeaderSet } from "./headerSet.js";
import type { CallKind, CallStatus, Principal, StatusName } from "./types.js";

export type CallOutcome<Res> =
  | { ok: true; response?: Res }
  | { ok: false; status: CallStatus };

export type CallHandler<Req = unknown, Res = unknown> = (call: ServerCall<Req, Res>) => Promise<CallOutcome<Res>>;

export type CallStage<Req = unknown, Res = unknown> = (
  call: ServerCall<Req, Res>,
  next: CallHandler<Req, Res>
) => Promise<CallOutcome<Res>>;

export interface ServerCallInit<Req, Res> {
  service: string;
  method: string;
  kind: CallKind;
  requests: AsyncIterable<Req>;
  requestMetadata?: HeaderSet;
  /** Writes one response message; only response-streaming calls provide it. */
  send?: (message: Res) => void;
  signal?: AbortSignal;
  /** Whether the transport can carry trailing metadata on a faulted call. */
  permitsFaultTrailers?: boolean;
}

export class ServerCall<Req = unknown, Res = unknown> {
  readonly service: string;
  readonly method: string;
  readonly kind: CallKind;
  readonly requests: AsyncIterable<Req>;
  readonly requestMetadata: HeaderSet;
  /** Response headers attached while handling; the sink collaborators write to. */
  readonly headers = new HeaderSet();
  /** Trailing metadata delivered with the final status. */
  readonly trailers = new HeaderSet();
  readonly signal: AbortSignal;
  readonly permitsFaultTrailers: boolean;
  principal: Principal | undefined;
  /** Set by the header-to-trailer middleware while it owns the call. */
  context: CallContext | undefined;
  private readonly sender: ((message: Res) => void) | undefined;

  constructor(init: ServerCallInit<Req, Res>) {
    this.service = init.service;
    this.method = init.method;
    this.kind = init.kind;
    this.requests = init.requests;
    this.requestMetadata = init.requestMetadata ?? new HeaderSet();
    this.sender = init.send;
    this.signal = init.signal ?? new AbortController().signal;
    this.permitsFaultTrailers = init.permitsFaultTrailers ?? false;
  }

  get path(): string {
    return `/${this.service}/${this.method}`;
  }

  /**
   * First request message, or undefined when the client sent none. The
   * iterator is not closed, so a streaming handler can keep reading.
   */
  async request(): Promise<Req | undefined> {
    const first = await this.requests[Symbol.asyncIterator]().next();
    return first.done ? undefined : first.value;
  }

  send(message: Res): void {
    if (!this.sender) throw new Error(`${this.path} does not stream responses`);
    this.sender(message);
  }
}

export function singleRequest<Req>(message: Req): AsyncIterable<Req> {
  return {
    async *[Symbol.asyncIterator]() {
      yield message;
    },
  };
}

export function success<Res>(response?: Res): CallOutcome<Res> {
  return response === undefined ? { ok: true } : { ok: true, response };
}

export function failure<Res>(code: StatusName, message: string): CallOutcome<Res> {
  return { ok: false, status: { code, message } };
}

/** Chains stages around `terminal`; the first stage is the outermost. */
export function composeStages<Req, Res>(
  stages: CallStage<Req, Res>[],
  terminal: CallHandler<Req, Res>
): CallHandler<Req, Res> {
  return stages.reduceRight<CallHandler<Req, Res>>(
    (next, stage) => (call) => stage(call, next),
    terminal
  );
}
