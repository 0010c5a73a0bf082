import * as grpc from "@grpc/grpc-js";
import type { ServerSurfaceCall } from "@grpc/grpc-js/build/src/server-call.js";
import { errorMessage } from "../domain/errors.js";
import type { PropagationMetricsTracker } from "../domain/metrics/propagationMetrics.js";
import {
  ServerCall,
  composeStages,
  failure,
  singleRequest,
  type CallHandler,
  type CallOutcome,
  type CallStage,
} from "../domain/pipeline.js";
import type { CallKind, CallStatus, Logger } from "../domain/types.js";
import { headerSetFromMetadata, toGrpcMetadata } from "./metadata.js";

type AnyServerCall = ServerSurfaceCall;

type Settled =
  | { kind: "outcome"; outcome: CallOutcome<unknown> }
  | { kind: "fault"; error: unknown };

export type MethodHandlers = Record<string, CallHandler>;

export interface BindOptions {
  /** Outermost first, e.g. [headerToTrailer.asStage(), authentication] */
  stages: CallStage[];
  logger: Logger;
  metrics?: PropagationMetricsTracker;
}

export function callKind(method: grpc.MethodDefinition<unknown, unknown>): CallKind {
  if (method.requestStream) return method.responseStream ? "bidi" : "clientStream";
  return method.responseStream ? "serverStream" : "unary";
}

function unimplemented(path: string): CallHandler {
  return async () => failure("UNIMPLEMENTED", `${path} is not implemented`);
}

/**
 * Runs the pipeline for one call. Faults are caught here so the binding can
 * still answer with a status; the middleware has already merged what it could.
 */
async function execute(call: ServerCall, pipeline: CallHandler): Promise<Settled> {
  try {
    return { kind: "outcome", outcome: await pipeline(call) };
  } catch (error) {
    return { kind: "fault", error };
  }
}

function toStatus(settled: Settled): CallStatus {
  if (settled.kind === "fault") return { code: "INTERNAL", message: errorMessage(settled.error, "Internal error") };
  if (settled.outcome.ok) return { code: "OK", message: "" };
  return settled.outcome.status;
}

class CallResponder {
  private headersSent = false;

  constructor(
    private readonly native: AnyServerCall,
    private readonly call: ServerCall,
    private readonly options: BindOptions
  ) {}

  /** Response headers go out once, ahead of the first message. */
  sendHeaders(): void {
    if (this.headersSent || this.call.signal.aborted) return;
    this.headersSent = true;
    if (this.call.headers.isEmpty()) return;
    this.native.sendMetadata(toGrpcMetadata(this.call.headers, this.options.logger.err));
  }

  trailers(): grpc.Metadata {
    return toGrpcMetadata(this.call.trailers, this.options.logger.err);
  }

  errorStatus(status: CallStatus): Partial<grpc.StatusObject> {
    return { code: grpc.status[status.code], details: status.message, metadata: this.trailers() };
  }

  finish(settled: Settled): void {
    const status = toStatus(settled);
    const ctx = this.call.context;
    if (settled.kind === "fault") {
      this.options.logger.err(`[grpc] ${this.call.path} - handler error:`, status.message);
    }
    if (ctx?.phase === "TRAILERS_MERGED") ctx.markSent();
    this.options.metrics?.record({
      status: this.call.signal.aborted ? "CANCELLED" : status.code,
      phase: ctx?.phase ?? "STARTED",
      propagatedValues: [...(ctx?.propagated?.entries() ?? [])].length,
      fault: settled.kind === "fault",
    });
  }
}

function bindMethod(
  serviceName: string,
  methodName: string,
  kind: CallKind,
  pipeline: CallHandler,
  options: BindOptions
): grpc.UntypedServiceImplementation[string] {
  const base = (native: AnyServerCall, requests: AsyncIterable<unknown>, send?: (message: unknown) => void) => {
    const controller = new AbortController();
    native.on("cancelled", () => controller.abort());
    const call = new ServerCall({
      service: serviceName,
      method: methodName,
      kind,
      requests,
      send,
      requestMetadata: headerSetFromMetadata(native.metadata),
      signal: controller.signal,
      // grpc-js carries metadata on error statuses, so faulted calls keep their trailers.
      permitsFaultTrailers: true,
    });
    return { call, responder: new CallResponder(native, call, options) };
  };

  const respondUnary = (call: ServerCall, responder: CallResponder, callback: grpc.sendUnaryData<unknown>, settled: Settled) => {
    if (!call.signal.aborted) {
      if (settled.kind === "outcome" && settled.outcome.ok) {
        responder.sendHeaders();
        callback(null, settled.outcome.response ?? {}, responder.trailers());
      } else {
        callback(responder.errorStatus(toStatus(settled)));
      }
    }
    responder.finish(settled);
  };

  const endStream = (
    native: grpc.ServerWritableStream<unknown, unknown> | grpc.ServerDuplexStream<unknown, unknown>,
    call: ServerCall,
    responder: CallResponder,
    settled: Settled
  ) => {
    if (!call.signal.aborted) {
      if (settled.kind === "outcome" && settled.outcome.ok) {
        responder.sendHeaders();
        native.end(responder.trailers());
      } else {
        native.emit("error", responder.errorStatus(toStatus(settled)));
      }
    }
    responder.finish(settled);
  };

  const run = (call: ServerCall, finish: (settled: Settled) => void) => {
    execute(call, pipeline)
      .then(finish)
      .catch((e: unknown) => options.logger.err(`[grpc] ${call.path} - failed to send response:`, errorMessage(e, "unknown error")));
  };

  switch (kind) {
    case "unary": {
      const handler: grpc.handleUnaryCall<unknown, unknown> = (native, callback) => {
        const { call, responder } = base(native, singleRequest(native.request));
        run(call, (settled) => respondUnary(call, responder, callback, settled));
      };
      return handler;
    }
    case "serverStream": {
      const handler: grpc.handleServerStreamingCall<unknown, unknown> = (native) => {
        const { call, responder } = base(native, singleRequest(native.request), (message) => {
          responder.sendHeaders();
          native.write(message);
        });
        run(call, (settled) => endStream(native, call, responder, settled));
      };
      return handler;
    }
    case "clientStream": {
      const handler: grpc.handleClientStreamingCall<unknown, unknown> = (native, callback) => {
        const { call, responder } = base(native, native);
        run(call, (settled) => respondUnary(call, responder, callback, settled));
      };
      return handler;
    }
    case "bidi": {
      const handler: grpc.handleBidiStreamingCall<unknown, unknown> = (native) => {
        const { call, responder } = base(native, native, (message) => {
          responder.sendHeaders();
          native.write(message);
        });
        run(call, (settled) => endStream(native, call, responder, settled));
      };
      return handler;
    }
  }
}

/**
 * Builds the grpc-js implementation map for `service`. Every method runs
 * through the same stages; methods without a handler answer UNIMPLEMENTED.
 */
export function bindService(
  serviceName: string,
  service: grpc.ServiceDefinition,
  handlers: MethodHandlers,
  options: BindOptions
): grpc.UntypedServiceImplementation {
  const impl: grpc.UntypedServiceImplementation = {};
  for (const [methodName, method] of Object.entries(service)) {
    const terminal =
      handlers[methodName] ??
      (method.originalName ? handlers[method.originalName] : undefined) ??
      unimplemented(`/${serviceName}/${methodName}`);
    const pipeline = composeStages(options.stages, terminal);
    impl[methodName] = bindMethod(serviceName, methodName, callKind(method), pipeline, options);
  }
  options.logger.log(`(info) Bound ${serviceName}: ${Object.keys(impl).join(", ")}`);
  return impl;
}

export function createGrpcServer(
  serviceName: string,
  service: grpc.ServiceDefinition,
  handlers: MethodHandlers,
  options: BindOptions
): grpc.Server {
  const server = new grpc.Server();
  server.addService(service, bindService(serviceName, service, handlers, options));
  return server;
}

export function listen(server: grpc.Server, address: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (error, port) => {
      if (error) reject(error);
      else resolve(port);
    });
  });
}

export function shutdown(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown(() => resolve());
  });
}
