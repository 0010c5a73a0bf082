import * as grpc from "@grpc/grpc-js";
import { GetUserInfoResponseSchema, type GetUserInfoRequest, type GetUserInfoResponse } from "../domain/usecases/userInfo.js";
import { metadataToRecord } from "../infrastructure/metadata.js";
import type { LoadedService } from "../infrastructure/protoLoader.js";

export type CallResult<T> =
  | { ok: true; response: T; headers: Record<string, string[]>; trailers: Record<string, string[]> }
  | { ok: false; code: grpc.status; codeName: string; details: string; trailers: Record<string, string[]> };

export interface CallOptions {
  /** Sent as `authorization: <token>` when present */
  token?: string;
  deadlineMs?: number;
  /** Cancels the call when aborted */
  signal?: AbortSignal;
}

function requestMetadata(options: CallOptions): grpc.Metadata {
  const metadata = new grpc.Metadata();
  if (options.token !== undefined) metadata.set("authorization", options.token);
  return metadata;
}

function failed<T>(status: grpc.StatusObject): CallResult<T> {
  return {
    ok: false,
    code: status.code,
    codeName: grpc.status[status.code],
    details: status.details,
    trailers: metadataToRecord(status.metadata),
  };
}

/**
 * Minimal client for auth.AuthService that surfaces the final status and the
 * trailing metadata of every call, failed or not.
 */
export class AuthServiceClient {
  private readonly client: grpc.Client;
  private readonly service: LoadedService;

  constructor(address: string, service: LoadedService) {
    this.service = service;
    this.client = new service.client(address, grpc.credentials.createInsecure());
  }

  private method(name: string): grpc.MethodDefinition<GetUserInfoRequest, unknown> {
    const method = this.service.definition[name];
    if (!method) throw new Error(`${this.service.name} has no method ${name}`);
    return method;
  }

  private callOptions(options: CallOptions): grpc.CallOptions {
    return { deadline: Date.now() + (options.deadlineMs ?? 5000) };
  }

  private cancelOnAbort(call: { cancel(): void }, signal: AbortSignal | undefined): void {
    if (!signal) return;
    if (signal.aborted) call.cancel();
    else signal.addEventListener("abort", () => call.cancel(), { once: true });
  }

  getUserInfo(request: GetUserInfoRequest, options: CallOptions = {}): Promise<CallResult<GetUserInfoResponse>> {
    const method = this.method("GetUserInfo");
    return new Promise((resolve) => {
      let headers: Record<string, string[]> = {};
      let response: unknown;
      const call = this.client.makeUnaryRequest(
        method.path,
        (value: GetUserInfoRequest) => method.requestSerialize(value),
        (buffer: Buffer): unknown => method.responseDeserialize(buffer),
        request,
        requestMetadata(options),
        this.callOptions(options),
        (_error, value) => {
          // The error carries the same status; it is read from the status event below.
          response = value;
        }
      );
      this.cancelOnAbort(call, options.signal);
      call.on("metadata", (metadata: grpc.Metadata) => {
        headers = metadataToRecord(metadata);
      });
      call.on("status", (status: grpc.StatusObject) => {
        if (status.code !== grpc.status.OK) return resolve(failed(status));
        const parsed = GetUserInfoResponseSchema.safeParse(response);
        if (!parsed.success) {
          return resolve(failed({ ...status, code: grpc.status.INTERNAL, details: "malformed GetUserInfoResponse" }));
        }
        resolve({ ok: true, response: parsed.data, headers, trailers: metadataToRecord(status.metadata) });
      });
    });
  }

  watchUserInfo(request: GetUserInfoRequest, options: CallOptions = {}): Promise<CallResult<GetUserInfoResponse[]>> {
    const method = this.method("WatchUserInfo");
    return new Promise((resolve) => {
      let headers: Record<string, string[]> = {};
      let streamError: Error | undefined;
      const messages: GetUserInfoResponse[] = [];
      const stream = this.client.makeServerStreamRequest(
        method.path,
        (value: GetUserInfoRequest) => method.requestSerialize(value),
        (buffer: Buffer): unknown => method.responseDeserialize(buffer),
        request,
        requestMetadata(options),
        this.callOptions(options)
      );
      this.cancelOnAbort(stream, options.signal);
      stream.on("metadata", (metadata: grpc.Metadata) => {
        headers = metadataToRecord(metadata);
      });
      stream.on("data", (message: unknown) => {
        const parsed = GetUserInfoResponseSchema.safeParse(message);
        if (parsed.success) messages.push(parsed.data);
      });
      // Failed statuses arrive as an error and then a status event; the status carries the trailers.
      stream.on("error", (error: Error) => {
        streamError = error;
      });
      stream.on("status", (status: grpc.StatusObject) => {
        if (status.code !== grpc.status.OK) {
          return resolve(failed({ ...status, details: status.details || (streamError?.message ?? "") }));
        }
        resolve({ ok: true, response: messages, headers, trailers: metadataToRecord(status.metadata) });
      });
    });
  }

  close(): void {
    this.client.close();
  }
}
