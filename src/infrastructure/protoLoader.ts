import fs from "fs";
import path from "path";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";

// keepCase so handlers see the field names written in the .proto (user_id).
export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export interface LoadedService {
  /** Fully qualified service name, e.g. "auth.AuthService" */
  name: string;
  definition: grpc.ServiceDefinition;
  client: grpc.ServiceClientConstructor;
}

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

function isServiceConstructor(node: GrpcNode): node is grpc.ServiceClientConstructor {
  return typeof node === "function" && "service" in node;
}

function isNamespace(node: GrpcNode): node is grpc.GrpcObject {
  return typeof node === "object" && node !== null && !("format" in node);
}

export function loadPackage(protoPath: string): grpc.GrpcObject {
  const file = path.resolve(protoPath);
  if (!fs.existsSync(file)) throw new Error(`proto file not found: ${file}`);
  const pkgDef = protoLoader.loadSync(file, { ...LOADER_OPTIONS, includeDirs: [path.dirname(file)] });
  return grpc.loadPackageDefinition(pkgDef);
}

export function findService(pkg: grpc.GrpcObject, fullServiceName: string): LoadedService | null {
  let node: GrpcNode = pkg;
  for (const part of fullServiceName.split(".")) {
    if (!isNamespace(node) || !(part in node)) return null;
    node = node[part];
  }
  if (!isServiceConstructor(node)) return null;
  return { name: fullServiceName, definition: node.service, client: node };
}

export function loadService(protoPath: string, fullServiceName: string): LoadedService {
  const service = findService(loadPackage(protoPath), fullServiceName);
  if (!service) throw new Error(`service ${fullServiceName} not found in ${protoPath}`);
  return service;
}
