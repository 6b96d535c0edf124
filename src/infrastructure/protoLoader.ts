import { fileURLToPath } from "url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";

export const PROTO_DIR = fileURLToPath(new URL("../../proto", import.meta.url));
export const RPC_PACKAGE = "linkhold.api.v2";
export const RPC_PROTO_FILES = ["linkhold/api/v2/workspace_service.proto"];

type GrpcNode = grpc.GrpcObject | grpc.ServiceClientConstructor | grpc.ProtobufTypeDefinition;

/** Service constructors keyed by fully-qualified service name. */
export type RpcServices = Map<string, grpc.ServiceClientConstructor>;

export interface LoadRpcServicesOptions {
  protoDir?: string;
  files?: string[];
  packageName?: string;
}

function isServiceConstructor(node: GrpcNode): node is grpc.ServiceClientConstructor {
  return typeof node === "function" && "service" in node;
}

function isNamespace(node: GrpcNode): node is grpc.GrpcObject {
  return typeof node === "object" && !("format" in node);
}

function lookupNamespace(root: grpc.GrpcObject, packageName: string): grpc.GrpcObject | null {
  let node: GrpcNode = root;
  for (const part of packageName.split(".")) {
    if (!isNamespace(node)) return null;
    const next: GrpcNode | undefined = node[part];
    if (next === undefined) return null;
    node = next;
  }
  return isNamespace(node) ? node : null;
}

/**
 * Load the .proto files with proto-loader and collect every service declared
 * directly under `packageName`.
 *
 * The same constructors back both the gRPC server (via `.service`) and the
 * HTTP gateway's clients, so the two surfaces cannot disagree on a method.
 */
export function loadRpcServices(options: LoadRpcServicesOptions = {}): RpcServices {
  const protoDir = options.protoDir ?? PROTO_DIR;
  const packageName = options.packageName ?? RPC_PACKAGE;
  const packageDefinition = protoLoader.loadSync(options.files ?? RPC_PROTO_FILES, {
    includeDirs: [protoDir],
    keepCase: false,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });

  const namespace = lookupNamespace(grpc.loadPackageDefinition(packageDefinition), packageName);
  const services: RpcServices = new Map();
  if (!namespace) return services;
  for (const [name, node] of Object.entries(namespace)) {
    if (isServiceConstructor(node)) services.set(`${packageName}.${name}`, node);
  }
  return services;
}
