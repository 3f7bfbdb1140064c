// Runtime loading of the EchoService contract from its .proto file.

import { fileURLToPath } from "node:url";
import * as protoLoader from "@grpc/proto-loader";
import { METHODS, Status, StreamError } from "@stream-echo/core";

/** Location of `stream.proto`, beside this package's sources. */
export const PROTO_PATH = fileURLToPath(new URL("../proto/stream/v1/stream.proto", import.meta.url));

export const SERVICE_NAME = "stream.v1.EchoService";

/**
 * Options for proto-loader.
 *
 * `defaults` makes an absent `message` field decode as "" rather than be
 * missing, matching proto3 semantics on the wire.
 */
export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export type EchoMethodDefinition = protoLoader.MethodDefinition<object, object>;

export interface EchoServiceDefinition {
  /** The whole service, for `Server.addService`. */
  service: protoLoader.ServiceDefinition;
  clientStream: EchoMethodDefinition;
  serverStream: EchoMethodDefinition;
  bidiSync: EchoMethodDefinition;
  bidiAsync: EchoMethodDefinition;
}

let cached: EchoServiceDefinition | null = null;

/**
 * Load and check the service definition.
 *
 * The default path is loaded once per process; an explicit path is always
 * read from disk.
 */
export function loadEchoService(protoPath?: string): EchoServiceDefinition {
  if (protoPath === undefined && cached) return cached;

  const packageDefinition = protoLoader.loadSync(protoPath ?? PROTO_PATH, PROTO_LOADER_OPTIONS);
  const service = packageDefinition[SERVICE_NAME];
  if (!service || "format" in service) {
    throw new Error(`${SERVICE_NAME} is not a service in ${protoPath ?? PROTO_PATH}`);
  }

  const definition: EchoServiceDefinition = {
    service,
    clientStream: method(service, "EchoClientStream", METHODS.clientStream, true, false),
    serverStream: method(service, "EchoServerStream", METHODS.serverStream, false, true),
    bidiSync: method(service, "EchoBidirectionalStreamSync", METHODS.bidiSync, true, true),
    bidiAsync: method(service, "EchoBidirectionalStreamAsync", METHODS.bidiAsync, true, true),
  };
  if (protoPath === undefined) cached = definition;
  return definition;
}

/** Forget the cached definition. */
export function clearProtoCache(): void {
  cached = null;
}

function method(
  service: protoLoader.ServiceDefinition,
  name: string,
  path: string,
  requestStream: boolean,
  responseStream: boolean,
): EchoMethodDefinition {
  const definition = service[name];
  if (!definition) {
    throw new Error(`${SERVICE_NAME} has no method ${name}`);
  }
  if (
    definition.path !== path ||
    definition.requestStream !== requestStream ||
    definition.responseStream !== responseStream
  ) {
    throw new Error(`${SERVICE_NAME}.${name} does not match ${path}`);
  }
  return definition;
}

/**
 * Narrow a deserialized EchoRequest/EchoResponse.
 *
 * Throws a StreamError with INVALID_ARGUMENT when `message` is missing or not
 * a string.
 */
export function decodeEchoMessage(value: unknown, what: "request" | "response"): { message: string } {
  if (typeof value === "object" && value !== null && "message" in value && typeof value.message === "string") {
    return { message: value.message };
  }
  throw StreamError.rejected(Status.INVALID_ARGUMENT, `malformed ${what}: expected a string message field`);
}
