// Client-side call logging.

import * as grpc from "@grpc/grpc-js";
import type { Logger } from "@stream-echo/core";

/**
 * Client interceptor logging the start of every call and its final status.
 *
 * Output:
 * - start: `→ path` with `{ kind }`
 * - end: `← path: ✓ 12.34ms` at info, or `← path: ✗ …` with the status at warn
 */
export function loggingInterceptor(log: Logger): grpc.Interceptor {
  return (options, nextCall) => {
    const { path, requestStream, responseStream } = options.method_definition;
    const kind = `${requestStream ? "stream" : "unary"}-${responseStream ? "stream" : "unary"}`;
    const started = performance.now();
    log.info(`→ ${path}`, { kind });

    return new grpc.InterceptingCall(nextCall(options), {
      start(metadata, _listener, next) {
        next(metadata, {
          onReceiveStatus(status, nextStatus) {
            const took = `${(performance.now() - started).toFixed(2)}ms`;
            if (status.code === grpc.status.OK) {
              log.info(`← ${path}: ✓ ${took}`, { kind });
            } else {
              log.warn(`← ${path}: ✗ ${took}`, {
                kind,
                status: grpc.status[status.code],
                details: status.details,
              });
            }
            nextStatus(status);
          },
        });
      },
    });
  };
}
