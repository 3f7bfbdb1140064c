// Echo service message types and the default transformations.

export interface EchoRequest {
  readonly message: string;
}

export interface EchoResponse {
  readonly message: string;
}

/**
 * Turns one inbound message into one outbound message.
 *
 * `ordinal` is the 1-based position of the request in its stream.
 */
export type Transform = (request: EchoRequest, ordinal: number) => EchoResponse | Promise<EchoResponse>;

export const syncEcho: Transform = (request) => ({ message: `Sync Echo: ${request.message}` });

export const asyncEcho: Transform = (request) => ({
  message: `Async Echo (processed): ${request.message}`,
});

/**
 * Single response of a client-streaming call.
 *
 * The messages are JSON-quoted, so distinct sequences never summarize alike.
 */
export function summarize(messages: readonly string[]): EchoResponse {
  return { message: `Received ${messages.length} messages: ${JSON.stringify(messages)}` };
}

/** The `ordinal`-th response of a server-streaming call. */
export function fanOutEcho(request: EchoRequest, ordinal: number): EchoResponse {
  return { message: `Echo #${ordinal}: ${request.message}` };
}
