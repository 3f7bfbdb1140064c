// Call status codes reported to the peer when a call ends.
//
// The numbers are the gRPC status codes, so transports can pass them through
// without a lookup table of their own.

export const Status = {
  OK: 0,
  /** The peer went away, or the call was cancelled while in flight. */
  CANCELLED: 1,
  UNKNOWN: 2,
  /** An inbound payload could not be decoded. */
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  /** The server refused the call because too many are in flight. */
  RESOURCE_EXHAUSTED: 8,
  /** The transformation applied to a message raised. */
  INTERNAL: 13,
  /** Reading from or writing to the stream failed. */
  UNAVAILABLE: 14,
} as const;

export type Status = (typeof Status)[keyof typeof Status];

/** Convert a status code to a human-readable string. */
export function statusName(code: Status): string {
  switch (code) {
    case Status.OK:
      return "ok";
    case Status.CANCELLED:
      return "cancelled";
    case Status.UNKNOWN:
      return "unknown";
    case Status.INVALID_ARGUMENT:
      return "invalid_argument";
    case Status.DEADLINE_EXCEEDED:
      return "deadline_exceeded";
    case Status.RESOURCE_EXHAUSTED:
      return "resource_exhausted";
    case Status.INTERNAL:
      return "internal";
    case Status.UNAVAILABLE:
      return "unavailable";
    default:
      return `status_${code}`;
  }
}
