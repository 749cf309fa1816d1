/**
 * keyflight/errors
 *
 * Errors raised by keyflight itself. Errors produced by a flight's computation
 * are never wrapped; these only describe what happened to a caller.
 */

/** Discriminant for FlightCancelledError - use in switch statements */
export const FLIGHT_CANCELLED = "FLIGHT_CANCELLED" as const;

/** Discriminant for ChannelClosedError - use in switch statements */
export const CHANNEL_CLOSED = "CHANNEL_CLOSED" as const;

/**
 * Returned by `doCancellable` when the caller's signal aborts before the
 * flight completes. The flight keeps running for everyone else.
 */
export type FlightCancelledError<K = unknown> = {
  type: typeof FLIGHT_CANCELLED;
  key: K;
  /** `signal.reason` at the time of the abort */
  reason: unknown;
};

/**
 * Rejection of a pending `receive()` when its channel is closed before
 * anything was delivered.
 */
export type ChannelClosedError = {
  type: typeof CHANNEL_CLOSED;
  message: string;
};

/**
 * Type guard for FlightCancelledError.
 */
export function isFlightCancelledError(
  error: unknown
): error is FlightCancelledError {
  return (
    typeof error === "object" &&
    error !== null &&
    (error as FlightCancelledError).type === FLIGHT_CANCELLED
  );
}

/**
 * Type guard for ChannelClosedError.
 */
export function isChannelClosedError(error: unknown): error is ChannelClosedError {
  return (
    typeof error === "object" &&
    error !== null &&
    (error as ChannelClosedError).type === CHANNEL_CLOSED
  );
}
