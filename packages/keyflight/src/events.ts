/**
 * Events emitted by a Group through its `onEvent` option.
 */

/** How a caller entered a flight */
export type FlightMode = "do" | "doAsync" | "doCancellable";

/** How a flight's computation finished */
export type FlightOutcome = "ok" | "err" | "throw";

export type FlightEvent<K = unknown> =
  | { type: "flight_start"; group: string; key: K; ts: number; mode: FlightMode }
  | { type: "flight_join"; group: string; key: K; ts: number; mode: FlightMode; duplicates: number }
  | {
      type: "flight_complete";
      group: string;
      key: K;
      ts: number;
      durationMs: number;
      outcome: FlightOutcome;
      shared: boolean;
      /** Number of doAsync channels the result was delivered to */
      subscribers: number;
    }
  | { type: "flight_forget"; group: string; key: K; ts: number; forgotten: boolean }
  | { type: "flight_cancel"; group: string; key: K; ts: number; reason: unknown };

export type FlightEventListener<K = unknown> = (event: FlightEvent<K>) => void;

/**
 * Invoke a listener, logging instead of propagating anything it throws.
 */
export function emitFlightEvent<K>(
  listener: FlightEventListener<K> | undefined,
  event: FlightEvent<K>
): void {
  if (!listener) return;
  try {
    listener(event);
  } catch (e) {
    console.error("keyflight: onEvent listener threw an error:", e);
  }
}
