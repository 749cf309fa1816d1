/**
 * keyflight/singleflight
 *
 * Duplicate call suppression: concurrent requests for the same key share one
 * in-flight computation, and every requester observes the same outcome.
 *
 * @example
 * ```typescript
 * import { createSingleflightGroup } from 'keyflight/singleflight';
 * import { ok, type AsyncResult } from 'keyflight';
 *
 * const group = createSingleflightGroup<string, User, 'NOT_FOUND'>();
 *
 * const [a, b] = await Promise.all([
 *   group.do('user:1', (signal) => fetchUser('1', signal)),
 *   group.do('user:1', (signal) => fetchUser('1', signal)), // joins the first
 * ]);
 * // a.shared === true, b.shared === true, fetchUser ran once
 * ```
 */

import { createChannel, type ChannelSink, type FlightChannel } from "./channel";
import { ok, type AsyncResult, type MaybeAsyncResult, type Result } from "./core";
import { FLIGHT_CANCELLED, type FlightCancelledError } from "./errors";
import {
  emitFlightEvent,
  type FlightEventListener,
  type FlightMode,
  type FlightOutcome,
} from "./events";

// =============================================================================
// Types
// =============================================================================

/**
 * The computation run for a key. It receives the cancellation signal of the
 * caller that started the flight and decides for itself how to honour it.
 */
export type FlightFn<T, E, C = unknown> = (
  signal: AbortSignal
) => MaybeAsyncResult<T, E, C>;

/**
 * A Result plus whether it was delivered to more than one caller.
 */
export type SharedResult<T, E = unknown, C = unknown> = Result<T, E, C> & {
  shared: boolean;
};

/**
 * Options for createSingleflightGroup().
 */
export interface SingleflightGroupOptions<K> {
  /**
   * Label used in events.
   * @default "keyflight"
   */
  name?: string;

  /**
   * Observability hook, called synchronously for every flight event.
   * A listener that throws is logged and otherwise ignored.
   */
  onEvent?: FlightEventListener<K>;

  /**
   * Clock used to measure flight duration.
   * @default Date.now
   */
  now?: () => number;
}

export interface DoOptions {
  /**
   * Handed to the computation when this call starts the flight.
   * Never read by the group itself.
   */
  signal?: AbortSignal;
}

export interface DoCancellableOptions {
  /**
   * Handed to the computation when this call starts the flight. When it
   * aborts before the flight completes, this caller stops waiting.
   */
  signal: AbortSignal;
}

/**
 * A keyed registry of in-flight computations.
 */
export interface SingleflightGroup<K, T, E = unknown, C = unknown> {
  /**
   * Join the in-flight computation for `key`, or start `fn` if there is none.
   *
   * The starting caller runs `fn` right away, before `do` returns. Joining
   * callers wait for it and always see `shared: true`; the starting caller
   * sees `shared: true` if anyone joined before completion.
   *
   * A rejection of `fn` is not wrapped: every caller's promise rejects with
   * the same reason.
   */
  do(key: K, fn: FlightFn<T, E, C>, options?: DoOptions): Promise<SharedResult<T, E, C>>;

  /**
   * Like `do`, but returns a channel immediately instead of waiting. A new
   * flight runs `fn` on a separate task. Every channel attached to a flight
   * receives the same result, with `shared` reflecting the final count.
   */
  doAsync(key: K, fn: FlightFn<T, E, C>, options?: DoOptions): FlightChannel<SharedResult<T, E, C>>;

  /**
   * Like `do`, but stops waiting when `options.signal` aborts, resolving to a
   * FlightCancelledError. The flight itself keeps running for other callers.
   */
  doCancellable(
    key: K,
    fn: FlightFn<T, E, C>,
    options: DoCancellableOptions
  ): Promise<SharedResult<T, E | FlightCancelledError<K>, C>>;

  /**
   * Evict `key` so the next caller starts a fresh computation, unless other
   * callers have already joined its flight.
   *
   * @returns true if `key` is no longer in flight (unknown or just removed),
   * false if it is shared and was left alone
   */
  forgetUnshared(key: K): boolean;

  /** Whether a computation for `key` is in flight. */
  isInflight(key: K): boolean;

  /** Callers beyond the first attached to `key`'s flight, or undefined if none is in flight. */
  duplicates(key: K): number | undefined;

  /** Number of keys in flight. */
  size(): number;
}

type CallOutcome<T, E, C> =
  | { status: "fulfilled"; result: Result<T, E, C> }
  | { status: "rejected"; reason: unknown };

/**
 * One in-flight (or just completed) computation.
 *
 * `done` resolves exactly once, on the pending -> completed transition.
 * `duplicates` and `subscribers` only change while the record is pending and
 * reachable from the registry.
 */
interface CallRecord<T, E, C> {
  state: "pending" | "completed";
  done: Promise<CallOutcome<T, E, C>>;
  fire: (outcome: CallOutcome<T, E, C>) => void;
  duplicates: number;
  subscribers: ChannelSink<SharedResult<T, E, C>>[];
  startedAt: number;
}

// =============================================================================
// Group
// =============================================================================

const toShared = <T, E, C>(
  outcome: CallOutcome<T, E, C>,
  shared: boolean
): SharedResult<T, E, C> => {
  if (outcome.status === "rejected") {
    throw outcome.reason;
  }
  return { ...outcome.result, shared };
};

const outcomeKind = <T, E, C>(outcome: CallOutcome<T, E, C>): FlightOutcome => {
  if (outcome.status === "rejected") return "throw";
  return outcome.result.ok ? "ok" : "err";
};

/**
 * Create a singleflight group.
 *
 * There is no lock: JavaScript runs one task at a time, and every registry
 * read-modify-write below is a synchronous block without an `await`, so it
 * cannot interleave with another. The computation always runs outside those
 * blocks.
 *
 * @example
 * ```typescript
 * const group = createSingleflightGroup<string, Config>({
 *   onEvent: (e) => e.type === 'flight_join' && metrics.increment('config.coalesced'),
 * });
 *
 * const channel = group.doAsync('config', (signal) => loadConfig(signal));
 * const result = await channel.receive();
 * ```
 */
export function createSingleflightGroup<K, T, E = unknown, C = unknown>(
  options: SingleflightGroupOptions<K> = {}
): SingleflightGroup<K, T, E, C> {
  const name = options.name ?? "keyflight";
  const now = options.now ?? Date.now;
  const onEvent = options.onEvent;
  const registry = new Map<K, CallRecord<T, E, C>>();

  const open = (key: K, mode: FlightMode): CallRecord<T, E, C> => {
    let fire: (outcome: CallOutcome<T, E, C>) => void = () => undefined;
    const done = new Promise<CallOutcome<T, E, C>>((resolve) => {
      fire = resolve;
    });
    const record: CallRecord<T, E, C> = {
      state: "pending",
      done,
      fire,
      duplicates: 0,
      subscribers: [],
      startedAt: now(),
    };
    registry.set(key, record);
    emitFlightEvent(onEvent, { type: "flight_start", group: name, key, ts: record.startedAt, mode });
    return record;
  };

  const attach = (key: K, record: CallRecord<T, E, C>, mode: FlightMode): void => {
    record.duplicates++;
    emitFlightEvent(onEvent, {
      type: "flight_join",
      group: name,
      key,
      ts: now(),
      mode,
      duplicates: record.duplicates,
    });
  };

  const complete = (key: K, record: CallRecord<T, E, C>, outcome: CallOutcome<T, E, C>): void => {
    record.state = "completed";
    record.fire(outcome);
    // A forgotten record may have been replaced by a newer flight for the same key.
    if (registry.get(key) === record) {
      registry.delete(key);
    }
    const shared = record.duplicates > 0;
    for (const sink of record.subscribers) {
      if (outcome.status === "fulfilled") {
        sink.deliver({ ...outcome.result, shared });
      } else {
        sink.fail(outcome.reason);
      }
    }
    const ts = now();
    emitFlightEvent(onEvent, {
      type: "flight_complete",
      group: name,
      key,
      ts,
      durationMs: ts - record.startedAt,
      outcome: outcomeKind(outcome),
      shared,
      subscribers: record.subscribers.length,
    });
  };

  // Never rejects: a throwing fn becomes a "rejected" outcome.
  const execute = async (
    key: K,
    record: CallRecord<T, E, C>,
    fn: FlightFn<T, E, C>,
    signal: AbortSignal
  ): Promise<CallOutcome<T, E, C>> => {
    let outcome: CallOutcome<T, E, C>;
    try {
      outcome = { status: "fulfilled", result: await fn(signal) };
    } catch (reason) {
      outcome = { status: "rejected", reason };
    }
    complete(key, record, outcome);
    return outcome;
  };

  const enter = (
    key: K,
    fn: FlightFn<T, E, C>,
    signal: AbortSignal,
    mode: FlightMode
  ): { record: CallRecord<T, E, C>; joined: boolean; result: Promise<SharedResult<T, E, C>> } => {
    const existing = registry.get(key);
    if (existing) {
      attach(key, existing, mode);
      return {
        record: existing,
        joined: true,
        result: existing.done.then((outcome) => toShared(outcome, true)),
      };
    }
    const record = open(key, mode);
    return {
      record,
      joined: false,
      result: execute(key, record, fn, signal).then((outcome) =>
        toShared(outcome, record.duplicates > 0)
      ),
    };
  };

  return {
    do: (key, fn, doOptions = {}) =>
      enter(key, fn, doOptions.signal ?? new AbortController().signal, "do").result,

    doAsync: (key, fn, doOptions = {}) => {
      const { channel, sink } = createChannel<SharedResult<T, E, C>>();
      const existing = registry.get(key);
      if (existing) {
        existing.subscribers.push(sink);
        attach(key, existing, "doAsync");
        return channel;
      }
      const record = open(key, "doAsync");
      record.subscribers.push(sink);
      const signal = doOptions.signal ?? new AbortController().signal;
      queueMicrotask(() => {
        // The outcome reaches callers through record.subscribers.
        void execute(key, record, fn, signal);
      });
      return channel;
    },

    doCancellable: (key, fn, { signal }) => {
      const { record, joined, result: flight } = enter(key, fn, signal, "doCancellable");
      return new Promise<SharedResult<T, E | FlightCancelledError<K>, C>>((resolve, reject) => {
        const onAbort = (): void => {
          // A detached joiner no longer waits, so it stops counting as a duplicate.
          if (joined && record.state === "pending") {
            record.duplicates--;
          }
          emitFlightEvent(onEvent, {
            type: "flight_cancel",
            group: name,
            key,
            ts: now(),
            reason: signal.reason,
          });
          resolve({
            ok: false,
            error: { type: FLIGHT_CANCELLED, key, reason: signal.reason },
            shared: false,
          });
        };

        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener("abort", onAbort, { once: true });
        }

        // After an abort this promise is already settled, and the flight's
        // outcome only matters to the callers still attached.
        void flight.then(
          (result) => {
            signal.removeEventListener("abort", onAbort);
            resolve(result);
          },
          (reason: unknown) => {
            signal.removeEventListener("abort", onAbort);
            reject(reason);
          }
        );
      });
    },

    forgetUnshared: (key) => {
      const record = registry.get(key);
      let forgotten = true;
      if (record) {
        forgotten = record.duplicates === 0;
        if (forgotten) {
          registry.delete(key);
        }
      }
      emitFlightEvent(onEvent, { type: "flight_forget", group: name, key, ts: now(), forgotten });
      return forgotten;
    },

    isInflight: (key) => registry.has(key),

    duplicates: (key) => registry.get(key)?.duplicates,

    size: () => registry.size,
  };
}

// =============================================================================
// singleflight() wrapper
// =============================================================================

/**
 * Options for the singleflight wrapper.
 */
export type SingleflightOptions<Args extends unknown[], K = string> = {
  /**
   * Derive the coalescing key from the arguments.
   * Calls with the same key share one in-flight request.
   */
  key: (...args: Args) => K;

  /**
   * Label used in events.
   * @default "keyflight"
   */
  name?: string;

  /**
   * Observability hook, see SingleflightGroupOptions.onEvent.
   */
  onEvent?: FlightEventListener<K>;
};

const toResult = <T, E, C>(shared: SharedResult<T, E, C>): Result<T, E, C> => {
  if (shared.ok) return ok(shared.value);
  return shared.cause !== undefined
    ? { ok: false, error: shared.error, cause: shared.cause }
    : { ok: false, error: shared.error };
};

/**
 * Create a singleflight-wrapped function.
 * Concurrent calls with the same key share one in-flight request; once it
 * completes, the next call starts a new one.
 *
 * @example
 * ```typescript
 * import { singleflight } from 'keyflight/singleflight';
 * import { ok, err, type AsyncResult } from 'keyflight';
 *
 * const fetchUser = async (id: string): AsyncResult<User, 'NOT_FOUND'> =>
 *   id !== '0' ? ok({ id, name: `User ${id}` }) : err('NOT_FOUND');
 *
 * const fetchUserOnce = singleflight(fetchUser, {
 *   key: (id) => `user:${id}`,
 * });
 *
 * const [a, b, c] = await Promise.all([
 *   fetchUserOnce('1'),  // Triggers fetch
 *   fetchUserOnce('1'),  // Joins existing fetch
 *   fetchUserOnce('2'),  // Different key - new fetch
 * ]);
 * ```
 */
export function singleflight<Args extends unknown[], T, E, C = unknown, K = string>(
  operation: (...args: Args) => AsyncResult<T, E, C>,
  options: SingleflightOptions<Args, K>
): (...args: Args) => AsyncResult<T, E, C> {
  const group = createSingleflightGroup<K, T, E, C>({
    name: options.name,
    onEvent: options.onEvent,
  });

  return async (...args: Args): AsyncResult<T, E, C> =>
    toResult(await group.do(options.key(...args), () => operation(...args)));
}
