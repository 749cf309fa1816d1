/**
 * Single-slot delivery channel handed out by `Group.doAsync`.
 *
 * A channel receives exactly one value (or one failure) and is closed from
 * then on. `receive()` can be called any number of times and always settles
 * the same way.
 */

import { CHANNEL_CLOSED, isChannelClosedError, type ChannelClosedError } from "./errors";

/**
 * Consumer side of a channel.
 */
export interface FlightChannel<R> extends AsyncIterable<R> {
  /**
   * Wait for the delivered value. Rejects with the delivered failure, or with
   * a ChannelClosedError if the channel was closed before delivery.
   */
  receive(): Promise<R>;

  /**
   * Stop listening. A delivery after this is dropped. Has no effect on the
   * flight or on other subscribers.
   */
  close(): void;

  /** Whether a value or failure has been delivered */
  readonly delivered: boolean;

  /** Whether the channel accepts no further delivery */
  readonly closed: boolean;
}

/**
 * Producer side of a channel. Both methods return false when the channel was
 * already settled or closed.
 */
export interface ChannelSink<R> {
  deliver(value: R): boolean;
  fail(reason: unknown): boolean;
}

type Settlement<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown };

interface Waiter<R> {
  resolve: (value: R) => void;
  reject: (reason: unknown) => void;
}

const closedError = (): ChannelClosedError => ({
  type: CHANNEL_CLOSED,
  message: "Channel was closed before a result was delivered",
});

/**
 * Create a connected channel/sink pair.
 *
 * @example
 * ```typescript
 * const { channel, sink } = createChannel<number>();
 * sink.deliver(1);
 * await channel.receive(); // 1
 * sink.deliver(2);         // false - already delivered
 * ```
 */
export function createChannel<R>(): { channel: FlightChannel<R>; sink: ChannelSink<R> } {
  let settlement: Settlement<R> | undefined;
  let closedByConsumer = false;
  let waiters: Waiter<R>[] = [];

  const settle = (next: Settlement<R>): boolean => {
    if (settlement !== undefined || closedByConsumer) {
      return false;
    }
    settlement = next;
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (next.status === "fulfilled") {
        waiter.resolve(next.value);
      } else {
        waiter.reject(next.reason);
      }
    }
    return true;
  };

  const receive = (): Promise<R> => {
    if (settlement !== undefined) {
      return settlement.status === "fulfilled"
        ? Promise.resolve(settlement.value)
        : Promise.reject(settlement.reason);
    }
    if (closedByConsumer) {
      return Promise.reject(closedError());
    }
    return new Promise<R>((resolve, reject) => {
      waiters.push({ resolve, reject });
    });
  };

  const channel: FlightChannel<R> = {
    receive,

    close: () => {
      if (closedByConsumer || settlement !== undefined) {
        return;
      }
      closedByConsumer = true;
      const pending = waiters;
      waiters = [];
      for (const waiter of pending) {
        waiter.reject(closedError());
      }
    },

    get delivered() {
      return settlement !== undefined;
    },

    get closed() {
      return closedByConsumer || settlement !== undefined;
    },

    async *[Symbol.asyncIterator]() {
      try {
        yield await receive();
      } catch (e) {
        if (isChannelClosedError(e)) {
          return;
        }
        throw e;
      }
    },
  };

  const sink: ChannelSink<R> = {
    deliver: (value) => settle({ status: "fulfilled", value }),
    fail: (reason) => settle({ status: "rejected", reason }),
  };

  return { channel, sink };
}
