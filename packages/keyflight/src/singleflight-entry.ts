/**
 * keyflight/singleflight
 *
 * Request coalescing - dedupe concurrent identical requests.
 * Multiple concurrent calls with the same key share one in-flight request.
 *
 * @example
 * ```typescript
 * import { createSingleflightGroup } from 'keyflight/singleflight';
 *
 * const group = createSingleflightGroup<string, User, 'NOT_FOUND'>();
 *
 * const channel = group.doAsync('user:1', (signal) => fetchUser('1', signal));
 * const { shared } = await group.do('user:1', (signal) => fetchUser('1', signal));
 * // shared === true: the second call joined the first
 * ```
 */

export {
  createSingleflightGroup,
  singleflight,
  type FlightFn,
  type SharedResult,
  type SingleflightGroup,
  type SingleflightGroupOptions,
  type SingleflightOptions,
  type DoOptions,
  type DoCancellableOptions,
} from "./singleflight";

export { createChannel, type FlightChannel, type ChannelSink } from "./channel";

export {
  FLIGHT_CANCELLED,
  CHANNEL_CLOSED,
  isFlightCancelledError,
  isChannelClosedError,
  type FlightCancelledError,
  type ChannelClosedError,
} from "./errors";

export {
  type FlightEvent,
  type FlightEventListener,
  type FlightMode,
  type FlightOutcome,
} from "./events";
