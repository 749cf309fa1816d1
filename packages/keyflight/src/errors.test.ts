/**
 * Tests for errors.ts - type guards
 */
import { describe, it, expect } from "vitest";
import {
  CHANNEL_CLOSED,
  FLIGHT_CANCELLED,
  isChannelClosedError,
  isFlightCancelledError,
  type FlightCancelledError,
} from "./errors";

describe("isFlightCancelledError()", () => {
  it("identifies cancellation errors", () => {
    const error: FlightCancelledError<string> = { type: FLIGHT_CANCELLED, key: "user:1", reason: "stop" };

    expect(isFlightCancelledError(error)).toBe(true);
  });

  it("rejects other values", () => {
    expect(isFlightCancelledError(null)).toBe(false);
    expect(isFlightCancelledError("FLIGHT_CANCELLED")).toBe(false);
    expect(isFlightCancelledError({ type: CHANNEL_CLOSED, message: "closed" })).toBe(false);
  });
});

describe("isChannelClosedError()", () => {
  it("identifies closed-channel errors", () => {
    expect(isChannelClosedError({ type: CHANNEL_CLOSED, message: "closed" })).toBe(true);
    expect(isChannelClosedError(new Error("closed"))).toBe(false);
  });
});
