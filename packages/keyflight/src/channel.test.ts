/**
 * Tests for channel.ts - single-slot delivery
 */
import { describe, it, expect } from "vitest";
import { createChannel } from "./channel";
import { isChannelClosedError } from "./errors";

describe("createChannel()", () => {
  it("delivers a value once", async () => {
    const { channel, sink } = createChannel<number>();

    expect(sink.deliver(1)).toBe(true);
    expect(sink.deliver(2)).toBe(false);
    expect(sink.fail(new Error("late"))).toBe(false);

    await expect(channel.receive()).resolves.toBe(1);
    await expect(channel.receive()).resolves.toBe(1);
    expect(channel.delivered).toBe(true);
    expect(channel.closed).toBe(true);
  });

  it("resolves receivers that were waiting before delivery", async () => {
    const { channel, sink } = createChannel<string>();

    const first = channel.receive();
    const second = channel.receive();
    sink.deliver("ready");

    await expect(Promise.all([first, second])).resolves.toEqual(["ready", "ready"]);
  });

  it("rejects receivers with the delivered failure", async () => {
    const { channel, sink } = createChannel<string>();
    const boom = new Error("boom");

    const waiting = channel.receive();
    sink.fail(boom);

    await expect(waiting).rejects.toBe(boom);
    await expect(channel.receive()).rejects.toBe(boom);
    expect(channel.delivered).toBe(true);
  });

  it("drops deliveries after the consumer closes", async () => {
    const { channel, sink } = createChannel<string>();

    const waiting = channel.receive();
    channel.close();

    expect(channel.closed).toBe(true);
    expect(channel.delivered).toBe(false);
    expect(sink.deliver("too late")).toBe(false);

    const reason: unknown = await waiting.catch((e: unknown) => e);
    expect(isChannelClosedError(reason)).toBe(true);
    await expect(channel.receive()).rejects.toEqual({
      type: "CHANNEL_CLOSED",
      message: "Channel was closed before a result was delivered",
    });
  });

  it("ignores close after delivery", async () => {
    const { channel, sink } = createChannel<string>();

    sink.deliver("kept");
    channel.close();

    await expect(channel.receive()).resolves.toBe("kept");
  });

  it("iterates over the single value", async () => {
    const { channel, sink } = createChannel<number>();
    sink.deliver(42);

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value);
    }

    expect(seen).toEqual([42]);
  });

  it("ends iteration without a value when closed", async () => {
    const { channel } = createChannel<number>();
    const seen: number[] = [];

    const iterating = (async () => {
      for await (const value of channel) {
        seen.push(value);
      }
    })();
    channel.close();
    await iterating;

    expect(seen).toEqual([]);
  });

  it("rethrows a delivered failure from iteration", async () => {
    const { channel, sink } = createChannel<number>();
    sink.fail(new Error("boom"));

    const iterate = async () => {
      for await (const value of channel) {
        return value;
      }
      return undefined;
    };

    await expect(iterate()).rejects.toThrow("boom");
  });
});
