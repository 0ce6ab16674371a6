import { describe, it, expect } from "vitest";
import { EventChannel } from "../channel/index.js";

describe("EventChannel", () => {
  it("delivers events in push order to every subscriber", () => {
    const channel = new EventChannel<number>();
    const first: number[] = [];
    const second: number[] = [];
    channel.subscribe((event) => first.push(event));
    channel.subscribe((event) => second.push(event));

    channel.push(1);
    channel.push(2);
    channel.push(3);

    expect(first).toEqual([1, 2, 3]);
    expect(second).toEqual([1, 2, 3]);
  });

  it("drops events pushed with no subscribers", () => {
    const channel = new EventChannel<string>();
    expect(() => channel.push("lost")).not.toThrow();

    const seen: string[] = [];
    channel.subscribe((event) => seen.push(event));
    channel.push("kept");
    expect(seen).toEqual(["kept"]);
  });

  it("keeps delivering when one subscriber throws", () => {
    const channel = new EventChannel<string>();
    const seen: string[] = [];
    channel.subscribe(() => {
      throw new Error("listener failure");
    });
    channel.subscribe((event) => seen.push(event));

    channel.push("a");
    channel.push("b");

    expect(seen).toEqual(["a", "b"]);
  });

  it("stops delivering to an unsubscribed listener", () => {
    const channel = new EventChannel<string>();
    const seen: string[] = [];
    const unsubscribe = channel.subscribe((event) => seen.push(event));

    channel.push("before");
    unsubscribe();
    channel.push("after");

    expect(seen).toEqual(["before"]);
    expect(channel.subscriberCount).toBe(0);
  });

  it("drops pushes and subscriptions after close", () => {
    const channel = new EventChannel<string>();
    const seen: string[] = [];
    channel.subscribe((event) => seen.push(event));

    channel.close();
    channel.push("late");
    channel.subscribe((event) => seen.push(event));
    channel.push("later");

    expect(seen).toEqual([]);
    expect(channel.isClosed).toBe(true);
    expect(channel.subscriberCount).toBe(0);
  });
});
