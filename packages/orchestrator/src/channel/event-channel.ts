/**
 * EventChannel - ordered single-producer, multi-consumer push stream
 *
 * Events are delivered synchronously, in push order, to the listeners
 * subscribed at push time. There is no buffering and no replay: a late
 * subscriber only sees later events, and pushing with no subscribers
 * drops the event.
 */

import { getContextLogger } from "@ticketflow/core";

export type ChannelListener<T> = (event: T) => void;

export class EventChannel<T> {
  private listeners: ChannelListener<T>[] = [];
  private closed = false;

  constructor(private readonly name = "events") {}

  /**
   * Add a listener
   *
   * @returns A function that removes the listener again
   */
  subscribe(listener: ChannelListener<T>): () => void {
    if (this.closed) {
      return () => undefined;
    }

    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  /**
   * Deliver an event to every current listener
   *
   * A throwing listener is logged and skipped; the others still receive
   * the event.
   */
  push(event: T): void {
    if (this.closed) {
      return;
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        getContextLogger().warn({ err, channel: this.name }, "Event listener threw");
      }
    }
  }

  /**
   * Detach all listeners; later pushes are dropped
   */
  close(): void {
    this.closed = true;
    this.listeners = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.listeners.length;
  }
}
