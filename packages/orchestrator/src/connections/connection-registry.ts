/**
 * ConnectionRegistry - per-owner client connections with broadcast
 *
 * An owner may hold several live connections at once (browser tabs,
 * CLI sessions). A broadcast reaches all of them; a connection whose send
 * fails or times out is removed after the pass, so the registry heals
 * itself without the transport having to report disconnects.
 */

import { getContextLogger } from "@ticketflow/core";
import type { AgentEvent } from "../schemas/index.js";
import { KeyedLock } from "../utils/index.js";
import { errorMessage } from "../errors.js";

/**
 * One open client connection (WebSocket, SSE stream, console)
 */
export interface ClientConnection {
  readonly id: string;
  send(event: AgentEvent): Promise<void> | void;
  close?(): void;
}

export interface BroadcastResult {
  delivered: number;
  removed: number;
}

export interface ConnectionRegistryOptions {
  /**
   * A send still pending after this long counts as failed
   * @default 10000
   */
  sendTimeoutMs?: number;
}

const DEFAULT_SEND_TIMEOUT_MS = 10_000;

export class ConnectionRegistry {
  private readonly buckets = new Map<string, ClientConnection[]>();
  private readonly broadcasts = new KeyedLock();
  private readonly sendTimeoutMs: number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  /**
   * Add a connection under its owner; registering the same connection twice is a no-op
   */
  register(owner: string, connection: ClientConnection): void {
    const bucket = this.buckets.get(owner);
    if (!bucket) {
      this.buckets.set(owner, [connection]);
    } else if (!bucket.includes(connection)) {
      bucket.push(connection);
    }

    getContextLogger().debug(
      { owner, connectionId: connection.id, connections: this.connectionCount(owner) },
      "Connection registered"
    );
  }

  /**
   * Remove a connection if present
   *
   * @returns whether the connection was registered
   */
  unregister(owner: string, connection: ClientConnection): boolean {
    const bucket = this.buckets.get(owner);
    if (!bucket) {
      return false;
    }

    const index = bucket.indexOf(connection);
    if (index === -1) {
      return false;
    }

    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(owner);
    }

    getContextLogger().debug({ owner, connectionId: connection.id }, "Connection unregistered");
    return true;
  }

  /**
   * Send an event to every connection of the owner
   *
   * Passes for the same owner run one at a time in call order, so each
   * connection receives events in the order they were broadcast. Sends
   * within a pass run concurrently; failures are collected and the failed
   * connections removed once the pass is done. Never rejects.
   */
  broadcast(owner: string, event: AgentEvent): Promise<BroadcastResult> {
    if (!this.buckets.has(owner) && !this.broadcasts.isLocked(owner)) {
      return Promise.resolve({ delivered: 0, removed: 0 });
    }

    return this.broadcasts.run(owner, () => this.deliver(owner, event));
  }

  private async deliver(owner: string, event: AgentEvent): Promise<BroadcastResult> {
    const snapshot = [...(this.buckets.get(owner) ?? [])];
    if (snapshot.length === 0) {
      return { delivered: 0, removed: 0 };
    }

    const results = await Promise.allSettled(snapshot.map((connection) => this.sendWithTimeout(connection, event)));

    const failed: ClientConnection[] = [];
    results.forEach((result, index) => {
      const connection = snapshot[index];
      if (result.status === "rejected" && connection) {
        getContextLogger().warn(
          { owner, connectionId: connection.id, eventType: event.type, error: errorMessage(result.reason) },
          "Dropping connection after failed send"
        );
        failed.push(connection);
      }
    });

    let removed = 0;
    for (const connection of failed) {
      if (this.unregister(owner, connection)) {
        removed++;
        this.closeQuietly(owner, connection);
      }
    }

    return { delivered: snapshot.length - failed.length, removed };
  }

  private sendWithTimeout(connection: ClientConnection, event: AgentEvent): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Send timed out after ${this.sendTimeoutMs}ms`));
      }, this.sendTimeoutMs);

      Promise.resolve()
        .then(() => connection.send(event))
        .then(
          () => {
            clearTimeout(timer);
            resolve();
          },
          (error: unknown) => {
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }

  private closeQuietly(owner: string, connection: ClientConnection): void {
    try {
      connection.close?.();
    } catch (err) {
      getContextLogger().debug({ err, owner, connectionId: connection.id }, "Closing dead connection failed");
    }
  }

  connectionCount(owner: string): number {
    return this.buckets.get(owner)?.length ?? 0;
  }

  owners(): string[] {
    return Array.from(this.buckets.keys());
  }

  /**
   * Close and forget every connection (shutdown)
   */
  closeAll(): void {
    for (const [owner, bucket] of this.buckets) {
      for (const connection of bucket) {
        this.closeQuietly(owner, connection);
      }
    }
    this.buckets.clear();
  }
}
