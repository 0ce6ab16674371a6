/**
 * Shared test doubles for the orchestrator specs
 */

import type { ClientConnection } from "../connections/index.js";
import type { AgentEvent } from "../schemas/index.js";

export class RecordingConnection implements ClientConnection {
  readonly events: AgentEvent[] = [];
  closeCount = 0;

  constructor(readonly id: string) {}

  send(event: AgentEvent): void {
    this.events.push(event);
  }

  close(): void {
    this.closeCount++;
  }

  get types(): string[] {
    return this.events.map((event) => event.type);
  }
}

export class FailingConnection implements ClientConnection {
  attempts = 0;
  closeCount = 0;

  constructor(readonly id: string) {}

  async send(): Promise<void> {
    this.attempts++;
    throw new Error("socket closed");
  }

  close(): void {
    this.closeCount++;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let pending promise callbacks and immediates run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
