import WebSocket from "ws";
import type { RawData } from "ws";

export type SocketMessage =
  | { kind: "binary"; data: Uint8Array }
  | { kind: "text"; text: string };

/** The slice of a WebSocket connection the driver needs. */
export interface SessionSocket {
  send(data: Uint8Array | string): Promise<void>;
  /** Next inbound message; undefined once the peer has closed. Rejects when `signal` aborts. */
  receive(signal?: AbortSignal): Promise<SocketMessage | undefined>;
  close(): Promise<void>;
}

export type SocketConnector = (url: string) => Promise<SessionSocket>;

export interface ConnectOptions {
  maxPayload?: number;
  openTimeoutMs?: number;
  closeTimeoutMs?: number;
}

export const MAX_PAYLOAD_BYTES = 256 * 1024;
export const OPEN_TIMEOUT_MS = 10_000;
export const CLOSE_TIMEOUT_MS = 5_000;

export function abortError(): Error {
  const error = new Error("receive aborted");
  error.name = "AbortError";
  return error;
}

type Waiter = {
  resolve: (message: SocketMessage | undefined) => void;
  reject: (error: Error) => void;
};

/**
 * Turns push-style socket callbacks into pull-style `receive` calls. Messages
 * that arrive with no pending receiver are queued in order.
 */
export class MessageQueue {
  private readonly pending: SocketMessage[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure: Error | undefined;

  push(message: SocketMessage): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.pending.push(message);
    }
  }

  end(error?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve(undefined);
      }
    }
  }

  next(signal?: AbortSignal): Promise<SocketMessage | undefined> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(undefined);
    if (signal?.aborted) return Promise.reject(abortError());

    return new Promise<SocketMessage | undefined>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(abortError());
      };
      const waiter: Waiter = {
        resolve: (message) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(message);
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}

function rawDataBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

class WebSocketSession implements SessionSocket {
  private readonly queue = new MessageQueue();

  constructor(
    private readonly socket: WebSocket,
    private readonly closeTimeoutMs: number,
  ) {
    socket.on("message", (data: RawData, isBinary: boolean) => {
      const bytes = rawDataBytes(data);
      this.queue.push(
        isBinary ? { kind: "binary", data: bytes } : { kind: "text", text: Buffer.from(bytes).toString("utf8") },
      );
    });
    socket.on("close", () => this.queue.end());
    socket.on("error", (error: Error) => this.queue.end(error));
  }

  send(data: Uint8Array | string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, { binary: typeof data !== "string" }, (error?: Error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  receive(signal?: AbortSignal): Promise<SocketMessage | undefined> {
    return this.queue.next(signal);
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.socket.terminate();
        resolve();
      }, this.closeTimeoutMs);
      this.socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      this.socket.close();
    });
  }
}

/** Opens a WebSocket connection and resolves once it is ready to send. */
export function connectWebSocket(url: string, options: ConnectOptions = {}): Promise<SessionSocket> {
  const socket = new WebSocket(url, {
    maxPayload: options.maxPayload ?? MAX_PAYLOAD_BYTES,
    handshakeTimeout: options.openTimeoutMs ?? OPEN_TIMEOUT_MS,
  });
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      socket.off("open", onOpen);
      reject(error);
    };
    const onOpen = () => {
      socket.off("error", onError);
      resolve(new WebSocketSession(socket, options.closeTimeoutMs ?? CLOSE_TIMEOUT_MS));
    };
    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}
