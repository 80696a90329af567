import type { WSContext } from "hono/ws";
import type { WebSocket } from "ws";

import type { Connection } from "../core.js";

const OPEN = 1;

/** Adapts a Hono WebSocket context to the hub's connection port. */
export class WebSocketConnection implements Connection {
  readonly #ws: WSContext<WebSocket>;

  constructor(ws: WSContext<WebSocket>) {
    this.#ws = ws;
  }

  get isOpen(): boolean {
    return this.#ws.readyState === OPEN;
  }

  send(data: string): void {
    if (!this.isOpen) {
      throw new Error("WebSocket is not open");
    }
    this.#ws.send(data);
  }

  close(code: number, reason: string): void {
    if (this.#ws.readyState >= 2) {
      return;
    }
    this.#ws.close(code, reason);
  }
}
