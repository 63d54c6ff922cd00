import { WebSocketServer, WebSocket } from "ws";
import type { Server as HttpServer } from "node:http";

export type TraderEventType = "status" | "decision" | "trade" | "snapshot";

export interface TraderEvent {
  type: TraderEventType;
  timestamp: string;
  data: unknown;
}

function encodeEvent(type: TraderEventType, data: unknown): string {
  const event: TraderEvent = { type, timestamp: new Date().toISOString(), data };
  return JSON.stringify(event);
}

/**
 * Pushes trader events to dashboard clients on `/ws`. When a snapshot
 * provider is given, each new client receives a "snapshot" event first.
 */
export class WsBroker {
  private wss: WebSocketServer | null = null;
  private readonly snapshot: (() => unknown) | undefined;

  constructor(snapshot?: () => unknown) {
    this.snapshot = snapshot;
  }

  attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: "/ws" });
    this.wss.on("connection", (ws) => {
      if (this.snapshot) ws.send(encodeEvent("snapshot", this.snapshot()));
    });
  }

  clientCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  broadcastEvent(type: TraderEventType, data: unknown): void {
    if (!this.wss) return;
    const message = encodeEvent(type, data);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(message);
    }
  }

  close(): void {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    wss.clients.forEach((client) => client.terminate());
    wss.close();
  }
}
