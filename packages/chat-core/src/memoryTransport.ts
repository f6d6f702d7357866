import { TransportError } from "./errors.js";
import type { ApiCall, ApiResult, ChatEvent, ChatTransport } from "./types.js";

export interface PostedMessage {
  channel: string;
  text: string;
}

/**
 * In-process transport. Events are queued with `push()`, posts are recorded
 * in `posted`, and connect/read/post failures can be scripted.
 */
export class MemoryTransport implements ChatTransport {
  readonly posted: PostedMessage[] = [];
  readonly calls: ApiCall[] = [];
  connectCount = 0;
  private connected = false;
  private inbox: ChatEvent[] = [];
  private connectFailures: Error[] = [];
  private readFailures: Error[] = [];
  private postResults: ApiResult[] = [];
  private identity: { id: string; tag: string };

  constructor(identity: { id: string; tag: string } = { id: "B0", tag: "bot#0000" }) {
    this.identity = identity;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Queue inbound events for the next read. */
  push(...events: ChatEvent[]): void {
    this.inbox.push(...events);
  }

  /** Make the next `count` connect attempts fail with `error`. */
  failConnect(error: Error, count = 1): void {
    for (let i = 0; i < count; i++) this.connectFailures.push(error);
  }

  /** Make the next read fail with `error`, as if the connection dropped. */
  failRead(error: Error = new TransportError("Connection lost")): void {
    this.readFailures.push(error);
  }

  /** Override the result of the next postMessage call. */
  nextPostResult(result: ApiResult): void {
    this.postResults.push(result);
  }

  async connect(): Promise<void> {
    this.connectCount++;
    const failure = this.connectFailures.shift();
    if (failure) {
      this.connected = false;
      throw failure;
    }
    this.connected = true;
  }

  async readEvents(): Promise<ChatEvent[]> {
    const failure = this.readFailures.shift();
    if (failure) {
      this.connected = false;
      throw failure;
    }
    if (!this.connected) throw new TransportError("Not connected");

    const batch = this.inbox;
    this.inbox = [];
    return batch;
  }

  async call(call: ApiCall): Promise<ApiResult> {
    this.calls.push(call);
    if (!this.connected) return { ok: false, error: "not_connected" };

    switch (call.method) {
      case "postMessage": {
        const scripted = this.postResults.shift();
        if (scripted) return scripted;
        this.posted.push({ channel: call.channel, text: call.text });
        return { ok: true, data: { channel: call.channel, ids: [String(this.posted.length)] } };
      }
      case "fetchChannel":
        return { ok: true, data: { id: call.channel, type: 0 } };
      case "whoami":
        return { ok: true, data: { ...this.identity } };
    }
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }
}
