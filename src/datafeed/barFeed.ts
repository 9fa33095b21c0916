/**
 * WebSocket bar + regime feed.
 * The server pushes closed 1m bars and regime classifications as JSON;
 * a single message may carry one object or an array of them.
 */

import WebSocket from "ws";
import type { RegimeCategory, RegimeSignal } from "../types.js";
import type { Bar } from "./barAggregator.js";

export type FeedBarMessage = { kind: "bar"; bar: Bar };
export type FeedRegimeMessage = { kind: "regime"; ts: number; symbol?: string; signal: RegimeSignal };
export type FeedMessage = FeedBarMessage | FeedRegimeMessage;

export interface BarFeedConfig {
  url: string;
  symbols: string[];
  token?: string;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function parseTs(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string") {
    const ms = new Date(value).getTime();
    return Number.isFinite(ms) ? ms : undefined;
  }
  return undefined;
}

function isCategory(value: unknown): value is RegimeCategory {
  return value === "BULL" || value === "BEAR" || value === "NEUTRAL";
}

function parseConfidence(value: unknown): RegimeSignal["confidence"] {
  if (!isRecord(value)) return undefined;
  const out: Partial<Record<RegimeCategory, number>> = {};
  for (const category of ["BULL", "BEAR", "NEUTRAL"] as const) {
    const p = num(value[category]);
    if (p !== undefined) out[category] = p;
  }
  return Object.keys(out).length ? out : undefined;
}

function parseOne(msg: unknown): FeedMessage | null {
  if (!isRecord(msg)) return null;

  if (msg.T === "b") {
    const ts = parseTs(msg.t);
    const open = num(msg.o);
    const high = num(msg.h);
    const low = num(msg.l);
    const close = num(msg.c);
    const volume = num(msg.v);
    if (
      typeof msg.S !== "string" ||
      ts === undefined ||
      open === undefined ||
      high === undefined ||
      low === undefined ||
      close === undefined ||
      volume === undefined
    ) {
      return null;
    }
    return { kind: "bar", bar: { ts, symbol: msg.S, open, high, low, close, volume } };
  }

  if (msg.T === "r") {
    const ts = parseTs(msg.t);
    const category = typeof msg.regime === "string" ? msg.regime.toUpperCase() : undefined;
    if (ts === undefined || !isCategory(category)) return null;
    const signal: RegimeSignal = { category };
    const confidence = parseConfidence(msg.confidence);
    if (confidence) signal.confidence = confidence;
    return { kind: "regime", ts, symbol: typeof msg.S === "string" ? msg.S : undefined, signal };
  }

  return null;
}

/**
 * Parse one raw frame. Unknown or malformed entries are skipped.
 */
export function parseFeedMessage(raw: string): FeedMessage[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const out: FeedMessage[] = [];
  for (const item of items) {
    const msg = parseOne(item);
    if (msg) out.push(msg);
  }
  return out;
}

export function nextBackoff(current: number, maxBackoff: number): number {
  return Math.min(Math.round(current * 1.5), maxBackoff);
}

export class WsBarFeed {
  private config: BarFeedConfig;
  private ws: WebSocket | null = null;
  private isConnected: boolean = false;
  private stopped: boolean = false;
  private queue: FeedMessage[] = [];
  private resolveQueue: ((value: FeedMessage | null) => void)[] = [];
  private reconnectBackoff: number;
  private readonly initialBackoff: number;
  private readonly maxBackoff: number;

  constructor(config: BarFeedConfig) {
    this.config = config;
    this.initialBackoff = config.initialBackoffMs ?? 5000;
    this.maxBackoff = config.maxBackoffMs ?? 60000;
    this.reconnectBackoff = this.initialBackoff;
  }

  /**
   * Connect, subscribe and yield feed messages until close() is called.
   * Reconnects with exponential backoff on any connection failure.
   */
  async *messages(): AsyncGenerator<FeedMessage, void, unknown> {
    while (!this.stopped) {
      try {
        this.dropSocket();
        console.log(`[Feed] Connecting to ${this.config.url} (backoff: ${this.reconnectBackoff}ms)...`);
        await this.connectWebSocket();
        this.subscribe();
        this.reconnectBackoff = this.initialBackoff;

        while (this.isConnected && !this.stopped) {
          const msg = await this.waitForMessage();
          if (msg) yield msg;
        }
      } catch (error: unknown) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        console.error("[Feed] WebSocket error in generator loop:", errorMsg);
        this.isConnected = false;
      }

      if (this.stopped) break;
      this.dropSocket();
      console.log(`[Feed] Will reconnect in ${this.reconnectBackoff / 1000}s...`);
      await new Promise((resolve) => setTimeout(resolve, this.reconnectBackoff));
      this.reconnectBackoff = nextBackoff(this.reconnectBackoff, this.maxBackoff);
    }
  }

  private dropSocket(): void {
    if (!this.ws) return;
    this.ws.removeAllListeners();
    // a socket that never opened throws on close(); terminate() does not
    this.ws.terminate();
    this.ws = null;
  }

  private connectWebSocket(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      this.ws = ws;

      ws.on("open", () => {
        console.log(`[Feed] WebSocket connected`);
        this.isConnected = true;
        resolve();
      });

      ws.on("error", (error) => {
        console.error("[Feed] WebSocket error:", error.message);
        this.isConnected = false;
        this.wakeWaiters();
        reject(error);
      });

      ws.on("close", (code: number, reason: Buffer) => {
        console.log(`[Feed] WebSocket closed (code: ${code}, reason: ${reason.toString() || "none"})`);
        this.isConnected = false;
        this.wakeWaiters();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        for (const msg of parseFeedMessage(data.toString())) this.enqueue(msg);
      });
    });
  }

  private subscribe(): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new Error("WebSocket not connected");
    }
    if (this.config.token) {
      this.ws.send(JSON.stringify({ action: "auth", token: this.config.token }));
    }
    this.ws.send(JSON.stringify({ action: "subscribe", bars: this.config.symbols, regime: true }));
    console.log(`[Feed] Subscribed to bars for ${this.config.symbols.join(",")}`);
  }

  private enqueue(msg: FeedMessage): void {
    const resolve = this.resolveQueue.shift();
    if (resolve) resolve(msg);
    else this.queue.push(msg);
  }

  private wakeWaiters(): void {
    for (const resolve of this.resolveQueue.splice(0)) resolve(null);
  }

  private waitForMessage(): Promise<FeedMessage | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      // wake periodically so a silently dead socket is noticed
      const timer = setTimeout(() => {
        const index = this.resolveQueue.indexOf(waiter);
        if (index > -1) {
          this.resolveQueue.splice(index, 1);
          resolve(null);
        }
      }, 60000);
      const waiter = (value: FeedMessage | null): void => {
        clearTimeout(timer);
        resolve(value);
      };
      this.resolveQueue.push(waiter);
    });
  }

  close(): void {
    this.stopped = true;
    this.isConnected = false;
    this.dropSocket();
    this.wakeWaiters();
  }
}
