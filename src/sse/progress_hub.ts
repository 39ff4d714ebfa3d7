import "fastify-sse-v2";

import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger, FastifyReply } from "fastify";

import type { ProgressEvent } from "../contracts/case";
import { errorMessage } from "../pipeline/errors";

/** Fire-and-forget: emit never throws and never blocks the caller. */
export interface ProgressEmitter {
  emit(event: ProgressEvent): void;
}

export type ProgressSink = {
  id: string;
  caseId: string;
  createdAtMs: number;
  send(kind: string, data: string): void;
  close?(): void;
  log?: Pick<FastifyBaseLogger, "warn" | "debug">;
};

const DEFAULT_PING_MS = 30_000;
const DEFAULT_MAX_SINKS_PER_CASE = 5;

export const noopProgressEmitter: ProgressEmitter = {
  emit: () => undefined,
};

class SinkRegistry {
  private readonly sinks = new Map<string, Map<string, ProgressSink>>();

  add(sink: ProgressSink) {
    const bucket = this.sinks.get(sink.caseId) ?? new Map<string, ProgressSink>();
    bucket.set(sink.id, sink);
    this.sinks.set(sink.caseId, bucket);
  }

  remove(caseId: string, sinkId: string): ProgressSink | null {
    const bucket = this.sinks.get(caseId);
    const sink = bucket?.get(sinkId) ?? null;
    bucket?.delete(sinkId);
    if (bucket && bucket.size === 0) this.sinks.delete(caseId);
    return sink;
  }

  list(caseId: string): ProgressSink[] {
    return Array.from(this.sinks.get(caseId)?.values() ?? []);
  }

  listAll(): ProgressSink[] {
    const all: ProgressSink[] = [];
    for (const bucket of this.sinks.values()) all.push(...bucket.values());
    return all;
  }

  count(caseId?: string): number {
    if (caseId) return this.sinks.get(caseId)?.size ?? 0;
    let total = 0;
    for (const bucket of this.sinks.values()) total += bucket.size;
    return total;
  }
}

/**
 * Fans progress events out to the subscribers of each case. Delivery is
 * best-effort: a sink that throws is dropped.
 */
export class ProgressHub implements ProgressEmitter {
  private registry = new SinkRegistry();
  private pingTimer: NodeJS.Timeout | null = null;
  private pingIntervalMs: number;
  private maxSinksPerCase: number;

  constructor(args: { pingIntervalMs?: number; maxSinksPerCase?: number } = {}) {
    this.pingIntervalMs = args.pingIntervalMs ?? DEFAULT_PING_MS;
    this.maxSinksPerCase = args.maxSinksPerCase ?? DEFAULT_MAX_SINKS_PER_CASE;
  }

  subscribe(sink: ProgressSink): () => void {
    const existing = this.registry.list(sink.caseId);
    if (existing.length >= this.maxSinksPerCase) {
      const oldest = existing.sort((a, b) => a.createdAtMs - b.createdAtMs)[0];
      if (oldest) this.unsubscribe(oldest.caseId, oldest.id, "cap_exceeded");
    }
    this.registry.add(sink);
    this.ensurePingLoop();
    return () => this.unsubscribe(sink.caseId, sink.id, "unsubscribed");
  }

  unsubscribe(caseId: string, sinkId: string, reason: string = "closed") {
    const sink = this.registry.remove(caseId, sinkId);
    if (!sink) return;
    try {
      sink.close?.();
    } catch (error) {
      sink.log?.debug({ err: errorMessage(error), caseId, sinkId, reason }, "progress.close_failed");
    }
    if (this.registry.count() === 0) this.stopPingLoop();
  }

  emit(event: ProgressEvent): void {
    const data = JSON.stringify(event);
    for (const sink of this.registry.list(event.caseId)) {
      this.send(sink, "progress", data);
    }
  }

  subscriberCount(caseId?: string): number {
    return this.registry.count(caseId);
  }

  shutdown() {
    for (const sink of this.registry.listAll()) {
      this.unsubscribe(sink.caseId, sink.id, "shutdown");
    }
    this.stopPingLoop();
  }

  private send(sink: ProgressSink, kind: string, data: string) {
    try {
      sink.send(kind, data);
    } catch (error) {
      sink.log?.warn(
        { err: errorMessage(error), caseId: sink.caseId, sinkId: sink.id },
        "progress.send_failed"
      );
      this.unsubscribe(sink.caseId, sink.id, "send_failed");
    }
  }

  private ensurePingLoop() {
    if (this.pingTimer) return;
    this.pingTimer = setInterval(() => {
      const data = JSON.stringify({ ts: new Date().toISOString() });
      for (const sink of this.registry.listAll()) {
        this.send(sink, "ping", data);
      }
    }, this.pingIntervalMs);
    this.pingTimer.unref();
  }

  private stopPingLoop() {
    if (!this.pingTimer) return;
    clearInterval(this.pingTimer);
    this.pingTimer = null;
  }
}

export function sseSink(args: {
  caseId: string;
  reply: FastifyReply;
  log?: FastifyBaseLogger;
}): ProgressSink {
  return {
    id: randomUUID(),
    caseId: args.caseId,
    createdAtMs: Date.now(),
    log: args.log,
    send: (kind, data) => {
      args.reply.sse({ id: randomUUID(), event: kind, data });
    },
    close: () => {
      args.reply.sseContext.source.end();
    },
  };
}
