import { APP_VERSION } from "./config";

/** Per-session counters, as reported on `/health`. */
export interface SessionCounts {
  active: number;
  ready: number;
}

/**
 * Server lifecycle snapshot. Session counts are read live from the
 * registry each time the status is requested.
 */
export interface ServerStatus {
  version: string;
  /** 'stdio' | 'http' | 'unknown' */
  transport: string;
  embeddingModel: string;
  generationModel: string;
  /** True once providers and stores are initialized and a transport is accepting requests. */
  ready: boolean;
  startedAt: string;
  sessions: SessionCounts;
}

export class StatusManager {
  private readonly data: Omit<ServerStatus, "sessions">;
  private sessionCounts: () => SessionCounts = () => ({ active: 0, ready: 0 });

  public constructor(initial?: Partial<Omit<ServerStatus, "sessions">>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      transport: initial?.transport ?? "unknown",
      embeddingModel: initial?.embeddingModel ?? "",
      generationModel: initial?.generationModel ?? "",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModelNames(embedding: string, generation: string) {
    this.data.embeddingModel = embedding;
    this.data.generationModel = generation;
  }

  /** Source of the live session counts (usually the session registry). */
  public trackSessions(counts: () => SessionCounts) {
    this.sessionCounts = counts;
  }

  public markReady() {
    this.data.ready = true;
  }

  public getStatus(): ServerStatus {
    return { ...this.data, sessions: this.sessionCounts() };
  }

  public toJSON() {
    return this.getStatus();
  }
}

// Shared by the entry point, the health endpoint and the session_status tool.
export const statusManager = new StatusManager();
