import { randomUUID } from "node:crypto";
import { log } from "../utils/logger.js";

const logger = log.child("upload-sessions");

export const UPLOAD_STATUSES = ["pending", "uploading", "completed", "failed", "expired"] as const;
export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

export interface UploadSession {
  readonly sessionId: string;
  readonly createdAt: Date;
  readonly expiresAt: Date;
  readonly suggestedFileName?: string;
  readonly favorite?: boolean;
  readonly archived?: boolean;
  readonly status: UploadStatus;
  readonly assetId?: string;
  readonly errorMessage?: string;
}

export interface CreateSessionInput {
  suggestedFileName?: string;
  favorite?: boolean;
  archived?: boolean;
}

export type SessionTransition =
  | { type: "begin" }
  | { type: "complete"; assetId: string }
  | { type: "fail"; message: string };

export type TransitionRefusal = "not_found" | "expired" | "in_progress" | "completed" | "failed" | "not_uploading";

export type TransitionResult =
  | { ok: true; session: UploadSession }
  | { ok: false; reason: TransitionRefusal; session?: UploadSession };

export interface UploadSessionManagerOptions {
  timeoutMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
  generateId?: () => string;
}

export const DEFAULT_SESSION_TIMEOUT_MS = 30 * 60_000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

function isTerminal(status: UploadStatus): boolean {
  return status === "completed" || status === "failed" || status === "expired";
}

function refusalFor(status: UploadStatus): TransitionRefusal {
  switch (status) {
    case "completed":
      return "completed";
    case "failed":
      return "failed";
    case "expired":
      return "expired";
    case "uploading":
      return "in_progress";
    case "pending":
      return "not_uploading";
  }
}

/**
 * Owns every out-of-band upload session.
 *
 * All store operations are synchronous, so each lookup or transition runs to
 * completion before any other request is scheduled: updates to one session are
 * linearizable and never interleave. Callers only ever receive frozen snapshots.
 *
 * Expiry is lazy: a `pending` session past `expiresAt` is observed as `expired` on
 * the next read or `begin`. A session that already reached `uploading` is never
 * downgraded to `expired`; the upload decides its terminal state.
 */
export class UploadSessionManager {
  private readonly sessions = new Map<string, UploadSession>();
  private readonly timeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: UploadSessionManagerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  createSession(input: CreateSessionInput = {}): UploadSession {
    const createdAt = this.now();
    const session: UploadSession = Object.freeze({
      sessionId: this.generateId(),
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + this.timeoutMs),
      suggestedFileName: input.suggestedFileName,
      favorite: input.favorite,
      archived: input.archived,
      status: "pending"
    });

    this.sessions.set(session.sessionId, session);
    logger.debug("session created", { sessionId: session.sessionId, expiresAt: session.expiresAt.toISOString() });
    return session;
  }

  getSession(sessionId: string): UploadSession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }

    return this.observeExpiry(session);
  }

  /** The single mutator; enforces the session state machine. */
  apply(sessionId: string, transition: SessionTransition): TransitionResult {
    const stored = this.sessions.get(sessionId);
    if (!stored) {
      return { ok: false, reason: "not_found" };
    }

    const current = this.observeExpiry(stored);

    switch (transition.type) {
      case "begin":
        if (current.status !== "pending") {
          return { ok: false, reason: refusalFor(current.status), session: current };
        }
        return { ok: true, session: this.replace(current, { status: "uploading" }) };

      case "complete":
        if (current.status !== "uploading") {
          return { ok: false, reason: refusalFor(current.status), session: current };
        }
        return {
          ok: true,
          session: this.replace(current, { status: "completed", assetId: transition.assetId, errorMessage: undefined })
        };

      case "fail":
        if (isTerminal(current.status)) {
          return { ok: false, reason: refusalFor(current.status), session: current };
        }
        return {
          ok: true,
          session: this.replace(current, { status: "failed", errorMessage: transition.message, assetId: undefined })
        };
    }
  }

  /**
   * Drops sessions whose expiry passed more than one sweep interval ago,
   * whatever their status. Returns the number removed.
   */
  sweep(): number {
    const cutoff = this.now() - this.sweepIntervalMs;
    let removed = 0;

    for (const [sessionId, session] of this.sessions) {
      if (session.expiresAt.getTime() < cutoff) {
        this.sessions.delete(sessionId);
        removed += 1;
      }
    }

    if (removed > 0) {
      logger.debug("swept expired sessions", { removed, remaining: this.sessions.size });
    }
    return removed;
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private observeExpiry(session: UploadSession): UploadSession {
    if (session.status === "pending" && this.now() > session.expiresAt.getTime()) {
      logger.debug("session expired", { sessionId: session.sessionId });
      return this.replace(session, { status: "expired" });
    }

    return session;
  }

  private replace(session: UploadSession, changes: Partial<Pick<UploadSession, "status" | "assetId" | "errorMessage">>): UploadSession {
    const next: UploadSession = Object.freeze({ ...session, ...changes });
    this.sessions.set(session.sessionId, next);
    return next;
  }
}
