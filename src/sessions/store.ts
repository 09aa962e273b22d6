import { randomUUID } from "node:crypto";

import type { StructuredLogger } from "../logger.js";
import { OrchestratorError } from "../rpc/errors.js";
import type { SessionTurn, TurnRole } from "../types.js";

export class SessionNotFoundError extends OrchestratorError {
  constructor(sessionId: string) {
    super("NotFound", "SessionNotFound", `Session '${sessionId}' not found`, {
      details: { session_id: sessionId },
    });
  }
}

/** Raised when a second run targets a session whose previous run is still in flight. */
export class SessionBusyError extends OrchestratorError {
  constructor(sessionId: string) {
    super("Conflict", "SessionBusy", `Session '${sessionId}' is already running a turn`, {
      hint: "wait for the current run to finish or use another session_id",
      details: { session_id: sessionId },
    });
  }
}

export interface SessionSnapshot {
  id: string;
  userId: string;
  createdAt: string;
  busy: boolean;
  turns: SessionTurn[];
}

interface SessionRecord {
  readonly id: string;
  readonly userId: string;
  readonly createdAt: string;
  readonly turns: SessionTurn[];
}

/**
 * Exclusive handle on one session, held for the duration of a run. Turns are
 * only appended through a lease, so one run's turns are never interleaved
 * with another's.
 */
export interface SessionLease {
  readonly sessionId: string;
  /** Whether this lease brought the session into existence. */
  readonly created: boolean;
  /** Copy of the turns recorded before this call. */
  history(): SessionTurn[];
  append(role: TurnRole, content: string): void;
  /** Number of turns currently recorded; pass to {@link rollbackTo}. */
  mark(): number;
  /** Drops every turn appended after {@link mark}. */
  rollbackTo(mark: number): void;
  release(): void;
}

export interface SessionStoreOptions {
  readonly logger: StructuredLogger;
  readonly now?: () => Date;
  readonly generateId?: () => string;
}

/** In-memory, session-indexed conversation store. */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly inFlight = new Set<string>();
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: SessionStoreOptions) {
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Leases {@link sessionId}, creating the session on first reference. A new
   * identifier is generated when none is supplied.
   */
  acquire(sessionId: string | undefined, options: { userId?: string } = {}): SessionLease {
    const id = sessionId ?? this.generateId();
    if (this.inFlight.has(id)) {
      throw new SessionBusyError(id);
    }

    let record = this.sessions.get(id);
    const created = !record;
    if (!record) {
      record = { id, userId: options.userId ?? "user", createdAt: this.now().toISOString(), turns: [] };
      this.sessions.set(id, record);
      this.logger.debug("session_created", { session_id: id, user_id: record.userId });
    }
    this.inFlight.add(id);

    const turns = record.turns;
    let released = false;
    const assertHeld = (): void => {
      if (released) {
        throw new Error(`Lease on session '${id}' has already been released`);
      }
    };

    return {
      sessionId: id,
      created,
      history: () => turns.map((turn) => ({ ...turn })),
      append: (role, content) => {
        assertHeld();
        turns.push({ role, content, timestamp: this.now().toISOString() });
      },
      mark: () => turns.length,
      rollbackTo: (mark) => {
        assertHeld();
        turns.splice(mark);
      },
      release: () => {
        if (!released) {
          released = true;
          this.inFlight.delete(id);
        }
      },
    };
  }

  get(sessionId: string): SessionSnapshot | undefined {
    const record = this.sessions.get(sessionId);
    if (!record) {
      return undefined;
    }
    return {
      id: record.id,
      userId: record.userId,
      createdAt: record.createdAt,
      busy: this.inFlight.has(record.id),
      turns: record.turns.map((turn) => ({ ...turn })),
    };
  }

  require(sessionId: string): SessionSnapshot {
    const snapshot = this.get(sessionId);
    if (!snapshot) {
      throw new SessionNotFoundError(sessionId);
    }
    return snapshot;
  }

  list(): Array<{ id: string; userId: string; turnCount: number; busy: boolean }> {
    return [...this.sessions.values()].map((record) => ({
      id: record.id,
      userId: record.userId,
      turnCount: record.turns.length,
      busy: this.inFlight.has(record.id),
    }));
  }

  delete(sessionId: string): SessionSnapshot {
    const snapshot = this.require(sessionId);
    if (snapshot.busy) {
      throw new SessionBusyError(sessionId);
    }
    this.sessions.delete(sessionId);
    this.logger.debug("session_deleted", { session_id: sessionId, turns: snapshot.turns.length });
    return snapshot;
  }

  /** Evicts a session regardless of lease state; used for ephemeral runs. */
  evict(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  clear(): void {
    this.sessions.clear();
    this.inFlight.clear();
  }
}
