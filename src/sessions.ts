import { RagSession, type SessionDeps, type SessionSettings, type SessionStatus } from "./orchestrator";
import { InvalidArgumentError } from "./errors";
import { componentLogger } from "./logger";

const log = componentLogger("sessions");

/**
 * One {@link RagSession} per owner, created on first use. Sessions of
 * different owners share the providers and stores but no mutable state.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, RagSession>();
  private readonly deps: SessionDeps;
  private readonly settings: SessionSettings;

  public constructor(deps: SessionDeps, settings: SessionSettings) {
    this.deps = deps;
    this.settings = settings;
  }

  public get size(): number {
    return this.sessions.size;
  }

  public get(ownerId: string): RagSession {
    const id = ownerKey(ownerId);
    let session = this.sessions.get(id);
    if (!session) {
      session = new RagSession(id, this.deps, this.settings);
      this.sessions.set(id, session);
      log.debug({ ownerId: id }, "session created");
    }
    return session;
  }

  /** Number of sessions with a document ready for queries. */
  public readyCount(): number {
    let n = 0;
    for (const s of this.sessions.values()) if (s.getState() === "READY") n++;
    return n;
  }

  /**
   * Unload the owner's session and drop it from the registry. The next
   * {@link get} starts a fresh session.
   *
   * @returns The status of the released session.
   */
  public release(ownerId: string): SessionStatus {
    const id = ownerKey(ownerId);
    const session = this.sessions.get(id);
    if (!session) return new RagSession(id, this.deps, this.settings).status();
    session.unload();
    this.sessions.delete(id);
    log.debug({ ownerId: id }, "session released");
    return session.status();
  }
}

function ownerKey(ownerId: string): string {
  const id = ownerId.trim();
  if (!id) throw new InvalidArgumentError("ownerId must not be empty");
  return id;
}
