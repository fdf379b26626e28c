import { Injectable, Logger } from "@nestjs/common";
import { assertValidIntake } from "./intake.validation";
import { KeyedLock } from "./keyed-lock";
import {
  IntakeValidationError,
  PatientIntake,
  Session,
  SessionNotFoundError,
  SessionState,
  Turn
} from "./session.types";

/**
 * In-memory session store. The backing map never leaves this class:
 * reads return detached snapshots and every mutation goes through a method.
 */
@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);
  private readonly sessions = new Map<string, Session>();
  private readonly lock = new KeyedLock();

  /** @throws IntakeValidationError, leaving any existing session untouched */
  upsertIntake(userId: string, intake: PatientIntake): Session {
    assertValidIntake(intake);
    if (intake.userId !== userId) {
      throw new IntakeValidationError("userId", `belongs to ${intake.userId}, not ${userId}`);
    }
    const now = new Date().toISOString();
    const existing = this.sessions.get(userId);
    const session: Session = existing
      ? { ...existing, intake: cloneIntake(intake), state: "INTAKE_COMPLETE", updatedAt: now }
      : { userId, intake: cloneIntake(intake), turns: [], state: "INTAKE_COMPLETE", createdAt: now, updatedAt: now };
    this.sessions.set(userId, session);
    this.logger.debug(`${existing ? "Replaced" : "Created"} intake for ${userId}`);
    return snapshot(session);
  }

  get(userId: string): Session {
    return snapshot(this.require(userId));
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  appendTurn(userId: string, turn: Turn): void {
    const session = this.require(userId);
    session.turns.push(structuredClone(turn));
    session.updatedAt = turn.timestamp;
  }

  transition(userId: string, state: SessionState): void {
    const session = this.require(userId);
    if (session.state !== state) {
      this.logger.debug(`Session ${userId}: ${session.state} -> ${state}`);
      session.state = state;
      session.updatedAt = new Date().toISOString();
    }
  }

  /** Removes the session. Returns false when there was nothing to remove. */
  clear(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  /** Runs `task` while holding the lock for `userId`. */
  runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(userId, task);
  }

  private require(userId: string): Session {
    const session = this.sessions.get(userId);
    if (!session) {
      throw new SessionNotFoundError(userId);
    }
    return session;
  }
}

function cloneIntake(intake: PatientIntake): PatientIntake {
  return {
    ...intake,
    comorbidities: [...intake.comorbidities],
    priorTreatments: [...intake.priorTreatments]
  };
}

function snapshot(session: Session): Session {
  return structuredClone(session);
}
