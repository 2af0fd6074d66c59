import logger from '../config/logger';
import appConfig from '../config/env';
import { AppError } from '../utils/AppError';
import {
  AttachmentDescriptor,
  OrderData,
  OrderStep,
  Session,
  UserId,
} from '../types/session';

/**
 * Session store contract used by the conversation handler
 */
export interface SessionStore {
  readonly size: number;
  get(userId: UserId): Session | undefined;
  create(userId: UserId, initialStep: OrderStep): Session;
  update(userId: UserId, step?: OrderStep, dataPatch?: Partial<OrderData>): Session;
  appendFile(userId: UserId, file: AttachmentDescriptor): boolean;
  clear(userId: UserId): void;
  sweepExpired(): number;
}

export interface SessionStoreOptions {
  maxSessions: number;
  sessionTimeoutSeconds: number;
  maxFilesPerOrder: number;
}

/**
 * InMemorySessionStore keeps one session per user in process memory.
 * Expired sessions are only swept when the store is at capacity.
 * Nothing survives a restart.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<UserId, Session>();

  constructor(private readonly options: SessionStoreOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Returns the active session and marks it as used
   */
  get(userId: UserId): Session | undefined {
    this.sweepIfUnderPressure();

    const session = this.sessions.get(userId);
    if (session) {
      session.lastActivityAt = new Date();
    }
    return session;
  }

  /**
   * Starts a fresh session, discarding whatever the user had before
   */
  create(userId: UserId, initialStep: OrderStep): Session {
    this.sweepIfUnderPressure();

    const now = new Date();
    const session: Session = {
      userId,
      step: initialStep,
      orderData: {},
      files: [],
      createdAt: now,
      lastActivityAt: now,
    };
    this.sessions.set(userId, session);
    logger.debug(`Session created for ${userId}: step=${initialStep}`);
    return session;
  }

  /**
   * Moves the session to a new step and/or merges order fields.
   * A missing session is created at the menu step first.
   * @throws AppError if the patch tries to change a price that is already locked
   */
  update(userId: UserId, step?: OrderStep, dataPatch?: Partial<OrderData>): Session {
    const session = this.get(userId) ?? this.create(userId, OrderStep.MENU);

    if (
      dataPatch?.finalPrice !== undefined &&
      session.orderData.finalPrice !== undefined
    ) {
      throw new AppError(`Final price is already locked for ${userId}`, 409);
    }

    if (step) {
      session.step = step;
    }
    if (dataPatch) {
      session.orderData = { ...session.orderData, ...dataPatch };
    }
    session.lastActivityAt = new Date();

    logger.debug(`Session updated for ${userId}: step=${session.step}`);
    return session;
  }

  /**
   * Adds an attachment unless the order already holds the maximum
   * @returns false if there is no session or the cap is reached
   */
  appendFile(userId: UserId, file: AttachmentDescriptor): boolean {
    const session = this.get(userId);
    if (!session || session.files.length >= this.options.maxFilesPerOrder) {
      return false;
    }
    session.files.push(file);
    logger.debug(`File attached for ${userId}: ${session.files.length}/${this.options.maxFilesPerOrder}`);
    return true;
  }

  clear(userId: UserId): void {
    if (this.sessions.delete(userId)) {
      logger.debug(`Session cleared for ${userId}`);
    }
  }

  /**
   * Removes every session idle for longer than the timeout
   * @returns number of sessions removed
   */
  sweepExpired(): number {
    const cutoff = Date.now() - this.options.sessionTimeoutSeconds * 1000;
    let removed = 0;

    for (const [userId, session] of this.sessions.entries()) {
      if (session.lastActivityAt.getTime() < cutoff) {
        this.sessions.delete(userId);
        removed++;
      }
    }

    if (removed > 0) {
      logger.info(`Swept ${removed} expired sessions, ${this.sessions.size} remaining`);
    }
    return removed;
  }

  private sweepIfUnderPressure(): void {
    if (this.sessions.size >= this.options.maxSessions) {
      this.sweepExpired();
    }
  }
}

// Export singleton instance
export default new InMemorySessionStore({
  maxSessions: appConfig.maxSessions,
  sessionTimeoutSeconds: appConfig.sessionTimeoutSeconds,
  maxFilesPerOrder: appConfig.maxFilesPerOrder,
});
