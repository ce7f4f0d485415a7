import type { TicketStatus } from '../core/entities/Ticket.js';
import { nextStatus } from '../core/policies/StatusMachine.js';
import type { TicketService } from '../core/services/TicketService.js';
import { scrollDescription } from '../core/state/ScrollController.js';
import { moveSelection, reselectAfterMutation } from '../core/state/SelectionTracker.js';
import type { SessionState, Step } from '../core/state/SessionState.js';
import { applyStatusChange, findTicket, selectedTicket } from '../core/state/TicketStore.js';
import type { LoggerLike } from '../infrastructure/logging/Logger.js';
import type { UpdateFailurePolicy } from '../schemas/index.js';
import { formatError } from '../utils/errors.js';

export type SessionCommand =
  | { readonly type: 'move'; readonly delta: Step }
  | { readonly type: 'scroll'; readonly delta: Step }
  | { readonly type: 'cycleStatus' };

export interface Notice {
  readonly level: 'info' | 'error';
  readonly message: string;
}

/**
 * What the renderer draws: the session plus the update bookkeeping around it
 */
export interface SessionSnapshot {
  readonly session: SessionState;
  readonly notice: Notice | null;
  readonly pendingUpdates: number;
  readonly failedUpdates: number;
}

export interface SessionControllerOptions {
  readonly logger: LoggerLike;
  readonly updateFailurePolicy?: UpdateFailurePolicy;
}

/**
 * Owns the current session value and turns commands into new values.
 *
 * Status changes are optimistic: the store is updated right away and the
 * backend call runs in the background. When it fails, the local status is
 * kept or rolled back to the last status the backend acknowledged,
 * depending on the failure policy.
 */
export class SessionController {
  private snapshot: SessionSnapshot;
  private readonly listeners = new Set<() => void>();
  private readonly pendingByTicket = new Map<string, number>();
  private readonly acknowledged = new Map<string, TicketStatus>();
  private readonly logger: LoggerLike;
  private readonly updateFailurePolicy: UpdateFailurePolicy;

  constructor(
    private readonly service: TicketService,
    initial: SessionState,
    options: SessionControllerOptions
  ) {
    this.snapshot = { session: initial, notice: null, pendingUpdates: 0, failedUpdates: 0 };
    this.logger = options.logger;
    this.updateFailurePolicy = options.updateFailurePolicy ?? 'keep';

    for (const ticket of initial.tickets) {
      this.acknowledged.set(ticket.id, ticket.status);
    }
  }

  getSnapshot = (): SessionSnapshot => this.snapshot;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Apply a command. The returned promise settles once any backend work
   * the command started is done; it never rejects.
   */
  dispatch(command: SessionCommand): Promise<void> {
    switch (command.type) {
      case 'move':
        this.setSession(moveSelection(this.snapshot.session, command.delta));
        return Promise.resolve();
      case 'scroll':
        this.setSession(scrollDescription(this.snapshot.session, command.delta));
        return Promise.resolve();
      case 'cycleStatus':
        return this.cycleSelectedStatus();
    }
  }

  /**
   * Wait for every status update still on the wire
   */
  async whenIdle(): Promise<void> {
    await this.service.drain();
  }

  private async cycleSelectedStatus(): Promise<void> {
    const ticket = selectedTicket(this.snapshot.session);
    if (!ticket) {
      return;
    }

    const status = nextStatus(ticket.status);
    const changed = applyStatusChange(this.snapshot.session, ticket.id, status);
    this.pendingByTicket.set(ticket.id, (this.pendingByTicket.get(ticket.id) ?? 0) + 1);
    this.publish({
      ...this.snapshot,
      session: reselectAfterMutation(changed, ticket.id),
      notice: null,
      pendingUpdates: this.snapshot.pendingUpdates + 1
    });

    try {
      await this.service.updateStatus(ticket.id, status);
      this.acknowledged.set(ticket.id, status);
      this.logger.info(`Ticket ${ticket.id} status set to ${status}`);
      this.settle(ticket.id, this.snapshot.session, null, false);
    } catch (error) {
      const message = formatError(error, `Failed to update status of ticket ${ticket.id}`);
      this.logger.error(message);
      this.settle(ticket.id, this.reconcile(ticket.id), { level: 'error', message }, true);
    }
  }

  /**
   * Session after a failed update, per the failure policy.
   * Rollback waits for the last queued update of the ticket so it never
   * undoes a change the backend may still accept.
   */
  private reconcile(id: string): SessionState {
    const session = this.snapshot.session;
    if (this.updateFailurePolicy !== 'rollback' || (this.pendingByTicket.get(id) ?? 0) > 1) {
      return session;
    }

    const confirmed = this.acknowledged.get(id);
    const current = findTicket(session, id);
    if (confirmed === undefined || current === undefined || current.status === confirmed) {
      return session;
    }

    this.logger.warn(`Rolled ticket ${id} back to ${confirmed}`);
    return applyStatusChange(session, id, confirmed);
  }

  private settle(id: string, session: SessionState, notice: Notice | null, failed: boolean): void {
    const remaining = (this.pendingByTicket.get(id) ?? 1) - 1;
    if (remaining > 0) {
      this.pendingByTicket.set(id, remaining);
    } else {
      this.pendingByTicket.delete(id);
    }

    this.publish({
      session,
      notice: notice ?? this.snapshot.notice,
      pendingUpdates: this.snapshot.pendingUpdates - 1,
      failedUpdates: this.snapshot.failedUpdates + (failed ? 1 : 0)
    });
  }

  private setSession(session: SessionState): void {
    if (session !== this.snapshot.session) {
      this.publish({ ...this.snapshot, session });
    }
  }

  private publish(snapshot: SessionSnapshot): void {
    this.snapshot = snapshot;
    for (const listener of this.listeners) {
      listener();
    }
  }
}
