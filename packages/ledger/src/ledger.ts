/**
 * @verigate/ledger - CreditLedger
 *
 * Per-caller credit balances with two-phase charging. `reserve` takes the
 * funds up front, `commit` finalizes the charge, `release` refunds it.
 * Every operation on one caller's account is serialized through a keyed
 * lock; the account store's version check catches writers outside this
 * process, and such conflicts are retried.
 *
 * A refund never gives up on contention. When the store itself fails, the
 * refund is kept as owed and settled before the caller's next ledger
 * operation.
 */

import pino from 'pino';
import { nanoid } from 'nanoid';
import {
  InsufficientCreditsError,
  InvalidRequestError,
  LedgerConflictError,
  ReservationStateError,
  retry,
  type AccountStore,
  type CreditAccount,
  type LedgerEntry,
  type LedgerEntryKind,
} from '@verigate/core';
import { KeyedMutex } from './mutex.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ReservationState = 'pending' | 'committed' | 'released';

/** Handle for a pending charge returned by `reserve`. */
export interface ReservationToken {
  readonly id: string;
  readonly callerId: string;
  readonly amount: number;
  /** Balance right after the funds were taken. */
  readonly balanceAfter: number;
}

export interface SettleResult {
  reservationId: string;
  state: ReservationState;
  balanceAfter: number;
}

export interface CreditLedgerOptions {
  accounts: AccountStore;
  /** Bound on waiting for a caller's lock. */
  lockTimeoutMs?: number;
  /** Retries after a version conflict. */
  maxConflictRetries?: number;
  logger?: pino.Logger;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// CreditLedger
// ---------------------------------------------------------------------------

export class CreditLedger {
  private readonly accounts: AccountStore;
  private readonly lockTimeoutMs: number;
  private readonly maxConflictRetries: number;
  private readonly log: pino.Logger;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();

  /** Reservations not yet committed or released. */
  private readonly pending = new Map<string, ReservationToken>();
  /** Pending reservations whose refund hit a store failure. */
  private readonly owed = new Map<string, ReservationToken>();

  constructor(options: CreditLedgerOptions) {
    this.accounts = options.accounts;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.maxConflictRetries = options.maxConflictRetries ?? 3;
    this.log = options.logger ?? pino({ name: 'verigate:ledger' });
    this.now = options.now ?? (() => new Date());
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  async getAccount(callerId: string): Promise<CreditAccount> {
    return (await this.accounts.get(callerId)) ?? { callerId, balance: 0, version: 0 };
  }

  async balance(callerId: string): Promise<number> {
    await this.reconcile(callerId);
    return (await this.getAccount(callerId)).balance;
  }

  history(callerId: string, limit = 50): Promise<LedgerEntry[]> {
    return this.accounts.listEntries(callerId, limit);
  }

  isPending(reservationId: string): boolean {
    return this.pending.has(reservationId);
  }

  /** Number of reservations awaiting commit or release. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Number of refunds waiting for the store to recover. */
  get owedCount(): number {
    return this.owed.size;
  }

  // -----------------------------------------------------------------------
  // Two-phase charge
  // -----------------------------------------------------------------------

  /**
   * Take `amount` credits from the caller's balance. Throws
   * InsufficientCreditsError when the balance is short.
   */
  async reserve(callerId: string, amount: number): Promise<ReservationToken> {
    assertAmount(amount, true);
    await this.reconcile(callerId);

    // Free services still get a token so settlement follows one path.
    const balanceAfter =
      amount === 0
        ? await this.balance(callerId)
        : await this.withAccount(callerId, 'reserve', async (account) => {
            if (account.balance < amount) {
              throw new InsufficientCreditsError(amount, account.balance);
            }
            return account.balance - amount;
          });

    const token: ReservationToken = { id: nanoid(), callerId, amount, balanceAfter };
    this.pending.set(token.id, token);
    if (amount > 0) {
      await this.journal(callerId, 'reserve', amount, balanceAfter, token.id);
    }

    this.log.debug({ callerId, amount, balanceAfter, reservationId: token.id }, 'Credits reserved');
    return token;
  }

  /**
   * Finalize a reservation. The funds already left the balance, so this
   * only settles bookkeeping.
   */
  async commit(token: ReservationToken): Promise<SettleResult> {
    this.take(token, 'commit');

    const balanceAfter = await this.mutex.run(
      token.callerId,
      this.lockTimeoutMs,
      async () => (await this.getAccount(token.callerId)).balance,
      () => new LedgerConflictError(token.callerId, 'commit'),
    ).catch((err: unknown) => {
      // The charge stands either way; only the reported balance is stale.
      this.log.warn({ callerId: token.callerId, err }, 'Balance read after commit failed');
      return token.balanceAfter;
    });

    if (token.amount > 0) {
      await this.journal(token.callerId, 'commit', token.amount, balanceAfter, token.id);
    }
    this.log.debug({ callerId: token.callerId, reservationId: token.id }, 'Reservation committed');
    return { reservationId: token.id, state: 'committed', balanceAfter };
  }

  /**
   * Refund a reservation. Valid once per token; a second call throws
   * ReservationStateError. Version conflicts are retried until the refund
   * lands. A store failure rejects, and the token stays pending and owed
   * until `reconcile` or another `release` settles it.
   */
  async release(token: ReservationToken): Promise<SettleResult> {
    this.take(token, 'release');

    let balanceAfter: number;
    try {
      balanceAfter =
        token.amount === 0
          ? (await this.getAccount(token.callerId)).balance
          : await this.withAccount(token.callerId, 'release', async (account) => account.balance + token.amount, true);
    } catch (err: unknown) {
      this.pending.set(token.id, token);
      this.owed.set(token.id, token);
      this.log.error(
        { callerId: token.callerId, reservationId: token.id, amount: token.amount, err },
        'Refund failed, kept as owed',
      );
      throw err;
    }

    if (token.amount > 0) {
      await this.journal(token.callerId, 'release', token.amount, balanceAfter, token.id);
    }
    this.log.debug({ callerId: token.callerId, amount: token.amount, balanceAfter }, 'Reservation released');
    return { reservationId: token.id, state: 'released', balanceAfter };
  }

  // -----------------------------------------------------------------------
  // Administration
  // -----------------------------------------------------------------------

  /**
   * Add credits to an account, creating it if needed.
   */
  async topUp(callerId: string, amount: number): Promise<number> {
    assertAmount(amount, false);
    await this.reconcile(callerId);

    const balanceAfter = await this.withAccount(callerId, 'top_up', async (account) => account.balance + amount);
    await this.journal(callerId, 'top_up', amount, balanceAfter, null);

    this.log.info({ callerId, amount, balanceAfter }, 'Credits topped up');
    return balanceAfter;
  }

  /**
   * Retry owed refunds, for one caller or for all. Returns how many landed;
   * the rest stay owed.
   */
  async reconcile(callerId?: string): Promise<number> {
    const due = [...this.owed.values()].filter((t) => callerId === undefined || t.callerId === callerId);
    let settled = 0;
    for (const token of due) {
      try {
        await this.release(token);
        settled++;
        this.log.info({ callerId: token.callerId, reservationId: token.id }, 'Owed refund settled');
      } catch (err: unknown) {
        if (!(err instanceof ReservationStateError)) {
          this.log.warn({ callerId: token.callerId, reservationId: token.id, err }, 'Owed refund still failing');
        }
      }
    }
    return settled;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /**
   * Remove a token from the pending set, or throw if it is not pending.
   * Taking it synchronously keeps two concurrent settles from both passing.
   */
  private take(token: ReservationToken, operation: 'commit' | 'release'): void {
    if (!this.pending.delete(token.id)) {
      throw new ReservationStateError(token.id, 'settled', operation);
    }
    this.owed.delete(token.id);
  }

  /**
   * Read-modify-write of one account under the caller's lock. `update`
   * returns the new balance (or throws). Version conflicts are retried;
   * an `unbounded` write waits for the lock and retries without limit.
   */
  private withAccount(
    callerId: string,
    operation: string,
    update: (account: CreditAccount) => Promise<number>,
    unbounded = false,
  ): Promise<number> {
    return this.mutex.run(
      callerId,
      unbounded ? null : this.lockTimeoutMs,
      () =>
        retry(
          async () => {
            const account = await this.getAccount(callerId);
            const next = await update(account);
            if (next < 0) {
              throw new InsufficientCreditsError(account.balance - next, account.balance);
            }
            const written = await this.accounts.compareAndSet(callerId, account.version, next);
            if (!written) {
              throw new LedgerConflictError(callerId, operation);
            }
            return next;
          },
          {
            maxRetries: unbounded ? Number.POSITIVE_INFINITY : this.maxConflictRetries,
            initialDelayMs: 5,
            maxDelayMs: 100,
            shouldRetry: (err) => err instanceof LedgerConflictError,
            onRetry: (_err, attempt) => this.log.debug({ callerId, operation, attempt }, 'Ledger conflict, retrying'),
          },
        ),
      () => new LedgerConflictError(callerId, `${operation} (lock timeout)`),
    );
  }

  private async journal(
    callerId: string,
    kind: LedgerEntryKind,
    amount: number,
    balanceAfter: number,
    reservationId: string | null,
  ): Promise<void> {
    try {
      await this.accounts.appendEntry({
        id: nanoid(),
        callerId,
        kind,
        amount,
        balanceAfter,
        reservationId,
        createdAt: this.now().toISOString(),
      });
    } catch (err: unknown) {
      this.log.warn({ callerId, kind, reservationId, err }, 'Ledger journal write failed');
    }
  }
}

function assertAmount(amount: number, allowZero: boolean): void {
  if (!Number.isInteger(amount) || amount < 0 || (!allowZero && amount === 0)) {
    throw new InvalidRequestError(`Credit amount must be a ${allowZero ? 'non-negative' : 'positive'} integer`, {
      amount,
    });
  }
}
