import type { LedgerStore } from '../store/ledger-store';
import { LedgerTransaction, type TransferIntent } from '../store/ledger-transaction';
import type { Clock, TransferOptions } from '../types';
import { formatUnits } from '../utils/fixed-point';
import { KeyedLock } from '../utils/keyed-lock';
import { ProtocolPausedError, TransferFailedError, describeError } from '../utils/ledger-error';
import { logger } from '../utils/logger';
import type { AssetTransfer } from './asset-transfer.service';

export interface SettlementOptions extends TransferOptions {
  /** Administrative work keeps running while the protocol is paused. */
  bypassPause?: boolean;
}

function asTransferFailure(err: unknown): TransferFailedError {
  return err instanceof TransferFailedError ? err : new TransferFailedError(describeError(err), err);
}

const describeIntent = (intent: TransferIntent) => `${formatUnits(intent.amount)} ${intent.asset} for ${intent.account}`;

/**
 * Runs ledger operations as single atomic steps:
 * lock → pause check → work on a unit of work → pulls → commit → pushes.
 * A failed pull or commit refunds earlier pulls; a failed push restores the committed
 * state and refunds every pull. Either everything applies or nothing stays visible.
 */
export class SettlementService {
  constructor(
    private readonly store: LedgerStore,
    private readonly transfer: AssetTransfer,
    private readonly clock: Clock,
    private readonly locks: KeyedLock = new KeyedLock()
  ) {}

  async run<T>(keys: string[], work: (tx: LedgerTransaction) => Promise<T>, options: SettlementOptions = {}): Promise<T> {
    return this.locks.runExclusive(keys, async () => {
      if (!options.bypassPause && (await this.store.isPaused())) throw new ProtocolPausedError();
      const tx = new LedgerTransaction(this.store, this.clock());
      const result = await work(tx);
      await this.settle(tx, options);
      return result;
    });
  }

  /** Exclusive access without a unit of work, for administrative writes. */
  async exclusive<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(keys, task);
  }

  private async settle(tx: LedgerTransaction, options: TransferOptions): Promise<void> {
    const pulled: TransferIntent[] = [];
    try {
      for (const intent of tx.pulls) {
        await this.transfer.pull(intent.asset, intent.account, intent.amount, options);
        pulled.push(intent);
      }
    } catch (err) {
      logger.warn(`Pull failed, nothing committed: ${describeError(err)}`);
      await this.refund(pulled);
      throw asTransferFailure(err);
    }

    try {
      await this.store.commit(tx.changes());
    } catch (err) {
      logger.error('Ledger commit failed, refunding pulled funds', err);
      await this.refund(pulled);
      throw err;
    }

    try {
      for (const intent of tx.pushes) {
        await this.transfer.push(intent.asset, intent.account, intent.amount, options);
      }
    } catch (err) {
      logger.error('Push failed after commit, restoring previous ledger state', err);
      try {
        await this.store.commit(tx.revert());
      } catch (revertErr) {
        logger.error('Restoring the ledger failed; manual reconciliation required', revertErr);
      } finally {
        await this.refund(pulled);
      }
      throw asTransferFailure(err);
    }
  }

  private async refund(pulled: TransferIntent[]): Promise<void> {
    for (const intent of pulled) {
      try {
        await this.transfer.push(intent.asset, intent.account, intent.amount);
      } catch (err) {
        logger.error(`Refund failed (${describeIntent(intent)}); manual reconciliation required`, err);
      }
    }
  }
}
