import env from '../config/env';
import { getCustodyKeypair, server } from '../config/stellar';
import { MongoLedgerStore } from '../store/mongo-ledger-store';
import { MongoWalletBook } from '../store/mongo-wallet-book';
import { AdminService } from './admin.service';
import { type AssetTransfer, type WalletBook, WalletAssetTransfer } from './asset-transfer.service';
import { LendingService } from './lending.service';
import { StellarAssetTransfer } from './stellar-transfer.service';

const store = new MongoLedgerStore(env.MONGO_TRANSACTIONS);

// Only the custodial mode keeps balances in a wallet book
const walletBook: WalletBook | undefined =
  env.TRANSFER_MODE === 'wallet' ? new MongoWalletBook(env.MONGO_TRANSACTIONS) : undefined;

const createTransfer = (): AssetTransfer =>
  walletBook
    ? new WalletAssetTransfer(walletBook)
    : new StellarAssetTransfer({
        server,
        custody: getCustodyKeypair(),
        horizonUrl: env.HORIZON_URL,
        networkPassphrase: env.NETWORK,
      });

export const lendingService = new LendingService({ store, transfer: createTransfer() });

export const adminService = new AdminService({
  store,
  settlement: lendingService.settlement,
  wallets: walletBook,
});
