import axios from 'axios';
import { Horizon, Keypair, Operation, TransactionBuilder } from '@stellar/stellar-sdk';
import type { AssetId, TransferOptions, UserId } from '../types';
import { getAssetFromId } from '../utils/asset';
import { formatUnits } from '../utils/fixed-point';
import { TransferFailedError, describeError } from '../utils/ledger-error';
import { logger } from '../utils/logger';
import type { AssetTransfer } from './asset-transfer.service';

/** Stellar amounts carry 7 decimals. */
export const STELLAR_DECIMALS = 7;

export interface StellarTransferConfig {
  server: Horizon.Server;
  custody: Keypair;
  horizonUrl: string;
  networkPassphrase: string;
}

export function toStellarAmount(amount: bigint): string {
  const value = formatUnits(amount, STELLAR_DECIMALS);
  if (value === '0') throw new TransferFailedError(`amount ${formatUnits(amount)} is below the network precision`);
  return value;
}

function describeSubmitError(err: unknown): string {
  if (axios.isAxiosError(err) && err.response) {
    return `Horizon rejected the transaction (${err.response.status}): ${JSON.stringify(err.response.data)}`;
  }
  return describeError(err);
}

/**
 * On-chain transfers: user ids are Stellar public keys, pulls are signed with the
 * caller's secret (passed as `authorization`), pushes with the custody keypair.
 */
export class StellarAssetTransfer implements AssetTransfer {
  constructor(private readonly config: StellarTransferConfig) {}

  async pull(asset: AssetId, from: UserId, amount: bigint, options?: TransferOptions): Promise<void> {
    const secret = options?.authorization;
    if (!secret) throw new TransferFailedError('a signing secret is required to move funds from the user');
    let signer: Keypair;
    try {
      signer = Keypair.fromSecret(secret);
    } catch (err) {
      throw new TransferFailedError('the supplied authorization is not a valid secret', err);
    }
    if (signer.publicKey() !== from) {
      throw new TransferFailedError('the supplied authorization does not belong to the account');
    }
    await this.pay(signer, this.config.custody.publicKey(), asset, amount);
  }

  async push(asset: AssetId, to: UserId, amount: bigint): Promise<void> {
    await this.pay(this.config.custody, to, asset, amount);
  }

  private async pay(signer: Keypair, destination: string, asset: AssetId, amount: bigint): Promise<void> {
    const paymentAmount = toStellarAmount(amount);
    const paymentAsset = getAssetFromId(asset);
    try {
      const { server, horizonUrl, networkPassphrase } = this.config;
      const sourceAccount = await server.loadAccount(signer.publicKey());
      const baseFee = await server.fetchBaseFee();
      const tx = new TransactionBuilder(sourceAccount, { fee: baseFee.toString(), networkPassphrase })
        .addOperation(Operation.payment({ destination, asset: paymentAsset, amount: paymentAmount }))
        .setTimeout(60)
        .build();
      tx.sign(signer);

      const response = await axios.post<{ hash: string }>(
        `${horizonUrl}/transactions`,
        `tx=${encodeURIComponent(tx.toXDR())}`,
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' }, timeout: 30000 }
      );
      logger.info(`Payment submitted: ${paymentAmount} ${asset} to ${destination} (${response.data.hash})`);
    } catch (err) {
      throw new TransferFailedError(describeSubmitError(err), err);
    }
  }
}
