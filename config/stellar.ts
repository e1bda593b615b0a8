import { Horizon, Keypair } from '@stellar/stellar-sdk';
import env from './env';

export const server = new Horizon.Server(env.HORIZON_URL);

export const getCustodyKeypair = (): Keypair => {
  if (!env.CUSTODY_SECRET) {
    throw new Error('CUSTODY_SECRET is required when TRANSFER_MODE=stellar');
  }
  return Keypair.fromSecret(env.CUSTODY_SECRET);
};
