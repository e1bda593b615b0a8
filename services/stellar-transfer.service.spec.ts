import { Horizon, Keypair } from '@stellar/stellar-sdk';
import { describe, expect, test } from 'vitest';
import { TransferFailedError } from '../utils/ledger-error';
import { StellarAssetTransfer, toStellarAmount } from './stellar-transfer.service';
import { units } from './testing-utils';

// never contacted: every case fails before a request is built
const HORIZON_URL = 'http://127.0.0.1:9';

function createTransfer() {
  return new StellarAssetTransfer({
    server: new Horizon.Server(HORIZON_URL, { allowHttp: true }),
    custody: Keypair.random(),
    horizonUrl: HORIZON_URL,
    networkPassphrase: 'Test SDF Network ; September 2015',
  });
}

describe('toStellarAmount', () => {
  test('truncates to seven decimals', () => {
    expect(toStellarAmount(units('12.123456789'))).toBe('12.1234567');
    expect(toStellarAmount(units('3'))).toBe('3');
  });

  test('rejects amounts below network precision', () => {
    expect(() => toStellarAmount(units('0.00000001'))).toThrow(TransferFailedError);
  });
});

describe('StellarAssetTransfer.pull', () => {
  test('requires a signing secret', async () => {
    const user = Keypair.random();
    await expect(createTransfer().pull('native', user.publicKey(), units('1'))).rejects.toThrow(
      'Transfer failed: a signing secret is required to move funds from the user'
    );
  });

  test('rejects a malformed secret', async () => {
    const user = Keypair.random();
    await expect(
      createTransfer().pull('native', user.publicKey(), units('1'), { authorization: 'not-a-secret' })
    ).rejects.toThrow('Transfer failed: the supplied authorization is not a valid secret');
  });

  test("rejects another account's secret", async () => {
    const user = Keypair.random();
    const other = Keypair.random();
    await expect(
      createTransfer().pull('native', user.publicKey(), units('1'), { authorization: other.secret() })
    ).rejects.toThrow('Transfer failed: the supplied authorization does not belong to the account');
  });
});
