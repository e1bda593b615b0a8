import type { LedgerStore } from '../store/ledger-store';
import type { AssetId } from '../types';
import { PriceUnavailableError } from '../utils/ledger-error';

/** Price of one unit of an asset in the quote currency, scaled to SCALE. */
export interface PriceOracle {
  price(asset: AssetId): Promise<bigint>;
}

/**
 * Reads the administratively written price for an asset. The core never writes prices.
 */
export class StoredPriceOracle implements PriceOracle {
  constructor(private readonly store: LedgerStore) {}

  async price(asset: AssetId): Promise<bigint> {
    const price = await this.store.findPrice(asset);
    if (price === null || price <= 0n) throw new PriceUnavailableError(asset);
    return price;
  }
}
