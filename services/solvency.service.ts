import { MAX_HEALTH_FACTOR, SCALE } from '../config/lending';
import type { LedgerReader } from '../store/ledger-transaction';
import type { AccountLiquidity, AssetId, UserId } from '../types';
import { projectMarket } from './interest-accrual.service';
import { borrowBalanceOf, supplyBalanceOf } from './position.service';
import type { PriceOracle } from './price.service';

const SCALE_SQUARED = SCALE * SCALE;

/**
 * Values an account across every asset it touched. Balances are reconstructed against
 * indices projected to the reader's clock, so a stale stored principal is never valued.
 *
 * collateralValue uses collateralFactor (borrow ceiling); liquidationValue uses
 * liquidationThreshold (health factor). The two are kept apart.
 */
export class SolvencyService {
  constructor(private readonly oracle: PriceOracle) {}

  async evaluate(reader: LedgerReader, user: UserId): Promise<AccountLiquidity> {
    let collateralValue = 0n;
    let liquidationValue = 0n;
    let borrowValue = 0n;

    for (const asset of await reader.touchedAssets(user)) {
      const market = projectMarket(await reader.market(asset), reader.now);
      const position = await reader.position(user, asset);
      const supplied = position.isCollateral ? supplyBalanceOf(position, market) : 0n;
      const borrowed = borrowBalanceOf(position, market);
      if (supplied === 0n && borrowed === 0n) continue;

      const price = await this.oracle.price(asset);
      if (supplied > 0n) {
        collateralValue += (supplied * price * market.collateralFactor) / SCALE_SQUARED;
        liquidationValue += (supplied * price * market.liquidationThreshold) / SCALE_SQUARED;
      }
      if (borrowed > 0n) {
        borrowValue += (borrowed * price) / SCALE;
      }
    }

    const healthFactor = borrowValue > 0n ? (liquidationValue * SCALE) / borrowValue : MAX_HEALTH_FACTOR;
    return { collateralValue, liquidationValue, borrowValue, healthFactor, liquidatable: healthFactor < SCALE };
  }

  async canBorrow(reader: LedgerReader, user: UserId, asset: AssetId, amount: bigint): Promise<boolean> {
    const account = await this.evaluate(reader, user);
    const price = await this.oracle.price(asset);
    return account.collateralValue >= account.borrowValue + (amount * price) / SCALE;
  }

  async remainsSolventAfterWithdraw(reader: LedgerReader, user: UserId, asset: AssetId, amount: bigint): Promise<boolean> {
    return this.coversDebtWithout(reader, user, asset, amount);
  }

  async remainsSolventWithoutCollateral(reader: LedgerReader, user: UserId, asset: AssetId): Promise<boolean> {
    const market = projectMarket(await reader.market(asset), reader.now);
    const position = await reader.position(user, asset);
    return this.coversDebtWithout(reader, user, asset, supplyBalanceOf(position, market));
  }

  private async coversDebtWithout(reader: LedgerReader, user: UserId, asset: AssetId, amount: bigint): Promise<boolean> {
    const account = await this.evaluate(reader, user);
    if (account.borrowValue === 0n) return true;
    const market = projectMarket(await reader.market(asset), reader.now);
    const price = await this.oracle.price(asset);
    const removed = (amount * price * market.collateralFactor) / SCALE_SQUARED;
    return account.collateralValue >= account.borrowValue + removed;
  }
}
