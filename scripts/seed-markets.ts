/**
 * Seed script: registers the three demo markets and, in wallet mode, funds a seed account
 * with test balances.
 * Run: npm run seed
 */
import env from '../config/env';
import { connectDB, disconnectDB } from '../config/db';
import type { AdminService } from '../services/admin.service';
import type { MarketRegistration } from '../types';
import { parseUnits } from '../utils/fixed-point';
import { AssetAlreadyRegisteredError } from '../utils/ledger-error';
import { logger } from '../utils/logger';

const riskDefaults = {
  reserveFactor: parseUnits('0.1'),
  collateralFactor: parseUnits('0.8'),
  liquidationThreshold: parseUnits('0.85'),
};

export const SEED_MARKETS: MarketRegistration[] = [
  {
    asset: 'mUSDC',
    annualSupplyRate: parseUnits('0.04'),
    annualBorrowRate: parseUnits('0.05'),
    initialPrice: parseUnits('1'),
    ...riskDefaults,
  },
  {
    asset: 'mDAI',
    annualSupplyRate: parseUnits('0.03'),
    annualBorrowRate: parseUnits('0.04'),
    initialPrice: parseUnits('1'),
    ...riskDefaults,
  },
  {
    asset: 'mWETH',
    annualSupplyRate: parseUnits('0.02'),
    annualBorrowRate: parseUnits('0.03'),
    initialPrice: parseUnits('2000'),
    ...riskDefaults,
  },
];

export const SEED_BALANCES: Record<string, bigint> = {
  mUSDC: parseUnits('1000'),
  mDAI: parseUnits('1000'),
  mWETH: parseUnits('10'),
};

export interface SeedSummary {
  registered: string[];
  skipped: string[];
  credited: string[];
}

/** Registers every seed market that is missing; safe to run repeatedly. */
export async function seedMarkets(admin: AdminService, seedAccount?: string): Promise<SeedSummary> {
  const summary: SeedSummary = { registered: [], skipped: [], credited: [] };

  for (const market of SEED_MARKETS) {
    try {
      await admin.registerMarket(market);
      summary.registered.push(market.asset);
    } catch (err) {
      if (!(err instanceof AssetAlreadyRegisteredError)) throw err;
      logger.info(`Market ${market.asset} already exists. Skipping.`);
      summary.skipped.push(market.asset);
    }
  }

  if (seedAccount) {
    for (const [asset, amount] of Object.entries(SEED_BALANCES)) {
      await admin.creditWallet(seedAccount, asset, amount);
      summary.credited.push(asset);
    }
  }
  return summary;
}

async function seed() {
  await connectDB();
  const { adminService } = await import('../services');
  const seedAccount = env.TRANSFER_MODE === 'wallet' ? env.SEED_ACCOUNT : undefined;
  const summary = await seedMarkets(adminService, seedAccount);
  logger.success(
    `Seeded markets: registered [${summary.registered.join(', ')}], skipped [${summary.skipped.join(', ')}]` +
      (seedAccount ? `, funded ${seedAccount} with [${summary.credited.join(', ')}]` : '')
  );
  await disconnectDB();
}

if (require.main === module) {
  seed()
    .then(() => {
      logger.info('Seed script completed');
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error('Seed script failed', err);
      process.exit(1);
    });
}

export { seed };
