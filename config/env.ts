import dotenv from 'dotenv';

dotenv.config();

export type TransferMode = 'wallet' | 'stellar';

const flag = (value: string | undefined, fallback: boolean) =>
    value === undefined ? fallback : ['true', '1', 'yes'].includes(value.trim().toLowerCase());

const list = (value: string | undefined) =>
    (value ?? '').split(',').map((item) => item.trim()).filter((item) => item.length > 0);

const transferMode = (value: string | undefined): TransferMode => (value === 'stellar' ? 'stellar' : 'wallet');

const env = {
    PORT: Number(process.env.PORT) || 5000,
    NODE_ENV: process.env.NODE_ENV || 'development',
    MONGO_URI: process.env.MONGO_URI || '',
    // Ledger commits run in session transactions (replica set required)
    MONGO_TRANSACTIONS: flag(process.env.MONGO_TRANSACTIONS, true),
    JWT_SECRET: process.env.JWT_SECRET || '',
    ADMIN_USER_IDS: list(process.env.ADMIN_USER_IDS),
    TRANSFER_MODE: transferMode(process.env.TRANSFER_MODE),
    HORIZON_URL: process.env.HORIZON_URL || 'https://horizon-testnet.stellar.org',
    NETWORK: process.env.NETWORK || 'Test SDF Network ; September 2015',
    CUSTODY_SECRET: process.env.CUSTODY_SECRET || '',
    SEED_ACCOUNT: process.env.SEED_ACCOUNT || 'seed-account',
};

export default env;
