import app from './app';
import { connectDB } from './config/db';
import env from './config/env';
import { logger } from './utils/logger';

const PORT = env.PORT;

const startServer = async () => {
  try {
    await connectDB();
    app.listen(PORT, () => {
      logger.success(`🚀 Credit ledger running on port ${PORT} (transfer mode: ${env.TRANSFER_MODE})`);
    });
  } catch (error) {
    logger.error('❌ Failed to start server', error);
    process.exit(1);
  }
};

void startServer();
