import chalk from 'chalk';

type Level = 'info' | 'warn' | 'error' | 'success';

const getTimestamp = () => new Date().toISOString();
const isProduction = process.env.NODE_ENV === 'production';
const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// In production only warnings, errors and committed operations are printed
const shouldLog = (level: Level) => {
  if (isTest) return level === 'error' && process.env.LOG_IN_TESTS === 'true';
  if (isProduction) return level !== 'info';
  return true;
};

/**
 * Reduce a thrown value to the fields worth printing.
 */
const summarize = (err: unknown): Record<string, unknown> => {
  if (err instanceof Error) {
    const summary: Record<string, unknown> = { name: err.name, message: err.message };
    if ('code' in err) summary.code = err.code;
    if ('status' in err) summary.status = err.status;
    if (isDevelopment && err.stack) summary.stack = err.stack.split('\n').slice(0, 3).join('\n');
    return summary;
  }
  if (typeof err === 'object' && err !== null) {
    return { type: 'object', keys: Object.keys(err).slice(0, 10) };
  }
  return { value: String(err) };
};

export const logger = {
  info: (msg: string) => {
    if (shouldLog('info')) {
      console.log(`${chalk.blue('[INFO]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  success: (msg: string) => {
    if (shouldLog('success')) {
      console.log(`${chalk.green('[SUCCESS]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  warn: (msg: string) => {
    if (shouldLog('warn')) {
      console.log(`${chalk.yellow('[WARN]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  error: (msg: string, err?: unknown) => {
    if (!shouldLog('error')) return;
    console.log(`${chalk.red('[ERROR]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    if (err !== undefined) {
      console.error(chalk.red(JSON.stringify(summarize(err), null, isDevelopment ? 2 : 0)));
    }
  },
};
