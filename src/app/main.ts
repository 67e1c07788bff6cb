import { toIsoDate } from '../calendar/tradingCalendar.js';
import { loadConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';

import { bootRuntime, runEveningRoutine } from './runtime.js';

export type Command = 'monitor' | 'evening';

export function parseCommand(argv: string[]): { command: Command; date?: string } {
  const [command = 'monitor', date] = argv;
  if (command !== 'monitor' && command !== 'evening') {
    throw new Error(`Unknown command "${command}", expected monitor or evening`);
  }

  return { command, date };
}

export async function bootstrap(argv: string[] = process.argv.slice(2)) {
  const { command, date } = parseCommand(argv);
  const config = loadConfig();
  const logger = createLogger(config);
  const runtime = await bootRuntime({ config, logger });

  if (command === 'evening') {
    const result = await runEveningRoutine(runtime, date ?? toIsoDate(Date.now()));
    logger.info({ status: result.status, date: result.date }, 'evening routine finished');
    await runtime.shutdown();
    return result;
  }

  const stop = () => {
    runtime.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  runtime.monitor.start();
  logger.info({ portfolioId: config.PORTFOLIO_ID }, 'paper trader booted');
  return null;
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    console.error('Failed to boot paper trader', error);
    process.exit(1);
  });
}
