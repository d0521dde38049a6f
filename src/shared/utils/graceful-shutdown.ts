import { INestApplicationContext, Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';

/**
 * Closes the application on SIGINT/SIGTERM so module destroy hooks run
 * (queue drained, browser closed) before the process exits.
 */
export function setupGracefulShutdown(app: INestApplicationContext): void {
  const logger = new Logger('GracefulShutdown');
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let closing = false;

  for (const signal of signals) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;

      logger.log(`${signal} received: closing application...`);
      app.close().then(
        () => {
          logger.log('Application closed gracefully.');
          process.exit(0);
        },
        (error: unknown) => {
          logger.error(`Error during graceful shutdown: ${errorMessage(error)}`);
          process.exit(1);
        },
      );
    });
  }
}
