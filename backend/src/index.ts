import { app } from './app';
import { config } from './config';
import { createLogger } from './utils/logger';

const log = createLogger('server');

function start(): void {
  try {
    app.listen(config.port, () => {
      log.info(`Server running on http://localhost:${config.port}`);
      log.info(`Health check: http://localhost:${config.port}/api/health`);
    });
  } catch (error) {
    log.error('Failed to start server', { error });
    process.exit(1);
  }
}

start();
