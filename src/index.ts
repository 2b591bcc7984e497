import { start } from './server';
import { SecurityLogger, errorMessage } from './utils/securityLogger';

start().catch((error: unknown) => {
  SecurityLogger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
