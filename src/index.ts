// ============================================
// DEADZONE - Main Entry Point
// ============================================

// Load environment variables from .env file
import 'dotenv/config';

import { startApp } from './app.js';
import { closeDatabaseConnection } from './db/drizzle.js';

console.log(`
  ____  _____    _    ____  ________  _   _ _____
 |  _ \\| ____|  / \\  |  _ \\|__  / _ \\| \\ | | ____|
 | | | |  _|   / _ \\ | | | | / / | | |  \\| |  _|
 | |_| | |___ / ___ \\| |_| |/ /| |_| | |\\  | |___
 |____/|_____/_/   \\_\\____//____\\___/|_| \\_|_____|

        The world keeps turning while you sleep.
`);

async function main() {
  const app = await startApp();

  // Graceful shutdown
  const shutdown = async () => {
    app.log.info('Shutting down Deadzone...');
    try {
      await app.close();
      closeDatabaseConnection();
      app.log.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

main().catch((err) => {
  console.error('Failed to start Deadzone:', err);
  process.exit(1);
});
