// ============================================
// VALLEY ECONOMY - Main Entry Point
// ============================================

// Load environment variables from .env file
import 'dotenv/config';

import { startApp } from './app.js';

console.log(`
╔══════════════════════════════════════════════╗
║                                              ║
║            V A L L E Y   E C O N O M Y       ║
║                                              ║
║      Grow your money. Beat the rival.        ║
║                                              ║
╚══════════════════════════════════════════════╝
`);

async function main() {
  const app = await startApp();

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\nShutting down Valley Economy...');
    try {
      await app.close();
      console.log('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      console.error('Error during shutdown:', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  console.error('Failed to start Valley Economy:', err);
  process.exit(1);
});
