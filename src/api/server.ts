import { createApp } from './app';
import { loadConfig } from '../config';
import { createReferralsDb } from '../referrals';

function main() {
  const config = loadConfig();
  const db = createReferralsDb(config);

  if (config.backend === 'memory') {
    console.log('Using in-memory store (data will not persist)');
  }

  const app = createApp(db);

  const server = app.listen(config.port, () => {
    console.log(`Referral ledger API running on port ${config.port}`);
    console.log(`Store backend: ${config.backend}${config.dbPath ? ` (${config.dbPath})` : ''}`);
    console.log(`Reservoir capacity: ${config.reservoirSize}, max levels: ${config.maxLevels}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => {
      db.close();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  console.error('Startup failed:', err);
  process.exit(1);
}
