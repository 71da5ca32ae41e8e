import { createApp } from './app';
import { loadConfig } from './config';
import { getPool } from './db';
import { PgHistoryStore } from './services/historyStore';

const config = loadConfig();
const app = createApp({ historyStore: new PgHistoryStore(getPool), config });

// Start server
app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
}).on('error', (err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
