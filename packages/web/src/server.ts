import * as fs from 'fs';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();

// Ensure data directory exists
if (!fs.existsSync(config.dataDir)) {
  fs.mkdirSync(config.dataDir, { recursive: true });
}

const app = createApp(config);

// Start server
const server = app.listen(config.port, () => {
  console.log(`
╔════════════════════════════════════════════════════════════╗
║                   Combinadic API                           ║
║                                                            ║
║   Listening at: http://localhost:${config.port}                      ║
║                                                            ║
║   Press Ctrl+C to stop the server                          ║
╚════════════════════════════════════════════════════════════╝
`);
});

// Graceful shutdown
function shutdown(): void {
  console.log('\nShutting down...');
  server.close(() => {
    console.log('Server stopped.');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
