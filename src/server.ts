import 'dotenv/config';

// Keep serving when a stray promise rejects
process.on('unhandledRejection', (reason, promise) => {
  console.error('[UNHANDLED REJECTION] Promise:', promise, 'Reason:', reason);
});

process.on('uncaughtException', (error) => {
  console.error('[UNCAUGHT EXCEPTION]', error);
});

import http from 'http';
import { loadConfig } from './config.js';
import { createServices } from './services.js';
import { createApp } from './app.js';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);
const server = http.createServer(app);

// Expired sessions are dropped lazily on read; sweep the rest every 10 minutes
const pruneTimer = setInterval(() => services.sessions.pruneExpired(), 10 * 60 * 1000);
pruneTimer.unref();

server.listen(config.port, () => {
  console.log(`Dosage viewer running on port ${config.port}`);
  console.log(`Results: ${config.resultsDir}`);
  console.log(`PDFs: ${config.pdfDir}`);
  console.log(`Section marker: ${config.sectionLabel}, render DPI: ${config.renderDpi}, backend: ${config.pdfBackend}`);
});

function shutdown(): void {
  console.log('Shutting down...');
  clearInterval(pruneTimer);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
