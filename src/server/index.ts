// ============================================================================
// MAIN SERVER - XPath locator service
// ============================================================================

import dotenv from 'dotenv';

import { createApp } from './app.js';
import { GeminiService } from './ai/GeminiService.js';
import { loadConfig } from './config/AppConfig.js';
import { LocatorService } from './services/LocatorService.js';

dotenv.config();

const config = loadConfig();
const locatorService = new LocatorService(new GeminiService(config.ai));
const app = createApp(config, { locatorService });

// ============================================================================
// STARTUP
// ============================================================================

const server = app.listen(config.port, config.host, () => {
  console.log(`[Server] XPath locator service listening on http://${config.host}:${config.port}`);
  console.log(`[Server] AI suggestions: ${locatorService.aiEnabled ? 'enabled' : 'disabled'}`);
});

function shutdown(signal: string): void {
  console.log(`\n[Server] ${signal} received, shutting down...`);
  server.close((error) => {
    if (error) {
      console.error('[Server] Shutdown error:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
