#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { loadConfig } from './config';
import { AdbMcpServer } from './server';
import { AdbSession } from './utils/adb';
import { ConsoleLogger } from './utils/logger';
import { processBridgeGuard } from './utils/server-guard';

function readPackageVersion(): string {
  const manifestPath = path.join(__dirname, '..', 'package.json');
  const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return '0.0.0';
}

// Exiting fires the process exit hook, which kills any adb child still running
function registerSignalHandlers(): void {
  process.once('SIGINT', () => process.exit(130));
  process.once('SIGTERM', () => process.exit(143));
}

async function main() {
  const version = readPackageVersion();
  const args = process.argv.slice(2);
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    console.log(version);
    return;
  }

  const config = loadConfig();
  const logger = new ConsoleLogger();
  const session = new AdbSession({
    binary: config.binary,
    debug: config.debug,
    singleton: config.singleton,
    timeoutMs: config.timeoutMs,
    serverGuard: config.restartServer ? processBridgeGuard : undefined,
    logger,
  });

  registerSignalHandlers();

  if (config.device) {
    const deviceId = await session.connect(config.device);
    logger.info(`Connected to ${deviceId}`);
  }

  const server = new AdbMcpServer(session, { version, logger });
  await server.run();
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
