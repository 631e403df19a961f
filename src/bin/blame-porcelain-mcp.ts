#!/usr/bin/env node

import { BlameServer } from '../server.js';
import { Logger } from '../logger.js';

const server = new BlameServer();
server.run().catch((error: unknown) => {
  // Logger instead of console: stdout belongs to the MCP protocol
  Logger.getInstance().error('Server startup failed', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
