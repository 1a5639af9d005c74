#!/usr/bin/env node

import { loadConfig, parseCliArgs } from './config.js';
import { log, setLogLevel } from './utils/log.js';
import {
  createRuntime,
  DeviceMcpServer,
  packageVersion,
  serveLineOverStdio,
  serveLineOverTcp,
} from './server.js';

async function main() {
  try {
    const cli = parseCliArgs(process.argv.slice(2));
    if (cli.showVersion) {
      console.log(packageVersion());
      return;
    }

    const config = loadConfig(process.env, cli.overrides);
    setLogLevel(config.logLevel);
    const runtime = createRuntime(config);

    if (config.protocol === 'mcp') {
      await new DeviceMcpServer(runtime).run();
    } else if (config.listenPort !== undefined) {
      await serveLineOverTcp(runtime, config.listenPort);
    } else {
      await serveLineOverStdio(runtime);
    }
  } catch (error) {
    log.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

void main();
