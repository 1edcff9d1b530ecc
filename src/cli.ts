#!/usr/bin/env node

import pc from 'picocolors';
import { Bridge } from './services/bridge.js';
import { getCachePath, getConfigPath, loadConfig, saveConfig, DEFAULT_WEB_PORT } from './services/configStore.js';
import { createApp, startApiServer, closeApiServer, APP_VERSION } from './server.js';
import { runSetupWizard } from './setup/wizard.js';
import { sendTriggers, DEFAULT_SEND_HOST, DEFAULT_SEND_PORT } from './commands/send.js';
import { createLogger, errorMessage } from './utils/logger.js';

const logger = createLogger('cli');

// ── Arg parsing ──

const args = process.argv.slice(2);
const command = args[0];

function flag(name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i === -1 || i + 1 >= args.length) return undefined;
  return args[i + 1];
}

function positional(): string[] {
  const values: string[] = [];
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      i++;
      continue;
    }
    values.push(args[i]);
  }
  return values;
}

function die(msg: string): never {
  console.error(pc.red(msg));
  process.exit(1);
}

function intFlag(name: string, fallback: number): number {
  const raw = flag(name);
  if (raw === undefined) return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) die(`--${name} must be a number`);
  return value;
}

// ── Commands ──

async function start(): Promise<void> {
  const config = loadConfig();
  const webPort = parseInt(process.env['AUTOMATOR_BRIDGE_WEB_PORT'] || '', 10) || config.web_port;

  const bridge = new Bridge({ config, cachePath: getCachePath(), persist: saveConfig });
  const report = await bridge.start();
  for (const failure of report.failed) {
    logger.warn(`Listener on port ${failure.port} did not start: ${failure.error}`);
  }

  const server = await startApiServer(createApp(bridge, webPort), webPort);
  logger.info(`automator-bridge v${APP_VERSION} running (config: ${getConfigPath()})`);

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    try {
      await closeApiServer(server);
      await bridge.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

async function send(): Promise<void> {
  const triggers = positional();
  if (triggers.length === 0) {
    die('Usage: automator-bridge send <trigger...> [--host h] [--port p] [--delay ms]');
  }

  const host = flag('host') ?? DEFAULT_SEND_HOST;
  const port = intFlag('port', DEFAULT_SEND_PORT);
  const sent = await sendTriggers(triggers, { host, port, delayMs: intFlag('delay', 0) });
  console.log(pc.green(`Sent ${sent} trigger(s) to ${host}:${port}`));
}

async function status(): Promise<void> {
  const port = intFlag('port', DEFAULT_WEB_PORT);
  const response = await fetch(`http://127.0.0.1:${port}/api/status`, {
    signal: AbortSignal.timeout(3000),
  });
  if (!response.ok) {
    die(`Status request failed: HTTP ${response.status}`);
  }
  console.log(JSON.stringify(await response.json(), null, 2));
}

function usage(): void {
  console.log(`${pc.bold('automator-bridge')} v${APP_VERSION}

Usage:
  automator-bridge start                 Start TCP listeners and the management API
  automator-bridge setup                 Interactive first-run configuration
  automator-bridge send <trigger...>     Send trigger lines over TCP (--host, --port, --delay)
  automator-bridge status                Show the status of a running bridge (--port)
`);
}

async function main(): Promise<void> {
  switch (command) {
    case 'start':
      await start();
      break;
    case 'setup':
      await runSetupWizard();
      break;
    case 'send':
      await send();
      break;
    case 'status':
      await status();
      break;
    case undefined:
    case 'help':
    case '--help':
      usage();
      break;
    default:
      usage();
      die(`Unknown command: ${command}`);
  }
}

main().catch((error) => {
  die(errorMessage(error));
});
