import * as p from '@clack/prompts';
import pc from 'picocolors';
import { loadConfig, saveConfig, generateAutomatorId, getConfigPath } from '../services/configStore.js';
import { AutomatorClient, normalizeBaseUrl } from '../services/automatorClient.js';
import { EventLog } from '../services/eventLog.js';
import type { AutomatorConfig, ConfigDocument, TcpListenerConfig } from '../types/index.js';

export function validateAutomatorName(value: string | undefined): string | undefined {
  if (!value?.trim()) return 'Name is required';
  return undefined;
}

export function validateAutomatorUrl(value: string | undefined): string | undefined {
  if (!value?.trim()) return 'URL is required';
  try {
    const url = new URL(normalizeBaseUrl(value));
    if (!url.hostname) return 'URL needs a host';
  } catch {
    return 'Invalid URL (e.g. 192.168.1.50:3000 or http://automator.local:3000)';
  }
  return undefined;
}

export function validateListenerPort(
  value: string | undefined,
  listeners: readonly TcpListenerConfig[],
): string | undefined {
  if (!value?.trim()) return 'Port is required';
  if (!/^\d+$/.test(value.trim())) return 'Port must be a number';
  const port = parseInt(value, 10);
  if (port < 1 || port > 65535) return 'Port must be between 1 and 65535';
  if (listeners.some((l) => l.port === port)) return `Port ${port} is already configured`;
  return undefined;
}

function cancelled(): never {
  p.cancel('Setup cancelled.');
  process.exit(0);
}

async function promptAutomator(): Promise<AutomatorConfig> {
  p.note(
    `1. Open the Automator on the control machine\n` +
    `2. Note the ${pc.bold('address and port')} of its web API\n` +
    `3. Make sure this machine can reach it over the network`,
    'Step 1: Automator instance',
  );

  const name = await p.text({
    message: 'Name for this Automator:',
    placeholder: 'e.g., Studio A',
    validate: validateAutomatorName,
  });
  if (p.isCancel(name)) cancelled();

  const url = await p.text({
    message: 'Automator URL:',
    placeholder: 'e.g., http://192.168.1.50:3000',
    validate: validateAutomatorUrl,
  });
  if (p.isCancel(url)) cancelled();

  const apiKey = await p.password({
    message: 'API key (leave empty if none):',
  });
  if (p.isCancel(apiKey)) cancelled();

  return {
    id: generateAutomatorId(),
    name: name.trim(),
    url: normalizeBaseUrl(url),
    api_key: apiKey ?? '',
    enabled: true,
  };
}

async function testAutomator(automator: AutomatorConfig): Promise<void> {
  const s = p.spinner();
  s.start(`Testing connection to ${automator.url}...`);
  const client = new AutomatorClient(() => [automator], new EventLog());
  try {
    const status = await client.checkConnection(automator.id);
    if (status.connected) {
      s.stop(pc.green('Automator reachable'));
    } else {
      s.stop(pc.yellow(`Not reachable yet: ${status.error ?? 'unknown error'}`));
    }
  } finally {
    await client.close();
  }
}

async function promptListener(config: ConfigDocument): Promise<TcpListenerConfig | undefined> {
  p.note(
    `Hardware controllers connect to this machine over TCP and send one\n` +
    `trigger per line. Pick the port they are configured to use.`,
    'Step 2: TCP listener',
  );

  const addListener = await p.confirm({
    message: 'Add a TCP listener port now?',
    initialValue: config.tcp_listeners.length === 0,
  });
  if (p.isCancel(addListener)) cancelled();
  if (!addListener) return undefined;

  const port = await p.text({
    message: 'TCP port:',
    placeholder: 'e.g., 9001',
    validate: (value) => validateListenerPort(value, config.tcp_listeners),
  });
  if (p.isCancel(port)) cancelled();

  const name = await p.text({
    message: 'Listener name:',
    placeholder: 'e.g., Vision switcher',
    defaultValue: `Port ${port}`,
  });
  if (p.isCancel(name)) cancelled();

  return { port: parseInt(port, 10), name: name.trim() || `Port ${port}`, enabled: true };
}

export async function runSetupWizard(): Promise<void> {
  console.clear();

  p.intro(pc.bgCyan(pc.black(' automator-bridge setup ')));

  const config = loadConfig();

  if (config.automators.length > 0) {
    const addAnother = await p.confirm({
      message: `${config.automators.length} Automator(s) already configured. Add another?`,
      initialValue: false,
    });

    if (p.isCancel(addAnother) || !addAnother) {
      p.outro('Setup cancelled.');
      return;
    }
  }

  const automator = await promptAutomator();

  const shouldTest = await p.confirm({
    message: 'Test the connection now?',
    initialValue: true,
  });
  if (!p.isCancel(shouldTest) && shouldTest) {
    await testAutomator(automator);
  }

  const listener = await promptListener(config);

  const s = p.spinner();
  s.start('Saving configuration...');
  saveConfig({
    ...config,
    first_run: false,
    automators: [...config.automators, automator],
    tcp_listeners: listener ? [...config.tcp_listeners, listener] : config.tcp_listeners,
  });
  s.stop(`Configuration saved to ${pc.dim(getConfigPath())}`);

  p.note(
    `Map triggers to macros through the management API, for example:\n\n` +
    `${pc.cyan('POST /api/config')} with ${pc.bold('tcp_commands')} and ${pc.bold('command_mappings')}\n` +
    `or use ${pc.cyan('/tcp/capture/start')} to learn a trigger from the hardware.`,
    'Next steps',
  );

  p.outro(pc.green('Setup complete! Run "automator-bridge start" to start the bridge.'));
}
