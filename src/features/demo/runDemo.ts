/**
 * Feature walkthrough for the `demo` command
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ConsoleFacade } from '../../core/console/index.js';
import { maskSecret } from '../../shared/utils/mask.js';

export interface DemoOptions {
  /** Pause between progress steps, in ms */
  stepDelayMs?: number;
  /** Ask the prompt questions; defaults to whether stdin is a TTY */
  interactive?: boolean;
}

function demoMessages(cu: ConsoleFacade): void {
  cu.header('Messages & Events');
  cu.success('Operation completed successfully.');
  cu.info('Fetching configuration from remote store...');
  cu.warning('API rate limit approaching (80%).');
  cu.error('Failed to connect to primary database.');
  cu.event('Log line at INFO level', 'INFO');
  cu.event('A successful operation event', 'SUCCESS');
  cu.event('Low disk space on node-7', 'WARNING');
  cu.event('Dead-letter queue growing rapidly', 'ERROR');
  cu.event('This is a DEBUG detail (only at verbosity 3)', 'DEBUG');
}

function demoStructure(cu: ConsoleFacade): void {
  cu.header('Structure: Panel, Markdown, Code, Rule');
  cu.panel('This message sits inside the default panel.', { title: 'Default Panel' });
  cu.panel('Blue on white inside a bold red border.', {
    title: 'Custom style & border',
    style: 'blue on white',
    borderStyle: 'bold red',
  });
  cu.panel('A magenta, double box panel.', { title: 'Double box', borderStyle: 'magenta', box: 'double' });
  cu.panel('An expanded and padded panel.', { title: 'Padding & expand', padding: 1, expand: true });
  cu.markdown([
    '# Markdown Title',
    '- Bulleted item',
    '- **Bold** and *italics*',
    '> Blockquote',
    '',
    '```ts',
    'const hello = (name: string): string => `Hello, ${name}!`;',
    '```',
  ].join('\n'));
  cu.code('const area = Math.PI * 10 ** 2;\nconsole.log(area);', { title: 'Code' });

  const command = `PGPASSWORD="${maskSecret('SuperSecretP@$$', 3)}" psql -U demo_user -h db.internal.example -p 5432 `
    + '-d DemoDatabase -v ON_ERROR_STOP=1 -f "/mnt/path/to/some/sql-file/temp.sql"';
  cu.code(command, { language: 'bash', title: 'Code with wrap', wrap: true });
  cu.rule('Five blank lines follow');
  cu.spacer(5);
  cu.rule('End of structure demo');
}

function demoData(cu: ConsoleFacade): void {
  cu.header('Data: Table, Dictionary, JSON, Tree');
  cu.table(['Key', 'Value'], [['ENV', 'prod'], ['REGION', 'us-east-1'], ['REPLICAS', 3]], { title: 'Simple Table' });

  const conf = { env: 'prod', region: 'us-east-1', replicas: 3, feature_x: true };
  cu.dictionary(conf, { title: 'Key/Value Dictionary' });
  cu.dictionary(conf, { title: 'Dictionary (compact)', expand: false });

  cu.json({ status: 'ok', items: [{ id: 1 }, { id: 2 }], meta: { page: 1 } }, { title: 'JSON Payload' });
  cu.tree({
    config: {
      db: { host: 'localhost', port: 5432 },
      cache: { enabled: true, ttl: 600 },
    },
    services: ['auth', 'payments', 'search'],
  }, { title: 'Nested Structure' });
}

function demoSecrets(cu: ConsoleFacade): void {
  cu.header('Secrets & Key/Value');
  cu.keyValue('USER', 'service_account');
  cu.keyValue('PASSWORD', 'p@ssw0rd!', { secret: true, keep: 3 });
}

async function demoProgress(cu: ConsoleFacade, stepDelayMs: number): Promise<void> {
  cu.header('Progress & Status');
  await cu.status('Connecting to remote service...', () => sleep(stepDelayMs * 10));

  await cu.progress().run(async (progress) => {
    const upload = progress.addTask('Uploading artifacts', { total: 20 });
    const index = progress.addTask('Indexing search', { total: 10 });
    for (let i = 0; i < 20; i++) {
      progress.advance(upload);
      progress.advance(index);
      await sleep(stepDelayMs);
    }
  });
  cu.success('All tasks finished.');
}

async function demoPrompts(cu: ConsoleFacade, interactive: boolean): Promise<void> {
  cu.header('Prompts (skipped if non-interactive)');
  if (!interactive) {
    cu.warning('stdin is not a TTY; skipping interactive prompts.');
    return;
  }
  const name = await cu.prompt('Enter your name');
  const proceed = await cu.confirm('Proceed with deployment?');
  cu.info(`Hello, ${name}. Proceed = ${proceed}`);
}

function demoExceptions(cu: ConsoleFacade): void {
  cu.header('Exceptions');
  try {
    JSON.parse('{"unterminated": ');
  } catch (err) {
    cu.printException(err);
  }
}

function demoThemes(cu: ConsoleFacade): void {
  cu.header('Theme Switch');
  const original = cu.theme;
  cu.info(`Currently using theme: ${original}`);
  for (const theme of ['light', 'mono']) {
    cu.setTheme(theme);
    cu.info(`Now using theme: ${theme}`);
  }
  cu.setTheme(original);
  cu.info(`Switched back to theme: ${original}`);
}

export async function runDemo(cu: ConsoleFacade, options: DemoOptions = {}): Promise<void> {
  const stepDelayMs = options.stepDelayMs ?? 40;
  const interactive = options.interactive ?? process.stdin.isTTY === true;

  cu.header('prettyterm: Full Feature Demo');
  cu.event('Starting demo run', 'INFO');

  demoMessages(cu);
  demoStructure(cu);
  demoData(cu);
  demoSecrets(cu);
  await demoProgress(cu, stepDelayMs);
  await demoPrompts(cu, interactive);
  demoExceptions(cu);
  demoThemes(cu);

  cu.event('Demo run complete', 'SUCCESS');
  cu.success('Done.');
}
