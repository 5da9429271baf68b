import test from 'node:test';
import assert from 'node:assert/strict';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { z } from 'zod';
import { Client, ClientOptions } from '../src/server/client.js';
import { Config } from '../src/server/config.js';
import { ToolError } from '../src/server/error.js';
import { Logger } from '../src/server/logger.js';

const fixture = fileURLToPath(new URL('./fixtures/language-server.cjs', import.meta.url));

const EntrySchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  signal: z.string().optional()
});

type Entry = z.infer<typeof EntrySchema>;

const configuration = { python: { analysis: { typeCheckingMode: 'basic' } } };

/** Messages the fake server received, in arrival order */
function received(log: string): Entry[] {
  if (!existsSync(log)) {
    return [];
  }
  return readFileSync(log, 'utf8')
    .split('\n')
    .filter(Boolean)
    .map(line => EntrySchema.parse(JSON.parse(line)));
}

function alive(pid: number | undefined): boolean {
  if (pid === undefined) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitFor(condition: () => boolean, timeout: number = 5000): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 20));
  }
}

function setup(mode: string = 'normal', settings: Record<string, unknown> = {}) {
  const workspaceRoot = mkdtempSync(join(tmpdir(), 'client-'));
  const log = join(workspaceRoot, '.server.log');
  const config = Config.parse({ settings: { shutdownGracePeriodMs: 200, ...settings } });
  const options: ClientOptions = {
    args: [fixture, mode],
    command: process.execPath,
    language: { ...config.getLanguageConfig('python'), configuration, env: { FAKE_SERVER_LOG: log } },
    logger: new Logger(new Server({ name: 'test', version: '0.0.0' }, { capabilities: { logging: {} } }), 'error'),
    settings: config.getSettings(),
    workspaceRoot
  };
  const methods = () => received(log).map(entry => entry.method ?? entry.signal);
  return { log, methods, options, workspaceRoot };
}

const isCode = (code: string) => (error: unknown) => error instanceof ToolError && error.code === code;

test('Client: start completes the handshake and opens the first workspace file', async () => {
  const { log, methods, options, workspaceRoot } = setup();
  const source = join(workspaceRoot, 'app.py');
  writeFileSync(source, 'x = 1\n');
  const client = await Client.start(options);
  try {
    assert.deepEqual(client.capabilities, { definitionProvider: true, hoverProvider: true });
    assert.deepEqual(client.serverInfo, { name: 'fake-server', version: '1.0.0' });
    assert.deepEqual(await client.sendRequest('test/echo', { ping: 1 }), { ping: 1 });
    assert.deepEqual(methods(), ['initialize', 'initialized', 'textDocument/didOpen', 'test/echo']);
    assert.deepEqual(received(log)[2].params, {
      textDocument: { languageId: 'python', text: 'x = 1\n', uri: pathToFileURL(source).toString(), version: 1 }
    });
  } finally {
    await client.stop();
  }
});

test('Client: files changed on disk are re-sent with a bumped version', async () => {
  const { log, options, workspaceRoot } = setup();
  const source = join(workspaceRoot, 'app.py');
  writeFileSync(source, 'x = 1\n');
  const client = await Client.start(options);
  try {
    await client.openFile(source);
    writeFileSync(source, 'x = 2\n');
    await client.openFile(source);
    await client.openFile(source);
    await assert.rejects(client.openFile(join(workspaceRoot, 'missing.py')), isCode('file_not_found'));
    await client.sendRequest('test/echo', {});
    const sync = received(log).filter(entry => entry.method?.startsWith('textDocument/'));
    assert.deepEqual(sync.map(entry => entry.method), ['textDocument/didOpen', 'textDocument/didChange']);
    assert.deepEqual(sync[1].params, {
      contentChanges: [{ text: 'x = 2\n' }],
      textDocument: { uri: pathToFileURL(source).toString(), version: 2 }
    });
  } finally {
    await client.stop();
  }
});

test('Client: workspace configuration requests are answered from the language configuration', async () => {
  const { options } = setup();
  const client = await Client.start(options);
  try {
    const answer = await client.sendRequest('test/configuration', {
      items: [{ section: 'python.analysis' }, { section: 'python.missing' }, {}]
    });
    assert.deepEqual(answer, [{ typeCheckingMode: 'basic' }, null, configuration]);
  } finally {
    await client.stop();
  }
});

test('Client: timeout and abort cancel the request on the server', async () => {
  const { log, options } = setup('normal', { timeoutMs: 1000 });
  const client = await Client.start(options);
  try {
    await assert.rejects(client.sendRequest('test/slow', {}), isCode('timeout'));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);
    await assert.rejects(client.sendRequest('test/slow', {}, controller.signal), isCode('cancelled'));
    await assert.rejects(client.sendRequest('test/slow', {}, controller.signal), isCode('cancelled'));
    await client.sendRequest('test/echo', {});
    const entries = received(log);
    const slow = entries.filter(entry => entry.method === 'test/slow').map(entry => entry.id);
    assert.equal(slow.length, 2);
    assert.deepEqual(
      entries.filter(entry => entry.method === '$/cancelRequest').map(entry => entry.params),
      slow.map(id => ({ id }))
    );
  } finally {
    await client.stop();
  }
});

test('Client: a server that exits fails later requests with server_error', async () => {
  const { options } = setup();
  const client = await Client.start(options);
  const pid = client.pid;
  await client.sendRequest('test/crash', {});
  await waitFor(() => !alive(pid));
  await assert.rejects(client.sendRequest('test/echo', {}), isCode('server_error'));
  await client.stop();
});

test('Client: an unresolvable command reports server_start_failed', async () => {
  const { options, workspaceRoot } = setup();
  await assert.rejects(
    Client.start({ ...options, command: join(workspaceRoot, 'missing-language-server') }),
    (error: unknown) => error instanceof ToolError && error.code === 'server_start_failed' && error.category === 'upstream'
  );
});

test('Client: a server exiting during startup reports server_start_failed', async () => {
  const { options } = setup('crash');
  await assert.rejects(Client.start(options), isCode('server_start_failed'));
});

test('Client: stop sends shutdown then exit and the server leaves', async () => {
  const { methods, options } = setup();
  const client = await Client.start(options);
  const pid = client.pid;
  await client.stop();
  assert.deepEqual(methods(), ['initialize', 'initialized', 'shutdown', 'exit']);
  assert.equal(alive(pid), false);
  await assert.rejects(client.sendRequest('test/echo', {}), isCode('server_error'));
});

test('Client: a server ignoring exit and SIGTERM is killed', async () => {
  const { methods, options } = setup('stubborn');
  const client = await Client.start(options);
  const pid = client.pid;
  await client.stop();
  assert.deepEqual(methods(), ['initialize', 'initialized', 'shutdown', 'exit', 'SIGTERM']);
  assert.equal(alive(pid), false);
});
