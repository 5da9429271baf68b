import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  buildOutline,
  Capability,
  Connection,
  hoverText,
  kindName
} from '../src/server/capability.js';
import { Workspace } from '../src/server/document.js';
import { ToolError } from '../src/server/error.js';

const range = (startLine: number, startCharacter: number, endLine: number, endCharacter: number) => ({
  end: { character: endCharacter, line: endLine },
  start: { character: startCharacter, line: startLine }
});

const root = mkdtempSync(join(tmpdir(), 'capability-'));
const models = join(root, 'models.py');
const modelsUri = pathToFileURL(models).toString();
writeFileSync(models, [
  'class User:',
  '    def validate(self):',
  '        return True',
  '',
  '',
  'def helper(user):',
  '    return user.validate()'
].join('\n'));

const documentSymbols = [
  {
    children: [
      { detail: '(self)', kind: 6, name: 'validate', range: range(1, 4, 2, 19), selectionRange: range(1, 8, 1, 16) }
    ],
    kind: 5,
    name: 'User',
    range: range(0, 0, 2, 19),
    selectionRange: range(0, 6, 0, 10)
  },
  { kind: 12, name: 'helper', range: range(5, 0, 6, 26), selectionRange: range(5, 4, 5, 10) }
];

const navigation = {
  definitionProvider: true,
  documentSymbolProvider: true,
  hoverProvider: true,
  implementationProvider: true,
  referencesProvider: true,
  typeDefinitionProvider: true,
  workspaceSymbolProvider: true
};

class FakeConnection implements Connection {
  capabilities: Record<string, unknown>;
  opened: string[] = [];
  requests: { method: string; params: unknown }[] = [];
  responses: Record<string, unknown>;
  stopped: number = 0;
  readonly workspace = new Workspace(root);

  constructor(responses: Record<string, unknown>, capabilities: Record<string, unknown> = navigation) {
    this.capabilities = capabilities;
    this.responses = responses;
  }

  async openFile(path: string): Promise<void> {
    this.opened.push(path);
  }

  async sendRequest(method: string, params: unknown): Promise<unknown> {
    this.requests.push({ method, params });
    return this.responses[method] ?? null;
  }

  async stop(): Promise<void> {
    this.stopped++;
  }
}

const isCode = (code: string) => (error: unknown) => error instanceof ToolError && error.code === code;

test('Capability: announced capabilities exclude disabled providers', () => {
  const connection = new FakeConnection({}, {
    definitionProvider: true,
    hoverProvider: {},
    referencesProvider: false,
    renameProvider: null
  });
  const capability = new Capability(connection, 4);
  assert.deepEqual([...capability.capabilities].sort(), ['definitionProvider', 'hoverProvider']);
});

test('Capability: outline builds the document symbol tree', async () => {
  const connection = new FakeConnection({ 'textDocument/documentSymbol': documentSymbols });
  const items = await new Capability(connection, 4).outline(models);
  assert.deepEqual(items, [
    {
      children: [
        {
          children: [],
          detail: '(self)',
          kind: 'Method',
          name: 'validate',
          path: ['User', 'validate'],
          range: range(1, 4, 2, 19),
          selection_range: range(1, 8, 1, 16)
        }
      ],
      kind: 'Class',
      name: 'User',
      path: ['User'],
      range: range(0, 0, 2, 19),
      selection_range: range(0, 6, 0, 10)
    },
    {
      children: [],
      kind: 'Function',
      name: 'helper',
      path: ['helper'],
      range: range(5, 0, 6, 26),
      selection_range: range(5, 4, 5, 10)
    }
  ]);
  assert.deepEqual(connection.opened, [models]);
  assert.deepEqual(connection.requests, [
    { method: 'textDocument/documentSymbol', params: { textDocument: { uri: modelsUri } } }
  ]);
});

test('Capability: outline of a file without symbols is empty', async () => {
  const connection = new FakeConnection({ 'textDocument/documentSymbol': null });
  assert.deepEqual(await new Capability(connection, 4).outline(models), []);
});

test('Capability: flat symbol information is nested by range', () => {
  const items = buildOutline([
    { kind: 12, location: { range: range(5, 0, 6, 26), uri: modelsUri }, name: 'helper' },
    { containerName: 'User', kind: 6, location: { range: range(1, 4, 2, 19), uri: modelsUri }, name: 'validate' },
    { kind: 5, location: { range: range(0, 0, 2, 19), uri: modelsUri }, name: 'User' }
  ]);
  assert.deepEqual(items.map(item => item.path), [['User'], ['helper']]);
  assert.deepEqual(items[0].children.map(item => item.path), [['User', 'validate']]);
  assert.deepEqual(items[0].children[0].selection_range, range(1, 4, 2, 19));
});

test('Capability: definition resolves a dotted symbol through the outline', async () => {
  const connection = new FakeConnection({
    'textDocument/definition': [{ range: range(1, 8, 1, 16), uri: modelsUri }],
    'textDocument/documentSymbol': documentSymbols
  });
  const items = await new Capability(connection, 4).definition({ file: models, symbol: 'User.validate' }, 'definition', true);
  assert.deepEqual(items, [
    {
      code: '    def validate(self):\n        return True',
      file_path: 'models.py',
      kind: 'Method',
      name: 'validate',
      path: ['User', 'validate'],
      range: range(1, 8, 1, 16)
    }
  ]);
  assert.deepEqual(connection.requests.map(request => request.method), [
    'textDocument/documentSymbol',
    'textDocument/definition'
  ]);
  assert.deepEqual(connection.requests[1].params, {
    position: { character: 8, line: 1 },
    textDocument: { uri: modelsUri }
  });
});

test('Capability: definition of an absent symbol is empty without a definition request', async () => {
  const connection = new FakeConnection({ 'textDocument/documentSymbol': documentSymbols });
  const items = await new Capability(connection, 4).definition({ file: models, symbol: 'Missing' }, 'definition', true);
  assert.deepEqual(items, []);
  assert.deepEqual(connection.requests.map(request => request.method), ['textDocument/documentSymbol']);
});

test('Capability: type definition follows location links on a given line', async () => {
  const connection = new FakeConnection({
    'textDocument/documentSymbol': documentSymbols,
    'textDocument/typeDefinition': [
      { targetRange: range(0, 0, 2, 19), targetSelectionRange: range(0, 6, 0, 10), targetUri: modelsUri }
    ]
  });
  const items = await new Capability(connection, 4).definition({ file: models, line: 5, symbol: 'helper' }, 'type_definition', false);
  assert.deepEqual(items, [
    { file_path: 'models.py', kind: 'Class', name: 'User', path: ['User'], range: range(0, 6, 0, 10) }
  ]);
  assert.deepEqual(connection.requests[0], {
    method: 'textDocument/typeDefinition',
    params: { position: { character: 4, line: 5 }, textDocument: { uri: modelsUri } }
  });
});

test('Capability: definitions outside readable files keep only path and range', async () => {
  const directory = join(root, 'pkg');
  mkdirSync(directory, { recursive: true });
  const connection = new FakeConnection({
    'textDocument/definition': [
      { range: range(0, 0, 0, 3), uri: 'file:///elsewhere/missing.py' },
      { range: range(0, 0, 0, 1), uri: pathToFileURL(directory).toString() }
    ],
    'textDocument/documentSymbol': documentSymbols
  });
  const items = await new Capability(connection, 4).definition({ file: models, symbol: 'helper' }, 'definition', true);
  assert.deepEqual(items, [
    { file_path: '/elsewhere/missing.py', range: range(0, 0, 0, 3) },
    { file_path: 'pkg', range: range(0, 0, 0, 1) }
  ]);
  assert.deepEqual(connection.requests.map(request => request.method), ['textDocument/documentSymbol', 'textDocument/definition']);
});

test('Capability: references are truncated with scope and context lines', async () => {
  const connection = new FakeConnection({
    'textDocument/documentSymbol': documentSymbols,
    'textDocument/references': [
      { range: range(1, 8, 1, 16), uri: modelsUri },
      { range: range(6, 16, 6, 24), uri: modelsUri },
      { range: range(0, 0, 0, 3), uri: 'file:///elsewhere/missing.py' }
    ]
  });
  const listing = await new Capability(connection, 4).references({ file: models, symbol: 'helper' }, 'references', 2, 1);
  assert.equal(listing.total, 3);
  assert.deepEqual(listing.items, [
    {
      code: 'class User:\n    def validate(self):\n        return True',
      file_path: 'models.py',
      range: range(1, 8, 1, 16),
      scope: { kind: 'Method', path: ['User', 'validate'] }
    },
    {
      code: 'def helper(user):\n    return user.validate()',
      file_path: 'models.py',
      range: range(6, 16, 6, 24),
      scope: { kind: 'Function', path: ['helper'] }
    }
  ]);
  assert.deepEqual(connection.requests[1], {
    method: 'textDocument/references',
    params: {
      context: { includeDeclaration: true },
      position: { character: 4, line: 5 },
      textDocument: { uri: modelsUri }
    }
  });
});

test('Capability: zero reference limit returns only the total', async () => {
  const connection = new FakeConnection({
    'textDocument/documentSymbol': documentSymbols,
    'textDocument/references': [{ range: range(1, 8, 1, 16), uri: modelsUri }]
  });
  const listing = await new Capability(connection, 4).references({ file: models, symbol: 'helper' }, 'references', 0, 3);
  assert.deepEqual(listing, { items: [], total: 1 });
});

test('Capability: implementations use the implementation request', async () => {
  const connection = new FakeConnection({ 'textDocument/implementation': null });
  const listing = await new Capability(connection, 4).references({ character: 8, file: models, line: 1 }, 'implementations', 10, 0);
  assert.deepEqual(listing, { items: [], total: 0 });
  assert.deepEqual(connection.requests, [
    {
      method: 'textDocument/implementation',
      params: { position: { character: 8, line: 1 }, textDocument: { uri: modelsUri } }
    }
  ]);
});

test('Capability: hover without a server range spans the symbol name', async () => {
  const connection = new FakeConnection({
    'textDocument/documentSymbol': documentSymbols,
    'textDocument/hover': { contents: { kind: 'markdown', value: '```python\nclass User\n```' } }
  });
  const hover = await new Capability(connection, 4).hover({ file: models, symbol: 'User' });
  assert.deepEqual(hover, { contents: '```python\nclass User\n```', range: range(0, 6, 0, 10) });
});

test('Capability: hover at a position keeps the server range', async () => {
  const connection = new FakeConnection({
    'textDocument/hover': { contents: 'validate(self) -> bool', range: range(6, 16, 6, 24) }
  });
  const hover = await new Capability(connection, 4).hover({ character: 16, file: models, line: 6 });
  assert.deepEqual(hover, { contents: 'validate(self) -> bool', range: range(6, 16, 6, 24) });
  assert.deepEqual(connection.requests.map(request => request.method), ['textDocument/hover']);
});

test('Capability: empty hover contents are no hover data', async () => {
  const blank = new FakeConnection({ 'textDocument/hover': { contents: '  ' } });
  assert.equal(await new Capability(blank, 4).hover({ file: models, line: 0 }), null);
  const missing = new FakeConnection({ 'textDocument/hover': null });
  assert.equal(await new Capability(missing, 4).hover({ file: models, line: 0 }), null);
});

test('Capability: hover text joins marked strings', () => {
  assert.equal(
    hoverText([{ language: 'python', value: 'def helper(user)' }, 'Helper docs']),
    '```python\ndef helper(user)\n```\n\nHelper docs'
  );
});

test('Capability: workspace symbols are filtered by file pattern before truncation', async () => {
  const generated = pathToFileURL(join(root, 'build', 'gen.py')).toString();
  const connection = new FakeConnection({
    'workspace/symbol': [
      { kind: 5, location: { range: range(0, 6, 0, 10), uri: modelsUri }, name: 'User' },
      { kind: 12, location: { uri: pathToFileURL(join(root, 'other.ts')).toString() }, name: 'Other' },
      { kind: 12, location: { range: range(2, 4, 2, 13), uri: generated }, name: 'generated' },
      { containerName: 'User', kind: 6, location: { range: range(1, 8, 1, 16), uri: modelsUri }, name: 'validate' }
    ]
  });
  const capability = new Capability(connection, 4);
  const filtered = await capability.workspaceSymbols('U', '*.py', 1);
  assert.deepEqual(filtered, {
    items: [{ file_path: 'models.py', kind: 'Class', name: 'User', path: ['User'], range: range(0, 6, 0, 10), signature: 'class User:' }],
    total: 3
  });
  const all = await capability.workspaceSymbols('U', undefined, 10);
  assert.equal(all.total, 4);
  assert.deepEqual(all.items[1], { file_path: 'other.ts', kind: 'Function', name: 'Other', path: ['Other'] });
  assert.deepEqual(all.items[2], { file_path: 'build/gen.py', kind: 'Function', name: 'generated', path: ['generated'], range: range(2, 4, 2, 13) });
  assert.deepEqual(all.items[3], {
    container: 'User',
    file_path: 'models.py',
    kind: 'Method',
    name: 'validate',
    path: ['User', 'validate'],
    range: range(1, 8, 1, 16),
    signature: 'def validate(self):'
  });
});

test('Capability: file pattern matches symbols in any directory without listing the workspace', async () => {
  const connection = new FakeConnection({
    'workspace/symbol': [
      { kind: 5, location: { range: range(0, 6, 0, 10), uri: modelsUri }, name: 'User' },
      { kind: 12, location: { range: range(0, 4, 0, 9), uri: pathToFileURL(join(root, 'build', 'gen.py')).toString() }, name: 'build' },
      { kind: 12, location: { range: range(0, 4, 0, 9), uri: pathToFileURL(join(root, '.cache', 'hidden.py')).toString() }, name: 'hidden' },
      { kind: 12, location: { range: range(0, 4, 0, 9), uri: pathToFileURL(join(root, 'dist', 'app.js')).toString() }, name: 'app' }
    ]
  });
  const capability = new Capability(connection, 4);
  const names = async (pattern: string) => (await capability.workspaceSymbols('', pattern, 10)).items.map(item => item.file_path);
  assert.deepEqual(await names('*.py'), ['models.py', 'build/gen.py', '.cache/hidden.py']);
  assert.deepEqual(await names('build/*.py'), ['build/gen.py']);
  assert.deepEqual(await names('**/*.js'), ['dist/app.js']);
  assert.deepEqual(connection.requests.map(request => request.method), ['workspace/symbol', 'workspace/symbol', 'workspace/symbol']);
});

test('Capability: unexpected responses are server errors', async () => {
  const connection = new FakeConnection({ 'textDocument/definition': 'bogus' });
  await assert.rejects(
    new Capability(connection, 4).definition({ file: models, line: 0 }, 'definition', false),
    isCode('server_error')
  );
});

test('Capability: disconnect stops the connection', async () => {
  const connection = new FakeConnection({});
  await new Capability(connection, 4).disconnect();
  assert.equal(connection.stopped, 1);
});

test('Capability: symbol kinds have readable names', () => {
  assert.equal(kindName(12), 'Function');
  assert.equal(kindName(99), 'Unknown(99)');
});
