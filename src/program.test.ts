import { describe, test, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram, describeError } from './program';
import { EmptyModelError, PlanTooLargeError } from './errors';

/**
 * Runs the commands in process against a PGlite database persisted to disk.
 */
describe('CLI', () => {
  let tempDir: string;
  let dbPath: string;
  let configPath: string;
  let output: string[];

  beforeAll(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ellie-cli-'));
    dbPath = path.join(tempDir, 'db');
    configPath = path.join(tempDir, 'missing.json');

    const db = new PGlite(dbPath);
    await db.exec(`
      CREATE SCHEMA shop;
      CREATE TABLE shop.customers (id INTEGER PRIMARY KEY, name TEXT);
      CREATE TABLE shop.orders (id INTEGER PRIMARY KEY, customer_id INTEGER REFERENCES shop.customers(id));
      CREATE VIEW shop.recent_orders AS SELECT id FROM shop.orders;
    `);
    await db.close();
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
    vi.stubEnv('ELLIE_ORGANIZATION', '');
    vi.stubEnv('ELLIE_TOKEN', '');
    vi.stubEnv('ELLIE_FOLDER_ID', '');
    vi.stubEnv('LOG_LEVEL', 'silent');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  function run(...args: string[]): Promise<unknown> {
    return createProgram().parseAsync(args, { from: 'user' });
  }

  function source(): string[] {
    return ['-s', `pglite:${dbPath}`, '-c', configPath];
  }

  test('schemas lists the source schemas', async () => {
    await run('schemas', ...source());

    expect(output).toContain('shop');
  });

  test('preview summarizes the plan', async () => {
    await run('preview', ...source(), '--schema', 'shop');

    expect(output).toEqual([
      'Model "shop": 3 entities, 1 explicit and 0 inferred relationships',
      'Operations:',
      '  CREATE model',
      'Total: 1 operation(s)',
    ]);
  });

  test('preview can leave out views', async () => {
    await run('preview', ...source(), '--no-views', '--folder-id', '42', '--schema', 'shop');

    expect(output[0]).toBe('Model "shop": 2 entities, 1 explicit and 0 inferred relationships');
    expect(output[2]).toBe('  CREATE model in folder 42');
  });

  test('preview --json prints the Ellie request body', async () => {
    await run('preview', ...source(), '--json', '-n', 'Shop', '-f', '42', '--schema', 'shop');

    const body = JSON.parse(output.join('\n'));
    expect(body.model.name).toBe('Shop');
    expect(body.model.level).toBe('physical');
    expect(body.model.folderId).toBe(42);
    expect(body.model.entities.map((e: { name: string }) => e.name)).toEqual(['customers', 'orders', 'recent_orders']);
    expect(body.model.relationships).toHaveLength(1);
  });

  test('mermaid writes the diagram to a file', async () => {
    const file = path.join(tempDir, 'shop.mmd');

    await run('mermaid', ...source(), '-o', file, '--no-views', '--schema', 'shop');

    expect(output).toEqual([`Exported to ${file}`]);
    expect(fs.readFileSync(file, 'utf-8')).toBe([
      'erDiagram',
      '    customers {',
      '        int id PK',
      '        string name "nullable"',
      '    }',
      '    orders {',
      '        int id PK',
      '        int customer_id FK "nullable"',
      '    }',
      '    customers ||--o{ orders : "customer_id"',
    ].join('\n'));
  });

  test('transfer needs a folder and Ellie credentials', async () => {
    await expect(run('transfer', ...source(), '--yes', '--schema', 'shop')).rejects.toThrow(
      'Folder ID is required. Pass --folder-id or set ellie.folderId.'
    );
    await expect(run('transfer', ...source(), '--yes', '-f', '42', '--schema', 'shop')).rejects.toThrow(
      'Ellie organization and token are required (config file or ELLIE_ORGANIZATION / ELLIE_TOKEN)'
    );
  });

  test('transfer into an existing model needs no folder', async () => {
    await expect(run('transfer', ...source(), '--yes', '-m', '7', '--schema', 'shop')).rejects.toThrow(
      'Ellie organization and token are required (config file or ELLIE_ORGANIZATION / ELLIE_TOKEN)'
    );
  });

  test('transfer --dry-run stops after planning', async () => {
    vi.stubEnv('ELLIE_ORGANIZATION', 'acme.ellie.ai');
    vi.stubEnv('ELLIE_TOKEN', 'test-secret');

    await run('transfer', ...source(), '--dry-run', '-f', '42', '--no-views', '--schema', 'shop');

    expect(output).toEqual([
      'Model "shop": 2 entities, 1 explicit and 0 inferred relationships',
      'Operations:',
      '  CREATE model in folder 42',
      'Total: 1 operation(s)',
      'Dry run: nothing was sent to Ellie.',
    ]);
  });

  test('reports an empty schema', async () => {
    await expect(run('preview', ...source(), '--schema', 'nothing_here')).rejects.toThrow(EmptyModelError);
  });

  test('init-config writes the defaults once', async () => {
    const file = path.join(tempDir, 'config', 'settings.json');

    await run('init-config', '-c', file);

    expect(output).toEqual([`Wrote ${file}`]);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8')).transfer.maxEntities).toBe(500);
    await expect(run('init-config', '-c', file)).rejects.toThrow(`${file} already exists`);
  });
});

describe('describeError', () => {
  test('adds guidance for an empty model', () => {
    expect(describeError(new EmptyModelError())).toBe(
      'The schema contains no tables to model. Check the schema names and whether views are excluded.'
    );
  });

  test('prints transfer errors without a stack', () => {
    expect(describeError(new PlanTooLargeError(3, 2, 'createModel'))).toBe(
      'Operation createModel would transfer 3 entities, more than the maximum of 2. Select fewer schemas, exclude views or raise maxEntities.'
    );
    expect(describeError('plain')).toBe('plain');
  });
});
