/**
 * Batch Insert Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { batchInsert, buildInsertQuery } from '../batch-insert.js';
import type { DatabaseClient } from '../database.js';

function createMockClient(): DatabaseClient & { calls: { sql: string; params?: unknown[] }[] } {
  const calls: { sql: string; params?: unknown[] }[] = [];
  return {
    calls,
    query: vi.fn().mockImplementation(async (sql: string, params?: unknown[]) => {
      calls.push({ sql, params });
      return { rows: [], rowCount: Array.isArray(params) ? params.length / 2 : 0 };
    }),
  };
}

describe('buildInsertQuery', () => {
  it('numbers placeholders row by row', () => {
    expect(buildInsertQuery('params', ['chave', 'valor'], 2)).toBe(
      'INSERT INTO params (chave, valor) VALUES ($1, $2), ($3, $4)'
    );
  });

  it('appends an upsert clause', () => {
    expect(
      buildInsertQuery('params', ['chave', 'valor'], 1, {
        columns: ['chave'],
        action: 'DO UPDATE',
        updateColumns: ['valor'],
      })
    ).toBe(
      'INSERT INTO params (chave, valor) VALUES ($1, $2) ON CONFLICT (chave) DO UPDATE SET valor = EXCLUDED.valor'
    );
  });

  it('falls back to DO NOTHING without update columns', () => {
    expect(
      buildInsertQuery('params', ['chave'], 1, { columns: ['chave'], action: 'DO UPDATE' })
    ).toBe('INSERT INTO params (chave) VALUES ($1) ON CONFLICT (chave) DO NOTHING');
  });
});

describe('batchInsert', () => {
  const columns = ['chave', 'valor'];
  const getValues = (item: [string, string]) => [item[0], item[1]];

  it('does nothing for an empty list', async () => {
    const client = createMockClient();
    const empty: [string, string][] = [];
    await expect(batchInsert(client, empty, { table: 'params', columns, getValues })).resolves.toBe(0);
    expect(client.calls).toHaveLength(0);
  });

  it('splits items into chunks and sums the written rows', async () => {
    const client = createMockClient();
    const items: [string, string][] = [
      ['a', '1'],
      ['b', '2'],
      ['c', '3'],
    ];

    const written = await batchInsert(client, items, {
      table: 'params',
      columns,
      getValues,
      chunkSize: 2,
    });

    expect(written).toBe(3);
    expect(client.calls.map((call) => call.params)).toEqual([['a', '1', 'b', '2'], ['c', '3']]);
  });

  it('rethrows a failing chunk', async () => {
    const client: DatabaseClient = { query: vi.fn().mockRejectedValue(new Error('boom')) };
    await expect(
      batchInsert(client, [['a', '1']], { table: 'params', columns, getValues })
    ).rejects.toThrow('boom');
  });
});
