import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { listMigrations, runMigrations } from '../migrate';

describe('runMigrations', () => {
  let dir: string;
  let statements: string[];
  let applied: string[];
  const client = { query: jest.fn() };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    fs.writeFileSync(path.join(dir, '002_offers.sql'), 'CREATE TABLE offers ();');
    fs.writeFileSync(path.join(dir, '001_teams.sql'), 'CREATE TABLE teams ();');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a migration');

    statements = [];
    applied = [];
    client.query.mockReset();
    client.query.mockImplementation(async (text: string) => {
      const sql = text.replace(/\s+/g, ' ').trim();
      statements.push(sql);
      if (sql.startsWith('SELECT filename')) {
        return { rows: applied.map((filename) => ({ filename })) };
      }
      if (sql.includes('BROKEN')) {
        throw new Error('syntax error at or near "BROKEN"');
      }
      return { rows: [] };
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists .sql files in name order', () => {
    expect(listMigrations(dir)).toEqual(['001_teams.sql', '002_offers.sql']);
  });

  it('applies each pending file in its own transaction', async () => {
    applied = ['001_teams.sql'];

    const ran = await runMigrations(client, dir);

    expect(ran).toEqual(['002_offers.sql']);
    expect(statements.slice(2)).toEqual([
      'BEGIN',
      'CREATE TABLE offers ();',
      'INSERT INTO _migrations (filename) VALUES ($1)',
      'COMMIT',
    ]);
    expect(client.query).toHaveBeenCalledWith('INSERT INTO _migrations (filename) VALUES ($1)', ['002_offers.sql']);
  });

  it('rolls back and stops at a failing file', async () => {
    fs.writeFileSync(path.join(dir, '002_offers.sql'), 'BROKEN SQL;');

    await expect(runMigrations(client, dir)).rejects.toThrow('syntax error at or near "BROKEN"');

    expect(statements.slice(2)).toEqual([
      'BEGIN',
      'CREATE TABLE teams ();',
      'INSERT INTO _migrations (filename) VALUES ($1)',
      'COMMIT',
      'BEGIN',
      'BROKEN SQL;',
      'ROLLBACK',
    ]);
  });
});
