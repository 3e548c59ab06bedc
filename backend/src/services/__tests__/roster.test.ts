import { describe, it, expect } from '@jest/globals';
import bcrypt from 'bcryptjs';
import { INDUSTRIES } from '../../types';
import { defaultRoster, toSeeds } from '../roster';

describe('roster', () => {
  it('bundles four teams for every industry', () => {
    const roster = defaultRoster('test-secret');

    expect(roster).toHaveLength(20);
    for (const industry of INDUSTRIES) {
      expect(roster.filter((t) => t.industry === industry)).toHaveLength(4);
    }
    expect(new Set(roster.map((t) => t.username)).size).toBe(20);
    expect(roster.every((t) => t.password === 'test-secret')).toBe(true);
  });

  it('hashes passwords before they become seeds', async () => {
    const [seed] = await toSeeds(
      [{ name: 'Golf Smelting', username: 'golf', industry: 'Aluminium', password: 'test-secret' }],
      4
    );

    expect(seed.name).toBe('Golf Smelting');
    expect(Object.keys(seed)).not.toContain('password');
    expect(seed.password_hash).not.toBe('test-secret');
    expect(bcrypt.compareSync('test-secret', seed.password_hash)).toBe(true);
  });
});
