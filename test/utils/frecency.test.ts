import { describe, expect, test } from 'vitest';
import {
  decay,
  evictStale,
  rankByFrequency,
  rankByRecency,
  recordVisit,
} from '../../src/utils/frecency.ts';
import { buildDatabase } from '../helpers/database.ts';

const NOW = 1_700_000_000;
const MAX_AGE = 30 * 24 * 3600;

describe('frecency', () => {
  describe('decay', () => {
    test('multiplies every score by the factor', () => {
      const decayed = decay(new Map([['/a', 2], ['/b', 1]]), 0.5);
      expect([...decayed.entries()]).toEqual([['/a', 1], ['/b', 0.5]]);
    });

    test('does not mutate the input map', () => {
      const input = new Map([['/a', 2]]);
      decay(input, 0.5);
      expect(input.get('/a')).toBe(2);
    });

    test('is a no-op on an empty map', () => {
      expect(decay(new Map()).size).toBe(0);
    });
  });

  describe('recordVisit', () => {
    test('first visit scores 1', () => {
      const db = buildDatabase();
      expect(recordVisit(db, '/a', NOW)).toBe(true);
      expect(db.frequency.get('/a')).toBe(1);
      expect(db.lastVisit.get('/a')).toBe(NOW);
    });

    test('two visits to one directory score 1.99', () => {
      const db = buildDatabase();
      recordVisit(db, '/a', NOW);
      recordVisit(db, '/a', NOW + 10);
      expect(db.frequency.get('/a')).toBeCloseTo(1.99, 10);
      expect(db.lastVisit.get('/a')).toBe(NOW + 10);
    });

    test('visiting another directory decays the rest', () => {
      const db = buildDatabase();
      recordVisit(db, '/a', NOW);
      recordVisit(db, '/b', NOW + 1);
      expect(db.frequency.get('/a')).toBeCloseTo(0.99, 10);
      expect(db.frequency.get('/b')).toBe(1);
      expect(db.lastVisit.get('/a')).toBe(NOW);
    });

    test('uses a custom discount factor', () => {
      const db = buildDatabase({ frequency: { '/a': 4 }, lastVisit: { '/a': NOW } });
      recordVisit(db, '/b', NOW, 0.5);
      expect(db.frequency.get('/a')).toBe(2);
    });

    test('refuses ignored directories', () => {
      const db = buildDatabase({ frequency: { '/a': 3 }, ignored: ['/tmp'] });
      expect(recordVisit(db, '/tmp', NOW)).toBe(false);
      expect(db.frequency.has('/tmp')).toBe(false);
      expect(db.lastVisit.has('/tmp')).toBe(false);
      expect(db.frequency.get('/a')).toBe(3);
    });

    test('scores never go negative', () => {
      const db = buildDatabase();
      for (let i = 0; i < 500; i++) recordVisit(db, i % 2 === 0 ? '/a' : '/b', NOW + i);
      for (const score of db.frequency.values()) expect(score).toBeGreaterThan(0);
    });
  });

  describe('evictStale', () => {
    test('removes directories older than the maximum age from both maps', () => {
      const db = buildDatabase({
        frequency: { '/old': 5, '/new': 1 },
        lastVisit: { '/old': NOW - MAX_AGE - 1, '/new': NOW - 60 },
      });

      expect(evictStale(db, NOW, MAX_AGE)).toEqual(['/old']);
      expect(db.frequency.has('/old')).toBe(false);
      expect(db.lastVisit.has('/old')).toBe(false);
      expect(db.frequency.get('/new')).toBe(1);
    });

    test('keeps a directory visited exactly at the maximum age', () => {
      const db = buildDatabase({ frequency: { '/edge': 1 }, lastVisit: { '/edge': NOW - MAX_AGE } });
      expect(evictStale(db, NOW, MAX_AGE)).toEqual([]);
      expect(db.lastVisit.has('/edge')).toBe(true);
    });

    test('never touches marks or ignored directories', () => {
      const db = buildDatabase({
        marks: { old: '/old' },
        ignored: ['/skip'],
        frequency: { '/old': 1 },
        lastVisit: { '/old': 0 },
      });
      evictStale(db, NOW, MAX_AGE);
      expect(db.marks.get('old')).toBe('/old');
      expect(db.ignored.has('/skip')).toBe(true);
    });

    test('is a no-op on an empty database', () => {
      const db = buildDatabase();
      expect(evictStale(db, NOW)).toEqual([]);
      expect(db.frequency.size).toBe(0);
    });

    test('forgets a stale directory on the next recorded visit', () => {
      const db = buildDatabase({ frequency: { '/old': 2 }, lastVisit: { '/old': NOW - MAX_AGE - 100 } });
      recordVisit(db, '/a', NOW);
      evictStale(db, NOW, MAX_AGE);
      expect([...db.frequency.keys()]).toEqual(['/a']);
      expect([...db.lastVisit.keys()]).toEqual(['/a']);
    });
  });

  describe('ranking', () => {
    const db = buildDatabase({
      frequency: { '/a': 1, '/b': 3, '/c': 1, '/d': 2 },
      lastVisit: { '/a': 40, '/b': 10, '/c': 30, '/d': 20 },
    });

    test('ranks by descending frequency, ties in insertion order', () => {
      expect(rankByFrequency(db)).toEqual(['/b', '/d', '/a', '/c']);
    });

    test('ranks by most recent visit', () => {
      expect(rankByRecency(db)).toEqual(['/a', '/c', '/d', '/b']);
    });
  });
});
