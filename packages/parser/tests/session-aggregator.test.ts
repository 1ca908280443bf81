import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  parseSessionTimestamp,
  aggregateSession,
  discoverSessions,
  parseAllSessions,
} from '../src/session-aggregator.js';
import { extractCategory, categoryForFile } from '../src/extractors.js';

describe('parseSessionTimestamp', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should parse the capture time and drop the sub-second suffix', () => {
    expect(parseSessionTimestamp('23-Aug-25_03-20-07-44')).toEqual(new Date(2025, 7, 23, 3, 20, 7));
  });

  it('should accept a name without the suffix', () => {
    expect(parseSessionTimestamp('01-Jan-24_23-59-59')).toEqual(new Date(2024, 0, 1, 23, 59, 59));
  });

  it('should return null and warn for a non-matching name', () => {
    expect(parseSessionTimestamp('not-a-timestamp')).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(
      "[session-aggregator] Could not parse timestamp from 'not-a-timestamp'",
    );
  });

  it('should reject impossible dates', () => {
    expect(parseSessionTimestamp('31-Feb-25_10-00-00-01')).toBeNull();
    expect(parseSessionTimestamp('12-Foo-25_10-00-00-01')).toBeNull();
  });
});

describe('extractCategory', () => {
  it('should map the nine capture filenames', () => {
    expect(categoryForFile('battery_basic.txt')).toBe('batteryBasic');
    expect(categoryForFile('battery_stats_detailed.txt')).toBe('batteryStatsDetailed');
    expect(categoryForFile('notes.txt')).toBeNull();
    expect(categoryForFile('constructor')).toBeNull();
  });

  it('should report a read failure with an empty record', () => {
    const result = extractCategory('power', 'power.txt', () => {
      throw new Error('EACCES: permission denied');
    });
    expect(result).toEqual({
      ok: false,
      category: 'power',
      record: {},
      failure: { category: 'power', file: 'power.txt', stage: 'read', message: 'EACCES: permission denied' },
    });
  });

  it('should return the parsed record on success', () => {
    const result = extractCategory('power', 'power.txt', () => 'Wake Locks: size=2');
    expect(result).toEqual({ ok: true, category: 'power', record: { wakeLocksCount: 2 } });
  });

  it('should parse CRLF captures the same as LF ones', () => {
    const lines = [
      'Current Battery Service state:',
      '  level: 85',
      '  temperature: 235',
      '',
      'Battery history:',
      '  level: 1',
      '  temperature: 999',
    ];
    const lf = extractCategory('batteryBasic', 'battery_basic.txt', () => lines.join('\n'));
    const crlf = extractCategory('batteryBasic', 'battery_basic.txt', () => lines.join('\r\n'));

    expect(crlf).toEqual(lf);
    expect(crlf.record.fields).toEqual({
      std_level: { kind: 'integer', value: 85 },
      std_temperature: { kind: 'float', value: 23.5 },
    });
  });
});

describe('aggregateSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should ignore unrecognized files', () => {
    const session = aggregateSession({
      id: '23-Aug-25_03-20-07-44',
      files: [
        { name: 'screenshot.txt', read: () => 'ignored' },
        { name: 'power.txt', read: () => 'Power state: ON' },
      ],
    });

    expect(session.filesParsed).toEqual(['power.txt']);
    expect(session.categories).toEqual({ power: { powerState: 'ON' } });
    expect(session.failures).toEqual([]);
  });

  it('should keep a failed category and log the failure', () => {
    const session = aggregateSession({
      id: '23-Aug-25_03-20-07-44',
      files: [
        { name: 'thermal.txt', read: () => { throw new Error('disk gone'); } },
        { name: 'power.txt', read: () => 'Wake Locks: size=1' },
      ],
    });

    expect(session.categories.thermal).toEqual({ temperatures: {} });
    expect(session.categories.power).toEqual({ wakeLocksCount: 1 });
    expect(session.failures).toEqual([
      { category: 'thermal', file: 'thermal.txt', stage: 'read', message: 'disk gone' },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      '[session-aggregator] 23-Aug-25_03-20-07-44/thermal.txt: read failed: disk gone',
    );
  });

  it('should keep the first record when a category file appears twice', () => {
    const second = vi.fn(() => 'Wake Locks: size=2');
    const session = aggregateSession({
      id: '23-Aug-25_03-20-07-44',
      files: [
        { name: 'power.txt', read: () => 'Wake Locks: size=1' },
        { name: 'power.txt', read: second },
      ],
    });

    expect(session.categories).toEqual({ power: { wakeLocksCount: 1 } });
    expect(session.filesParsed).toEqual(['power.txt']);
    expect(second).not.toHaveBeenCalled();
    expect(session.failures).toEqual([
      {
        category: 'power',
        file: 'power.txt',
        stage: 'duplicate',
        message: 'category already extracted from an earlier file',
      },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      '[session-aggregator] 23-Aug-25_03-20-07-44/power.txt: duplicate failed: category already extracted from an earlier file',
    );
  });

  it('should produce a deeply frozen record', () => {
    const session = aggregateSession({
      id: '23-Aug-25_03-20-07-44',
      files: [{ name: 'procstats.txt', read: () => '* com.example / u0a12 / v3:\n  TOTAL: 5%' }],
    });

    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.categories)).toBe(true);
    expect(Object.isFrozen(session.filesParsed)).toBe(true);
    expect(Object.isFrozen(session.categories.procStats)).toBe(true);
    expect(Object.isFrozen(session.categories.procStats?.processes[0].stats)).toBe(true);
  });
});

describe('discoverSessions / parseAllSessions', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'phonediag-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeSession(name: string, files: Record<string, string>): void {
    const dir = path.join(root, name);
    fs.mkdirSync(dir);
    for (const [file, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(dir, file), content);
    }
  }

  it('should treat each subdirectory as one session', () => {
    writeSession('23-Aug-25_03-20-07-44', { 'power.txt': 'Power state: ON' });
    writeSession('22-Aug-25_21-00-00-10', {});
    fs.writeFileSync(path.join(root, 'stray.txt'), 'not a session');

    const sources = discoverSessions(root);
    expect(sources.map((s) => s.id)).toEqual(['22-Aug-25_21-00-00-10', '23-Aug-25_03-20-07-44']);
    expect(sources[1].files.map((f) => f.name)).toEqual(['power.txt']);
    expect(sources[1].files[0].read()).toBe('Power state: ON');
  });

  it('should parse a session holding only device info', () => {
    writeSession('23-Aug-25_03-20-07-44', { 'device_info.txt': 'Model: CPH2451\nBrand: OnePlus' });

    const [session] = parseAllSessions(root);
    expect(Object.keys(session.categories)).toEqual(['deviceInfo']);
    expect(session.categories.deviceInfo).toEqual({ model: 'CPH2451', brand: 'OnePlus', properties: {} });
    expect(session.timestamp).toEqual(new Date(2025, 7, 23, 3, 20, 7));
  });

  it('should keep a session whose name is not a timestamp', () => {
    writeSession('not-a-timestamp', { 'power.txt': 'Wake Locks: size=4' });

    const sessions = parseAllSessions(root);
    expect(sessions).toHaveLength(1);
    expect(sessions[0].id).toBe('not-a-timestamp');
    expect(sessions[0].timestamp).toBeNull();
    expect(sessions[0].categories.power).toEqual({ wakeLocksCount: 4 });
    expect(console.warn).toHaveBeenCalledWith(
      "[session-aggregator] Could not parse timestamp from 'not-a-timestamp'",
    );
  });

  it('should return no sessions for a missing root', () => {
    expect(parseAllSessions(path.join(root, 'missing'))).toEqual([]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
