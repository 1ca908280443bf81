import { ProcessEntry, ProcessStats, ProcStatsRecord } from './types.js';
import { LineAction, SKIP, StatRule, applyFirstRule, walkEntities } from './entity-walker.js';

// Stat lines under a process header:
//   TOTAL: 100% (12MB-12MB-12MB/1.1MB-2.1MB-3.1MB/41MB-41MB-42MB over 5)
//   Persistent: 100% (...)
//   Bnd Fgs: 12% (...)
//   Service: 3.1% (...)
const STAT_RULES: readonly StatRule<ProcessStats>[] = [
  {
    re: /TOTAL:\s*(\d+)%(?:\s*\(([^)]+)\))?/,
    apply: (stats, m) => {
      stats.totalPercent = parseInt(m[1], 10);
      if (m[2] !== undefined) stats.totalMemory = m[2];
    },
  },
  {
    re: /Persistent:\s*(\d+)%/,
    apply: (stats, m) => { stats.persistentPercent = parseInt(m[1], 10); },
  },
  {
    re: /Bnd Fgs:\s*(\d+)%/,
    apply: (stats, m) => { stats.boundForegroundPercent = parseInt(m[1], 10); },
  },
  {
    re: /Service:\s*(\d+)%/,
    apply: (stats, m) => { stats.servicePercent = parseInt(m[1], 10); },
  },
];

export function emptyProcStatsRecord(): ProcStatsRecord {
  return { processes: [], totalProcesses: 0 };
}

/**
 * Classify one procstats line. A process header looks like
 * `* com.android.systemui / u0a123 / v34:`.
 */
export function classifyProcStatsLine(line: string): LineAction<ProcessEntry> {
  const trimmed = line.trim();

  if (trimmed.startsWith('*') && trimmed.includes(' / ')) {
    const parts = trimmed.split(' / ');
    if (parts.length < 3) return SKIP;
    return {
      type: 'open',
      entity: {
        packageName: parts[0].replace(/^\*\s*/, '').trim(),
        user: parts[1].trim(),
        version: parts[2].replace(/:/g, '').trim(),
        stats: {},
      },
    };
  }

  if (!trimmed.includes(':')) return SKIP;
  return {
    type: 'update',
    apply: (entity) => { applyFirstRule(STAT_RULES, trimmed, entity.stats); },
  };
}

/** Parse `dumpsys procstats` into per-process entries, in file order. */
export function parseProcStats(content: string, into = emptyProcStatsRecord()): ProcStatsRecord {
  if (!content) return into;

  walkEntities(content.split('\n'), classifyProcStatsLine, into.processes);
  into.totalProcesses = into.processes.length;
  return into;
}
