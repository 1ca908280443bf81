import { AppUsageEntry, AppUsageStats, UsageStatsRecord } from './types.js';
import { LineAction, SKIP, StatRule, applyFirstRule, walkEntities } from './entity-walker.js';

// Durations stay opaque strings ("1h 2m 3s", "+5m12s340ms").
const STAT_RULES: readonly StatRule<AppUsageStats>[] = [
  {
    re: /Total time in foreground: (.+)/,
    apply: (stats, m) => { stats.foregroundTime = m[1].trim(); },
  },
  {
    re: /Total time visible: (.+)/,
    apply: (stats, m) => { stats.visibleTime = m[1].trim(); },
  },
  {
    re: /Total time in background: (.+)/,
    apply: (stats, m) => { stats.backgroundTime = m[1].trim(); },
  },
];

export function emptyUsageStatsRecord(): UsageStatsRecord {
  return { apps: [], totalApps: 0 };
}

export function classifyUsageStatsLine(line: string): LineAction<AppUsageEntry> {
  const trimmed = line.trim();

  if (trimmed.startsWith('Package ') && trimmed.includes(':')) {
    const match = trimmed.match(/^Package (\S+)/);
    if (!match) return SKIP;
    return {
      type: 'open',
      entity: { packageName: match[1].replace(/:$/, ''), stats: {} },
    };
  }

  if (!trimmed.includes(':')) return SKIP;
  return {
    type: 'update',
    apply: (entity) => { applyFirstRule(STAT_RULES, trimmed, entity.stats); },
  };
}

/** Parse `dumpsys usagestats` into per-app time-in-state entries. */
export function parseUsageStats(content: string, into = emptyUsageStatsRecord()): UsageStatsRecord {
  if (!content) return into;

  walkEntities(content.split('\n'), classifyUsageStatsLine, into.apps);
  into.totalApps = into.apps.length;
  return into;
}
