import { AppBatteryEntry, AppBatteryStats, BatteryAttributionRecord } from './types.js';
import { LineAction, SKIP, StatRule, applyFirstRule, walkEntities } from './entity-walker.js';

const ONE_LEVEL_RE = /^ {2}\S/;
const TWO_LEVELS_RE = /^ {4}/;

const STAT_RULES: readonly StatRule<AppBatteryStats>[] = [
  { re: /Screen: (\d+) ms/, apply: (s, m) => { s.screenTimeMs = parseInt(m[1], 10); } },
  { re: /CPU: (\d+) ms/, apply: (s, m) => { s.cpuTimeMs = parseInt(m[1], 10); } },
  { re: /Wake lock: (\d+) ms/, apply: (s, m) => { s.wakeLockMs = parseInt(m[1], 10); } },
  { re: /Mobile network: (\d+) ms/, apply: (s, m) => { s.mobileNetworkMs = parseInt(m[1], 10); } },
  { re: /Wifi: (\d+) ms/, apply: (s, m) => { s.wifiTimeMs = parseInt(m[1], 10); } },
];

export function emptyBatteryAttributionRecord(): BatteryAttributionRecord {
  return { apps: [], totalApps: 0 };
}

type IndentLevel = 0 | 1 | 2 | 'other';

/**
 * 0 for an unindented line, 1 for exactly two leading spaces, 2 for four or
 * more. Any other prefix (one or three spaces, tabs) is `other`.
 */
function indentLevel(line: string): IndentLevel {
  if (TWO_LEVELS_RE.test(line)) return 2;
  if (ONE_LEVEL_RE.test(line)) return 1;
  if (/^\S/.test(line)) return 0;
  return 'other';
}

/**
 * Parse `dumpsys batterystats` per-app attribution.
 *
 * Layout:
 * ```
 * Statistics since last charge:
 *   com.example.app:
 *     Screen: 120000 ms
 *     CPU: 4500 ms
 * ```
 * A one-level line that is not `<package>:` (and any non-blank top-level
 * line) closes the open app, so its two-level lines are not misattributed.
 * Lines with any other indentation are ignored.
 */
export function parseBatteryStatsDetailed(
  content: string,
  into = emptyBatteryAttributionRecord(),
): BatteryAttributionRecord {
  if (!content) return into;

  const classify = (line: string): LineAction<AppBatteryEntry> => {
    const trimmed = line.trim();
    if (!trimmed) return SKIP;

    const periodMatch = trimmed.match(/^Statistics since (.+?):/);
    if (periodMatch) {
      return { type: 'meta', apply: () => { into.period = periodMatch[1]; } };
    }

    const level = indentLevel(line);
    if (level === 1) {
      const appMatch = trimmed.match(/^(\S+):$/);
      return appMatch
        ? { type: 'open', entity: { packageName: appMatch[1], stats: {} } }
        : { type: 'close' };
    }
    if (level === 2) {
      return { type: 'update', apply: (entity) => { applyFirstRule(STAT_RULES, trimmed, entity.stats); } };
    }
    return level === 0 ? { type: 'close' } : SKIP;
  };

  walkEntities(content.split('\n'), classify, into.apps);
  into.totalApps = into.apps.length;

  const totalScreen = sumField(into.apps, 'screenTimeMs');
  if (totalScreen !== undefined) into.totalScreenTimeMs = totalScreen;
  const totalCpu = sumField(into.apps, 'cpuTimeMs');
  if (totalCpu !== undefined) into.totalCpuTimeMs = totalCpu;
  const totalWake = sumField(into.apps, 'wakeLockMs');
  if (totalWake !== undefined) into.totalWakeLockMs = totalWake;

  return into;
}

/** Sum over apps carrying the field; undefined when none does. */
function sumField(apps: AppBatteryEntry[], field: keyof AppBatteryStats): number | undefined {
  let total: number | undefined;
  for (const app of apps) {
    const value = app.stats[field];
    if (value !== undefined) total = (total ?? 0) + value;
  }
  return total;
}
