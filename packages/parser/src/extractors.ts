import { CategoryName, CategoryRecordMap, ExtractionResult, ExtractionStage } from './types.js';
import {
  emptyBatterySnapshot,
  emptyCpuRecord,
  emptyMemoryRecord,
  emptyPowerRecord,
  emptyThermalRecord,
  parseBatteryBasic,
  parseCpuInfo,
  parseMemInfo,
  parsePower,
  parseThermal,
} from './dumpsys-parser.js';
import { emptyDeviceIdentity, parseDeviceInfo } from './device-parser.js';
import { emptyProcStatsRecord, parseProcStats } from './procstats-parser.js';
import { emptyUsageStatsRecord, parseUsageStats } from './usagestats-parser.js';
import { emptyBatteryAttributionRecord, parseBatteryStatsDetailed } from './batterystats-parser.js';

interface CategoryExtractor<K extends CategoryName> {
  empty: () => CategoryRecordMap[K];
  parse: (content: string, into: CategoryRecordMap[K]) => CategoryRecordMap[K];
}

const EXTRACTORS: { [K in CategoryName]: CategoryExtractor<K> } = {
  batteryBasic: { empty: emptyBatterySnapshot, parse: parseBatteryBasic },
  deviceInfo: { empty: emptyDeviceIdentity, parse: parseDeviceInfo },
  thermal: { empty: emptyThermalRecord, parse: parseThermal },
  power: { empty: emptyPowerRecord, parse: parsePower },
  cpuInfo: { empty: emptyCpuRecord, parse: parseCpuInfo },
  procStats: { empty: emptyProcStatsRecord, parse: parseProcStats },
  memoryInfo: { empty: emptyMemoryRecord, parse: parseMemInfo },
  usageStats: { empty: emptyUsageStatsRecord, parse: parseUsageStats },
  batteryStatsDetailed: { empty: emptyBatteryAttributionRecord, parse: parseBatteryStatsDetailed },
};

/** Fixed capture filenames, one per category. */
export const CATEGORY_FILES: Readonly<Record<string, CategoryName>> = {
  'battery_basic.txt': 'batteryBasic',
  'device_info.txt': 'deviceInfo',
  'thermal.txt': 'thermal',
  'power.txt': 'power',
  'cpuinfo.txt': 'cpuInfo',
  'procstats.txt': 'procStats',
  'memory_info.txt': 'memoryInfo',
  'usage_stats.txt': 'usageStats',
  'battery_stats_detailed.txt': 'batteryStatsDetailed',
};

export function categoryForFile(fileName: string): CategoryName | null {
  return Object.prototype.hasOwnProperty.call(CATEGORY_FILES, fileName) ? CATEGORY_FILES[fileName] : null;
}

/**
 * Read and parse one capture file. Line endings are normalized to `\n` before
 * parsing, so captures saved with CRLF parse the same as LF ones.
 *
 * Errors never escape: a failed read or parse returns the record built so far
 * together with the failure.
 */
export function extractCategory<K extends CategoryName>(
  category: K,
  file: string,
  read: () => string,
): ExtractionResult<K> {
  const extractor: CategoryExtractor<K> = EXTRACTORS[category];
  const record = extractor.empty();
  let stage: ExtractionStage = 'read';

  try {
    const content = read().replace(/\r\n?/g, '\n');
    stage = 'parse';
    extractor.parse(content, record);
    return { ok: true, category, record };
  } catch (err) {
    return {
      ok: false,
      category,
      record,
      failure: {
        category,
        file,
        stage,
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }
}
