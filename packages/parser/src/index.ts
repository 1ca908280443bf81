export * from './types.js';
export { coerceValue, isTemperatureKey, scaleTenths, getField, toCell, ABSENT } from './value-coercer.js';
export { extractSection, parseKeyValueBlock, END_OF_TEXT } from './section-extractor.js';
export type { SectionBoundary, ValueTransform } from './section-extractor.js';
export {
  parseBatteryBasic,
  parseThermal,
  parsePower,
  parseCpuInfo,
  parseMemInfo,
  TENTHS_THRESHOLD,
} from './dumpsys-parser.js';
export { parseDeviceInfo } from './device-parser.js';
export { parseProcStats } from './procstats-parser.js';
export { parseUsageStats } from './usagestats-parser.js';
export { parseBatteryStatsDetailed } from './batterystats-parser.js';
export { CATEGORY_FILES, categoryForFile, extractCategory } from './extractors.js';
export {
  parseSessionTimestamp,
  aggregateSession,
  discoverSessions,
  parseAllSessions,
} from './session-aggregator.js';
export { loadSessionsFromZip, groupSessionEntries, sessionEntryFor } from './unpacker.js';
export type { SessionEntry } from './unpacker.js';
export { projectSummary, projectRow, compareRows, lookupColumn } from './summary-projector.js';
