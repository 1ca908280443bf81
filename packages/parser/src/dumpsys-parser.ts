import {
  AppMemory,
  BatterySnapshot,
  CpuProcess,
  CpuRecord,
  FieldValue,
  MemoryRecord,
  PowerRecord,
  ThermalRecord,
} from './types.js';
import { extractSection, parseKeyValueBlock } from './section-extractor.js';
import { isTemperatureKey, scaleTenths } from './value-coercer.js';

const VENDOR_BATTERY_HEADER = 'Current OPLUS Battery Service state:';
const BATTERY_HEADER = 'Current Battery Service state:';

export function emptyBatterySnapshot(): BatterySnapshot {
  return { fields: {} };
}

function scaleTemperature(key: string, value: FieldValue): FieldValue {
  return isTemperatureKey(key) ? scaleTenths(value) : value;
}

/**
 * Parse `dumpsys battery` output.
 *
 * Two sibling blocks may share field names (`level`, `temperature`), so each
 * is isolated first and namespaced:
 * - vendor block → `oplus_<key>`
 * - standard block (up to the first blank line) → `std_<key>`
 */
export function parseBatteryBasic(content: string, into = emptyBatterySnapshot()): BatterySnapshot {
  if (!content) return into;

  const vendorBlock = extractSection(content, VENDOR_BATTERY_HEADER, BATTERY_HEADER);
  if (vendorBlock !== null) {
    parseKeyValueBlock(vendorBlock, 'oplus_', scaleTemperature, into.fields);
  }

  const standardBlock = extractSection(content, BATTERY_HEADER, /\n[ \t]*\n/);
  if (standardBlock !== null) {
    parseKeyValueBlock(standardBlock, 'std_', scaleTemperature, into.fields);
  }

  return into;
}

// ============================================================
// Thermal
// ============================================================

// Format: "Temperature{mValue=35.5, mType=0, mName=CPU, mStatus=0}"
const TEMPERATURE_RE = /Temperature\{mValue=([\d.]+), mType=(\d+), mName=([^,}]+)/g;
const THERMAL_STATUS_RE = /Thermal Status: (\d+)/;

/** Sensor readings above this are taken to be tenths of a degree. */
export const TENTHS_THRESHOLD = 100;

export function emptyThermalRecord(): ThermalRecord {
  return { temperatures: {} };
}

/**
 * Parse `dumpsys thermalservice` output.
 *
 * Readings above {@link TENTHS_THRESHOLD} are divided by 10. This is a
 * heuristic for devices reporting tenths of a degree; a genuine reading above
 * 100°C would be misread.
 */
export function parseThermal(content: string, into = emptyThermalRecord()): ThermalRecord {
  if (!content) return into;

  for (const match of content.matchAll(TEMPERATURE_RE)) {
    let value = parseFloat(match[1]);
    if (Number.isNaN(value)) continue;
    if (value > TENTHS_THRESHOLD) value = value / 10;

    into.temperatures[match[3].trim()] = {
      value,
      type: parseInt(match[2], 10),
    };
  }

  const statusMatch = content.match(THERMAL_STATUS_RE);
  if (statusMatch) into.thermalStatus = parseInt(statusMatch[1], 10);

  return into;
}

// ============================================================
// Power
// ============================================================

export function emptyPowerRecord(): PowerRecord {
  return {};
}

/** Parse `dumpsys power`: the power state line and the wake lock count. */
export function parsePower(content: string, into = emptyPowerRecord()): PowerRecord {
  if (!content) return into;

  const stateMatch = content.match(/Power state: (.+)/);
  if (stateMatch) into.powerState = stateMatch[1].trim();

  const wakeLockMatch = content.match(/Wake Locks: size=(\d+)/);
  if (wakeLockMatch) into.wakeLocksCount = parseInt(wakeLockMatch[1], 10);

  return into;
}

// ============================================================
// CPU
// ============================================================

const TOP_N = 10;

const CPU_LOAD_RE = /Total: (\d+)%/;
const CPU_FREQUENCY_RE = /CPU(\d+): (\d+)MHz/g;
const CPU_TOTAL_RE = /([\d.]+)%\s+TOTAL:\s*([\d.]+)%\s+user\s*\+\s*([\d.]+)%\s+kernel(?:\s*\+\s*([\d.]+)%\s+iowait)?/;
const CPU_PROCESS_RE = /^([\d.]+)%\s+(\d+)\/([^:]+):\s*[\d.]+%\s+user\s*\+\s*[\d.]+%\s+kernel/;

/** The largest `limit` items by `score`, largest first. */
function topBy<T>(items: readonly T[], score: (item: T) => number, limit = TOP_N): T[] {
  return [...items].sort((a, b) => score(b) - score(a)).slice(0, limit);
}

/** One row per line of `block` whose trimmed text matches `re`. */
function rowsMatching<T>(block: string, re: RegExp, build: (match: RegExpMatchArray) => T): T[] {
  const rows: T[] = [];
  for (const line of block.split('\n')) {
    const match = line.trim().match(re);
    if (match) rows.push(build(match));
  }
  return rows;
}

export function emptyCpuRecord(): CpuRecord {
  return { topProcesses: [] };
}

/**
 * Parse CPU load and clock information.
 *
 * Looks for:
 * - overall load: `Total: 42%`
 * - per-core clocks: `CPU0: 1804MHz`
 * - `dumpsys cpuinfo` TOTAL line: `34% TOTAL: 18% user + 12% kernel + 2.1% iowait`
 * - per-process lines: `18% 1234/system_server: 12% user + 6% kernel`
 */
export function parseCpuInfo(content: string, into = emptyCpuRecord()): CpuRecord {
  if (!content) return into;

  const loadMatch = content.match(CPU_LOAD_RE);
  if (loadMatch) into.cpuLoadTotal = parseInt(loadMatch[1], 10);

  const frequencies: Record<string, number> = {};
  let coreCount = 0;
  for (const match of content.matchAll(CPU_FREQUENCY_RE)) {
    frequencies[`CPU${match[1]}`] = parseInt(match[2], 10);
    coreCount++;
  }
  if (coreCount > 0) into.frequencies = frequencies;

  const totalMatch = content.match(CPU_TOTAL_RE);
  if (totalMatch) {
    into.usage = {
      total: parseFloat(totalMatch[1]),
      user: parseFloat(totalMatch[2]),
      kernel: parseFloat(totalMatch[3]),
    };
    if (totalMatch[4]) into.usage.ioWait = parseFloat(totalMatch[4]);
  }

  const processes = rowsMatching(content, CPU_PROCESS_RE, (m): CpuProcess => ({
    pid: parseInt(m[2], 10),
    processName: m[3].trim(),
    cpuPercent: parseFloat(m[1]),
  }));
  into.topProcesses = topBy(processes, (p) => p.cpuPercent);

  return into;
}

// ============================================================
// Memory
// ============================================================

const TOTAL_RAM_RE = /Total RAM: ([\d,]+)\s*K/;
const FREE_RAM_RE = /Free RAM: ([\d,]+)\s*K/;

// "    312,456K: com.android.systemui (pid 1234 / activities)"
const PSS_HEADER = 'Total PSS by process:';
const PSS_END_RE = /\n[ \t]*\n|\nTotal PSS by (?:OOM|category)/;
const PSS_ROW_RE = /^([\d,]+)K:\s*(.+?)\s*\(pid\s+(\d+)/;

export function emptyMemoryRecord(): MemoryRecord {
  return { appMemory: [], topMemoryApps: [] };
}

/**
 * Parse `dumpsys meminfo`: RAM totals and the per-process PSS breakdown.
 * Used RAM and usage percent are derived only when both totals are present.
 */
export function parseMemInfo(content: string, into = emptyMemoryRecord()): MemoryRecord {
  if (!content) return into;

  const totalMatch = content.match(TOTAL_RAM_RE);
  if (totalMatch) {
    into.totalRamKb = parseKbValue(totalMatch[1]);
    into.totalRamMb = into.totalRamKb / 1024;
    into.totalRamGb = into.totalRamMb / 1024;
  }

  const freeMatch = content.match(FREE_RAM_RE);
  if (freeMatch) {
    into.freeRamKb = parseKbValue(freeMatch[1]);
    into.freeRamMb = into.freeRamKb / 1024;
  }

  if (into.totalRamMb !== undefined && into.freeRamMb !== undefined && into.totalRamMb > 0) {
    into.usedRamMb = into.totalRamMb - into.freeRamMb;
    into.ramUsagePercent = (into.usedRamMb / into.totalRamMb) * 100;
  }

  const pssBlock = extractSection(content, PSS_HEADER, PSS_END_RE);
  if (pssBlock !== null) {
    into.appMemory = rowsMatching(pssBlock, PSS_ROW_RE, (m): AppMemory => {
      const memoryKb = parseKbValue(m[1]);
      return { processName: m[2], pid: parseInt(m[3], 10), memoryKb, memoryMb: memoryKb / 1024 };
    });
    into.topMemoryApps = topBy(into.appMemory, (app) => app.memoryKb);
  }

  return into;
}

/** "5,832,568" → 5832568 */
function parseKbValue(text: string): number {
  return parseInt(text.replace(/,/g, ''), 10);
}
