import {
  Cell,
  CategoryName,
  CategoryRecordMap,
  MetricColumn,
  SessionRecord,
  SummaryRow,
  SummaryTable,
} from './types.js';
import { ABSENT, getField, toCell } from './value-coercer.js';

type Categories = Partial<CategoryRecordMap>;

/** Read from one category record; an absent category gives an absent cell. */
function fromCategory<K extends CategoryName>(
  categories: Categories,
  category: K,
  read: (record: CategoryRecordMap[K]) => Cell,
): Cell {
  const record: CategoryRecordMap[K] | undefined = categories[category];
  if (record === undefined) return ABSENT;
  return read(record);
}

function batteryField(categories: Categories, key: string): Cell {
  return fromCategory(categories, 'batteryBasic', (r) => getField(r.fields, key));
}

function sensorValue(categories: Categories, sensor: string): Cell {
  return fromCategory(categories, 'thermal', (r) => toCell(r.temperatures[sensor]?.value, 'float'));
}

/** Flatten one session into a summary row. */
export function projectRow(session: SessionRecord): SummaryRow {
  const c = session.categories;

  const metrics: Record<MetricColumn, Cell> = {
    battery_level: batteryField(c, 'std_level'),
    battery_voltage: batteryField(c, 'std_voltage'),
    battery_temperature: batteryField(c, 'std_temperature'),
    charging_status: batteryField(c, 'std_status'),
    ac_powered: batteryField(c, 'std_AC powered'),
    usb_powered: batteryField(c, 'std_USB powered'),
    phone_temp: batteryField(c, 'oplus_PhoneTemp'),

    model: fromCategory(c, 'deviceInfo', (r) => toCell(r.model)),
    brand: fromCategory(c, 'deviceInfo', (r) => toCell(r.brand)),
    android_version: fromCategory(c, 'deviceInfo', (r) => toCell(r.androidVersion)),

    cpu_temp: sensorValue(c, 'CPU'),
    gpu_temp: sensorValue(c, 'GPU'),
    battery_temp_thermal: sensorValue(c, 'BATTERY'),
    skin_temp: sensorValue(c, 'SKIN'),

    total_processes: fromCategory(c, 'procStats', (r) => toCell(r.totalProcesses, 'integer')),

    total_ram_gb: fromCategory(c, 'memoryInfo', (r) => toCell(r.totalRamGb)),
    used_ram_mb: fromCategory(c, 'memoryInfo', (r) => toCell(r.usedRamMb)),
    ram_usage_percent: fromCategory(c, 'memoryInfo', (r) => toCell(r.ramUsagePercent)),

    total_screen_time_ms: fromCategory(c, 'batteryStatsDetailed', (r) => toCell(r.totalScreenTimeMs, 'integer')),
    total_cpu_time_ms: fromCategory(c, 'batteryStatsDetailed', (r) => toCell(r.totalCpuTimeMs, 'integer')),
    total_wake_lock_ms: fromCategory(c, 'batteryStatsDetailed', (r) => toCell(r.totalWakeLockMs, 'integer')),
  };

  return {
    session: session.id,
    timestamp: session.timestamp,
    filesParsed: session.filesParsed.length,
    metrics,
  };
}

/**
 * Ascending by timestamp; undated rows after every dated row. Ties, and rows
 * that are both undated, order by session id.
 */
export function compareRows(a: SummaryRow, b: SummaryRow): number {
  if (a.timestamp && b.timestamp) {
    const diff = a.timestamp.getTime() - b.timestamp.getTime();
    if (diff !== 0) return diff;
  } else if (a.timestamp) {
    return -1;
  } else if (b.timestamp) {
    return 1;
  }
  return a.session < b.session ? -1 : a.session > b.session ? 1 : 0;
}

/** Project every session into one row and order the rows by capture time. */
export function projectSummary(sessions: readonly SessionRecord[]): SummaryTable {
  return sessions.map((session) => projectRow(session)).sort(compareRows);
}

export function lookupColumn(row: SummaryRow, column: MetricColumn): Cell {
  return row.metrics[column];
}
