// ============================================================
// Field Values
// ============================================================

export type FieldValue =
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'text'; value: string };

export interface AbsentValue {
  kind: 'absent';
}

/** A field lookup result. `absent` means unknown, never zero. */
export type Cell = FieldValue | AbsentValue;

/** Dynamic key/value record. A missing key is an absent field. */
export type FieldMap = Record<string, FieldValue>;

// ============================================================
// Category Records
// ============================================================

export interface BatterySnapshot {
  fields: FieldMap;   // oplus_<key> (vendor block), std_<key> (standard block)
}

export interface DeviceIdentity {
  model?: string;
  brand?: string;
  androidVersion?: string;
  properties: FieldMap;   // prop_<name>
}

export interface SensorReading {
  value: number;   // °C
  type: number;
}

export interface ThermalRecord {
  temperatures: Record<string, SensorReading>;
  thermalStatus?: number;
}

export interface PowerRecord {
  powerState?: string;
  wakeLocksCount?: number;
}

export interface CpuUsage {
  total: number;
  user: number;
  kernel: number;
  ioWait?: number;
}

export interface CpuProcess {
  pid: number;
  processName: string;
  cpuPercent: number;
}

export interface CpuRecord {
  cpuLoadTotal?: number;
  frequencies?: Record<string, number>;   // "CPU0" → MHz
  usage?: CpuUsage;
  topProcesses: CpuProcess[];
}

export interface ProcessStats {
  totalPercent?: number;
  totalMemory?: string;   // "12MB-12MB-12MB/1.1MB-2.1MB-3.1MB/41MB-41MB-42MB over 5"
  persistentPercent?: number;
  boundForegroundPercent?: number;
  servicePercent?: number;
}

export interface ProcessEntry {
  packageName: string;
  user: string;
  version: string;
  stats: ProcessStats;
}

export interface ProcStatsRecord {
  processes: ProcessEntry[];
  totalProcesses: number;
}

export interface AppMemory {
  processName: string;
  pid: number;
  memoryKb: number;
  memoryMb: number;
}

export interface MemoryRecord {
  totalRamKb?: number;
  totalRamMb?: number;
  totalRamGb?: number;
  freeRamKb?: number;
  freeRamMb?: number;
  usedRamMb?: number;
  ramUsagePercent?: number;
  appMemory: AppMemory[];
  topMemoryApps: AppMemory[];
}

export interface AppUsageStats {
  foregroundTime?: string;
  visibleTime?: string;
  backgroundTime?: string;
}

export interface AppUsageEntry {
  packageName: string;
  stats: AppUsageStats;
}

export interface UsageStatsRecord {
  apps: AppUsageEntry[];
  totalApps: number;
}

export interface AppBatteryStats {
  screenTimeMs?: number;
  cpuTimeMs?: number;
  wakeLockMs?: number;
  mobileNetworkMs?: number;
  wifiTimeMs?: number;
}

export interface AppBatteryEntry {
  packageName: string;
  stats: AppBatteryStats;
}

export interface BatteryAttributionRecord {
  period?: string;   // "last charge", "last unplugged"
  apps: AppBatteryEntry[];
  totalApps: number;
  totalScreenTimeMs?: number;
  totalCpuTimeMs?: number;
  totalWakeLockMs?: number;
}

export interface CategoryRecordMap {
  batteryBasic: BatterySnapshot;
  deviceInfo: DeviceIdentity;
  thermal: ThermalRecord;
  power: PowerRecord;
  cpuInfo: CpuRecord;
  procStats: ProcStatsRecord;
  memoryInfo: MemoryRecord;
  usageStats: UsageStatsRecord;
  batteryStatsDetailed: BatteryAttributionRecord;
}

export type CategoryName = keyof CategoryRecordMap;

// ============================================================
// Extraction
// ============================================================

export type ExtractionStage = 'read' | 'parse' | 'duplicate';

export interface ExtractionFailure {
  category: CategoryName;
  file: string;
  stage: ExtractionStage;
  message: string;
}

/** On failure, `record` holds whatever was extracted before the error. */
export type ExtractionResult<K extends CategoryName = CategoryName> =
  | { ok: true; category: K; record: CategoryRecordMap[K] }
  | { ok: false; category: K; record: CategoryRecordMap[K]; failure: ExtractionFailure };

// ============================================================
// Sessions
// ============================================================

export interface SessionFile {
  name: string;
  read: () => string;
}

export interface SessionSource {
  id: string;
  files: SessionFile[];
}

export interface SessionRecord {
  readonly id: string;
  readonly timestamp: Date | null;
  readonly filesParsed: readonly string[];
  readonly categories: Readonly<Partial<CategoryRecordMap>>;
  readonly failures: readonly ExtractionFailure[];
}

// ============================================================
// Summary Table
// ============================================================

export const METRIC_COLUMNS = [
  'battery_level',
  'battery_voltage',
  'battery_temperature',
  'charging_status',
  'ac_powered',
  'usb_powered',
  'phone_temp',
  'model',
  'brand',
  'android_version',
  'cpu_temp',
  'gpu_temp',
  'battery_temp_thermal',
  'skin_temp',
  'total_processes',
  'total_ram_gb',
  'used_ram_mb',
  'ram_usage_percent',
  'total_screen_time_ms',
  'total_cpu_time_ms',
  'total_wake_lock_ms',
] as const;

export type MetricColumn = (typeof METRIC_COLUMNS)[number];

export interface SummaryRow {
  session: string;
  timestamp: Date | null;
  filesParsed: number;
  metrics: Record<MetricColumn, Cell>;
}

export type SummaryTable = SummaryRow[];
