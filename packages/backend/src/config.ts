export interface AppConfig {
  port: number;
  uploadDir: string;
  maxFileSize: number; // bytes
  logsDir: string;     // default root scanned for session directories
  sessionTtlMs: number;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(env('PORT', '8000'), 10),
    uploadDir: env('UPLOAD_DIR', '/tmp/phonediag-uploads'),
    maxFileSize: parseInt(env('MAX_FILE_SIZE', String(200 * 1024 * 1024)), 10), // 200MB
    logsDir: env('LOGS_DIR', 'logs'),
    sessionTtlMs: parseInt(env('SESSION_TTL_MS', String(60 * 60 * 1000)), 10), // 1 hour
  };
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}
