import fs from 'node:fs';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { isValid, parse } from 'date-fns';
import {
  CategoryRecordMap,
  ExtractionFailure,
  ExtractionResult,
  SessionFile,
  SessionRecord,
  SessionSource,
} from './types.js';
import { categoryForFile, extractCategory } from './extractors.js';

// Session directories are named like "23-Aug-25_03-20-07-44"; the optional
// trailing "-44" is sub-second noise.
const SESSION_NAME_FORMAT = 'dd-MMM-yy_HH-mm-ss';
const SESSION_NAME_RE = /^(\d{1,2}-[A-Za-z]{3}-\d{2}_\d{2}-\d{2}-\d{2})(?:-\d{1,3})?$/;

// Two-digit years resolve to 1950–2049.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2000, 0, 1);

/**
 * Parse the capture time encoded in a session directory name (local time).
 * Returns null, with a warning, when the name does not match.
 */
export function parseSessionTimestamp(dirName: string): Date | null {
  const match = dirName.match(SESSION_NAME_RE);
  if (match) {
    const parsed = parse(match[1], SESSION_NAME_FORMAT, TWO_DIGIT_YEAR_REFERENCE);
    if (isValid(parsed)) return parsed;
  }
  console.warn(`[session-aggregator] Could not parse timestamp from '${dirName}'`);
  return null;
}

/**
 * Build one session record from its capture files. Unrecognized filenames are
 * ignored; extraction failures are logged and kept on the record alongside
 * whatever partial data was extracted. A second file for an already stored
 * category is not read: the first record stays and the duplicate is reported
 * as a failure.
 */
export function aggregateSession(source: SessionSource): SessionRecord {
  const categories: Partial<CategoryRecordMap> = {};
  const filesParsed: string[] = [];
  const failures: ExtractionFailure[] = [];

  const files = [...source.files].sort((a, b) => a.name.localeCompare(b.name));
  for (const file of files) {
    const category = categoryForFile(file.name);
    if (!category) continue;

    if (categories[category] !== undefined) {
      const failure: ExtractionFailure = {
        category,
        file: file.name,
        stage: 'duplicate',
        message: 'category already extracted from an earlier file',
      };
      logFailure(source.id, failure);
      failures.push(failure);
      continue;
    }

    const result = extractCategory(category, file.name, file.read);
    storeResult(categories, result);
    filesParsed.push(file.name);

    if (!result.ok) {
      logFailure(source.id, result.failure);
      failures.push(result.failure);
    }
  }

  return deepFreeze({
    id: source.id,
    timestamp: parseSessionTimestamp(source.id),
    filesParsed,
    categories,
    failures,
  });
}

function logFailure(sessionId: string, failure: ExtractionFailure): void {
  console.warn(
    `[session-aggregator] ${sessionId}/${failure.file}: ${failure.stage} failed: ${failure.message}`,
  );
}

/** Freeze a record and every object nested in it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function storeResult<K extends keyof CategoryRecordMap>(
  categories: Partial<CategoryRecordMap>,
  result: ExtractionResult<K>,
): void {
  categories[result.category] = result.record;
}

/**
 * List the session directories directly under `rootDir`. File contents are
 * read lazily, at extraction time.
 */
export function discoverSessions(rootDir: string): SessionSource[] {
  let entries: Dirent[];
  try {
    entries = fs.readdirSync(rootDir, { withFileTypes: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(`[session-aggregator] Logs directory '${rootDir}' not readable: ${reason}`);
    return [];
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ id: name, files: listSessionFiles(path.join(rootDir, name)) }));
}

function listSessionFiles(sessionDir: string): SessionFile[] {
  let names: string[];
  try {
    names = fs.readdirSync(sessionDir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[session-aggregator] Session directory '${sessionDir}' not readable: ${reason}`);
    return [];
  }

  return names
    .filter((name) => name.endsWith('.txt'))
    .map((name) => {
      const filePath = path.join(sessionDir, name);
      return { name, read: () => fs.readFileSync(filePath, 'utf-8') };
    });
}

/** Discover and parse every session under `rootDir`, ordered by directory name. */
export function parseAllSessions(rootDir: string): SessionRecord[] {
  const sources = discoverSessions(rootDir);
  const sessions = sources.map((source) => aggregateSession(source));
  console.log(`[session-aggregator] Parsed ${sessions.length} sessions from ${rootDir}`);
  return sessions;
}
