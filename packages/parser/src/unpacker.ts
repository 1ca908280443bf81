import yauzl from 'yauzl-promise';
import type { Entry } from 'yauzl-promise';
import { SessionRecord, SessionSource } from './types.js';
import { aggregateSession } from './session-aggregator.js';

export interface SessionEntry {
  session: string;      // session id: the parent directory name
  sessionDir: string;   // full parent path inside the archive
  fileName: string;
}

/**
 * Map a zip entry path to its session: the immediate parent directory of a
 * `.txt` file. Directories and files at the archive root yield null.
 *
 * `logs/23-Aug-25_03-20-07-44/thermal.txt` → session `23-Aug-25_03-20-07-44`
 */
export function sessionEntryFor(entryPath: string): SessionEntry | null {
  if (entryPath.endsWith('/')) return null;

  const segments = entryPath.split('/').filter(Boolean);
  if (segments.length < 2) return null;

  const fileName = segments[segments.length - 1];
  if (!fileName.endsWith('.txt')) return null;

  return {
    session: segments[segments.length - 2],
    sessionDir: segments.slice(0, -1).join('/'),
    fileName,
  };
}

/**
 * Group entry paths by their full parent directory, so equally named sessions
 * under different parents stay apart. Groups are ordered by session id, then
 * by directory.
 */
export function groupSessionEntries(entryPaths: string[]): Map<string, string[]> {
  const groups = new Map<string, { session: string; paths: string[] }>();
  for (const entryPath of entryPaths) {
    const entry = sessionEntryFor(entryPath);
    if (!entry) continue;
    const group = groups.get(entry.sessionDir) ?? { session: entry.session, paths: [] };
    group.paths.push(entryPath);
    groups.set(entry.sessionDir, group);
  }

  const ordered = [...groups.entries()].sort(
    ([dirA, a], [dirB, b]) => a.session.localeCompare(b.session) || dirA.localeCompare(dirB),
  );
  return new Map(ordered.map(([dir, group]) => [dir, group.paths]));
}

/**
 * Unpack a zip of session directories and parse every session in it.
 * All entries are read first; parsing runs once the archive is closed.
 */
export async function loadSessionsFromZip(zipPath: string): Promise<SessionRecord[]> {
  const zipFile = await yauzl.open(zipPath);
  const contents = new Map<string, string>();

  try {
    for await (const entry of zipFile) {
      if (!sessionEntryFor(entry.filename)) continue;
      if (contents.has(entry.filename)) {
        console.warn(`[unpacker] Duplicate entry '${entry.filename}' in ${zipPath} ignored`);
        continue;
      }
      const buffer = await readEntry(entry);
      contents.set(entry.filename, buffer.toString('utf-8'));
    }
  } finally {
    await zipFile.close();
  }

  const groups = groupSessionEntries([...contents.keys()]);
  if (groups.size === 0) {
    throw new Error(`No session files found in zip: ${zipPath}`);
  }

  const sources: SessionSource[] = [...groups.entries()].map(([sessionDir, entryPaths]) => ({
    id: sessionDir.split('/').pop() ?? sessionDir,
    files: entryPaths.map((entryPath) => {
      const text = contents.get(entryPath) ?? '';
      return { name: entryPath.split('/').pop() ?? entryPath, read: () => text };
    }),
  }));

  return sources.map((source) => aggregateSession(source));
}

/**
 * Read a zip entry into a Buffer.
 */
async function readEntry(entry: Entry): Promise<Buffer> {
  const stream = await entry.openReadStream();
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}
