import { Router, Request, Response } from 'express';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { loadSessionsFromZip, parseAllSessions, projectSummary } from '@phonediag/parser';
import { getConfig } from '../config.js';
import { SessionStore, StoredSessions } from '../store.js';

const ID_RE = /^[\w-]+$/;

type Lookup =
  | { found: true; entry: StoredSessions }
  | { found: false; status: number; error: string };

/**
 * Find a stored collection, parsing an uploaded zip on first access.
 */
/**
 * Resolve a requested scan root inside the logs directory. Relative roots are
 * taken from the logs directory; anything outside it yields null.
 */
export function resolveScanRoot(logsDir: string, requested: string | undefined): string | null {
  const base = path.resolve(logsDir);
  const root = path.resolve(base, requested ?? '.');
  const relative = path.relative(base, root);
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
  return escapes ? null : root;
}

async function resolveSessions(store: SessionStore, id: string): Promise<Lookup> {
  if (!ID_RE.test(id)) return { found: false, status: 400, error: `Invalid id: ${id}` };

  const cached = store.get(id);
  if (cached) return { found: true, entry: cached };

  const zipPath = path.join(getConfig().uploadDir, `${id}.zip`);
  if (!fs.existsSync(zipPath)) {
    return { found: false, status: 404, error: `Sessions ${id} not found` };
  }

  try {
    const sessions = await loadSessionsFromZip(zipPath);
    const entry = { source: zipPath, sessions };
    store.set(id, entry);
    console.log(`[sessions] Parsed ${sessions.length} sessions from upload ${id}`);
    return { found: true, entry };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[sessions] Failed to unpack upload ${id}: ${message}`);
    return { found: false, status: 422, error: message };
  }
}

export function createSessionsRouter(store: SessionStore): Router {
  const router = Router();

  /**
   * POST /api/sessions/scan
   * Parse every session directory under `root`, a path inside LOGS_DIR
   * (default: LOGS_DIR itself). A missing root yields zero sessions, not an
   * error; a root outside LOGS_DIR is rejected.
   */
  router.post('/scan', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const requested = typeof body === 'object' && body !== null && 'root' in body ? body.root : undefined;
    const root = resolveScanRoot(
      getConfig().logsDir,
      typeof requested === 'string' && requested ? requested : undefined,
    );
    if (root === null) {
      res.status(400).json({ error: 'Scan root must be inside the logs directory' });
      return;
    }

    const sessions = parseAllSessions(root);
    const id = crypto.randomUUID();
    store.set(id, { source: root, sessions });

    res.json({ id, sessionCount: sessions.length });
  });

  /**
   * GET /api/sessions/:id
   * Session records with their nested category data.
   */
  router.get('/:id', async (req: Request, res: Response) => {
    const lookup = await resolveSessions(store, String(req.params.id));
    if (!lookup.found) {
      res.status(lookup.status).json({ error: lookup.error });
      return;
    }
    res.json(lookup.entry);
  });

  /**
   * GET /api/sessions/:id/summary
   * One row per session, ordered by capture time.
   */
  router.get('/:id/summary', async (req: Request, res: Response) => {
    const lookup = await resolveSessions(store, String(req.params.id));
    if (!lookup.found) {
      res.status(lookup.status).json({ error: lookup.error });
      return;
    }
    res.json({ rows: projectSummary(lookup.entry.sessions) });
  });

  return router;
}
