import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import yazl from 'yazl';
import type { Express } from 'express';

async function writeZip(zipPath: string, files: Record<string, string>): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const [name, content] of Object.entries(files)) {
    zip.addBuffer(Buffer.from(content), name);
  }
  zip.end();
  await pipeline(zip.outputStream, fs.createWriteStream(zipPath));
}

describe('Sessions API', () => {
  let tmp: string;
  let root: string;
  let app: Express;

  beforeAll(async () => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'phonediag-api-'));
    root = path.join(tmp, 'logs');
    process.env.UPLOAD_DIR = path.join(tmp, 'uploads');
    process.env.LOGS_DIR = root;

    const write = (session: string, file: string, content: string) => {
      fs.mkdirSync(path.join(root, session), { recursive: true });
      fs.writeFileSync(path.join(root, session, file), content);
    };
    write('24-Aug-25_08-00-00-01', 'battery_basic.txt', 'Current Battery Service state:\n  level: 80\n  temperature: 301');
    write('23-Aug-25_03-20-07-44', 'battery_basic.txt', 'Current Battery Service state:\n  level: 95');
    write('not-a-timestamp', 'device_info.txt', 'Model: CPH2451');

    const { createApp } = await import('../src/app.js');
    app = createApp();
  });

  afterAll(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
    delete process.env.UPLOAD_DIR;
    delete process.env.LOGS_DIR;
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('GET /api/health should report ok', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should scan a directory and serve its sessions', async () => {
    const scan = await request(app).post('/api/sessions/scan').send({ root });
    expect(scan.status).toBe(200);
    expect(scan.body.sessionCount).toBe(3);

    const res = await request(app).get(`/api/sessions/${scan.body.id}`);
    expect(res.status).toBe(200);
    expect(res.body.source).toBe(root);
    expect(res.body.sessions.map((s: { id: string }) => s.id)).toEqual([
      '23-Aug-25_03-20-07-44',
      '24-Aug-25_08-00-00-01',
      'not-a-timestamp',
    ]);
    expect(res.body.sessions[1].categories.batteryBasic.fields.std_temperature).toEqual({ kind: 'float', value: 30.1 });
    expect(res.body.sessions[2].timestamp).toBeNull();
  });

  it('should scan the logs directory when no root is given', async () => {
    const scan = await request(app).post('/api/sessions/scan').send({});
    expect(scan.status).toBe(200);
    expect(scan.body.sessionCount).toBe(3);
  });

  it('should reject scan roots outside the logs directory', async () => {
    const parent = await request(app).post('/api/sessions/scan').send({ root: '../' });
    expect(parent.status).toBe(400);
    expect(parent.body.error).toBe('Scan root must be inside the logs directory');

    const absolute = await request(app).post('/api/sessions/scan').send({ root: tmp });
    expect(absolute.status).toBe(400);
  });

  it('should serve the summary table in capture order', async () => {
    const scan = await request(app).post('/api/sessions/scan').send({ root });
    const res = await request(app).get(`/api/sessions/${scan.body.id}/summary`);

    expect(res.status).toBe(200);
    const rows: { session: string; metrics: Record<string, unknown> }[] = res.body.rows;
    expect(rows.map((r) => r.session)).toEqual([
      '23-Aug-25_03-20-07-44',
      '24-Aug-25_08-00-00-01',
      'not-a-timestamp',
    ]);
    expect(rows[0].metrics.battery_level).toEqual({ kind: 'integer', value: 95 });
    expect(rows[2].metrics.battery_level).toEqual({ kind: 'absent' });
    expect(rows[2].metrics.model).toEqual({ kind: 'text', value: 'CPH2451' });
  });

  it('should report zero sessions for a missing root', async () => {
    const res = await request(app).post('/api/sessions/scan').send({ root: 'missing' });
    expect(res.status).toBe(200);
    expect(res.body.sessionCount).toBe(0);
  });

  it('should return 404 for an unknown id', async () => {
    const res = await request(app).get('/api/sessions/unknown-id');
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Sessions unknown-id not found');
  });

  it('should return 400 for an id with path characters', async () => {
    const res = await request(app).get('/api/sessions/..%2Fetc/summary');
    expect(res.status).toBe(400);
  });

  it('should return 422 when an upload is not a readable zip', async () => {
    fs.mkdirSync(path.join(tmp, 'uploads'), { recursive: true });
    fs.writeFileSync(path.join(tmp, 'uploads', 'broken.zip'), 'not a zip');

    const res = await request(app).get('/api/sessions/broken');
    expect(res.status).toBe(422);
  });

  it('should parse an uploaded zip on first access', async () => {
    const zipPath = path.join(tmp, 'capture.zip');
    await writeZip(zipPath, {
      'export/23-Aug-25_03-20-07-44/power.txt': 'Power state: ON\nWake Locks: size=2',
      'export/23-Aug-25_03-20-07-44/device_info.txt': 'Model: CPH2451',
    });

    const upload = await request(app).post('/api/upload').attach('file', zipPath);
    expect(upload.status).toBe(200);
    expect(upload.body.filename).toBe('capture.zip');

    const res = await request(app).get(`/api/sessions/${upload.body.id}`);
    expect(res.status).toBe(200);
    expect(res.body.sessions).toHaveLength(1);
    expect(res.body.sessions[0].id).toBe('23-Aug-25_03-20-07-44');
    expect(res.body.sessions[0].categories.power).toEqual({ powerState: 'ON', wakeLocksCount: 2 });

    const summary = await request(app).get(`/api/sessions/${upload.body.id}/summary`);
    expect(summary.body.rows[0].metrics.model).toEqual({ kind: 'text', value: 'CPH2451' });
  });

  it('should reject uploads that are not zip files', async () => {
    const res = await request(app)
      .post('/api/upload')
      .attach('file', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Only .zip files are accepted');
  });
});
