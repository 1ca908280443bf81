import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import crypto from 'node:crypto';
import { getConfig } from '../config.js';

function getUpload() {
  const config = getConfig();
  fs.mkdirSync(config.uploadDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: config.uploadDir,
    filename: (_req, _file, cb) => {
      cb(null, `${crypto.randomUUID()}.zip`);
    },
  });

  return multer({
    storage,
    limits: { fileSize: config.maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (file.mimetype === 'application/zip' ||
          file.mimetype === 'application/x-zip-compressed' ||
          file.originalname.endsWith('.zip')) {
        cb(null, true);
      } else {
        cb(new Error('Only .zip files are accepted'));
      }
    },
  });
}

export function createUploadRouter(): Router {
  const router = Router();

  /**
   * POST /api/upload
   * Upload a zip of session directories. Parsing happens on the first
   * GET /api/sessions/:id.
   * Returns { id, filename, size }.
   */
  router.post('/', (req: Request, res: Response) => {
    const upload = getUpload();
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        res.status(400).json({ error: message });
        return;
      }

      if (!req.file) {
        res.status(400).json({ error: 'No file uploaded' });
        return;
      }

      const id = path.basename(req.file.filename, path.extname(req.file.filename));
      console.log(`[upload] Stored ${req.file.originalname} as ${id}`);

      res.json({
        id,
        filename: req.file.originalname,
        size: req.file.size,
      });
    });
  });

  return router;
}
