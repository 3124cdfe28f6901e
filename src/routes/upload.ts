import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import { v4 as uuidv4 } from 'uuid';

import type { FileStore } from '../store/files';
import type { UploadResponse } from '../types';

const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export const isPdfUpload = (file: Pick<Express.Multer.File, 'mimetype' | 'originalname'>): boolean =>
  file.mimetype === 'application/pdf' || path.extname(file.originalname).toLowerCase() === '.pdf';

export const createUploadRouter = (files: FileStore, uploadDir: string): Router => {
  const router = Router();

  const filesDir = path.resolve(uploadDir);
  fs.mkdirSync(filesDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, filesDir);
    },
    filename: (_req, file, cb) => {
      cb(null, `${Date.now()}-${path.basename(file.originalname)}`);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: MAX_UPLOAD_BYTES },
    fileFilter: (_req, file, cb) => {
      cb(null, isPdfUpload(file));
    },
  });

  router.post('/', upload.single('document'), (req, res) => {
    const document = req.file;

    if (!document) {
      res.status(400).json({ error: 'A PDF file is required in the "document" field.' });
      return;
    }

    const id = `doc_${uuidv4()}`;
    files.saveFile({
      id,
      name: document.originalname,
      path: path.resolve(document.path),
      uploadedAt: new Date().toISOString(),
    });

    const body: UploadResponse = { files: [{ id, name: document.originalname }] };
    res.json(body);
  });

  return router;
};
