import fs from 'fs';
import { Router, Request, Response, NextFunction } from 'express';
import { HttpError } from '../middleware/errorHandler';
import { fixFilename, removeUploads, uploadCsvs, uploadedFiles } from '../middleware/upload';
import { readCsvBuffer, toCsv } from '../services/csvTable';
import { mergeTables } from '../services/tableMerger';

const router = Router();

function isTruthy(value: unknown): boolean {
  return typeof value === 'string' && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

// POST /api/tables/merge: upload CSVs with the same columns, get one merged CSV
router.post('/api/tables/merge', uploadCsvs, async (req: Request, res: Response, next: NextFunction) => {
  const files = uploadedFiles(req.files);
  try {
    if (files.length === 0) {
      throw new HttpError('No CSV uploaded (field "files")', 400, 'MISSING_FILE');
    }

    // Uploads arrive in form order; merge them in name order like a folder merge
    const tables = files
      .map(file => readCsvBuffer(fixFilename(file.originalname), fs.readFileSync(file.path)))
      .sort((a, b) => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0));

    const sortBy = typeof req.body.sortBy === 'string' && req.body.sortBy ? req.body.sortBy : null;
    const merged = mergeTables(tables, { dedupe: isTruthy(req.body.dedupe), sortBy });

    res.setHeader('Content-Disposition', 'attachment; filename="merged.csv"');
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.send(toCsv([merged.header, ...merged.rows]));
  } catch (error) {
    next(error);
  } finally {
    await removeUploads(files);
  }
});

export default router;
