import { Router, Request, Response, NextFunction } from 'express';
import { HttpError } from '../middleware/errorHandler';
import { fixFilename, removeUploads, uploadedFiles, uploadPdfs } from '../middleware/upload';
import { extractPdfText } from '../services/pdfText';
import { extractReceipts, receiptTable } from '../services/receiptBatch';
import { toCsv } from '../services/csvTable';
import { ReceiptDocument } from '../types/receipt';
import { createLogger } from '../utils/logger';

const log = createLogger('receipts');
const router = Router();

async function parseUploadedReceipts(req: Request): Promise<ReceiptDocument[]> {
  const files = uploadedFiles(req.files);
  if (files.length === 0) {
    throw new HttpError('No PDF uploaded (field "files")', 400, 'MISSING_FILE');
  }

  try {
    const documents = await extractReceipts(files.map(file => file.path), extractPdfText);
    // Report the name the client sent rather than the temp upload path
    return documents.map((doc, i) => ({ ...doc, source: fixFilename(files[i].originalname) }));
  } finally {
    await removeUploads(files);
  }
}

// POST /api/receipts/parse: upload PDFs, get the extracted rows as JSON
router.post('/api/receipts/parse', uploadPdfs, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const documents = await parseUploadedReceipts(req);
    const rows = documents.reduce((acc, doc) => acc + doc.records.length, 0);
    log.info(`parse: files=${documents.length}, rows=${rows}`);
    res.json({ documents, rows });
  } catch (error) {
    next(error);
  }
});

// POST /api/receipts/export: upload PDFs, get a CSV of all rows
router.post('/api/receipts/export', uploadPdfs, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const documents = await parseUploadedReceipts(req);
    res.setHeader('Content-Disposition', 'attachment; filename="receipts.csv"');
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.send(toCsv(receiptTable(documents)));
  } catch (error) {
    next(error);
  }
});

export default router;
