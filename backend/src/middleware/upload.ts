import fs from 'fs';
import path from 'path';
import multer from 'multer';
import { config } from '../config';
import { HttpError } from './errorHandler';

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    fs.mkdir(config.uploadPath, { recursive: true }, err => cb(err, config.uploadPath));
  },
  filename: (_req, file, cb) => {
    const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
    cb(null, uniqueSuffix + path.extname(file.originalname).toLowerCase());
  },
});

function uploadFor(extension: string): multer.Multer {
  return multer({
    storage,
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (ext === extension) {
        cb(null, true);
      } else {
        cb(new HttpError(`Only ${extension} files are accepted: ${file.originalname}`, 400, 'INVALID_FILE_TYPE'));
      }
    },
    limits: { fileSize: config.maxUploadMb * 1024 * 1024 },
  });
}

export const uploadPdfs = uploadFor('.pdf').array('files', 100);
export const uploadCsvs = uploadFor('.csv').array('files', 100);

// Fix garbled non-ASCII filenames (multer decodes them as latin1)
export function fixFilename(originalname: string): string {
  const fixed = Buffer.from(originalname, 'latin1').toString('utf8');
  return fixed.includes('\ufffd') ? originalname : fixed;
}

export function uploadedFiles(files: Express.Request['files']): Express.Multer.File[] {
  if (!files) return [];
  return Array.isArray(files) ? files : Object.values(files).flat();
}

/** Remove uploaded temp files once a request is done with them. */
export async function removeUploads(files: Express.Multer.File[]): Promise<void> {
  await Promise.all(files.map(file => fs.promises.rm(file.path, { force: true })));
}
