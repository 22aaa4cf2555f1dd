import express, { type Request, type Response } from 'express';
import fs from 'fs';
import multer from 'multer';
import path from 'path';
import { randomUUID } from 'crypto';

import { type ConversionDirection, isConversionDirection } from '../config/formats';
import { InvalidRequestError, toErrorResponse } from '../errors';
import { logFailure, sendError } from '../middleware/errorHandler';
import { ConversionService } from '../services/conversionService';

export interface ConversionRouterOptions {
  uploadsDir: string;
  maxUploadBytes: number;
}

interface BatchResult {
  filename: string;
  file_id?: string;
  status?: 'completed';
  original_name?: string;
  error?: string;
  code?: string;
}

/**
 * Multer reads the multipart filename as latin1; browsers send UTF-8 bytes.
 */
export function decodeOriginalName(file: Express.Multer.File): string {
  return Buffer.from(file.originalname, 'latin1').toString('utf8');
}

export function createConversionRouter(conversionService: ConversionService, options: ConversionRouterOptions): express.Router {
  const router = express.Router();
  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, options.uploadsDir);
    },
    filename: (_req, file, cb) => {
      const extension = path.extname(file.originalname).toLowerCase();
      const uniqueName = `${Date.now()}-${randomUUID()}${extension}`;
      cb(null, uniqueName);
    }
  });
  const upload = multer({ storage, limits: { fileSize: options.maxUploadBytes } });

  async function discardUploads(files: Express.Multer.File[]): Promise<void> {
    await Promise.all(files.map((file) => fs.promises.rm(file.path, { force: true })));
  }

  function createDirectionHandler(direction: ConversionDirection) {
    return async (req: Request, res: Response) => {
      if (!req.file) {
        return sendError(res, new InvalidRequestError('No file provided.'));
      }

      try {
        const artifact = await conversionService.convertUpload({
          sourcePath: req.file.path,
          sourceFilename: decodeOriginalName(req.file),
          direction
        });

        return res.status(200).json({
          file_id: artifact.id,
          status: artifact.status,
          original_name: artifact.displayName
        });
      } catch (error) {
        return sendError(res, error);
      }
    };
  }

  router.post('/docx-to-pdf', upload.single('file'), createDirectionHandler('docx-to-pdf'));
  router.post('/pdf-to-docx', upload.single('file'), createDirectionHandler('pdf-to-docx'));

  router.post('/batch', upload.array('files'), async (req: Request, res: Response) => {
    const files = Array.isArray(req.files) ? req.files : [];
    const rawDirection: unknown = req.body?.direction ?? 'docx-to-pdf';

    if (!isConversionDirection(rawDirection)) {
      await discardUploads(files);
      return sendError(res, new InvalidRequestError(`Unknown conversion direction "${String(rawDirection)}".`));
    }

    if (files.length === 0) {
      return sendError(res, new InvalidRequestError('No files provided.'));
    }

    const direction = rawDirection;
    const results = await Promise.all(files.map(async (file): Promise<BatchResult> => {
      const filename = decodeOriginalName(file);
      try {
        const artifact = await conversionService.convertUpload({
          sourcePath: file.path,
          sourceFilename: filename,
          direction
        });

        return {
          filename,
          file_id: artifact.id,
          status: artifact.status,
          original_name: artifact.displayName
        };
      } catch (error) {
        const { statusCode, body } = toErrorResponse(error);
        logFailure(`Batch conversion of "${filename}" failed`, statusCode, error);
        return { filename, error: body.error, code: body.code };
      }
    }));

    return res.status(200).json({ results });
  });

  return router;
}
