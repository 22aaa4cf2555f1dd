import express, { type Request, type Response } from 'express';
import fs from 'fs';
import JSZip from 'jszip';
import path from 'path';

import { InvalidRequestError, NotFoundError } from '../errors';
import { sendError } from '../middleware/errorHandler';
import { ArtifactStore } from '../services/artifactStore';
import { ConvertedArtifact } from '../types/artifact';

export const BULK_ARCHIVE_NAME = 'converted_files.zip';

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Accepts `file_ids` either as a JSON array (JSON body) or as a JSON-encoded
 * string (form post from the browser).
 */
export function parseFileIds(body: unknown): string[] {
  const raw: unknown = typeof body === 'object' && body !== null && 'file_ids' in body
    ? body.file_ids
    : undefined;

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new InvalidRequestError('file_ids must be a JSON array of file identifiers.');
    }
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidRequestError('file_ids must be a JSON array of file identifiers.');
  }

  if (value.length === 0) {
    throw new InvalidRequestError('No files specified.');
  }

  return Array.from(new Set(value));
}

/**
 * Entry names for the archive. Repeated display names get " (n)" before the
 * extension so no entry replaces another.
 */
export function assignEntryNames(artifacts: readonly ConvertedArtifact[]): Map<string, string> {
  const used = new Set<string>();
  const names = new Map<string, string>();

  for (const artifact of artifacts) {
    const parsed = path.parse(artifact.displayName);
    let candidate = artifact.displayName;
    let counter = 1;

    while (used.has(candidate.toLowerCase())) {
      candidate = `${parsed.name} (${counter})${parsed.ext}`;
      counter += 1;
    }

    used.add(candidate.toLowerCase());
    names.set(artifact.id, candidate);
  }

  return names;
}

export function createDownloadRouter(artifactStore: ArtifactStore): express.Router {
  const router = express.Router();

  router.post('/bulk', async (req: Request, res: Response) => {
    try {
      const fileIds = parseFileIds(req.body);

      const resolved: ConvertedArtifact[] = [];
      for (const fileId of fileIds) {
        const artifact = artifactStore.get(fileId);
        if (artifact && await fileExists(artifact.outputPath)) {
          resolved.push(artifact);
        }
      }

      if (resolved.length === 0) {
        throw new NotFoundError('None of the requested files were found.');
      }

      const zip = new JSZip();
      const entryNames = assignEntryNames(resolved);
      for (const artifact of resolved) {
        zip.file(entryNames.get(artifact.id) ?? artifact.displayName, fs.createReadStream(artifact.outputPath));
      }

      res.attachment(BULK_ARCHIVE_NAME);

      const archiveStream = zip.generateNodeStream({ type: 'nodebuffer', streamFiles: true, compression: 'DEFLATE' });
      archiveStream.on('error', (error: Error) => {
        // eslint-disable-next-line no-console
        console.error(`Failed to build archive: ${error.message}`);
        if (!res.headersSent) {
          sendError(res, error);
        } else {
          res.destroy(error);
        }
      });

      archiveStream.pipe(res);
      return undefined;
    } catch (error) {
      return sendError(res, error);
    }
  });

  router.get('/:fileId', async (req: Request, res: Response) => {
    const { fileId } = req.params;
    const artifact = artifactStore.get(fileId);

    if (!artifact || !(await fileExists(artifact.outputPath))) {
      return sendError(res, new NotFoundError('File not found.'));
    }

    res.attachment(artifact.displayName);

    const readStream = fs.createReadStream(artifact.outputPath);
    readStream.on('error', (error: NodeJS.ErrnoException) => {
      if (!res.headersSent) {
        const status = error.code === 'ENOENT' ? 404 : 500;
        res.status(status).json({ error: 'Failed to read converted file.' });
      } else {
        res.destroy(error);
      }
    });

    readStream.pipe(res);
    return undefined;
  });

  return router;
}
