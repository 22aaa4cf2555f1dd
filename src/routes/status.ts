import express, { type Request, type Response } from 'express';

import { NotFoundError } from '../errors';
import { sendError } from '../middleware/errorHandler';
import { ArtifactStore } from '../services/artifactStore';

export function createStatusRouter(artifactStore: ArtifactStore): express.Router {
  const router = express.Router();

  router.get('/:fileId', (req: Request, res: Response) => {
    const { fileId } = req.params;
    const artifact = artifactStore.get(fileId);

    if (!artifact) {
      return sendError(res, new NotFoundError('File not found.'));
    }

    return res.json({
      file_id: artifact.id,
      status: artifact.status,
      original_name: artifact.displayName,
      direction: artifact.direction,
      created_at: artifact.createdAt.toISOString()
    });
  });

  return router;
}
