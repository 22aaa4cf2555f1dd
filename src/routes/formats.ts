import express, { type Request, type Response } from 'express';

import { CONVERSION_DIRECTIONS, SUPPORTED_DIRECTIONS } from '../config/formats';

export const formatsRouter = express.Router();

formatsRouter.get('/', (_req: Request, res: Response) => {
  res.json({
    directions: SUPPORTED_DIRECTIONS.map((direction) => ({
      direction,
      source: CONVERSION_DIRECTIONS[direction].source,
      target: CONVERSION_DIRECTIONS[direction].target
    }))
  });
});
