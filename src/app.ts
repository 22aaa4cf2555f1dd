import cors from 'cors';
import express, { type Request, type Response } from 'express';
import path from 'path';

import { type AppConfig, loadConfig } from './config/env';
import { ensureStorageDirectories, resolveStoragePaths, type StoragePaths } from './config/storage';
import { errorHandler } from './middleware/errorHandler';
import { createConversionRouter } from './routes/conversion';
import { createDownloadRouter } from './routes/download';
import { formatsRouter } from './routes/formats';
import { createStatusRouter } from './routes/status';
import { ArtifactStore } from './services/artifactStore';
import { ConversionService } from './services/conversionService';
import type { CommandRunner } from './services/processRunner';
import { type EngineLocator, SofficeLocator } from './services/sofficeLocator';

export interface AppOptions extends Partial<AppConfig> {
  locator?: EngineLocator;
  runCommand?: CommandRunner;
  publicDir?: string;
}

export interface AppContext {
  app: express.Express;
  config: AppConfig;
  storage: StoragePaths;
  artifactStore: ArtifactStore;
  conversionService: ConversionService;
}

export async function createApp(options: AppOptions = {}): Promise<AppContext> {
  const { locator: locatorOverride, runCommand, publicDir, ...overrides } = options;
  const config: AppConfig = { ...loadConfig(), ...overrides };
  const storage = resolveStoragePaths(config.storageRoot);
  await ensureStorageDirectories(storage);

  const app = express();
  const artifactStore = new ArtifactStore();
  const locator = locatorOverride ?? new SofficeLocator({ configuredPath: config.sofficePath });
  const conversionService = new ConversionService(artifactStore, {
    outputDirectory: storage.convertedDir,
    locator,
    pandocPath: config.pandocPath,
    pdfToDocxEngine: config.pdfToDocxEngine,
    timeoutMs: config.conversionTimeoutMs,
    runCommand
  });

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(express.static(publicDir ?? path.resolve(process.cwd(), 'public')));

  app.use('/convert', createConversionRouter(conversionService, {
    uploadsDir: storage.uploadsDir,
    maxUploadBytes: config.maxUploadBytes
  }));
  app.use('/download', createDownloadRouter(artifactStore));
  app.use('/status', createStatusRouter(artifactStore));
  app.use('/formats', formatsRouter);

  app.get('/health', async (_req: Request, res: Response) => {
    const sofficePath = await conversionService.locateSoffice();
    res.json({
      status: 'healthy',
      libreoffice_found: sofficePath !== undefined,
      libreoffice_path: sofficePath ?? null
    });
  });

  app.use(errorHandler);

  return { app, config, storage, artifactStore, conversionService };
}
