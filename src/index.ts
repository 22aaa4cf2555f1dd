import 'dotenv/config';
import http from 'http';

import { createApp } from './app';

async function bootstrap(): Promise<void> {
  try {
    const { app, config, storage, conversionService } = await createApp();
    const server = http.createServer(app);

    // eslint-disable-next-line no-console
    console.log(`Using storage directory: ${storage.root}`);
    const sofficePath = await conversionService.locateSoffice();
    if (sofficePath) {
      // eslint-disable-next-line no-console
      console.log(`Using LibreOffice soffice executable at: ${sofficePath}`);
    } else {
      // eslint-disable-next-line no-console
      console.warn('LibreOffice not found. Install it from https://www.libreoffice.org/download/ or set SOFFICE_PATH.');
    }
    if (conversionService.getPdfToDocxEngine() === 'pandoc') {
      // eslint-disable-next-line no-console
      console.log(`Using Pandoc executable at: ${conversionService.getPandocPath()} for PDF to DOCX`);
    }

    server.listen(config.port, () => {
      // eslint-disable-next-line no-console
      console.log(`Document converter listening on port ${config.port}`);
      // eslint-disable-next-line no-console
      console.log(`Open http://${config.host}:${config.port}/`);
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
