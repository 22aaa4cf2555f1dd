import fs from 'fs';
import JSZip from 'jszip';
import path from 'path';
import request from 'supertest';
import type { Application } from 'express';

import { type AppContext, createApp } from '../src/app';
import {
  createFakeEngine,
  createTempDir,
  FAKE_SOFFICE_PATH,
  fixedLocator,
  readDocxText
} from './helpers/fakeEngine';

describe('Document Converter Service', () => {
  let root: string;
  let context: AppContext;
  let app: Application;

  async function convertDocx(name: string, content: string): Promise<string> {
    const response = await request(app)
      .post('/convert/docx-to-pdf')
      .attach('file', Buffer.from(content), name)
      .expect(200);

    return response.body.file_id as string;
  }

  beforeEach(async () => {
    root = await createTempDir('app-');
    context = await createApp({
      storageRoot: root,
      publicDir: path.join(root, 'public'),
      locator: fixedLocator(FAKE_SOFFICE_PATH),
      runCommand: createFakeEngine().runCommand
    });
    app = context.app;
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('POST /convert/docx-to-pdf', () => {
    it('converts a DOCX upload and serves the PDF as an attachment', async () => {
      const convertResponse = await request(app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('annual report body'), 'report.docx');

      expect(convertResponse.status).toBe(200);
      expect(convertResponse.body).toEqual({
        file_id: expect.any(String),
        status: 'completed',
        original_name: 'report.pdf'
      });

      const fileId = convertResponse.body.file_id as string;
      const downloadResponse = await request(app)
        .get(`/download/${fileId}`)
        .responseType('blob')
        .expect(200);

      expect(downloadResponse.header['content-disposition']).toBe('attachment; filename="report.pdf"');
      expect(downloadResponse.header['content-type']).toBe('application/pdf');
      const body = downloadResponse.body as Buffer;
      expect(body.length).toBeGreaterThan(0);
      expect(body.subarray(0, 5).toString()).toBe('%PDF-');
    });

    it('rejects files with the wrong extension and keeps nothing', async () => {
      const response = await request(app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('%PDF-1.4'), 'report.pdf');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'File must be a .docx document.', code: 'InvalidFormat' });
      expect(context.artifactStore.size).toBe(0);
      await expect(fs.promises.readdir(context.storage.uploadsDir)).resolves.toEqual([]);
    });

    it('requires a file', async () => {
      const response = await request(app).post('/convert/docx-to-pdf').field('note', 'no file');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'No file provided.', code: 'InvalidRequest' });
    });

    it('reports engine failures without registering an artifact', async () => {
      const response = await request(app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('CORRUPT'), 'broken.docx');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'LibreOffice exited with code 1.', code: 'ConversionFailed' });
      expect(context.artifactStore.size).toBe(0);
    });

    it('logs the engine output of a failed conversion', async () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      try {
        await request(app)
          .post('/convert/docx-to-pdf')
          .attach('file', Buffer.from('CORRUPT'), 'broken.docx')
          .expect(500);

        expect(consoleError.mock.calls).toEqual([
          ['Request failed: LibreOffice exited with code 1.'],
          ['Error: source file could not be loaded']
        ]);
      } finally {
        consoleError.mockRestore();
      }
    });

    it('keeps non-ASCII file names intact', async () => {
      const convertResponse = await request(app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('curriculum vitae'), 'résumé.docx')
        .expect(200);

      expect(convertResponse.body.original_name).toBe('résumé.pdf');

      const downloadResponse = await request(app)
        .get(`/download/${convertResponse.body.file_id as string}`)
        .responseType('blob')
        .expect(200);

      expect(downloadResponse.header['content-disposition']).toBe('attachment; filename="résumé.pdf"');
    });

    it('rejects uploads over the size limit and keeps nothing', async () => {
      const limited = await createApp({
        storageRoot: root,
        publicDir: path.join(root, 'public'),
        maxUploadBytes: 4,
        locator: fixedLocator(FAKE_SOFFICE_PATH),
        runCommand: createFakeEngine().runCommand
      });

      const response = await request(limited.app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('annual report body'), 'report.docx');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'File too large', code: 'InvalidRequest' });
      expect(limited.artifactStore.size).toBe(0);
      await expect(fs.promises.readdir(limited.storage.uploadsDir)).resolves.toEqual([]);
    });

    it('reports a missing engine as unavailable', async () => {
      const withoutEngine = await createApp({
        storageRoot: root,
        publicDir: path.join(root, 'public'),
        locator: fixedLocator(undefined),
        runCommand: createFakeEngine().runCommand
      });

      const response = await request(withoutEngine.app)
        .post('/convert/docx-to-pdf')
        .attach('file', Buffer.from('text'), 'report.docx');

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        error: 'LibreOffice not found. Install LibreOffice or set SOFFICE_PATH.',
        code: 'EngineUnavailable'
      });
    });

    it('gives concurrent conversions distinct identifiers', async () => {
      const [first, second] = await Promise.all([
        request(app).post('/convert/docx-to-pdf').attach('file', Buffer.from('first body'), 'one.docx'),
        request(app).post('/convert/docx-to-pdf').attach('file', Buffer.from('second body'), 'two.docx')
      ]);

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(first.body.file_id).not.toBe(second.body.file_id);

      const firstDownload = await request(app).get(`/download/${first.body.file_id as string}`).responseType('blob');
      const secondDownload = await request(app).get(`/download/${second.body.file_id as string}`).responseType('blob');
      expect((firstDownload.body as Buffer).toString()).toContain('first body');
      expect((secondDownload.body as Buffer).toString()).toContain('second body');
    });
  });

  describe('POST /convert/pdf-to-docx', () => {
    it('converts a PDF upload into a DOCX download', async () => {
      const convertResponse = await request(app)
        .post('/convert/pdf-to-docx')
        .attach('file', Buffer.from('scanned contract'), 'contract.pdf')
        .expect(200);

      expect(convertResponse.body.original_name).toBe('contract.docx');

      const downloadResponse = await request(app)
        .get(`/download/${convertResponse.body.file_id as string}`)
        .responseType('blob')
        .expect(200);

      expect(downloadResponse.header['content-disposition']).toBe('attachment; filename="contract.docx"');
      const body = downloadResponse.body as Buffer;
      expect(body.subarray(0, 2).toString()).toBe('PK');
      await expect(readDocxText(body)).resolves.toContain('scanned contract');
    });

    it('rejects DOCX uploads', async () => {
      const response = await request(app)
        .post('/convert/pdf-to-docx')
        .attach('file', Buffer.from('text'), 'report.docx');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('InvalidFormat');
    });
  });

  describe('POST /convert/batch', () => {
    it('reports a result per file', async () => {
      const response = await request(app)
        .post('/convert/batch')
        .field('direction', 'docx-to-pdf')
        .attach('files', Buffer.from('first'), 'first.docx')
        .attach('files', Buffer.from('text'), 'wrong.pdf')
        .attach('files', Buffer.from('CORRUPT'), 'broken.docx')
        .expect(200);

      const results = response.body.results as Array<Record<string, string>>;
      expect(results).toHaveLength(3);
      expect(results[0]).toEqual({
        filename: 'first.docx',
        file_id: expect.any(String),
        status: 'completed',
        original_name: 'first.pdf'
      });
      expect(results[1]).toEqual({ filename: 'wrong.pdf', error: 'File must be a .docx document.', code: 'InvalidFormat' });
      expect(results[2]).toEqual({ filename: 'broken.docx', error: 'LibreOffice exited with code 1.', code: 'ConversionFailed' });
      expect(context.artifactStore.size).toBe(1);
    });

    it('decodes file names and logs engine output for failed entries', async () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      try {
        const response = await request(app)
          .post('/convert/batch')
          .attach('files', Buffer.from('Notizen'), 'Übersicht.docx')
          .attach('files', Buffer.from('CORRUPT'), 'défaut.docx')
          .expect(200);

        const results = response.body.results as Array<Record<string, string>>;
        expect(results[0]).toEqual({
          filename: 'Übersicht.docx',
          file_id: expect.any(String),
          status: 'completed',
          original_name: 'Übersicht.pdf'
        });
        expect(results[1]).toEqual({ filename: 'défaut.docx', error: 'LibreOffice exited with code 1.', code: 'ConversionFailed' });
        expect(consoleError.mock.calls).toEqual([
          ['Batch conversion of "défaut.docx" failed: LibreOffice exited with code 1.'],
          ['Error: source file could not be loaded']
        ]);
      } finally {
        consoleError.mockRestore();
      }
    });

    it('rejects unknown directions', async () => {
      const response = await request(app)
        .post('/convert/batch')
        .field('direction', 'xlsx-to-pdf')
        .attach('files', Buffer.from('first'), 'first.docx');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Unknown conversion direction "xlsx-to-pdf".', code: 'InvalidRequest' });
      await expect(fs.promises.readdir(context.storage.uploadsDir)).resolves.toEqual([]);
    });
  });

  describe('GET /download/:fileId', () => {
    it('returns 404 for unknown identifiers', async () => {
      const response = await request(app).get('/download/does-not-exist');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'File not found.', code: 'NotFound' });
    });

    it('returns 404 when the stored file has been removed', async () => {
      const fileId = await convertDocx('gone.docx', 'text');
      await fs.promises.rm(context.artifactStore.require(fileId).outputPath);

      const response = await request(app).get(`/download/${fileId}`);
      expect(response.status).toBe(404);
    });
  });

  describe('POST /download/bulk', () => {
    async function readArchive(response: request.Response): Promise<JSZip> {
      return await JSZip.loadAsync(response.body as Buffer);
    }

    it('bundles every requested file into one archive', async () => {
      const first = await convertDocx('alpha.docx', 'alpha body');
      const second = await convertDocx('beta.docx', 'beta body');

      const response = await request(app)
        .post('/download/bulk')
        .type('form')
        .send({ file_ids: JSON.stringify([first, second]) })
        .responseType('blob')
        .expect(200);

      expect(response.header['content-type']).toBe('application/zip');
      expect(response.header['content-disposition']).toBe('attachment; filename="converted_files.zip"');

      const archive = await readArchive(response);
      expect(Object.keys(archive.files).sort()).toEqual(['alpha.pdf', 'beta.pdf']);

      const single = await request(app).get(`/download/${first}`).responseType('blob');
      const entry = await archive.file('alpha.pdf')?.async('nodebuffer');
      expect(entry?.equals(single.body as Buffer)).toBe(true);
    });

    it('accepts a JSON body and omits unknown identifiers', async () => {
      const known = await convertDocx('kept.docx', 'kept');

      const response = await request(app)
        .post('/download/bulk')
        .send({ file_ids: [known, 'unknown-id'] })
        .responseType('blob')
        .expect(200);

      const archive = await readArchive(response);
      expect(Object.keys(archive.files)).toEqual(['kept.pdf']);
    });

    it('renames entries that share a display name', async () => {
      const first = await convertDocx('report.docx', 'one');
      const second = await convertDocx('report.docx', 'two');

      const response = await request(app)
        .post('/download/bulk')
        .send({ file_ids: [first, second] })
        .responseType('blob')
        .expect(200);

      const archive = await readArchive(response);
      expect(Object.keys(archive.files)).toEqual(['report.pdf', 'report (1).pdf']);
      await expect(archive.file('report (1).pdf')?.async('string')).resolves.toContain('two');
    });

    it('returns 404 when none of the identifiers resolve', async () => {
      const response = await request(app)
        .post('/download/bulk')
        .send({ file_ids: ['missing-1', 'missing-2'] });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'None of the requested files were found.', code: 'NotFound' });
    });

    it('rejects an empty or malformed list', async () => {
      const empty = await request(app).post('/download/bulk').type('form').send({ file_ids: '[]' });
      expect(empty.status).toBe(400);
      expect(empty.body).toEqual({ error: 'No files specified.', code: 'InvalidRequest' });

      const malformed = await request(app).post('/download/bulk').type('form').send({ file_ids: 'not json' });
      expect(malformed.status).toBe(400);
      expect(malformed.body.code).toBe('InvalidRequest');
    });
  });

  it('reports the status of a converted file', async () => {
    const fileId = await convertDocx('status.docx', 'text');

    const response = await request(app).get(`/status/${fileId}`).expect(200);
    expect(response.body).toEqual({
      file_id: fileId,
      status: 'completed',
      original_name: 'status.pdf',
      direction: 'docx-to-pdf',
      created_at: expect.any(String)
    });

    await request(app).get('/status/unknown').expect(404);
  });

  it('reports engine detection on the health endpoint', async () => {
    const response = await request(app).get('/health').expect(200);

    expect(response.body).toEqual({
      status: 'healthy',
      libreoffice_found: true,
      libreoffice_path: FAKE_SOFFICE_PATH
    });
  });

  it('returns supported directions', async () => {
    const response = await request(app).get('/formats').expect(200);

    expect(response.body.directions).toEqual([
      { direction: 'docx-to-pdf', source: 'docx', target: 'pdf' },
      { direction: 'pdf-to-docx', source: 'pdf', target: 'docx' }
    ]);
  });

  it('does not expose the converted directory', async () => {
    const fileId = await convertDocx('private.docx', 'text');
    const storedName = path.basename(context.artifactStore.require(fileId).outputPath);

    await request(app).get(`/converted/${storedName}`).expect(404);
    await request(app).get(`/downloads/${storedName}`).expect(404);
  });
});
