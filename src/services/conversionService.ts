import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

import type { PdfToDocxEngine } from '../config/env';
import {
  buildDisplayName,
  CONVERSION_DIRECTIONS,
  type ConversionDirection,
  getExtension,
  hasSourceExtension
} from '../config/formats';
import { ConversionFailedError, EngineUnavailableError, InvalidFormatError } from '../errors';
import { ConvertedArtifact } from '../types/artifact';
import { ArtifactStore } from './artifactStore';
import { type CommandRunner, runCommand } from './processRunner';
import { EngineLocator } from './sofficeLocator';

export interface UploadConversionRequest {
  sourcePath: string;
  sourceFilename: string;
  direction: ConversionDirection;
}

export interface ConversionServiceOptions {
  outputDirectory: string;
  locator: EngineLocator;
  pandocPath?: string;
  pdfToDocxEngine?: PdfToDocxEngine;
  timeoutMs?: number;
  runCommand?: CommandRunner;
}

type ConversionStrategy = 'soffice' | 'pandoc';

// LibreOffice filter names for --convert-to, keyed by target format.
const SOFFICE_EXPORT_FILTERS: Record<ConversionDirection, string> = {
  'docx-to-pdf': 'pdf:writer_pdf_Export',
  'pdf-to-docx': 'docx:MS Word 2007 XML'
};

export class ConversionService {
  private readonly outputDirectory: string;
  private readonly locator: EngineLocator;
  private readonly pandocPath: string;
  private readonly pdfToDocxEngine: PdfToDocxEngine;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(private readonly artifactStore: ArtifactStore, options: ConversionServiceOptions) {
    this.outputDirectory = options.outputDirectory;
    this.locator = options.locator;
    this.pandocPath = options.pandocPath ?? 'pandoc';
    this.pdfToDocxEngine = options.pdfToDocxEngine ?? 'soffice';
    this.timeoutMs = options.timeoutMs ?? 0;
    this.run = options.runCommand ?? runCommand;
  }

  getPandocPath(): string {
    return this.pandocPath;
  }

  getPdfToDocxEngine(): PdfToDocxEngine {
    return this.pdfToDocxEngine;
  }

  async locateSoffice(): Promise<string | undefined> {
    return await this.locator.locate();
  }

  async ensureDirectories(): Promise<void> {
    await fs.promises.mkdir(this.outputDirectory, { recursive: true });
  }

  /**
   * Converts an uploaded file and registers the result. The upload itself is
   * removed once the attempt is over, whether it succeeded or not.
   */
  async convertUpload(request: UploadConversionRequest): Promise<ConvertedArtifact> {
    try {
      const { source } = CONVERSION_DIRECTIONS[request.direction];
      if (!hasSourceExtension(request.sourceFilename, request.direction)) {
        throw new InvalidFormatError(`File must be a .${source} document.`);
      }

      const id = this.artifactStore.nextId();
      const displayName = buildDisplayName(request.sourceFilename, request.direction);
      const outputPath = await this.convert(request.sourcePath, request.direction, `${id}_${path.parse(displayName).name}`);

      return this.artifactStore.put({
        id,
        outputPath,
        displayName,
        direction: request.direction,
        sourceFilename: request.sourceFilename
      });
    } finally {
      await fs.promises.rm(request.sourcePath, { force: true });
    }
  }

  /**
   * Runs the external engine on `inputPath` and returns the path of the
   * produced file inside the output directory.
   */
  async convert(inputPath: string, direction: ConversionDirection, outputBasename?: string): Promise<string> {
    const { source, target } = CONVERSION_DIRECTIONS[direction];

    if (getExtension(inputPath) !== source) {
      throw new InvalidFormatError(`Input for ${direction} must be a .${source} file.`);
    }

    await this.ensureDirectories();

    const workDir = await fs.promises.mkdtemp(path.join(this.outputDirectory, 'work-'));

    try {
      const strategy = this.resolveStrategy(direction);
      const producedPath = strategy === 'pandoc'
        ? await this.convertWithPandoc(inputPath, workDir)
        : await this.convertWithSoffice(inputPath, workDir, direction);

      const stats = await fs.promises.stat(producedPath);
      if (stats.size === 0) {
        throw new ConversionFailedError(`Conversion produced an empty .${target} file.`);
      }

      const basename = outputBasename ?? `${randomUUID()}_${path.parse(inputPath).name}`;
      const finalPath = path.join(this.outputDirectory, `${basename}.${target}`);
      await fs.promises.rename(producedPath, finalPath);

      return finalPath;
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }

  private resolveStrategy(direction: ConversionDirection): ConversionStrategy {
    return direction === 'pdf-to-docx' && this.pdfToDocxEngine === 'pandoc' ? 'pandoc' : 'soffice';
  }

  private async convertWithSoffice(inputPath: string, workDir: string, direction: ConversionDirection): Promise<string> {
    const sofficePath = await this.locator.locate();
    if (!sofficePath) {
      throw new EngineUnavailableError('LibreOffice not found. Install LibreOffice or set SOFFICE_PATH.');
    }

    const outDir = path.join(workDir, 'out');
    const profileDir = path.join(workDir, 'profile');
    await fs.promises.mkdir(outDir, { recursive: true });

    // A private profile per run; soffice refuses to start twice on a shared one.
    const args = [
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      '--headless',
      '--norestore'
    ];

    if (direction === 'pdf-to-docx') {
      args.push('--infilter=writer_pdf_import');
    }

    args.push('--convert-to', SOFFICE_EXPORT_FILTERS[direction], '--outdir', outDir, inputPath);

    await this.run(sofficePath, args, { label: 'LibreOffice', timeoutMs: this.timeoutMs });

    return await this.findOutput(outDir, CONVERSION_DIRECTIONS[direction].target, 'LibreOffice');
  }

  private async convertWithPandoc(inputPath: string, workDir: string): Promise<string> {
    const stem = path.parse(inputPath).name;
    const markdownPath = path.join(workDir, `${stem}.md`);
    const outDir = path.join(workDir, 'out');
    await fs.promises.mkdir(outDir, { recursive: true });

    await this.convertPdfToMarkdown(inputPath, markdownPath);

    const args = [
      '--from',
      'markdown',
      '--to',
      'docx',
      markdownPath,
      '--output',
      path.join(outDir, `${stem}.docx`)
    ];

    await this.run(this.pandocPath, args, { label: 'Pandoc', timeoutMs: this.timeoutMs });

    return await this.findOutput(outDir, 'docx', 'Pandoc');
  }

  private async convertPdfToMarkdown(inputPath: string, outputPath: string): Promise<void> {
    const pdfBuffer: Buffer = await fs.promises.readFile(inputPath);
    const binaryData = new Uint8Array(pdfBuffer.buffer.slice(pdfBuffer.byteOffset, pdfBuffer.byteOffset + pdfBuffer.byteLength));

    let markdownContent: string;
    try {
      // Loaded on demand: only the Pandoc path reads PDF text.
      const { extractText } = await import('unpdf');
      const { text } = await extractText(binaryData, { mergePages: true });
      markdownContent = Array.isArray(text) ? text.join('\n\n') : text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConversionFailedError('Could not read text from the PDF.', message);
    }

    await fs.promises.writeFile(outputPath, markdownContent, 'utf8');
  }

  private async findOutput(outDir: string, extension: string, label: string): Promise<string> {
    const produced = await fs.promises.readdir(outDir);
    const suffix = `.${extension}`;
    const match = produced.find((file) => file.toLowerCase().endsWith(suffix));

    if (!match) {
      throw new ConversionFailedError(`${label} finished without producing a "${extension}" output.`);
    }

    return path.join(outDir, match);
  }
}
