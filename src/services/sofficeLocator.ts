import fs from 'fs';
import path from 'path';

export interface EngineLocator {
  locate(): Promise<string | undefined>;
}

export interface SofficeLocatorOptions {
  configuredPath?: string;
  candidates?: readonly string[];
  searchPath?: string;
  platform?: NodeJS.Platform;
}

export const DEFAULT_SOFFICE_CANDIDATES: readonly string[] = [
  '/Applications/LibreOffice.app/Contents/MacOS/soffice',
  '/usr/local/bin/soffice',
  '/opt/homebrew/bin/soffice',
  '/usr/bin/soffice',
  '/usr/lib/libreoffice/program/soffice',
  '/opt/libreoffice/program/soffice',
  'C:\\Program Files\\LibreOffice\\program\\soffice.exe',
  'C:\\Program Files (x86)\\LibreOffice\\program\\soffice.exe'
];

const PATH_EXECUTABLES = ['soffice', 'libreoffice'];

export class SofficeLocator implements EngineLocator {
  private readonly configuredPath?: string;
  private readonly candidates: readonly string[];
  private readonly searchPath: string;
  private readonly platform: NodeJS.Platform;
  private located?: string;

  constructor(options: SofficeLocatorOptions = {}) {
    this.configuredPath = options.configuredPath?.trim() || undefined;
    this.candidates = options.candidates ?? DEFAULT_SOFFICE_CANDIDATES;
    this.searchPath = options.searchPath ?? process.env.PATH ?? '';
    this.platform = options.platform ?? process.platform;
  }

  async locate(): Promise<string | undefined> {
    if (this.located) {
      return this.located;
    }

    for (const candidate of this.listCandidates()) {
      if (await this.isExecutable(candidate)) {
        this.located = candidate;
        return candidate;
      }
    }

    return undefined;
  }

  private listCandidates(): string[] {
    const fromPath = this.searchPath
      .split(path.delimiter)
      .filter((dir) => dir.trim().length > 0)
      .flatMap((dir) => PATH_EXECUTABLES.map((name) => path.join(dir, this.platform === 'win32' ? `${name}.exe` : name)));

    const candidates = [...this.candidates, ...fromPath];
    return this.configuredPath ? [this.configuredPath, ...candidates] : candidates;
  }

  private async isExecutable(candidate: string): Promise<boolean> {
    const mode = this.platform === 'win32' ? fs.constants.F_OK : fs.constants.X_OK;

    try {
      await fs.promises.access(candidate, mode);
      const stats = await fs.promises.stat(candidate);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}
