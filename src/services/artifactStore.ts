import { randomUUID } from 'crypto';

import type { ConversionDirection } from '../config/formats';
import { NotFoundError } from '../errors';
import { ConvertedArtifact } from '../types/artifact';

export interface RegisterArtifactPayload {
  id?: string;
  outputPath: string;
  displayName: string;
  direction: ConversionDirection;
  sourceFilename: string;
}

/**
 * Process-local index of finished conversions. Entries are only ever added;
 * an identifier is never reassigned.
 */
export class ArtifactStore {
  private readonly artifacts = new Map<string, ConvertedArtifact>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  put(payload: RegisterArtifactPayload): ConvertedArtifact {
    const id = payload.id ?? this.nextId();

    if (this.artifacts.has(id)) {
      throw new Error(`Artifact "${id}" is already registered.`);
    }

    const artifact: ConvertedArtifact = {
      id,
      outputPath: payload.outputPath,
      displayName: payload.displayName,
      direction: payload.direction,
      sourceFilename: payload.sourceFilename,
      status: 'completed',
      createdAt: new Date()
    };

    this.artifacts.set(id, artifact);
    return artifact;
  }

  get(id: string): ConvertedArtifact | undefined {
    return this.artifacts.get(id);
  }

  require(id: string): ConvertedArtifact {
    const artifact = this.artifacts.get(id);
    if (!artifact) {
      throw new NotFoundError('File not found.');
    }

    return artifact;
  }

  has(id: string): boolean {
    return this.artifacts.has(id);
  }

  get size(): number {
    return this.artifacts.size;
  }

  nextId(): string {
    let id = this.generateId();
    while (this.artifacts.has(id)) {
      id = this.generateId();
    }

    return id;
  }
}
