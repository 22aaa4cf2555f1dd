import type { ConversionDirection } from '../config/formats';

export type ArtifactStatus = 'completed';

export interface ConvertedArtifact {
  id: string;
  outputPath: string;
  displayName: string;
  direction: ConversionDirection;
  sourceFilename: string;
  status: ArtifactStatus;
  createdAt: Date;
}
