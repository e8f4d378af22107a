import { createHash } from 'crypto';
import type { Artifact, TargetFormat } from '../types';
import { FORMATS } from './formats';

/**
 * Wrap verified engine output as an Artifact
 *
 * The artifact keeps its own copy of the bytes; holders hand out copies.
 */
export function createArtifact(id: string, bytes: Buffer, format: TargetFormat, createdAt: Date = new Date()): Artifact {
  const descriptor = FORMATS[format];
  const owned = Buffer.from(bytes);
  return Object.freeze({
    id,
    bytes: owned,
    format,
    contentType: descriptor.contentType,
    extension: descriptor.extension,
    sizeBytes: owned.length,
    sha256: createHash('sha256').update(owned).digest('hex'),
    createdAt,
  });
}
