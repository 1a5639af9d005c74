import fs from 'fs';
import os from 'os';
import path from 'path';
import { Artifact, ArtifactTooLargeError, HandlerResult, JsonValue } from '../types.js';

const STAGING_PREFIX = 'android-dispatch-';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.mp4': 'video/mp4',
  '.xml': 'application/xml',
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.log': 'text/plain',
  '.pem': 'application/x-pem-file',
  '.crt': 'application/x-x509-ca-cert',
  '.apk': 'application/vnd.android.package-archive',
};

export function mimeTypeFor(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Runs `fn` with a fresh host-side temporary directory and removes it
 * synchronously before returning, whether `fn` resolved or threw.
 */
export async function withStagingDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), STAGING_PREFIX));
  try {
    return await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function checkArtifactSize(size: number, limit: number): void {
  if (size > limit) {
    throw new ArtifactTooLargeError(size, limit);
  }
}

// Size is checked before the file is read
export function readArtifactFile(filePath: string, limit: number, mimeType: string): Artifact {
  checkArtifactSize(fs.statSync(filePath).size, limit);
  return { data: fs.readFileSync(filePath), mimeType, name: path.basename(filePath) };
}

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  // PNG signature: 89 50 4E 47 0D 0A 1A 0A, then the IHDR chunk
  if (pngData.length < 24 || pngData.toString('hex', 0, 8) !== '89504e470d0a1a0a') {
    throw new Error('Invalid PNG data');
  }

  return { width: pngData.readUInt32BE(16), height: pngData.readUInt32BE(20) };
}

export function encodeResult(result: HandlerResult, maxArtifactBytes: number): JsonValue {
  switch (result.kind) {
    case 'text':
      return result.text;
    case 'json':
      return result.data;
    case 'binary': {
      const { artifact } = result;
      checkArtifactSize(artifact.data.length, maxArtifactBytes);
      return {
        ...result.meta,
        encoding: 'base64',
        mimeType: artifact.mimeType,
        name: artifact.name,
        size: artifact.data.length,
        data: artifact.data.toString('base64'),
      };
    }
  }
}
