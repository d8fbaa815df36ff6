import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import type { FunctionArtifact } from '@stacksmith/shared';

/**
 * Read a packaged function artifact. The content is opaque; only its
 * SHA-256 hash feeds the Function's fingerprint.
 */
export async function loadArtifact(path: string): Promise<FunctionArtifact> {
  const content = new Uint8Array(await readFile(path));
  const contentHash = createHash('sha256').update(content).digest('hex');
  return { content, contentHash };
}
