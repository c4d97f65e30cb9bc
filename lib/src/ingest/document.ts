/**
 * Source document identification: size and content hash.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, parse, resolve } from 'node:path';
import { IngestError, IngestErrorCode } from '../pdf/types.js';
import type { DocumentInfo } from './types.js';

/**
 * Lowercase hex SHA-256 of a file, read as a stream
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * @throws {IngestError} READ_ERROR when the file cannot be read
 */
export async function describeDocument(inputPath: string): Promise<DocumentInfo> {
  const filePath = resolve(inputPath);
  const fileName = basename(filePath);

  try {
    const { size } = await stat(filePath);
    const sha256 = await hashFile(filePath);

    return {
      fileName,
      filePath,
      stem: parse(fileName).name,
      sizeBytes: size,
      sha256,
    };
  } catch (error) {
    throw new IngestError(`Failed to read PDF file: ${filePath}`, IngestErrorCode.READ_ERROR, {
      filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
