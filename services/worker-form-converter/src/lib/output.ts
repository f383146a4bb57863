/**
 * Writing finalized SchemaDocuments
 */

import fs from 'fs/promises';
import path from 'path';
import type { SchemaDocument } from '@formflow/shared';

export function outputFileName(documentId: string): string {
  return `${documentId.replace(/[^A-Za-z0-9._-]/g, '_')}.json`;
}

/**
 * Write the field array as pretty-printed JSON and return its file:// URI
 */
export async function writeSchemaDocument(
  outputDir: string,
  documentId: string,
  fields: SchemaDocument
): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, outputFileName(documentId));
  await fs.writeFile(filePath, `${JSON.stringify(fields, null, 2)}\n`, 'utf-8');
  return `file://${filePath}`;
}
