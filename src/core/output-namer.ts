// core/output-namer.ts
// Output file naming and collision-safe artifact writes

import * as fs from 'fs/promises';
import * as path from 'path';

export interface OutputNameInput {
  /** Set only for identifier-bearing documents */
  identifier?: string;
  datasetPath: string;
  templatePath: string;
  date: Date;
}

export interface WrittenArtifact {
  outputPath: string;
  fileName: string;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * YYYY-MM-DD HH:MM:SS in local time, as shown inside documents
 */
export function formatGeneratedAt(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function sanitizeIdentifier(identifier: string): string {
  return identifier.trim().replace(/[/\\]/g, '-');
}

function stemOf(filePath: string): string {
  const name = path.basename(filePath);
  return path.basename(name, path.extname(name));
}

export function buildOutputName(input: OutputNameInput): string {
  const timestamp = formatTimestamp(input.date);

  if (input.identifier !== undefined) {
    return `invoice_${sanitizeIdentifier(input.identifier)}_${timestamp}.pdf`;
  }

  return `${stemOf(input.datasetPath)}_${stemOf(input.templatePath)}_${timestamp}.pdf`;
}

/**
 * Write bytes under `dir`, never replacing an existing file.
 * A same-second collision gets a `_2`, `_3`, ... suffix before `.pdf`.
 */
export async function writeArtifact(
  dir: string,
  fileName: string,
  bytes: Uint8Array
): Promise<WrittenArtifact> {
  await fs.mkdir(dir, { recursive: true });

  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);

  for (let attempt = 1; ; attempt++) {
    const candidate = attempt === 1 ? fileName : `${base}_${attempt}${ext}`;
    const outputPath = path.join(dir, candidate);
    try {
      await fs.writeFile(outputPath, bytes, { flag: 'wx' });
      return { outputPath, fileName: candidate };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        continue;
      }
      throw error;
    }
  }
}
