/**
 * Template Storage
 *
 * Filesystem access for workbooks and generated XML. The converter only sees
 * the TemplateStore interface, so tests can run it on in-memory files.
 */

import fs from 'fs/promises';
import path from 'path';
import { IOError } from './goals/errors';

export interface TemplateStore {
  /** Workbook paths to convert, in processing order. */
  list(): Promise<string[]>;
  read(filePath: string): Promise<Buffer>;
  write(filePath: string, bytes: Buffer): Promise<void>;
}

export const WORKBOOK_EXTENSION = '.xlsx';
export const XML_EXTENSION = '.xml';

/** "plans/Prostate.xlsx" → "plans/Prostate.xml" */
export function outputPathFor(workbookPath: string): string {
  const parsed = path.parse(workbookPath);
  return path.join(parsed.dir, parsed.name + XML_EXTENSION);
}

/**
 * Directory entries are plain names, so only separators and NUL rule one out;
 * "Prostate..v2.xlsx" is a valid template.
 */
export function isWorkbookName(name: string): boolean {
  // "~$name.xlsx" is Excel's lock file for an open workbook
  if (name.startsWith('~$')) return false;
  if (/[\/\\\0]/.test(name)) return false;
  return path.extname(name).toLowerCase() === WORKBOOK_EXTENSION;
}

export async function readBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new IOError(filePath, err);
  }
}

/**
 * Atomic write: bytes → .tmp → rename, creating the parent directory.
 */
export async function writeBytesAtomic(filePath: string, bytes: Buffer): Promise<void> {
  const tmpPath = filePath + '.tmp';
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, bytes);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new IOError(filePath, err);
  }
}

export class DirectoryTemplateStore implements TemplateStore {
  constructor(readonly dir: string) {}

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      throw new IOError(this.dir, err);
    }
    return entries
      .filter(isWorkbookName)
      .sort()
      .map((name) => path.join(this.dir, name));
  }

  read(filePath: string): Promise<Buffer> {
    return readBytes(filePath);
  }

  write(filePath: string, bytes: Buffer): Promise<void> {
    return writeBytesAtomic(filePath, bytes);
  }
}
