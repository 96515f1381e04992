/**
 * Voice Reshaper - Result Store
 * Keeps encoded result audio addressable by a reference string
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { createModuleLogger } from '../utils/logger';

const logger = createModuleLogger('ResultStore');

const SAFE_KEY = /^[A-Za-z0-9_-]+$/;

export interface ResultStore {
  /** Store bytes under `key` and return the reference to fetch them with */
  put(key: string, data: Uint8Array): Promise<string>;
  get(ref: string): Promise<Buffer | undefined>;
  delete(ref: string): Promise<boolean>;
}

function assertSafeKey(key: string): void {
  if (!SAFE_KEY.test(key)) {
    throw new Error(`Invalid result key: ${key}`);
  }
}

/**
 * Results held in process memory
 */
export class InMemoryResultStore implements ResultStore {
  private results: Map<string, Buffer> = new Map();

  async put(key: string, data: Uint8Array): Promise<string> {
    assertSafeKey(key);
    const ref = `${key}.wav`;
    this.results.set(ref, Buffer.from(data));
    return ref;
  }

  async get(ref: string): Promise<Buffer | undefined> {
    const data = this.results.get(ref);
    return data ? Buffer.from(data) : undefined;
  }

  async delete(ref: string): Promise<boolean> {
    return this.results.delete(ref);
  }
}

/**
 * Results written as WAV files under one directory
 */
export class FileResultStore implements ResultStore {
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  private resolve(ref: string): string | null {
    const base = path.basename(ref, '.wav');
    if (!SAFE_KEY.test(base) || ref !== `${base}.wav`) {
      return null;
    }
    return path.join(this.outputDir, ref);
  }

  async put(key: string, data: Uint8Array): Promise<string> {
    assertSafeKey(key);
    const ref = `${key}.wav`;
    await fs.ensureDir(this.outputDir);
    await fs.writeFile(path.join(this.outputDir, ref), data);
    logger.debug('Result written', { ref, bytes: data.byteLength });
    return ref;
  }

  async get(ref: string): Promise<Buffer | undefined> {
    const filePath = this.resolve(ref);
    if (!filePath || !(await fs.pathExists(filePath))) {
      return undefined;
    }
    return fs.readFile(filePath);
  }

  async delete(ref: string): Promise<boolean> {
    const filePath = this.resolve(ref);
    if (!filePath || !(await fs.pathExists(filePath))) {
      return false;
    }
    await fs.remove(filePath);
    return true;
  }
}
