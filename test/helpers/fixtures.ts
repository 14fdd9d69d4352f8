/**
 * Shared test fixtures: temporary directories, environment files and
 * small node child scripts
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';
import { WrapperLogger } from '../../src/logging';

export function makeTempDir(prefix: string = 'envoy-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Write a file (creating parent directories); returns its path
 */
export function writeFile(dir: string, relativePath: string, content: string): string {
  const filePath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

export function writeJson(dir: string, relativePath: string, data: unknown): string {
  return writeFile(dir, relativePath, JSON.stringify(data, null, 2));
}

/**
 * A logger that keeps entries but prints nothing
 */
export function silentLogger(): WrapperLogger {
  return new WrapperLogger({ consoleLevel: 'silent' });
}

/**
 * Writable that collects everything written to it
 */
export class MemorySink extends Writable {
  private chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

/**
 * Command line running an inline script with the current node binary
 */
export function nodeScript(script: string): string[] {
  return [process.execPath, '-e', script];
}
