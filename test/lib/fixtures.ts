import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

let counter = 0;

export function createTestDir(prefix: string): string {
  counter++;
  const dir = join(tmpdir(), `${prefix}-${process.pid}-${Date.now()}-${counter}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFixture(dir: string, relativePath: string, content: string | Buffer): string {
  const fullPath = join(dir, relativePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, content);
  return fullPath;
}

/** Deterministic bytes: byte i is i mod 251 */
export function patternBytes(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  for (let i = 0; i < size; i++) buffer[i] = i % 251;
  return buffer;
}
