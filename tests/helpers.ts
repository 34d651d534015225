/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function makeTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = join(tmpdir(), `wildmatch-${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function writeFile(dir: string, name: string, content: string): string {
  const fullPath = join(dir, name);
  writeFileSync(fullPath, content, 'utf-8');
  return fullPath;
}

/** Straightforward memoized recursion; slow but obviously correct. */
export function referenceMatch(pattern: string, subject: string): boolean {
  const memo = new Map<number, boolean>();
  const width = subject.length + 1;
  const go = (i: number, j: number): boolean => {
    const key = i * width + j;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;
    let result: boolean;
    if (i === pattern.length) {
      result = j === subject.length;
    } else if (pattern[i] === '*') {
      result = go(i + 1, j) || (j < subject.length && go(i, j + 1));
    } else {
      result = j < subject.length && (pattern[i] === '?' || pattern[i] === subject[j]) && go(i + 1, j + 1);
    }
    memo.set(key, result);
    return result;
  };
  return go(0, 0);
}
