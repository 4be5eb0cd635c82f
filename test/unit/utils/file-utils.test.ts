// test/unit/utils/file-utils.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { mkdirSync, readFileSync, writeFileSync, rmSync } from 'fs';
import { findFiles, readJsonFile, writeTextFile } from '../../../src/utils/file-utils';

let testDir = '';

beforeEach(() => {
  testDir = join(tmpdir(), `pom-blueprint-files-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  if (testDir) rmSync(testDir, { recursive: true, force: true });
});

describe('findFiles()', () => {
  beforeEach(() => {
    mkdirSync(join(testDir, 'e2e'), { recursive: true });
    mkdirSync(join(testDir, 'node_modules', 'lib'), { recursive: true });
    writeFileSync(join(testDir, 'e2e', 'b.spec.ts'), '');
    writeFileSync(join(testDir, 'e2e', 'fixtures.ts'), '');
    writeFileSync(join(testDir, 'a.spec.ts'), '');
    writeFileSync(join(testDir, 'notes.md'), '');
    writeFileSync(join(testDir, 'node_modules', 'lib', 'c.spec.ts'), '');
  });

  it('finds matching files recursively, sorted, skipping node_modules', () => {
    expect(findFiles(testDir, ['.ts'])).toEqual([
      join(testDir, 'a.spec.ts'),
      join(testDir, 'e2e', 'b.spec.ts'),
      join(testDir, 'e2e', 'fixtures.ts'),
    ]);
  });

  it('keeps only the files the filter accepts', () => {
    expect(findFiles(testDir, ['.ts'], (file) => file.endsWith('.spec.ts'))).toEqual([
      join(testDir, 'a.spec.ts'),
      join(testDir, 'e2e', 'b.spec.ts'),
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(findFiles(join(testDir, 'nope'), ['.ts'])).toEqual([]);
  });
});

describe('readJsonFile() / writeTextFile()', () => {
  it('creates parent directories and reads the JSON back', () => {
    const file = join(testDir, 'out', 'deep', 'data.json');
    writeTextFile(file, '{"ok":true}');
    expect(readFileSync(file, 'utf-8')).toBe('{"ok":true}');
    expect(readJsonFile(file)).toEqual({ ok: true, value: { ok: true } });
  });

  it('tells a missing file from malformed JSON', () => {
    const broken = join(testDir, 'broken.json');
    writeFileSync(broken, '{ "ok": ');
    expect(readJsonFile(join(testDir, 'missing.json'))).toEqual({ ok: false, reason: 'missing' });
    expect(readJsonFile(broken)).toEqual({ ok: false, reason: 'invalid' });
  });
});
