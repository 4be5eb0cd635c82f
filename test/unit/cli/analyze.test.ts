// test/unit/cli/analyze.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { existsSync, mkdirSync, readFileSync, writeFileSync, rmSync } from 'fs';
import {
  analyzeCommand,
  blueprintName,
  collectScripts,
  loadCommandConfig,
} from '../../../src/cli/commands/analyze';
import { SIGN_IN_SCRIPT } from '../../helpers/scripts';

// ─── Helpers ────────────────────────────────────────────────────────────────

let testDir = '';

beforeEach(() => {
  testDir = join(tmpdir(), `pom-blueprint-cli-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(testDir, { recursive: true });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  if (testDir) rmSync(testDir, { recursive: true, force: true });
});

// ─── Inputs ─────────────────────────────────────────────────────────────────

describe('blueprintName()', () => {
  it('drops the script extension only', () => {
    expect(blueprintName('/tmp/e2e/login.spec.ts')).toBe('login.spec');
    expect(blueprintName('checkout.test.mjs')).toBe('checkout.test');
  });
});

describe('collectScripts()', () => {
  it('lists test scripts under a directory', () => {
    mkdirSync(join(testDir, 'e2e'));
    writeFileSync(join(testDir, 'e2e', 'login.spec.ts'), SIGN_IN_SCRIPT);
    writeFileSync(join(testDir, 'e2e', 'helpers.ts'), 'export {};\n');
    expect(collectScripts(testDir)).toEqual([join(testDir, 'e2e', 'login.spec.ts')]);
  });

  it('takes a single file as given', () => {
    const file = join(testDir, 'recorded.ts');
    writeFileSync(file, SIGN_IN_SCRIPT);
    expect(collectScripts(file)).toEqual([file]);
  });
});

describe('loadCommandConfig()', () => {
  it('uses defaults without a file', () => {
    vi.stubEnv('POM_BLUEPRINT_CONFIG', '');
    expect(loadCommandConfig(undefined).method_grouping.max_actions_per_method).toBe(8);
  });

  it('reads the file named by the environment', () => {
    const file = join(testDir, 'pom.json');
    writeFileSync(file, JSON.stringify({ method_grouping: { max_actions_per_method: 4 } }));
    vi.stubEnv('POM_BLUEPRINT_CONFIG', file);
    expect(loadCommandConfig(undefined).method_grouping.max_actions_per_method).toBe(4);
  });

  it('prefers --config over the environment', () => {
    const file = join(testDir, 'cli.json');
    writeFileSync(file, JSON.stringify({ method_grouping: { max_actions_per_method: 3 } }));
    vi.stubEnv('POM_BLUEPRINT_CONFIG', join(testDir, 'missing.json'));
    expect(loadCommandConfig(file).method_grouping.max_actions_per_method).toBe(3);
  });
});

// ─── Command ────────────────────────────────────────────────────────────────

describe('analyzeCommand()', () => {
  it('writes one blueprint file per script', () => {
    vi.stubEnv('POM_BLUEPRINT_CONFIG', '');
    const file = join(testDir, 'login.spec.ts');
    writeFileSync(file, SIGN_IN_SCRIPT);
    const out = join(testDir, 'out');

    analyzeCommand(file, { output: out });

    const written = join(out, 'login.spec.blueprint.json');
    expect(existsSync(written)).toBe(true);
    const blueprint = JSON.parse(readFileSync(written, 'utf-8'));
    expect(blueprint.metadata.source).toBe(file);
    expect(blueprint.pages).toHaveLength(2);
  });

  it('prints JSON to stdout with --stdout', () => {
    vi.stubEnv('POM_BLUEPRINT_CONFIG', '');
    const file = join(testDir, 'login.spec.ts');
    writeFileSync(file, SIGN_IN_SCRIPT);
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    analyzeCommand(file, { output: join(testDir, 'out'), stdout: true });

    expect(write).toHaveBeenCalledTimes(1);
    const blueprint = JSON.parse(String(write.mock.calls[0][0]));
    expect(blueprint.metadata.total_actions).toBe(5);
    expect(existsSync(join(testDir, 'out'))).toBe(false);
  });

  it('exits with 1 when a script cannot be analyzed', () => {
    vi.stubEnv('POM_BLUEPRINT_CONFIG', '');
    const file = join(testDir, 'empty.spec.ts');
    writeFileSync(file, 'const x = 1;\n');
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => analyzeCommand(file, { output: join(testDir, 'out'), stdout: true })).toThrow('exit 1');
  });
});
