// test/unit/output/reporter.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { tmpdir } from 'os';
import { join } from 'path';
import { mkdirSync, readFileSync, rmSync } from 'fs';
import { buildRecommendations, printSummary, writeBlueprint } from '../../../src/output/reporter';
import { buildBlueprint } from '../../../src/blueprint/builder';
import { resolveConfig } from '../../../src/ingestion/config';
import type { SelectorAnalysis } from '../../../src/blueprint/types';
import { makeAction, makePage } from '../../helpers/records';
import { SIGN_IN_SCRIPT, USER_MENU_SCRIPT } from '../../helpers/scripts';

const config = resolveConfig();

const emptySelectors: SelectorAnalysis = {
  total_selectors: 0,
  by_strategy: { testid: 0, role: 0, text: 0, css: 0, xpath: 0, placeholder: 0 },
  average_fragility: 0,
  fragile_selector_ids: [],
  selectors: [],
  duplicates: [],
};

// ─── Recommendations ──────────────────────────────────────────────────────────

describe('buildRecommendations — from a sign-in blueprint', () => {
  const { recommendations } = buildBlueprint(SIGN_IN_SCRIPT);

  it('suggests a base page for several pages', () => {
    expect(recommendations.architectural).toEqual([
      {
        kind: 'base_page',
        severity: 'info',
        message: 'Extract a BasePage class shared by 2 page objects (LoginPage, DashboardPage)',
        related_ids: ['page_1', 'page_2'],
        line_numbers: [],
      },
    ]);
    expect(recommendations.refactoring).toEqual([]);
  });

  it('flags fragile selectors with their best replacement', () => {
    expect(recommendations.quality.map((r) => [r.kind, r.severity, r.message])).toEqual([
      ['fragile_selector', 'high', '[placeholder="Email"] has fragility 80; prefer getByTestId(\'email\')'],
      ['fragile_selector', 'high', '[placeholder="Password"] has fragility 80; prefer getByTestId(\'password\')'],
      ['fragile_selector', 'warning', "getByText('Welcome back') has fragility 70; prefer getByTestId('welcome-back')"],
    ]);
    expect(recommendations.quality[0].related_ids).toEqual(['selector_1', 'action_2']);
    expect(recommendations.quality[0].line_numbers).toEqual([5]);
  });
});

describe('buildRecommendations — components and methods', () => {
  it('recommends extracting a recurring component', () => {
    const { recommendations } = buildBlueprint(USER_MENU_SCRIPT);
    expect(recommendations.architectural.map((r) => r.message)).toEqual([
      'Extract a BasePage class shared by 2 page objects (SettingsPage, ProfilePage)',
      'Extract UserMenu (navigation) used on 2 pages',
    ]);
  });

  it('suggests splitting complex methods and renaming generic ones', () => {
    const page = makePage('page_1', [makeAction({ id: 'action_1', line_number: 4 })]);
    page.suggested_methods = [
      {
        id: 'method_1',
        owner_id: 'page_1',
        name: 'performAction1',
        alternatives: ['clickStep1', 'handleStep1'],
        name_source: 'generic',
        confidence: 40,
        action_ids: ['action_1'],
        assertion_ids: [],
        parameters: [],
        complexity: 75,
        line_range: { start: 4, end: 4 },
      },
    ];
    const result = buildRecommendations({ pages: [page], components: [], selectors: emptySelectors, weakPatterns: [], config });
    expect(result.refactoring).toEqual([
      {
        kind: 'split_method',
        severity: 'warning',
        message: 'performAction1 has complexity 75 (above 60); consider splitting it',
        related_ids: ['method_1'],
        line_numbers: [4],
      },
    ]);
    expect(result.quality).toEqual([
      {
        kind: 'generic_method_name',
        severity: 'info',
        message: 'performAction1 has no semantic name; alternatives: clickStep1, handleStep1',
        related_ids: ['method_1'],
        line_numbers: [4],
      },
    ]);
  });

  it('reports weak patterns as architectural hints', () => {
    const result = buildRecommendations({
      pages: [],
      components: [],
      selectors: emptySelectors,
      weakPatterns: [
        {
          action_verb: 'click',
          selector: '#help',
          confidence: 45,
          page_ids: ['page_1', 'page_2'],
          action_ids: ['action_1', 'action_3'],
          line_numbers: [2, 5],
        },
      ],
      config,
    });
    expect(result.architectural.map((r) => [r.kind, r.message])).toEqual([
      ['weak_pattern', 'click on #help repeats on 2 pages (confidence 45); consider a shared helper method'],
    ]);
  });
});

// ─── Output ───────────────────────────────────────────────────────────────────

describe('writeBlueprint()', () => {
  let testDir = '';

  beforeEach(() => {
    testDir = join(tmpdir(), `pom-blueprint-reporter-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (testDir) rmSync(testDir, { recursive: true, force: true });
  });

  it('writes pretty JSON named after the script', () => {
    const bp = buildBlueprint(SIGN_IN_SCRIPT, { source: 'login.spec.ts' });
    const file = writeBlueprint(join(testDir, 'out'), 'login.spec', bp);
    expect(file).toBe(join(testDir, 'out', 'login.spec.blueprint.json'));
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual(bp);
  });
});

describe('printSummary()', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints rows and one warning line per analysis warning', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const bp = buildBlueprint(SIGN_IN_SCRIPT);
    bp.metadata.warnings.push({ code: 'PARSE_FALLBACK', message: 'recovered', line_numbers: [] });

    printSummary(bp);

    // section title, six rows and a closing rule
    expect(log).toHaveBeenCalledTimes(8);
    expect(String(log.mock.calls[0][0])).toContain('<inline>');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain('PARSE_FALLBACK: recovered');
  });
});
