// test/unit/analysis/pages/boundary-detector.test.ts
import { describe, it, expect } from 'vitest';
import { detectPageBoundaries } from '../../../../src/analysis/pages/boundary-detector';
import { extractStatements } from '../../../../src/analysis/statement-extractor';
import { resolveConfig } from '../../../../src/ingestion/config';
import type { Statement } from '../../../../src/blueprint/types';
import { makeStatement } from '../../../helpers/records';
import { NO_NAVIGATION_SCRIPT, SIGN_IN_SCRIPT } from '../../../helpers/scripts';

const defaults = resolveConfig().page_detection;

function goto(line: number, url: string): Statement {
  return makeStatement({
    line_number: line,
    kind: 'navigation',
    action_verb: 'goto',
    target_url: url,
    literal_arguments: [{ kind: 'string', value: url }],
  });
}

function waitForUrl(line: number, url: string): Statement {
  return makeStatement({
    line_number: line,
    kind: 'wait',
    action_verb: 'waitForURL',
    target_url: url,
    literal_arguments: [{ kind: 'string', value: url }],
  });
}

function click(line: number, selector: string): Statement {
  return makeStatement({ line_number: line, selector_expression: selector });
}

// ─── Navigation and URL waits ─────────────────────────────────────────────────

describe('detectPageBoundaries — navigation', () => {
  const { pages, warnings } = detectPageBoundaries(extractStatements(SIGN_IN_SCRIPT).statements, defaults);

  it('opens a page at goto and another at a URL wait', () => {
    expect(pages.map((p) => [p.inferred_name, p.confidence, p.url_pattern])).toEqual([
      ['LoginPage', 100, '/login'],
      ['DashboardPage', 100, '/dashboard'],
    ]);
    expect(warnings).toEqual([]);
  });

  it('absorbs leading structural lines into the first page', () => {
    expect(pages[0].statements.map((s) => s.line_number)).toEqual([1, 3, 4, 5, 6, 7]);
    expect(pages[0].entry).toEqual({ type: 'navigation', line_number: 4, url: '/login' });
  });

  it('puts the boundary statement in the page it opens', () => {
    expect(pages[0].exit).toEqual({ type: 'wait_for_url', line_number: 8, url: '**/dashboard' });
    expect(pages[1].statements.map((s) => s.line_number)).toEqual([8, 9]);
    expect(pages[1].exit.type).toBe('end_of_input');
  });

  it('does not split on a URL wait matching the current page', () => {
    const result = detectPageBoundaries(
      [goto(1, '/orders/42'), click(2, "getByText('Refresh')"), waitForUrl(3, '**/orders/*')],
      defaults,
    );
    expect(result.pages).toHaveLength(1);
  });

  it('ignores URL waits when url_change_creates_new_page is off', () => {
    const result = detectPageBoundaries([goto(1, '/a'), click(2, '#x'), waitForUrl(3, '/b')], {
      ...defaults,
      url_change_creates_new_page: false,
    });
    expect(result.pages).toHaveLength(1);
  });

  it('scores a glob URL wait lower than a concrete one', () => {
    const result = detectPageBoundaries([goto(1, '/cart'), click(2, '#pay'), waitForUrl(3, '**/orders/*')], defaults);
    expect(result.pages[1].confidence).toBe(95);
    expect(result.pages[1].url_pattern).toBe('/orders/*');
  });
});

describe('detectPageBoundaries — history', () => {
  const statements = [
    goto(1, '/products'),
    click(2, '#item'),
    goto(3, '/cart'),
    click(4, '#remove'),
    makeStatement({ line_number: 5, kind: 'navigation', action_verb: 'goBack' }),
    click(6, '#item'),
  ];
  const { pages, warnings } = detectPageBoundaries(statements, defaults);

  it('resolves goBack to the previous URL and reuses its name', () => {
    expect(pages.map((p) => [p.inferred_name, p.confidence])).toEqual([
      ['ProductsPage', 100],
      ['CartPage', 100],
      ['ProductsPage', 65],
    ]);
    expect(pages[2].entry).toEqual({ type: 'history', line_number: 5, url: '/products' });
  });

  it('warns about the low-confidence page', () => {
    expect(warnings).toEqual([
      {
        code: 'LOW_CONFIDENCE_BOUNDARY',
        message: 'ProductsPage was inferred with confidence 65 (history)',
        line_numbers: [5],
      },
    ]);
  });

  it('assigns every statement to exactly one page', () => {
    expect(pages.flatMap((p) => p.statements)).toEqual(statements);
  });
});

// ─── Without signals ──────────────────────────────────────────────────────────

describe('detectPageBoundaries — no signal', () => {
  const { pages, warnings } = detectPageBoundaries(extractStatements(NO_NAVIGATION_SCRIPT).statements, defaults);

  it('treats the whole script as one page named after the test', () => {
    expect(pages).toHaveLength(1);
    expect(pages[0].inferred_name).toBe('RememberMePage');
    expect(pages[0].confidence).toBe(60);
    expect(pages[0].entry.type).toBe('start_of_input');
  });

  it('warns that boundaries are uncertain', () => {
    expect(warnings.map((w) => w.code)).toEqual(['UNCERTAIN_PAGE_BOUNDARIES']);
    expect(pages[0].boundary_signals).toEqual(['no navigation, URL wait, modal or tab signal found']);
  });
});

// ─── Modals and tabs ──────────────────────────────────────────────────────────

describe('detectPageBoundaries — overlays and tabs', () => {
  it('opens and closes a modal page in page mode', () => {
    const { pages } = detectPageBoundaries(
      [
        goto(1, '/account'),
        click(2, "getByRole('button', { name: 'Delete' })"),
        click(3, "getByTestId('confirm-modal')"),
        click(4, "getByRole('button', { name: 'Done' })"),
      ],
      { ...defaults, modal_detection: 'page' },
    );
    expect(pages.map((p) => [p.inferred_name, p.confidence, p.modal])).toEqual([
      ['AccountPage', 100, false],
      ['ConfirmModal', 65, true],
      ['AccountPage', 50, false],
    ]);
  });

  it('keeps modal statements on the page in component mode', () => {
    const { pages } = detectPageBoundaries(
      [goto(1, '/account'), click(2, "getByTestId('confirm-modal')")],
      defaults,
    );
    expect(pages).toHaveLength(1);
  });

  it('opens a tab page only when tab switches are enabled', () => {
    const statements = [
      goto(1, '/settings'),
      makeStatement({ line_number: 2, action_verb: 'fill', selector_expression: "getByLabel('Name')" }),
      click(3, "getByRole('tab', { name: 'Billing' })"),
    ];
    expect(detectPageBoundaries(statements, defaults).pages).toHaveLength(1);

    const { pages } = detectPageBoundaries(statements, { ...defaults, tab_switch_creates_new_page: true });
    expect(pages.map((p) => [p.inferred_name, p.confidence])).toEqual([
      ['SettingsPage', 100],
      ['BillingTabPage', 55],
    ]);
  });

  it('always opens a page for a browser tab', () => {
    const { pages } = detectPageBoundaries(
      [goto(1, '/help'), makeStatement({ line_number: 2, subtype: 'multi_tab', selector_expression: "getByText('Docs')" })],
      defaults,
    );
    expect(pages.map((p) => [p.inferred_name, p.confidence, p.entry.type])).toEqual([
      ['HelpPage', 100, 'navigation'],
      ['PopupPage', 65, 'tab_switch'],
    ]);
  });
});
