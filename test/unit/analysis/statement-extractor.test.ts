// test/unit/analysis/statement-extractor.test.ts
import { describe, it, expect } from 'vitest';
import { extractStatements, scanLogicalStatements } from '../../../src/analysis/statement-extractor';
import { ScriptParseError } from '../../../src/blueprint/errors';
import { script } from '../../helpers/records';
import { SIGN_IN_SCRIPT } from '../../helpers/scripts';

function at(code: string, line: number) {
  const found = extractStatements(code).statements.find((s) => s.line_number === line);
  if (!found) throw new Error(`no statement on line ${line}`);
  return found;
}

// ─── Kinds and lines ──────────────────────────────────────────────────────────

describe('extractStatements — statement kinds', () => {
  it('assigns one statement per source line in order', () => {
    const { statements, usedFallback } = extractStatements(SIGN_IN_SCRIPT);
    expect(usedFallback).toBe(false);
    expect(statements.map((s) => [s.line_number, s.kind])).toEqual([
      [1, 'structural'],
      [3, 'structural'],
      [4, 'navigation'],
      [5, 'interaction'],
      [6, 'interaction'],
      [7, 'interaction'],
      [8, 'wait'],
      [9, 'assertion'],
    ]);
  });

  it('records the header line of a test wrapper as its raw text', () => {
    expect(at(SIGN_IN_SCRIPT, 3).raw_text).toBe("test('user can sign in', async ({ page }) => {");
  });

  it('reads the legacy page.fill(selector, value) form', () => {
    const fill = at(SIGN_IN_SCRIPT, 5);
    expect(fill.action_verb).toBe('fill');
    expect(fill.selector_expression).toBe('[placeholder="Email"]');
    expect(fill.literal_arguments).toEqual([{ kind: 'string', value: 'user@example.com' }]);
    expect(fill.actor).toBe('page');
    expect(fill.subtype).toBe('standard');
  });

  it('keeps the locator chain as the selector expression', () => {
    const click = at(SIGN_IN_SCRIPT, 7);
    expect(click.action_verb).toBe('click');
    expect(click.selector_expression).toBe("getByRole('button', { name: 'Sign in' })");
  });

  it('records navigation and URL-wait targets', () => {
    expect(at(SIGN_IN_SCRIPT, 4).target_url).toBe('/login');
    expect(at(SIGN_IN_SCRIPT, 8).target_url).toBe('**/dashboard');
  });

  it('tags every statement inside test() with its title', () => {
    expect(at(SIGN_IN_SCRIPT, 6).context).toEqual({ in_branch: false, in_loop: false, test_title: 'user can sign in' });
    expect(at(SIGN_IN_SCRIPT, 1).context.test_title).toBeNull();
  });

  it('treats reload() as navigation without a target', () => {
    const code = script("test('r', async ({ page }) => {", '  await page.reload();', '});');
    const reload = at(code, 2);
    expect(reload.kind).toBe('navigation');
    expect(reload.action_verb).toBe('reload');
    expect(reload.target_url).toBeNull();
  });
});

// ─── Assertions ───────────────────────────────────────────────────────────────

describe('extractStatements — assertions', () => {
  it('describes the matcher and its locator subject', () => {
    const assertion = at(SIGN_IN_SCRIPT, 9);
    expect(assertion.selector_expression).toBe("getByText('Welcome back')");
    expect(assertion.matcher).toEqual({ name: 'toBeVisible', negated: false, soft: false, subject: 'locator' });
  });

  it('detects .not and expect.soft', () => {
    const code = script(
      "test('soft', async ({ page }) => {",
      "  await expect.soft(page.getByText('Saved')).not.toBeVisible();",
      '});',
    );
    const assertion = at(code, 2);
    expect(assertion.matcher).toEqual({ name: 'toBeVisible', negated: true, soft: true, subject: 'locator' });
    expect(assertion.selector_expression).toBe("getByText('Saved')");
  });

  it('marks page-level assertions and keeps regex arguments', () => {
    const code = script("test('url', async ({ page }) => {", '  await expect(page).toHaveURL(/dashboard/);', '});');
    const assertion = at(code, 2);
    expect(assertion.matcher?.subject).toBe('page');
    expect(assertion.selector_expression).toBeNull();
    expect(assertion.literal_arguments).toEqual([{ kind: 'regex', value: '/dashboard/' }]);
  });
});

// ─── Locator variables and actors ─────────────────────────────────────────────

describe('extractStatements — bindings', () => {
  const code = script(
    "test('save', async ({ page }) => {",
    "  const save = page.getByRole('button', { name: 'Save' });",
    '  await save.click();',
    '  await expect(save).toBeEnabled();',
    '});',
  );

  it('emits the locator declaration as structural', () => {
    expect(at(code, 2).kind).toBe('structural');
  });

  it('resolves a locator variable used as an action subject', () => {
    const click = at(code, 3);
    expect(click.kind).toBe('interaction');
    expect(click.selector_expression).toBe("getByRole('button', { name: 'Save' })");
  });

  it('resolves a locator variable used as an assertion subject', () => {
    expect(at(code, 4).selector_expression).toBe("getByRole('button', { name: 'Save' })");
  });

  it('collapses Promise.all around a popup into a multi_tab click', () => {
    const popup = script(
      "test('popup', async ({ page }) => {",
      '  const [popup] = await Promise.all([',
      "    page.waitForEvent('popup'),",
      "    page.getByText('Open help').click(),",
      '  ]);',
      "  await popup.getByRole('link', { name: 'Docs' }).click();",
      '});',
    );
    const opener = at(popup, 2);
    expect(opener.action_verb).toBe('click');
    expect(opener.subtype).toBe('multi_tab');
    expect(opener.selector_expression).toBe("getByText('Open help')");

    const inPopup = at(popup, 6);
    expect(inPopup.actor).toBe('popup');
    expect(inPopup.selector_expression).toBe("getByRole('link', { name: 'Docs' })");
  });

  it('reads keyboard actions without a selector', () => {
    const code2 = script("test('k', async ({ page }) => {", "  await page.keyboard.press('Enter');", '});');
    const press = at(code2, 2);
    expect(press.kind).toBe('interaction');
    expect(press.action_verb).toBe('press');
    expect(press.selector_expression).toBeNull();
    expect(press.literal_arguments).toEqual([{ kind: 'string', value: 'Enter' }]);
  });

  it('classifies dialog handlers and file uploads by subtype', () => {
    const code2 = script(
      "test('upload', async ({ page }) => {",
      "  page.once('dialog', (dialog) => dialog.accept());",
      "  await page.getByLabel('Avatar').setInputFiles('avatar.png');",
      '});',
    );
    expect(at(code2, 2).subtype).toBe('dialog');
    expect(at(code2, 2).action_verb).toBe('handleDialog');
    expect(at(code2, 3).subtype).toBe('file_upload');
  });
});

// ─── Context ──────────────────────────────────────────────────────────────────

describe('extractStatements — branch and loop context', () => {
  const code = script(
    "test('loop', async ({ page }) => {",
    "  for (const name of ['a', 'b']) {",
    "    await page.getByLabel(name).fill('x');",
    '  }',
    '  if (process.env.CI) {',
    "    await page.getByRole('button', { name: 'Skip' }).click();",
    '  }',
    '});',
  );

  it('emits loop and if headers as structural statements', () => {
    expect(at(code, 2).kind).toBe('structural');
    expect(at(code, 2).raw_text).toBe("for (const name of ['a', 'b']) {");
    expect(at(code, 5).kind).toBe('structural');
  });

  it('flags statements inside a loop', () => {
    const fill = at(code, 3);
    expect(fill.context.in_loop).toBe(true);
    expect(fill.context.in_branch).toBe(false);
    expect(fill.selector_expression).toBe('getByLabel(name)');
  });

  it('flags statements inside a branch', () => {
    expect(at(code, 6).context).toEqual({ in_branch: true, in_loop: false, test_title: 'loop' });
  });

  it('flags short-circuit statements as branches', () => {
    const code2 = script(
      "test('maybe', async ({ page }) => {",
      "  visible && await page.getByText('Close').click();",
      '});',
    );
    expect(at(code2, 2).kind).toBe('interaction');
    expect(at(code2, 2).context.in_branch).toBe(true);
  });

  it('uses the step title inside test.step and restores the test title after it', () => {
    const code2 = script(
      "test('outer', async ({ page }) => {",
      "  await test.step('log in', async () => {",
      "    await page.goto('/login');",
      '  });',
      "  await page.getByText('Home').click();",
      '});',
    );
    expect(at(code2, 2).kind).toBe('structural');
    expect(at(code2, 3).context.test_title).toBe('log in');
    expect(at(code2, 5).context.test_title).toBe('outer');
  });

  it('uses the hook name as the title inside beforeEach', () => {
    const code2 = script(
      'test.beforeEach(async ({ page }) => {',
      "  await page.goto('/');",
      '});',
    );
    expect(at(code2, 2).context.test_title).toBe('beforeEach');
  });
});

// ─── Warnings ─────────────────────────────────────────────────────────────────

describe('extractStatements — warnings', () => {
  it('keeps an unknown locator method as an unsupported interaction', () => {
    const code = script("test('x', async ({ page }) => {", "  await page.getByText('Row').highlight();", '});');
    const { statements, warnings } = extractStatements(code);
    const statement = statements.find((s) => s.line_number === 2);
    expect(statement?.unsupported).toBe(true);
    expect(statement?.kind).toBe('interaction');
    expect(warnings).toEqual([
      {
        code: 'UNSUPPORTED_ACTION',
        message: "Line 2: 'highlight' is not a recognized action; kept as a generic interaction",
        line_numbers: [2],
      },
    ]);
  });

  it('analyzes the first of two statements sharing a line and reports the second', () => {
    const code = script("test('x', async ({ page }) => {", "  await page.click('#a'); await page.click('#b');", '});');
    const { statements, warnings } = extractStatements(code);
    expect(statements.find((s) => s.line_number === 2)?.selector_expression).toBe('#a');
    expect(statements.filter((s) => s.line_number === 2)).toHaveLength(1);
    expect(warnings).toEqual([
      {
        code: 'SHARED_LINE_STATEMENT',
        message:
          "Line 2 holds more than one statement; interaction 'click' (await page.click('#b');) is not analyzed on its own",
        line_numbers: [2],
      },
    ]);
  });

  it('turns own-line comments into structural statements', () => {
    const code = script(
      "test('x', async ({ page }) => {",
      '  // open the menu',
      "  await page.click('#menu');",
      '});',
    );
    const comment = at(code, 2);
    expect(comment.kind).toBe('structural');
    expect(comment.raw_text).toBe('// open the menu');
  });

  it('throws ScriptParseError when nothing is recognizable', () => {
    expect(() => extractStatements('const x = 1;\n', 'empty.ts')).toThrow(ScriptParseError);
  });
});

// ─── Fallback scanner ─────────────────────────────────────────────────────────

describe('extractStatements — fallback for fragments', () => {
  const fragment = script(
    "test('fragment', async ({ page }) => {",
    "  await page.goto('https://example.com/login');",
    "  await page.getByLabel('Email').fill('a@example.com');",
  );

  it('recovers statements line by line and warns', () => {
    const { statements, warnings, usedFallback } = extractStatements(fragment);
    expect(usedFallback).toBe(true);
    expect(warnings[0].code).toBe('PARSE_FALLBACK');
    expect(statements.map((s) => [s.line_number, s.kind])).toEqual([
      [1, 'structural'],
      [2, 'navigation'],
      [3, 'interaction'],
    ]);
  });

  it('keeps the test title and selector text of recovered statements', () => {
    const { statements } = extractStatements(fragment);
    expect(statements[1].target_url).toBe('https://example.com/login');
    expect(statements[2].selector_expression).toBe("getByLabel('Email')");
    expect(statements[2].context.test_title).toBe('fragment');
  });
});

describe('extractStatements — fallback titles', () => {
  it('tracks test.step titles in recovered fragments', () => {
    const fragment = script(
      "test('outer', async ({ page }) => {",
      "  await test.step('log in', async () => {",
      "    await page.goto('/login');",
      '  });',
      "  await page.getByText('Home').click();",
    );
    const { statements, usedFallback } = extractStatements(fragment);
    expect(usedFallback).toBe(true);
    expect(statements.map((s) => [s.line_number, s.kind, s.context.test_title])).toEqual([
      [1, 'structural', 'outer'],
      [2, 'structural', 'log in'],
      [3, 'navigation', 'log in'],
      [4, 'structural', 'log in'],
      [5, 'interaction', 'outer'],
    ]);
  });
});

describe('scanLogicalStatements', () => {
  it('joins multi-line calls and isolates block openers', () => {
    const chunks = scanLogicalStatements(
      ["await page.fill(", "  '#email',", "  'a@example.com'", ');', "test('x', () => {"].join('\n'),
    );
    expect(chunks).toEqual([
      { text: "await page.fill(\n  '#email',\n  'a@example.com'\n);", startLine: 1, opener: false },
      { text: "test('x', () => {", startLine: 5, opener: true },
    ]);
  });

  it('ignores brackets inside strings', () => {
    const chunks = scanLogicalStatements("await page.click('text=(');\nawait page.click('#b');");
    expect(chunks.map((c) => c.startLine)).toEqual([1, 2]);
  });
});
