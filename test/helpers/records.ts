// test/helpers/records.ts
// Builders for IR records so stage tests can feed hand-made input.

import type {
  ActionRecord,
  AssertionRecord,
  PageRecord,
  Statement,
  StatementContext,
} from '../../src/blueprint/types';

/** Joins lines with \n so line numbers in tests read off the array index + 1. */
export function script(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

export function context(overrides: Partial<StatementContext> = {}): StatementContext {
  return { in_branch: false, in_loop: false, test_title: null, ...overrides };
}

export function makeStatement(overrides: Partial<Statement> = {}): Statement {
  const line = overrides.line_number ?? 1;
  return {
    line_number: line,
    end_line: line,
    kind: 'interaction',
    raw_text: 'await page.click(\'#x\');',
    action_verb: 'click',
    selector_expression: null,
    literal_arguments: [],
    target_url: null,
    subtype: 'standard',
    actor: 'page',
    matcher: null,
    unsupported: false,
    context: context(),
    ...overrides,
  };
}

export function makeAction(overrides: Partial<ActionRecord> & { id: string }): ActionRecord {
  return {
    page_id: 'page_1',
    line_number: 1,
    kind: 'interaction',
    action_verb: 'click',
    subtype: 'standard',
    raw_text: '',
    selector_id: null,
    target_url: null,
    literal_arguments: [],
    parameters: [],
    wait_behavior: { strategy: 'auto', timeout_ms: null, wait_line: null, anti_pattern: false },
    component_usage: null,
    context: context(),
    ...overrides,
  };
}

export function makeAssertion(overrides: Partial<AssertionRecord> & { id: string }): AssertionRecord {
  return {
    page_id: 'page_1',
    line_number: 1,
    type: 'toBeVisible',
    matcher: 'toBeVisible',
    negated: false,
    raw_text: '',
    selector_id: null,
    expected_value: null,
    placement_recommendation: 'in_test',
    placement_reason: 'test-specific expectation',
    context: context(),
    ...overrides,
  };
}

export function makePage(id: string, actions: ActionRecord[], assertions: AssertionRecord[] = []): PageRecord {
  const lines = [...actions, ...assertions].map((r) => r.line_number);
  return {
    id,
    inferred_name: 'TestPage',
    confidence: 100,
    url_pattern: null,
    entry_event: { type: 'start_of_input', line_number: null, action_id: null, url: null },
    exit_event: { type: 'end_of_input', line_number: null, action_id: null, url: null },
    boundary_signals: [],
    line_range: { start: Math.min(...lines), end: Math.max(...lines) },
    actions,
    assertions,
    structural_lines: [],
    suggested_methods: [],
    component_usages: [],
  };
}
