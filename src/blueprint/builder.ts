// src/blueprint/builder.ts
//
// Runs the analysis stages in order and assembles their outputs into the
// cross-referenced blueprint. Each stage fully consumes the previous stage's
// output; ids are handed out by one allocator in emission order.

import { extractStatements } from "../analysis/statement-extractor";
import { classifySelector } from "../analysis/selectors/classifier";
import { scoreSelector, STABILITY_THRESHOLD } from "../analysis/selectors/fragility";
import { detectPageBoundaries, type PageSegment, type SegmentEvent } from "../analysis/pages/boundary-detector";
import { detectComponents, type WeakPattern } from "../analysis/components/component-detector";
import {
  groupMethods,
  suggestParameters,
  type GenericNameCounter,
  type GroupItem,
  type MethodDraft,
} from "../analysis/methods/method-grouper";
import { assertionShapeKey, assertionType, recommendPlacement } from "../analysis/assertions/assertion-classifier";
import { buildRecommendations } from "../output/reporter";
import { assertBlueprintIntegrity } from "../output/validator";
import { resolveConfig, type AnalyzerConfig } from "../ingestion/config";
import { IdAllocator } from "./ids";
import type {
  ActionRecord,
  ActionSequence,
  AnalysisWarning,
  AssertionRecord,
  BoundaryEvent,
  ClassifiedSelector,
  ComponentRecord,
  MethodSuggestion,
  PageObjectBlueprint,
  PageRecord,
  SelectorAnalysis,
  SelectorRecord,
  SelectorStrategy,
  SequenceStep,
  Statement,
  WaitBehavior,
  WaitStrategy,
} from "./types";

export const ANALYZER_VERSION = "1.0.0";

export const OPERATIONAL_LIMITS = { actions: 200, pages: 20, components: 10 } as const;

export interface AnalyzeOptions {
  /** Label echoed into metadata.source; a file path for file input. */
  source?: string;
  /** Raw configuration; validated and defaulted. */
  config?: unknown;
}

// ─── Selector registry ────────────────────────────────────────────────────────

class SelectorRegistry {
  private readonly byNormalized = new Map<string, SelectorRecord>();

  constructor(
    private readonly ids: IdAllocator,
    private readonly config: AnalyzerConfig["selector_analysis"]
  ) {}

  register(raw: string, usedBy: string, line: number): SelectorRecord {
    const classified = classifySelector(raw);
    let record = this.byNormalized.get(classified.normalized);
    if (!record) {
      record = {
        id: this.ids.next("selector"),
        ...classified,
        ...scoreSelector(classified, this.config),
        used_by: [],
        line_numbers: [],
      };
      this.byNormalized.set(classified.normalized, record);
    }
    record.used_by.push(usedBy);
    record.line_numbers.push(line);
    return record;
  }

  all(): SelectorRecord[] {
    return [...this.byNormalized.values()];
  }

  byId(): Map<string, ClassifiedSelector> {
    return new Map(this.all().map((r) => [r.id, r]));
  }
}

// ─── Wait behaviour ───────────────────────────────────────────────────────────

const WAIT_STRATEGIES: Record<string, WaitStrategy> = {
  waitForTimeout: "fixed_timeout",
  waitForURL: "url",
  waitForNavigation: "url",
  waitForLoadState: "load_state",
  waitForSelector: "selector",
  waitFor: "selector",
  waitForResponse: "network",
  waitForRequest: "network",
  waitForEvent: "event",
  waitForFunction: "event",
};

function describeWait(wait: Statement): WaitBehavior {
  const strategy = WAIT_STRATEGIES[wait.action_verb ?? ""] ?? "event";
  let timeout: number | null = null;
  if (strategy === "fixed_timeout") {
    const first = wait.literal_arguments[0];
    timeout = first && first.kind === "number" ? Number(first.value) : null;
  } else {
    const options = wait.literal_arguments.find((a) => a.kind === "object");
    const m = options ? /timeout\s*:\s*(\d+)/.exec(options.value) : null;
    timeout = m ? Number(m[1]) : null;
  }
  return { strategy, timeout_ms: timeout, wait_line: wait.line_number, anti_pattern: strategy === "fixed_timeout" };
}

function waitBehaviorFor(statement: Statement, next: Statement | null): WaitBehavior {
  if (statement.kind === "wait") return describeWait(statement);
  if (next && next.kind === "wait") return describeWait(next);
  return { strategy: "auto", timeout_ms: null, wait_line: null, anti_pattern: false };
}

// ─── Records ──────────────────────────────────────────────────────────────────

interface RecordContext {
  ids: IdAllocator;
  selectors: SelectorRegistry;
  idsByLine: Map<number, string>;
  warnings: AnalysisWarning[];
  shapeCounts: Map<string, number>;
}

function toEvent(event: SegmentEvent, idsByLine: Map<number, string>): BoundaryEvent {
  return {
    type: event.type,
    line_number: event.line_number,
    action_id: event.line_number !== null ? idsByLine.get(event.line_number) ?? null : null,
    url: event.url,
  };
}

function buildActionRecord(
  statement: Statement,
  next: Statement | null,
  pageId: string,
  ctx: RecordContext
): ActionRecord {
  const id = ctx.ids.next("action");
  const selector = statement.selector_expression
    ? ctx.selectors.register(statement.selector_expression, id, statement.line_number)
    : null;
  const kind = statement.kind === "navigation" || statement.kind === "wait" ? statement.kind : "interaction";
  const record: ActionRecord = {
    id,
    page_id: pageId,
    line_number: statement.line_number,
    kind,
    action_verb: statement.action_verb,
    subtype: statement.subtype,
    raw_text: statement.raw_text,
    selector_id: selector?.id ?? null,
    target_url: statement.target_url,
    literal_arguments: statement.literal_arguments,
    parameters: [],
    wait_behavior: waitBehaviorFor(statement, next),
    component_usage: null,
    context: statement.context,
  };
  record.parameters = suggestParameters(record, selector);
  return record;
}

function buildAssertionRecord(
  statement: Statement,
  previous: Statement | null,
  pageId: string,
  ctx: RecordContext
): AssertionRecord {
  const id = ctx.ids.next("assertion");
  const selector = statement.selector_expression
    ? ctx.selectors.register(statement.selector_expression, id, statement.line_number)
    : null;
  const previousSelector = previous?.selector_expression ? classifySelector(previous.selector_expression) : null;
  const matcher = statement.matcher?.name ?? statement.action_verb ?? "unknown";
  const type = assertionType(matcher);
  const shapeCount = ctx.shapeCounts.get(assertionShapeKey(statement, selector?.normalized ?? null)) ?? 0;
  const placement = recommendPlacement(
    statement,
    previous,
    selector?.normalized ?? null,
    previousSelector?.normalized ?? null,
    shapeCount
  );

  if (type === "custom") {
    ctx.warnings.push({
      code: "UNSUPPORTED_ASSERTION",
      message: `Line ${statement.line_number}: matcher '${matcher}' has no dedicated assertion type; classified as custom`,
      line_numbers: [statement.line_number],
    });
  }

  const expected = statement.literal_arguments[0];
  return {
    id,
    page_id: pageId,
    line_number: statement.line_number,
    type,
    matcher,
    negated: statement.matcher?.negated ?? false,
    raw_text: statement.raw_text,
    selector_id: selector?.id ?? null,
    expected_value: expected ? expected.value : null,
    placement_recommendation: placement.placement,
    placement_reason: placement.reason,
    context: statement.context,
  };
}

function buildPages(segments: PageSegment[], statements: Statement[], ctx: RecordContext): PageRecord[] {
  const meaningful = statements.filter((s) => s.kind !== "structural");
  const position = new Map(meaningful.map((s, i) => [s.line_number, i]));
  const pageIds = segments.map(() => ctx.ids.next("page"));

  const pages = segments.map((segment, index): PageRecord => {
    const pageId = pageIds[index];
    const actions: ActionRecord[] = [];
    const assertions: AssertionRecord[] = [];
    const structural: number[] = [];

    for (const statement of segment.statements) {
      if (statement.kind === "structural") {
        structural.push(statement.line_number);
        continue;
      }
      const i = position.get(statement.line_number) ?? -1;
      if (statement.kind === "assertion") {
        const record = buildAssertionRecord(statement, meaningful[i - 1] ?? null, pageId, ctx);
        ctx.idsByLine.set(statement.line_number, record.id);
        assertions.push(record);
      } else {
        const record = buildActionRecord(statement, meaningful[i + 1] ?? null, pageId, ctx);
        ctx.idsByLine.set(statement.line_number, record.id);
        actions.push(record);
      }
    }

    return {
      id: pageId,
      inferred_name: segment.inferred_name,
      confidence: segment.confidence,
      url_pattern: segment.url_pattern,
      // Resolved below: the exit event points at a statement of the next page.
      entry_event: toEvent(segment.entry, new Map()),
      exit_event: toEvent(segment.exit, new Map()),
      boundary_signals: segment.boundary_signals,
      line_range: {
        start: Math.min(...segment.statements.map((s) => s.line_number)),
        end: Math.max(...segment.statements.map((s) => s.end_line)),
      },
      actions,
      assertions,
      structural_lines: structural,
      suggested_methods: [],
      component_usages: [],
    };
  });

  pages.forEach((page, index) => {
    page.entry_event = toEvent(segments[index].entry, ctx.idsByLine);
    page.exit_event = toEvent(segments[index].exit, ctx.idsByLine);
  });
  return pages;
}

// ─── Components ───────────────────────────────────────────────────────────────

function attachComponents(
  pages: PageRecord[],
  selectors: SelectorRegistry,
  config: AnalyzerConfig,
  ids: IdAllocator,
  warnings: AnalysisWarning[]
): { components: ComponentRecord[]; weak: WeakPattern[] } {
  const detection = detectComponents(pages, selectors.byId(), config.component_detection);
  warnings.push(...detection.warnings);

  const actionsById = new Map(pages.flatMap((p) => p.actions.map((a) => [a.id, a] as const)));
  const pagesById = new Map(pages.map((p) => [p.id, p]));

  const components = detection.components.map((draft): ComponentRecord => {
    const id = ids.next("component");
    draft.instances.forEach((instance, instanceIndex) => {
      instance.action_ids.forEach((actionId, position) => {
        const action = actionsById.get(actionId);
        if (action) action.component_usage = { component_id: id, instance_index: instanceIndex, position };
      });
      pagesById.get(instance.page_id)?.component_usages.push({
        component_id: id,
        instance_index: instanceIndex,
        action_ids: instance.action_ids,
        line_numbers: instance.line_numbers,
      });
    });
    const pageIds = [...new Set(draft.instances.map((i) => i.page_id))];
    return {
      id,
      inferred_name: draft.inferred_name,
      type: draft.type,
      confidence: draft.confidence,
      provisional: draft.provisional,
      appears_on_page_ids: pageIds,
      appearance_count: pageIds.length,
      pattern: draft.pattern,
      selector_templates: draft.selector_templates,
      instances: draft.instances,
      suggested_methods: [],
    };
  });

  for (const page of pages) {
    page.component_usages.sort((a, b) => a.line_numbers[0] - b.line_numbers[0]);
  }
  return { components, weak: detection.weak_patterns };
}

// ─── Methods ──────────────────────────────────────────────────────────────────

function ownerNoun(name: string): string | null {
  const noun = name.replace(/(Page|Modal|Header|Footer|Navigation|Form|Component)\d*$/, "");
  return noun === "" ? null : noun;
}

function finishMethods(drafts: MethodDraft[], ownerId: string, ids: IdAllocator): MethodSuggestion[] {
  return drafts.map((draft) => ({ id: ids.next("method"), owner_id: ownerId, ...draft }));
}

function attachMethods(
  pages: PageRecord[],
  components: ComponentRecord[],
  selectors: Map<string, ClassifiedSelector>,
  config: AnalyzerConfig,
  ids: IdAllocator,
  warnings: AnalysisWarning[]
): void {
  const counter: GenericNameCounter = { next: 1 };
  const selectorOf = (id: string | null): ClassifiedSelector | null => (id ? selectors.get(id) ?? null : null);

  for (const page of pages) {
    const items: GroupItem[] = [
      ...page.actions.map((record): GroupItem => ({
        kind: "action",
        record,
        selector: selectorOf(record.selector_id),
        opens_page: record.line_number === page.entry_event.line_number,
      })),
      ...page.assertions.map((record): GroupItem => ({ kind: "assertion", record })),
    ].sort((a, b) => a.record.line_number - b.record.line_number);

    const { methods, warnings: methodWarnings } = groupMethods(
      {
        owner_kind: "page",
        owner_noun: page.entry_event.type === "start_of_input" ? null : ownerNoun(page.inferred_name),
        items,
        exits_to_new_url: page.exit_event.type === "wait_for_url",
      },
      config.method_grouping,
      counter
    );
    warnings.push(...methodWarnings);
    page.suggested_methods = finishMethods(methods, page.id, ids);
  }

  const actionsById = new Map(pages.flatMap((p) => p.actions.map((a) => [a.id, a] as const)));
  for (const component of components) {
    const first = component.instances[0];
    const items: GroupItem[] = first.action_ids
      .map((id) => actionsById.get(id))
      .filter((a): a is ActionRecord => a !== undefined)
      .map((record): GroupItem => ({ kind: "action", record, selector: selectorOf(record.selector_id), opens_page: false }));

    const { methods, warnings: methodWarnings } = groupMethods(
      { owner_kind: "component", owner_noun: ownerNoun(component.inferred_name), items, exits_to_new_url: false },
      config.method_grouping,
      counter
    );
    warnings.push(...methodWarnings);
    component.suggested_methods = finishMethods(methods, component.id, ids);
  }
}

// ─── Sequences ────────────────────────────────────────────────────────────────

function buildSequences(pages: PageRecord[], components: ComponentRecord[], ids: IdAllocator): ActionSequence[] {
  const methodByRef = new Map<string, string>();
  for (const method of pages.flatMap((p) => p.suggested_methods)) {
    for (const ref of [...method.action_ids, ...method.assertion_ids]) methodByRef.set(ref, method.id);
  }
  const componentMethodByAction = new Map<string, string>();
  for (const component of components) {
    const methods = component.suggested_methods;
    for (const instance of component.instances) {
      instance.action_ids.forEach((actionId, position) => {
        const templateId = component.instances[0].action_ids[position];
        const method = methods.find((m) => m.action_ids.includes(templateId));
        if (method) componentMethodByAction.set(actionId, method.id);
      });
    }
  }

  type Entry = SequenceStep & { title: string | null };
  const entries: Entry[] = pages
    .flatMap((page) => [
      ...page.actions.map((a): Entry => ({
        ref_id: a.id,
        kind: "action",
        page_id: page.id,
        line_number: a.line_number,
        method_id: methodByRef.get(a.id) ?? componentMethodByAction.get(a.id) ?? null,
        component_id: a.component_usage?.component_id ?? null,
        title: a.context.test_title,
      })),
      ...page.assertions.map((a): Entry => ({
        ref_id: a.id,
        kind: "assertion",
        page_id: page.id,
        line_number: a.line_number,
        method_id: methodByRef.get(a.id) ?? null,
        component_id: null,
        title: a.context.test_title,
      })),
    ])
    .sort((a, b) => a.line_number - b.line_number);

  const byTitle = new Map<string, Entry[]>();
  for (const entry of entries) {
    const key = entry.title ?? "\u0000script";
    const list = byTitle.get(key) ?? [];
    list.push(entry);
    byTitle.set(key, list);
  }

  return [...byTitle.values()].map((list) => {
    const title = list[0].title;
    return {
      id: ids.next("sequence"),
      name: title ?? "script",
      test_title: title,
      page_ids: [...new Set(list.map((e) => e.page_id))],
      steps: list.map(
        (e): SequenceStep => ({
          ref_id: e.ref_id,
          kind: e.kind,
          page_id: e.page_id,
          line_number: e.line_number,
          method_id: e.method_id,
          component_id: e.component_id,
        })
      ),
    };
  });
}

// ─── Selector analysis ────────────────────────────────────────────────────────

function buildSelectorAnalysis(records: SelectorRecord[], config: AnalyzerConfig): SelectorAnalysis {
  const byStrategy: Record<SelectorStrategy, number> = {
    testid: 0,
    role: 0,
    text: 0,
    css: 0,
    xpath: 0,
    placeholder: 0,
  };
  for (const record of records) byStrategy[record.strategy]++;
  const total = records.reduce((sum, r) => sum + r.fragility_score, 0);

  return {
    total_selectors: records.length,
    by_strategy: byStrategy,
    average_fragility: records.length === 0 ? 0 : Math.round(total / records.length),
    fragile_selector_ids: config.selector_analysis.flag_fragile_selectors
      ? records.filter((r) => r.fragility_score > STABILITY_THRESHOLD).map((r) => r.id)
      : [],
    selectors: records,
    duplicates: records
      .filter((r) => new Set(r.used_by).size >= 2)
      .map((r) => ({ selector_id: r.id, raw: r.raw, occurrence_ids: r.used_by, line_numbers: r.line_numbers })),
  };
}

// ─── Main export ──────────────────────────────────────────────────────────────

function countLines(code: string): number {
  if (code === "") return 0;
  return code.replace(/\r?\n$/, "").split(/\r?\n/).length;
}

export function limitWarnings(actions: number, pages: number, components: number): AnalysisWarning[] {
  const warnings: AnalysisWarning[] = [];
  if (actions > OPERATIONAL_LIMITS.actions) {
    warnings.push({
      code: "LIMIT_EXCEEDED_ACTIONS",
      message: `${actions} actions exceed the supported limit of ${OPERATIONAL_LIMITS.actions}`,
      line_numbers: [],
    });
  }
  if (pages > OPERATIONAL_LIMITS.pages) {
    warnings.push({
      code: "LIMIT_EXCEEDED_PAGES",
      message: `${pages} pages exceed the supported limit of ${OPERATIONAL_LIMITS.pages}`,
      line_numbers: [],
    });
  }
  if (components > OPERATIONAL_LIMITS.components) {
    warnings.push({
      code: "LIMIT_EXCEEDED_COMPONENTS",
      message: `${components} components exceed the supported limit of ${OPERATIONAL_LIMITS.components}`,
      line_numbers: [],
    });
  }
  return warnings;
}

/**
 * Analyzes one script and returns its blueprint. Throws ScriptParseError when
 * the text holds no recognizable statement and ConfigError for invalid options.
 */
export function buildBlueprint(code: string, options: AnalyzeOptions = {}): PageObjectBlueprint {
  const config = resolveConfig(options.config);
  const source = options.source ?? "<inline>";
  const ids = new IdAllocator();
  const warnings: AnalysisWarning[] = [];

  // Step 1: Extract statements
  const extraction = extractStatements(code, source);
  const statements = extraction.statements;
  warnings.push(...extraction.warnings);

  // Step 2: Partition into pages
  const boundaries = detectPageBoundaries(statements, config.page_detection);
  warnings.push(...boundaries.warnings);

  // Step 3: Page records, with selectors registered in first-occurrence order
  const shapeCounts = new Map<string, number>();
  for (const statement of statements) {
    if (statement.kind !== "assertion") continue;
    const normalized = statement.selector_expression ? classifySelector(statement.selector_expression).normalized : null;
    const key = assertionShapeKey(statement, normalized);
    shapeCounts.set(key, (shapeCounts.get(key) ?? 0) + 1);
  }
  const selectors = new SelectorRegistry(ids, config.selector_analysis);
  const ctx: RecordContext = { ids, selectors, idsByLine: new Map(), warnings, shapeCounts };
  const pages = buildPages(boundaries.pages, statements, ctx);

  // Step 4: Components (back-references written onto actions and pages)
  const { components, weak } = attachComponents(pages, selectors, config, ids, warnings);

  // Step 5: Methods, page owners first
  attachMethods(pages, components, selectors.byId(), config, ids, warnings);

  // Step 6: Sequences and selector analysis
  const sequences = buildSequences(pages, components, ids);
  const selectorAnalysis = buildSelectorAnalysis(selectors.all(), config);

  // Step 7: Recommendations and limits
  const totalActions = pages.reduce((n, p) => n + p.actions.length, 0);
  const totalAssertions = pages.reduce((n, p) => n + p.assertions.length, 0);
  warnings.push(...limitWarnings(totalActions, pages.length, components.length));
  const recommendations = buildRecommendations({
    pages,
    components,
    selectors: selectorAnalysis,
    weakPatterns: weak,
    config,
  });

  const methodCount =
    pages.reduce((n, p) => n + p.suggested_methods.length, 0) +
    components.reduce((n, c) => n + c.suggested_methods.length, 0);

  const blueprint: PageObjectBlueprint = {
    metadata: {
      source,
      analyzer_version: ANALYZER_VERSION,
      total_lines: countLines(code),
      total_statements: statements.length,
      structural_statements: statements.filter((s) => s.kind === "structural").length,
      total_actions: totalActions,
      total_assertions: totalAssertions,
      unique_pages_detected: pages.length,
      total_components: components.length,
      total_methods: methodCount,
      total_selectors: selectorAnalysis.total_selectors,
      config,
      warnings,
    },
    pages,
    components,
    action_sequences: sequences,
    selector_analysis: selectorAnalysis,
    recommendations,
  };

  // Step 8: Integrity check; a failure here is a defect, never a user error
  assertBlueprintIntegrity(blueprint);
  return blueprint;
}
