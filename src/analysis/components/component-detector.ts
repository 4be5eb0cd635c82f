// src/analysis/components/component-detector.ts
//
// Finds action sub-sequences (verb + selector shape) that recur across pages and
// promotes them to reusable components. Pages are never altered here: the
// result lists instances by action id and the builder writes the back-references.

import { pascalCase, uniqueName } from "../../utils/naming";
import { derivableContent } from "../selectors/fragility";
import type { ComponentDetectionConfig } from "../../ingestion/config";
import type {
  AnalysisWarning,
  ClassifiedSelector,
  ComponentInstance,
  ComponentPatternStep,
  ComponentType,
  PageRecord,
} from "../../blueprint/types";

export const MAX_PATTERN_LENGTH = 10;
/** Patterns scoring below this are reported as recommendations, not components. */
export const MIN_COMPONENT_CONFIDENCE = 50;
const WEAK_PATTERN_CONFIDENCE = 45;

export interface ComponentDraft {
  inferred_name: string;
  type: ComponentType;
  confidence: number;
  provisional: boolean;
  pattern: ComponentPatternStep[];
  selector_templates: string[];
  instances: ComponentInstance[];
}

/** A recurring single action without any type signal; too weak to be a component. */
export interface WeakPattern {
  action_verb: string;
  selector: string;
  confidence: number;
  page_ids: string[];
  action_ids: string[];
  line_numbers: number[];
}

export interface ComponentDetection {
  components: ComponentDraft[];
  weak_patterns: WeakPattern[];
  warnings: AnalysisWarning[];
}

interface RunAction {
  id: string;
  page_id: string;
  line_number: number;
  action_verb: string;
  selector: ClassifiedSelector;
}

interface Occurrence {
  page_id: string;
  actions: RunAction[];
  exactKey: string;
}

interface Candidate {
  looseKey: string;
  length: number;
  occurrences: Occurrence[];
  pageCount: number;
  firstLine: number;
}

type SignalType = Exclude<ComponentType, "custom">;

// Tie order when two types score equally: modal > header > footer > navigation > form.
const TYPE_ORDER: SignalType[] = ["modal", "header", "footer", "navigation", "form"];

const TYPE_SIGNALS: Record<SignalType, { roles: string[]; pattern: RegExp }> = {
  modal: { roles: ["dialog", "alertdialog"], pattern: /modal|dialog/i },
  header: { roles: ["banner"], pattern: /header|banner|top-?bar|masthead/i },
  footer: { roles: ["contentinfo"], pattern: /footer/i },
  navigation: {
    roles: ["navigation", "menu", "menubar", "menuitem"],
    pattern: /\bnav\b|navbar|navigation|menu|sidebar|breadcrumb/i,
  },
  form: { roles: ["form", "search"], pattern: /\bform\b|[-_]form\b|\bform[-_]/i },
};

const TYPE_SUFFIX: Record<ComponentType, { suffix: string; aliases: string[] }> = {
  header: { suffix: "Header", aliases: ["Header", "Banner", "Topbar"] },
  footer: { suffix: "Footer", aliases: ["Footer"] },
  modal: { suffix: "Modal", aliases: ["Modal", "Dialog"] },
  navigation: { suffix: "Navigation", aliases: ["Navigation", "Nav", "Navbar", "Menu", "Sidebar", "Breadcrumb"] },
  form: { suffix: "Form", aliases: ["Form"] },
  custom: { suffix: "Component", aliases: ["Component"] },
};

function looseSelector(normalized: string): string {
  return normalized.toLowerCase().replace(/\d+/g, "#");
}

function isEnabled(type: ComponentType, config: ComponentDetectionConfig): boolean {
  switch (type) {
    case "header":
      return config.detect_headers;
    case "footer":
      return config.detect_footers;
    case "modal":
      return config.detect_modals;
    case "navigation":
      return config.detect_navigation;
    default:
      return true;
  }
}

function typeSignals(selector: ClassifiedSelector): SignalType[] {
  const role = selector.structured_details.role?.toLowerCase();
  return TYPE_ORDER.filter((type) => {
    const signal = TYPE_SIGNALS[type];
    return (role !== undefined && signal.roles.includes(role)) || signal.pattern.test(selector.raw);
  });
}

/** Most frequent type signal across the selectors; disabled types fall back to custom. */
export function inferComponentType(selectors: ClassifiedSelector[], config: ComponentDetectionConfig): ComponentType {
  const counts = new Map<SignalType, number>();
  for (const selector of selectors) {
    for (const type of typeSignals(selector)) counts.set(type, (counts.get(type) ?? 0) + 1);
  }
  let best: ComponentType = "custom";
  let bestCount = 0;
  for (const type of TYPE_ORDER) {
    const count = counts.get(type) ?? 0;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return isEnabled(best, config) ? best : "custom";
}

export function componentConfidence(identical: boolean, pageCount: number, typed: boolean, length: number): number {
  const t = typed ? 1 : 0;
  if (!typed && (length === 1 || pageCount < 2)) return WEAK_PATTERN_CONFIDENCE;
  if (pageCount >= 3 && identical) return 90 + Math.min(6, 2 * (pageCount - 3)) + 4 * t;
  if (pageCount === 2 && identical) return 85 + 4 * t;
  if (pageCount >= 2) return Math.min(89, 70 + Math.min(9, 3 * (pageCount - 2)) + 5 * t);
  return 60 + Math.min(9, 3 * Math.max(0, length - 2));
}

function selectorContent(selector: ClassifiedSelector): string | null {
  const details = selector.structured_details;
  if (details.test_id) return details.test_id;
  const content = derivableContent(details);
  if (content) return content;
  const firstClass = details.attributes.class?.split(" ")[0];
  return firstClass ?? null;
}

function componentName(actions: RunAction[], type: ComponentType, taken: Set<string>): string {
  const { suffix, aliases } = TYPE_SUFFIX[type];
  const content = actions.map((a) => selectorContent(a.selector)).find((c): c is string => c !== null);
  const base = content ? pascalCase(content) : "";
  const hasSuffix = aliases.some((alias) => base.endsWith(alias));
  return uniqueName(base === "" ? suffix : hasSuffix ? base : `${base}${suffix}`, taken);
}

function selectorTemplates(occurrences: Occurrence[]): string[] {
  const first = occurrences[0].actions;
  return first.map((action, i) => {
    const raws = new Set(occurrences.map((o) => o.actions[i].selector.raw));
    return raws.size === 1 ? action.selector.raw : action.selector.raw.replace(/\d+/g, "{n}");
  });
}

function toInstance(occurrence: Occurrence): ComponentInstance {
  return {
    page_id: occurrence.page_id,
    action_ids: occurrence.actions.map((a) => a.id),
    line_numbers: occurrence.actions.map((a) => a.line_number),
  };
}

/** Maximal runs of consecutive selector-bearing interactions; anything else breaks a run. */
function collectRuns(pages: PageRecord[], selectors: Map<string, ClassifiedSelector>): RunAction[][] {
  const runs: RunAction[][] = [];
  for (const page of pages) {
    const items = [
      ...page.actions.map((a) => ({ line: a.line_number, action: a })),
      ...page.assertions.map((a) => ({ line: a.line_number, action: null })),
    ].sort((a, b) => a.line - b.line);

    let run: RunAction[] = [];
    for (const item of items) {
      const action = item.action;
      const selector = action?.selector_id ? selectors.get(action.selector_id) : undefined;
      if (action && action.kind === "interaction" && action.action_verb && selector) {
        run.push({
          id: action.id,
          page_id: page.id,
          line_number: action.line_number,
          action_verb: action.action_verb,
          selector,
        });
        continue;
      }
      if (run.length > 0) runs.push(run);
      run = [];
    }
    if (run.length > 0) runs.push(run);
  }
  return runs;
}

function buildCandidates(runs: RunAction[][]): Candidate[] {
  const byKey = new Map<string, Occurrence[]>();
  for (const run of runs) {
    for (let start = 0; start < run.length; start++) {
      for (let length = 1; length <= MAX_PATTERN_LENGTH && start + length <= run.length; length++) {
        const actions = run.slice(start, start + length);
        const looseKey = actions.map((a) => `${a.action_verb}|${looseSelector(a.selector.normalized)}`).join(" → ");
        const exactKey = actions.map((a) => `${a.action_verb}|${a.selector.normalized}`).join(" → ");
        const list = byKey.get(looseKey) ?? [];
        list.push({ page_id: actions[0].page_id, actions, exactKey });
        byKey.set(looseKey, list);
      }
    }
  }

  return [...byKey.entries()].map(([looseKey, occurrences]) => ({
    looseKey,
    length: occurrences[0].actions.length,
    occurrences,
    pageCount: new Set(occurrences.map((o) => o.page_id)).size,
    firstLine: occurrences[0].actions[0].line_number,
  }));
}

/** Drops occurrences that touch an already claimed action or overlap each other. */
function freeOccurrences(occurrences: Occurrence[], claimed: Set<string>): Occurrence[] {
  const used = new Set<string>();
  const free: Occurrence[] = [];
  for (const occurrence of occurrences) {
    const ids = occurrence.actions.map((a) => a.id);
    if (ids.some((id) => claimed.has(id) || used.has(id))) continue;
    ids.forEach((id) => used.add(id));
    free.push(occurrence);
  }
  return free;
}

function firstLineOf(draft: ComponentDraft): number {
  return Math.min(...draft.instances.flatMap((i) => i.line_numbers));
}

function provisionalWarning(draft: ComponentDraft, actions: RunAction[]): AnalysisWarning {
  return {
    code: "PROVISIONAL_COMPONENT",
    message: `${draft.inferred_name} was seen on one page only; confirm it recurs before extracting it`,
    line_numbers: actions.map((a) => a.line_number),
  };
}

/**
 * Greedy selection: longer patterns first, then patterns seen on more pages,
 * then earlier first occurrence. An action is claimed by at most one component.
 */
export function detectComponents(
  pages: PageRecord[],
  selectors: Map<string, ClassifiedSelector>,
  config: ComponentDetectionConfig
): ComponentDetection {
  const runs = collectRuns(pages, selectors);
  const candidates = buildCandidates(runs)
    .filter((c) => c.pageCount >= config.min_appearances_for_component)
    .sort((a, b) => b.length - a.length || b.pageCount - a.pageCount || a.firstLine - b.firstLine);

  const claimed = new Set<string>();
  const taken = new Set<string>();
  const components: ComponentDraft[] = [];
  const weak: WeakPattern[] = [];
  const warnings: AnalysisWarning[] = [];

  for (const candidate of candidates) {
    const occurrences = freeOccurrences(candidate.occurrences, claimed);
    const pageCount = new Set(occurrences.map((o) => o.page_id)).size;
    if (pageCount < config.min_appearances_for_component || occurrences.length === 0) continue;

    const stepSelectors = occurrences[0].actions.map((a) => a.selector);
    const type = inferComponentType(stepSelectors, config);
    // Single-page patterns need a type signal and at least two actions.
    if (pageCount < 2 && (type === "custom" || candidate.length < 2)) continue;
    const identical = new Set(occurrences.map((o) => o.exactKey)).size === 1;
    const confidence = componentConfidence(identical, pageCount, type !== "custom", candidate.length);

    if (confidence < MIN_COMPONENT_CONFIDENCE) {
      const first = occurrences[0].actions[0];
      weak.push({
        action_verb: first.action_verb,
        selector: first.selector.raw,
        confidence,
        page_ids: [...new Set(occurrences.map((o) => o.page_id))],
        action_ids: occurrences.map((o) => o.actions[0].id),
        line_numbers: occurrences.map((o) => o.actions[0].line_number),
      });
      continue;
    }

    occurrences.forEach((o) => o.actions.forEach((a) => claimed.add(a.id)));
    const templates = selectorTemplates(occurrences);
    const draft: ComponentDraft = {
      inferred_name: componentName(occurrences[0].actions, type, taken),
      type,
      confidence,
      provisional: pageCount < 2,
      pattern: occurrences[0].actions.map((a, i) => ({
        action_verb: a.action_verb,
        selector_template: templates[i],
      })),
      selector_templates: templates,
      instances: occurrences.map(toInstance),
    };
    components.push(draft);
    if (draft.provisional) warnings.push(provisionalWarning(draft, occurrences[0].actions));
  }

  // Provisional pass: single-page runs of ≥2 actions sharing one enabled type signal.
  for (const run of runs) {
    let segment: RunAction[] = [];
    let segmentType: ComponentType = "custom";
    const flush = (): void => {
      if (segment.length >= 2 && segmentType !== "custom") {
        segment.forEach((a) => claimed.add(a.id));
        const occurrence: Occurrence = { page_id: segment[0].page_id, actions: segment, exactKey: "" };
        const draft: ComponentDraft = {
          inferred_name: componentName(segment, segmentType, taken),
          type: segmentType,
          confidence: componentConfidence(true, 1, true, segment.length),
          provisional: true,
          pattern: segment.map((a) => ({ action_verb: a.action_verb, selector_template: a.selector.raw })),
          selector_templates: segment.map((a) => a.selector.raw),
          instances: [toInstance(occurrence)],
        };
        components.push(draft);
        warnings.push(provisionalWarning(draft, segment));
      }
      segment = [];
      segmentType = "custom";
    };

    for (const action of run) {
      const type = claimed.has(action.id) ? "custom" : inferComponentType([action.selector], config);
      if (type === "custom" || (segment.length > 0 && type !== segmentType)) flush();
      if (type !== "custom") {
        segment.push(action);
        segmentType = type;
      }
    }
    flush();
  }

  components.sort((a, b) => firstLineOf(a) - firstLineOf(b));
  const weakPatterns = weak.filter((w) => !w.action_ids.some((id) => claimed.has(id)));
  return { components, weak_patterns: weakPatterns, warnings };
}
