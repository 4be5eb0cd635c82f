// src/analysis/pages/boundary-detector.ts
//
// Partitions the statement list into page segments. One forward pass keeps a
// "current page" accumulator; each statement is checked for a boundary signal
// (navigation, URL wait, history, modal, tab switch) before it is appended, so a
// boundary statement always belongs to the page it opens.

import { pascalCase } from "../../utils/naming";
import { isConcrete, isSameLocation, pageNameFromUrl, urlPattern, type UrlTarget } from "./url-utils";
import type { PageDetectionConfig } from "../../ingestion/config";
import type { AnalysisWarning, BoundaryEventType, Statement } from "../../blueprint/types";

export interface SegmentEvent {
  type: BoundaryEventType;
  line_number: number | null;
  url: string | null;
}

export interface PageSegment {
  statements: Statement[];
  entry: SegmentEvent;
  exit: SegmentEvent;
  confidence: number;
  url: UrlTarget | null;
  url_pattern: string | null;
  inferred_name: string;
  boundary_signals: string[];
  modal: boolean;
}

export interface BoundaryResult {
  pages: PageSegment[];
  warnings: AnalysisWarning[];
}

export const BOUNDARY_CONFIDENCE = {
  navigation: 100,
  urlConcrete: 100,
  urlPattern: 95,
  history: 65,
  modalEntry: 65,
  modalReturn: 50,
  browserTab: 65,
  uiTab: 55,
  startOfInput: 60,
} as const;

/** Pages below this confidence are reported as ambiguous. */
export const AMBIGUOUS_BELOW = 70;

const MODAL_SIGNAL_RE = /modal|dialog|popup|overlay|drawer|lightbox/i;
const UI_TAB_SIGNAL_RE = /getByRole\(\s*['"`]tab['"`]|role\s*=\s*['"]?tab\b|accordion|\btabs?\b|\btab[-_]|[-_]tab\b/i;

interface BoundaryDecision {
  event: SegmentEvent;
  confidence: number;
  url: UrlTarget | null;
  signal: string;
  name: string | null;
  modal: boolean;
}

interface DetectorState {
  current: UrlTarget | null;
  history: UrlTarget[];
  cursor: number;
  inModal: boolean;
}

function targetOf(statement: Statement): UrlTarget | null {
  if (statement.target_url === null) return null;
  const first = statement.literal_arguments[0];
  return { raw: statement.target_url, isRegex: first !== undefined && first.kind === "regex" };
}

function contentName(selector: string): string | null {
  const m = /name\s*:\s*(['"`])(.*?)\1/.exec(selector) ?? /\(\s*(['"`])(.*?)\1/.exec(selector);
  if (!m) return null;
  const name = pascalCase(m[2]);
  return name === "" ? null : name;
}

function hasModalSignal(statement: Statement): boolean {
  return statement.selector_expression !== null && MODAL_SIGNAL_RE.test(statement.selector_expression);
}

function decide(
  statement: Statement,
  state: DetectorState,
  config: PageDetectionConfig
): BoundaryDecision | null {
  const line = statement.line_number;
  const target = targetOf(statement);

  if (statement.kind === "navigation") {
    if (statement.action_verb === "goto" && target) {
      return {
        event: { type: "navigation", line_number: line, url: target.raw },
        confidence: BOUNDARY_CONFIDENCE.navigation,
        url: target,
        signal: `line ${line}: goto('${target.raw}')`,
        name: null,
        modal: false,
      };
    }
    if (statement.action_verb === "goBack" || statement.action_verb === "goForward") {
      const index = state.cursor + (statement.action_verb === "goBack" ? -1 : 1);
      const url = state.history[index] ?? null;
      return {
        event: { type: "history", line_number: line, url: url?.raw ?? null },
        confidence: BOUNDARY_CONFIDENCE.history,
        url,
        signal: `line ${line}: ${statement.action_verb}()`,
        name: null,
        modal: false,
      };
    }
    return null;
  }

  if (statement.kind === "wait" && statement.action_verb === "waitForURL" && target) {
    if (!config.url_change_creates_new_page) return null;
    if (isSameLocation(state.current, target, config.url_change_threshold)) return null;
    const concrete = isConcrete(target);
    return {
      event: { type: "wait_for_url", line_number: line, url: target.raw },
      confidence: concrete ? BOUNDARY_CONFIDENCE.urlConcrete : BOUNDARY_CONFIDENCE.urlPattern,
      url: target,
      signal: `line ${line}: waitForURL('${target.raw}') leaves ${state.current ? `'${state.current.raw}'` : "an unknown location"} (${config.url_change_threshold} comparison)`,
      name: null,
      modal: false,
    };
  }

  if (statement.kind === "interaction" && statement.subtype === "multi_tab") {
    return {
      event: { type: "tab_switch", line_number: line, url: null },
      confidence: BOUNDARY_CONFIDENCE.browserTab,
      url: null,
      signal: `line ${line}: browser tab switch (${statement.action_verb})`,
      name: "PopupPage",
      modal: false,
    };
  }

  if (config.modal_detection === "page" && (statement.kind === "interaction" || statement.kind === "assertion")) {
    const modalSignal = hasModalSignal(statement);
    if (modalSignal && !state.inModal) {
      const content = statement.selector_expression ? contentName(statement.selector_expression) : null;
      const base = content ? content.replace(/(Modal|Dialog)$/, "") : "";
      return {
        event: { type: "modal", line_number: line, url: state.current?.raw ?? null },
        confidence: BOUNDARY_CONFIDENCE.modalEntry,
        url: state.current,
        signal: `line ${line}: modal/dialog selector opens an overlay`,
        name: `${base || "Dialog"}Modal`,
        modal: true,
      };
    }
    if (!modalSignal && state.inModal && statement.kind === "interaction") {
      return {
        event: { type: "modal", line_number: line, url: state.current?.raw ?? null },
        confidence: BOUNDARY_CONFIDENCE.modalReturn,
        url: state.current,
        signal: `line ${line}: first interaction outside the modal returns to the page`,
        name: null,
        modal: false,
      };
    }
  }

  if (
    config.tab_switch_creates_new_page &&
    statement.kind === "interaction" &&
    statement.action_verb === "click" &&
    statement.selector_expression !== null &&
    UI_TAB_SIGNAL_RE.test(statement.selector_expression)
  ) {
    const content = contentName(statement.selector_expression);
    return {
      event: { type: "tab_switch", line_number: line, url: state.current?.raw ?? null },
      confidence: BOUNDARY_CONFIDENCE.uiTab,
      url: state.current,
      signal: `line ${line}: tab/accordion switch on the same URL`,
      name: content ? `${content.replace(/Tab$/, "")}TabPage` : "TabPage",
      modal: false,
    };
  }

  return null;
}

function applyHistory(statement: Statement, decision: BoundaryDecision, state: DetectorState): void {
  if (decision.event.type === "navigation" && decision.url) {
    state.history = state.history.slice(0, state.cursor + 1);
    state.history.push(decision.url);
    state.cursor = state.history.length - 1;
  } else if (decision.event.type === "history") {
    const step = statement.action_verb === "goBack" ? -1 : 1;
    state.cursor = Math.max(0, Math.min(state.history.length - 1, state.cursor + step));
  } else if (decision.event.type === "wait_for_url" && decision.url) {
    state.history[state.cursor + 1] = decision.url;
    state.history = state.history.slice(0, state.cursor + 2);
    state.cursor = state.history.length - 1;
  }
  if (decision.url) state.current = decision.url;
  if (decision.event.type === "modal") state.inModal = decision.modal;
}

function newSegment(entry: SegmentEvent, confidence: number): PageSegment {
  return {
    statements: [],
    entry,
    exit: { type: "end_of_input", line_number: null, url: null },
    confidence,
    url: null,
    url_pattern: null,
    inferred_name: "",
    boundary_signals: [],
    modal: false,
  };
}

function adopt(page: PageSegment, decision: BoundaryDecision): void {
  page.entry = decision.event;
  page.confidence = decision.confidence;
  page.url = decision.url;
  page.url_pattern = decision.url ? urlPattern(decision.url) : null;
  page.modal = decision.modal;
  page.boundary_signals.push(decision.signal);
  if (decision.name) page.inferred_name = decision.name;
}

function nameFor(page: PageSegment): string {
  if (page.inferred_name) return page.inferred_name;
  if (page.url) return pageNameFromUrl(page.url);
  const title = page.statements.find((s) => s.context.test_title !== null)?.context.test_title;
  const fromTitle = title ? pascalCase(title) : "";
  return fromTitle ? `${fromTitle}Page` : "MainPage";
}

/**
 * Splits statements into pages. Every statement lands in exactly one page and
 * page order follows source order.
 */
export function detectPageBoundaries(statements: Statement[], config: PageDetectionConfig): BoundaryResult {
  const warnings: AnalysisWarning[] = [];
  const state: DetectorState = { current: null, history: [], cursor: -1, inModal: false };
  const pages: PageSegment[] = [
    newSegment({ type: "start_of_input", line_number: null, url: null }, BOUNDARY_CONFIDENCE.startOfInput),
  ];
  let boundaries = 0;

  for (const statement of statements) {
    const decision = decide(statement, state, config);
    if (decision) {
      boundaries++;
      const current = pages[pages.length - 1];
      const hasContent = current.statements.some((s) => s.kind !== "structural");
      if (!hasContent) {
        adopt(current, decision);
      } else {
        current.exit = decision.event;
        const next = newSegment(decision.event, decision.confidence);
        adopt(next, decision);
        pages.push(next);
      }
      applyHistory(statement, decision, state);
    }
    pages[pages.length - 1].statements.push(statement);
  }

  // Same logical URL keeps the same name; different pages that would collide get a suffix.
  const patternsByName = new Map<string, string | null>();
  for (const page of pages) {
    const base = nameFor(page);
    let name = base;
    let n = 2;
    while (patternsByName.has(name) && patternsByName.get(name) !== page.url_pattern) {
      name = base.replace(/(Page|Modal)$/, `${n++}$1`);
    }
    patternsByName.set(name, page.url_pattern);
    page.inferred_name = name;
  }

  if (boundaries === 0) {
    pages[0].boundary_signals.push("no navigation, URL wait, modal or tab signal found");
    warnings.push({
      code: "UNCERTAIN_PAGE_BOUNDARIES",
      message: `No page boundary signal found; the whole script is treated as one page (confidence ${BOUNDARY_CONFIDENCE.startOfInput})`,
      line_numbers: [],
    });
  } else {
    for (const page of pages) {
      if (page.confidence >= AMBIGUOUS_BELOW) continue;
      if (page.entry.type === "start_of_input") {
        page.boundary_signals.push("page opened before the first navigation signal");
      }
      const firstLine = page.statements[0]?.line_number;
      warnings.push({
        code: "LOW_CONFIDENCE_BOUNDARY",
        message: `${page.inferred_name} was inferred with confidence ${page.confidence} (${page.entry.type})`,
        line_numbers: page.entry.line_number !== null ? [page.entry.line_number] : firstLine !== undefined ? [firstLine] : [],
      });
    }
  }

  return { pages, warnings };
}
