import * as path from "path";
import type {
  ComponentRecord,
  MethodSuggestion,
  PageObjectBlueprint,
  PageRecord,
  Recommendation,
  Recommendations,
  SelectorAnalysis,
} from "../blueprint/types";
import type { AnalyzerConfig } from "../ingestion/config";
import type { WeakPattern } from "../analysis/components/component-detector";
import { AMBIGUOUS_BELOW } from "../analysis/pages/boundary-detector";
import { STABILITY_THRESHOLD } from "../analysis/selectors/fragility";
import { writeTextFile } from "../utils/file-utils";
import * as logger from "../utils/logger";

/** Methods above this complexity are suggested for splitting. */
export const COMPLEXITY_HIGH_WATER = 60;

export interface RecommendationInput {
  pages: PageRecord[];
  components: ComponentRecord[];
  selectors: SelectorAnalysis;
  weakPatterns: WeakPattern[];
  config: AnalyzerConfig;
}

// ─── Architectural ────────────────────────────────────────────────────────────

function architectural(input: RecommendationInput): Recommendation[] {
  const out: Recommendation[] = [];

  if (input.pages.length >= 2) {
    const names = [...new Set(input.pages.map((p) => p.inferred_name))];
    out.push({
      kind: "base_page",
      severity: "info",
      message: `Extract a BasePage class shared by ${input.pages.length} page objects (${names.join(", ")})`,
      related_ids: input.pages.map((p) => p.id),
      line_numbers: [],
    });
  }

  for (const component of input.components) {
    const where = component.appearance_count === 1 ? "1 page" : `${component.appearance_count} pages`;
    out.push({
      kind: "component_extraction",
      severity: "info",
      message: component.provisional
        ? `${component.inferred_name} (${component.type}) looks reusable but appears on ${where} only; confirm before extracting it`
        : `Extract ${component.inferred_name} (${component.type}) used on ${where}`,
      related_ids: [component.id],
      line_numbers: component.instances.flatMap((i) => i.line_numbers),
    });
  }

  for (const weak of input.weakPatterns) {
    out.push({
      kind: "weak_pattern",
      severity: "info",
      message: `${weak.action_verb} on ${weak.selector} repeats on ${weak.page_ids.length} pages (confidence ${weak.confidence}); consider a shared helper method`,
      related_ids: weak.action_ids,
      line_numbers: weak.line_numbers,
    });
  }
  return out;
}

// ─── Refactoring ──────────────────────────────────────────────────────────────

function allMethods(input: RecommendationInput): MethodSuggestion[] {
  return [...input.pages.flatMap((p) => p.suggested_methods), ...input.components.flatMap((c) => c.suggested_methods)];
}

function refactoring(input: RecommendationInput, lineOf: Map<string, number>): Recommendation[] {
  return allMethods(input)
    .filter((m) => m.complexity > COMPLEXITY_HIGH_WATER)
    .map((m) => ({
      kind: "split_method",
      severity: "warning",
      message: `${m.name} has complexity ${m.complexity} (above ${COMPLEXITY_HIGH_WATER}); consider splitting it`,
      related_ids: [m.id],
      line_numbers: [...m.action_ids, ...m.assertion_ids]
        .map((id) => lineOf.get(id))
        .filter((n): n is number => n !== undefined)
        .sort((a, b) => a - b),
    }));
}

// ─── Quality ──────────────────────────────────────────────────────────────────

function quality(input: RecommendationInput): Recommendation[] {
  const out: Recommendation[] = [];
  const fragile = new Set(input.selectors.fragile_selector_ids);

  for (const selector of input.selectors.selectors) {
    if (!fragile.has(selector.id)) continue;
    const candidate = selector.improvement_candidates[0];
    const advice = candidate
      ? candidate.rendered_selector
        ? `prefer ${candidate.rendered_selector}`
        : candidate.rationale
      : "prefer a test id or role";
    out.push({
      kind: "fragile_selector",
      severity: selector.fragility_score >= 80 ? "high" : "warning",
      message: `${selector.raw} has fragility ${selector.fragility_score}; ${advice}`,
      related_ids: [selector.id, ...selector.used_by],
      line_numbers: selector.line_numbers,
    });
  }

  for (const action of input.pages.flatMap((p) => p.actions)) {
    if (!action.wait_behavior.anti_pattern || action.kind !== "wait") continue;
    const ms = action.wait_behavior.timeout_ms;
    out.push({
      kind: "fixed_timeout",
      severity: "warning",
      message: `Line ${action.line_number} waits a fixed ${ms === null ? "time" : `${ms}ms`}; wait for a URL, element or load state instead`,
      related_ids: [action.id],
      line_numbers: [action.line_number],
    });
  }

  for (const page of input.pages) {
    if (page.confidence >= AMBIGUOUS_BELOW) continue;
    const line = page.entry_event.line_number ?? page.line_range.start;
    out.push({
      kind: "ambiguous_boundary",
      severity: "warning",
      message: `${page.inferred_name} was inferred from a ${page.entry_event.type} boundary with confidence ${page.confidence}; review the split`,
      related_ids: [page.id],
      line_numbers: [line],
    });
  }

  for (const method of allMethods(input)) {
    if (method.name_source !== "generic") continue;
    out.push({
      kind: "generic_method_name",
      severity: "info",
      message: `${method.name} has no semantic name; alternatives: ${method.alternatives.join(", ")}`,
      related_ids: [method.id],
      line_numbers: [method.line_range.start],
    });
  }
  return out;
}

// ─── Main exports ─────────────────────────────────────────────────────────────

export function buildRecommendations(input: RecommendationInput): Recommendations {
  const lineOf = new Map<string, number>();
  for (const page of input.pages) {
    for (const record of [...page.actions, ...page.assertions]) lineOf.set(record.id, record.line_number);
  }
  return {
    architectural: architectural(input),
    refactoring: refactoring(input, lineOf),
    quality: quality(input),
  };
}

/** Writes `<name>.blueprint.json` under outDir and returns the file path. */
export function writeBlueprint(outDir: string, name: string, blueprint: PageObjectBlueprint): string {
  const filePath = path.join(outDir, `${name}.blueprint.json`);
  writeTextFile(filePath, JSON.stringify(blueprint, null, 2));
  return filePath;
}

export function printSummary(blueprint: PageObjectBlueprint): void {
  const m = blueprint.metadata;
  const s = blueprint.selector_analysis;
  const r = blueprint.recommendations;

  logger.section(m.source);
  logger.row("Pages", blueprint.pages.map((p) => `${p.inferred_name} (${p.confidence})`).join(", "));
  logger.row("Components", blueprint.components.map((c) => c.inferred_name).join(", ") || "none");
  logger.row("Actions / assertions", `${m.total_actions} / ${m.total_assertions}`);
  logger.row("Methods", String(m.total_methods));
  logger.row(
    "Selectors",
    `${s.total_selectors}, avg fragility ${logger.fragilityBadge(s.average_fragility, STABILITY_THRESHOLD)}, ${s.fragile_selector_ids.length} fragile`
  );
  logger.row("Recommendations", `${r.architectural.length} architectural, ${r.refactoring.length} refactoring, ${r.quality.length} quality`);
  logger.divider();

  for (const w of m.warnings) logger.analysisWarning(w.code, w.message);
}
