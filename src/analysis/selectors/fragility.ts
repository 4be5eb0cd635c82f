// src/analysis/selectors/fragility.ts
//
// Scores a classified selector 0–100 (higher = more likely to break) and
// proposes sturdier replacements. Every signal contributes a fixed weight to a
// base score of 50, independently of the others.

import { kebabCase } from "../../utils/naming";
import type { SelectorAnalysisConfig } from "../../ingestion/config";
import type {
  AppliedSignal,
  ClassifiedSelector,
  FragilityAssessment,
  FragilitySignal,
  ImprovementCandidate,
  SelectorDetails,
  SelectorStrategy,
} from "../../blueprint/types";

export const BASE_SCORE = 50;
/** Selectors scoring above this get improvement candidates and count as fragile. */
export const STABILITY_THRESHOLD = 40;

export const SIGNAL_WEIGHTS: Record<FragilitySignal, number> = {
  path_expression: 40,
  positional: 35,
  placeholder_only: 30,
  class_only: 25,
  text_only: 20,
  deep_nesting: 15,
  id_only: 10,
  multiple_attributes: 5,
  test_id: -40,
  role_based: -30,
  name_with_type: -20,
  aria_attribute: -15,
  label_association: -10,
};

const DEFAULT_PREFERENCE: SelectorStrategy[] = ["testid", "role", "text", "placeholder", "css", "xpath"];
const POSITIONAL_RE = /^(nth\(|nth=|first\(|last\(|:nth-|:first-|:last-|\[)/;
// ids such as "input-4821", ":r3:" or "a1b2c3d4e5" are generated per render
const DYNAMIC_VALUE_RE = /\d{3,}|^:r\w*:?$|[a-f0-9]{8,}|\$\{/i;
const TAG_ROLES: Record<string, string> = {
  button: "button",
  a: "link",
  select: "combobox",
  textarea: "textbox",
  nav: "navigation",
  img: "img",
  h1: "heading",
  h2: "heading",
  h3: "heading",
  h4: "heading",
  h5: "heading",
  h6: "heading",
};
const INPUT_TYPE_ROLES: Record<string, string> = {
  checkbox: "checkbox",
  radio: "radio",
  submit: "button",
  button: "button",
  reset: "button",
  search: "searchbox",
  number: "spinbutton",
  range: "slider",
};

function attributeKeys(details: SelectorDetails): string[] {
  return Object.keys(details.attributes);
}

function detectSignals(selector: ClassifiedSelector): FragilitySignal[] {
  const { strategy } = selector;
  const details = selector.structured_details;
  const keys = attributeKeys(details);
  const signals: FragilitySignal[] = [];

  if (strategy === "xpath" || details.fragments.some((f) => /^\(?\s*(\/\/|xpath=)/.test(f))) {
    signals.push("path_expression");
  }
  if (details.modifiers.some((m) => POSITIONAL_RE.test(m))) signals.push("positional");
  if (strategy === "placeholder") signals.push("placeholder_only");
  if (strategy === "css" && keys.length > 0 && keys.every((k) => k === "class")) signals.push("class_only");
  const labelled = details.label !== undefined || details.alt_text !== undefined || details.title !== undefined;
  if (strategy === "text" && !labelled) signals.push("text_only");
  if (details.nesting_depth > 3) signals.push("deep_nesting");
  if (strategy === "css" && keys.length === 1 && keys[0] === "id") signals.push("id_only");
  if (keys.length >= 2) signals.push("multiple_attributes");

  if (details.test_id !== undefined) signals.push("test_id");
  if (strategy === "role") signals.push("role_based");
  if (details.attributes.name !== undefined && details.attributes.type !== undefined) signals.push("name_with_type");
  if (keys.some((k) => k.startsWith("aria-"))) signals.push("aria_attribute");
  if (labelled) signals.push("label_association");

  return signals;
}

/** Visible or accessible content a replacement selector can be built from. */
export function derivableContent(details: SelectorDetails): string | null {
  const candidates = [
    details.accessible_name,
    details.text,
    details.label,
    details.placeholder,
    details.alt_text,
    details.title,
    details.attributes["aria-label"],
    details.attributes.name,
    details.attributes.id,
  ];
  for (const value of candidates) {
    if (value === undefined) continue;
    const trimmed = value.trim();
    if (trimmed === "" || DYNAMIC_VALUE_RE.test(trimmed) || trimmed.startsWith("/")) continue;
    return trimmed;
  }
  return null;
}

function inferRole(details: SelectorDetails): string | null {
  if (details.role) return details.role;
  const tag = details.tag;
  if (tag === "input") return INPUT_TYPE_ROLES[details.attributes.type ?? ""] ?? "textbox";
  if (tag && TAG_ROLES[tag]) return TAG_ROLES[tag];
  if (details.placeholder !== undefined || details.label !== undefined) return "textbox";
  return null;
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function improvementCandidates(
  selector: ClassifiedSelector,
  preferred: SelectorStrategy[]
): ImprovementCandidate[] {
  const details = selector.structured_details;
  const content = derivableContent(details);
  if (content === null) {
    return [
      {
        strategy: "source_change",
        rendered_selector: null,
        rationale:
          "No stable text or attribute can be derived from this selector; add a data-testid attribute to the element in the application source.",
        actionable: false,
      },
    ];
  }

  const candidates: ImprovementCandidate[] = [];
  for (const strategy of preferred) {
    if (strategy === "testid" && selector.strategy !== "testid") {
      const id = kebabCase(content);
      if (!id) continue;
      candidates.push({
        strategy: "testid",
        rendered_selector: `getByTestId(${quote(id)})`,
        rationale: `A dedicated test id survives layout and copy changes; add data-testid="${id}" to the element.`,
        actionable: true,
      });
    } else if (strategy === "role" && selector.strategy !== "role") {
      const role = inferRole(details);
      if (!role) continue;
      candidates.push({
        strategy: "role",
        rendered_selector: `getByRole(${quote(role)}, { name: ${quote(content)} })`,
        rationale: `The ${role} role with its accessible name "${content}" matches how users find the element.`,
        actionable: true,
      });
    }
  }
  return candidates;
}

/**
 * Scores a selector. Pure: the same selector and settings always give the same
 * score, signals and candidates.
 */
export function scoreSelector(
  selector: ClassifiedSelector,
  settings?: Pick<SelectorAnalysisConfig, "suggest_improvements" | "preferred_strategies">
): FragilityAssessment {
  const signals: AppliedSignal[] = detectSignals(selector).map((signal) => ({
    signal,
    weight: SIGNAL_WEIGHTS[signal],
  }));
  const raw = signals.reduce((sum, s) => sum + s.weight, BASE_SCORE);
  const score = Math.max(0, Math.min(100, raw));

  const suggest = settings?.suggest_improvements ?? true;
  const preferred = settings?.preferred_strategies ?? DEFAULT_PREFERENCE;

  return {
    fragility_score: score,
    signals,
    improvement_candidates:
      suggest && score > STABILITY_THRESHOLD ? improvementCandidates(selector, preferred) : [],
  };
}
