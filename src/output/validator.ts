import { ID_KINDS, parseId, type IdKind } from "../blueprint/ids";
import { BlueprintIntegrityError } from "../blueprint/errors";
import type { MethodSuggestion, PageObjectBlueprint } from "../blueprint/types";

// ─── Public types ─────────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// ─── Id checks ────────────────────────────────────────────────────────────────

function collectIds(bp: PageObjectBlueprint): Map<IdKind, string[]> {
  const byKind = new Map<IdKind, string[]>(ID_KINDS.map((k) => [k, []]));
  const push = (kind: IdKind, id: string): void => {
    byKind.get(kind)?.push(id);
  };

  for (const page of bp.pages) {
    push("page", page.id);
    page.actions.forEach((a) => push("action", a.id));
    page.assertions.forEach((a) => push("assertion", a.id));
    page.suggested_methods.forEach((m) => push("method", m.id));
  }
  for (const component of bp.components) {
    push("component", component.id);
    component.suggested_methods.forEach((m) => push("method", m.id));
  }
  bp.selector_analysis.selectors.forEach((s) => push("selector", s.id));
  bp.action_sequences.forEach((s) => push("sequence", s.id));
  return byKind;
}

function checkIdFormat(byKind: Map<IdKind, string[]>, errors: string[]): void {
  for (const [kind, ids] of byKind) {
    const numbers: number[] = [];
    for (const id of ids) {
      const parsed = parseId(id);
      if (!parsed || parsed.kind !== kind) {
        errors.push(`${id}: malformed ${kind} id`);
        continue;
      }
      numbers.push(parsed.n);
    }
    const sorted = [...numbers].sort((a, b) => a - b);
    if (sorted.some((n, i) => n !== i + 1)) {
      errors.push(`${kind} ids are not contiguous from 1: ${ids.join(", ")}`);
    }
  }
}

// ─── Reference checks ─────────────────────────────────────────────────────────

function checkMethods(
  owner: string,
  methods: MethodSuggestion[],
  covered: Set<string>,
  maxActions: number,
  errors: string[]
): void {
  for (const method of methods) {
    if (method.owner_id !== owner) errors.push(`${method.id}: owner_id ${method.owner_id} is not ${owner}`);
    if (method.action_ids.length > maxActions) {
      errors.push(`${method.id}: ${method.action_ids.length} actions exceed max_actions_per_method ${maxActions}`);
    }
    for (const ref of [...method.action_ids, ...method.assertion_ids]) {
      if (!covered.has(ref)) errors.push(`${method.id}: references ${ref} outside its owner`);
    }
    if (method.name_source === "generic" && (method.alternatives.length < 2 || method.confidence > 60)) {
      errors.push(`${method.id}: generic name needs ≥2 alternatives and confidence ≤ 60`);
    }
  }
}

function checkScore(label: string, value: number, errors: string[]): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    errors.push(`${label}: score ${value} is not an integer in [0, 100]`);
  }
}

// ─── Main exports ─────────────────────────────────────────────────────────────

/**
 * Checks the referential integrity of a blueprint: id shape and contiguity,
 * every cross-reference resolving, score bounds, and each source line being
 * owned by exactly one page.
 */
export function validateBlueprint(bp: PageObjectBlueprint): ValidationResult {
  const errors: string[] = [];
  const byKind = collectIds(bp);
  checkIdFormat(byKind, errors);

  const known = new Set([...byKind.values()].flat());
  const ref = (from: string, id: string | null): void => {
    if (id !== null && !known.has(id)) errors.push(`${from}: dangling reference ${id}`);
  };
  const maxActions = bp.metadata.config.method_grouping.max_actions_per_method;

  // ── Pages ───────────────────────────────────────────────────────────────────
  const seenLines = new Map<number, string>();
  bp.pages.forEach((page, index) => {
    checkScore(page.id, page.confidence, errors);
    const lines = [
      ...page.actions.map((a) => a.line_number),
      ...page.assertions.map((a) => a.line_number),
      ...page.structural_lines,
    ].sort((a, b) => a - b);
    lines.forEach((line, i) => {
      if (i > 0 && lines[i - 1] === line) errors.push(`${page.id}: line ${line} appears twice`);
      const owner = seenLines.get(line);
      if (owner && owner !== page.id) errors.push(`line ${line} is owned by both ${owner} and ${page.id}`);
      seenLines.set(line, page.id);
    });

    const next = bp.pages[index + 1];
    if (next && page.exit_event.line_number !== next.entry_event.line_number) {
      errors.push(`${page.id}: exit line ${page.exit_event.line_number} does not open ${next.id}`);
    }
    ref(`${page.id}.entry_event`, page.entry_event.action_id);
    ref(`${page.id}.exit_event`, page.exit_event.action_id);

    for (const action of page.actions) {
      if (action.page_id !== page.id) errors.push(`${action.id}: page_id ${action.page_id} is not ${page.id}`);
      ref(action.id, action.selector_id);
      ref(action.id, action.component_usage?.component_id ?? null);
    }
    for (const assertion of page.assertions) {
      if (assertion.page_id !== page.id) errors.push(`${assertion.id}: page_id ${assertion.page_id} is not ${page.id}`);
      ref(assertion.id, assertion.selector_id);
    }
    for (const usage of page.component_usages) {
      ref(`${page.id}.component_usages`, usage.component_id);
      usage.action_ids.forEach((id) => ref(`${page.id}.component_usages`, id));
    }

    const covered = new Set([...page.actions.map((a) => a.id), ...page.assertions.map((a) => a.id)]);
    checkMethods(page.id, page.suggested_methods, covered, maxActions, errors);
    if (!bp.metadata.config.method_grouping.separate_assertions) {
      const grouped = new Set(page.suggested_methods.flatMap((m) => m.assertion_ids));
      for (const assertion of page.assertions) {
        if (!grouped.has(assertion.id)) errors.push(`${assertion.id}: not included in any method of ${page.id}`);
      }
    }
  });

  // ── Components ──────────────────────────────────────────────────────────────
  for (const component of bp.components) {
    checkScore(component.id, component.confidence, errors);
    component.appears_on_page_ids.forEach((id) => ref(component.id, id));
    const covered = new Set(component.instances.flatMap((i) => i.action_ids));
    covered.forEach((id) => ref(component.id, id));
    checkMethods(component.id, component.suggested_methods, covered, maxActions, errors);
  }

  // ── Selectors & sequences ───────────────────────────────────────────────────
  for (const selector of bp.selector_analysis.selectors) {
    checkScore(selector.id, selector.fragility_score, errors);
    selector.used_by.forEach((id) => ref(selector.id, id));
  }
  bp.selector_analysis.fragile_selector_ids.forEach((id) => ref("fragile_selector_ids", id));
  for (const sequence of bp.action_sequences) {
    for (const step of sequence.steps) {
      ref(sequence.id, step.ref_id);
      ref(sequence.id, step.method_id);
      ref(sequence.id, step.component_id);
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Throws BlueprintIntegrityError listing every violation. */
export function assertBlueprintIntegrity(bp: PageObjectBlueprint): void {
  const result = validateBlueprint(bp);
  if (!result.valid) throw new BlueprintIntegrityError(result.errors);
}
