// src/analysis/methods/method-grouper.ts
//
// Greedy windowing of a page's (or component's) actions into method
// suggestions, plus the naming, parameter and complexity heuristics that
// describe each method.

import { camelCase, pascalCase, uniqueName, words } from "../../utils/naming";
import { derivableContent } from "../selectors/fragility";
import type { MethodGroupingConfig } from "../../ingestion/config";
import type {
  ActionRecord,
  AnalysisWarning,
  AssertionRecord,
  ClassifiedSelector,
  LiteralArgument,
  MethodSuggestion,
  ParameterSuggestion,
} from "../../blueprint/types";

export type GroupItem =
  | { kind: "action"; record: ActionRecord; selector: ClassifiedSelector | null; opens_page: boolean }
  | { kind: "assertion"; record: AssertionRecord };

export interface GroupingInput {
  owner_kind: "page" | "component";
  /** Noun describing the owner, e.g. "Login" for LoginPage or "UserMenu" for a component. */
  owner_noun: string | null;
  items: GroupItem[];
  /** The owner is left through a URL change right after its last item. */
  exits_to_new_url: boolean;
}

export type MethodDraft = Omit<MethodSuggestion, "id" | "owner_id">;

/** Shared across owners so generic names number in emission order. */
export interface GenericNameCounter {
  next: number;
}

export const COMPLEXITY_WEIGHTS = {
  action: 5,
  parameter: 10,
  branch: 15,
  loop: 20,
  fileUpload: 10,
  multipleAssertions: 15,
  crossPage: 20,
  componentDelegation: 10,
} as const;

export const NAME_CONFIDENCE = { content: 85, url: 70, verb_noun: 65, generic: 40 } as const;

const FILL_VERBS = new Set([
  "fill", "type", "pressSequentially", "selectOption", "check", "uncheck",
  "setChecked", "setInputFiles", "clear",
]);
const TERMINAL_VERBS = new Set(["click", "dblclick", "tap", "press", "submit"]);
const VALUE_VERBS = new Set([
  "fill", "type", "pressSequentially", "selectOption", "setInputFiles",
  "press", "setChecked", "insertText",
]);
const ACTION_WORDS = new Set([
  "sign", "login", "log", "logout", "signin", "signup", "submit", "save",
  "search", "add", "delete", "remove", "continue", "next", "checkout",
  "register", "create", "update", "confirm", "cancel", "send", "apply",
  "open", "close", "accept", "reject", "upload", "download", "buy", "pay",
]);
const VERB_PREFIX: Record<string, string> = {
  click: "click",
  dblclick: "doubleClick",
  tap: "tap",
  fill: "fill",
  type: "type",
  pressSequentially: "type",
  press: "press",
  check: "check",
  uncheck: "uncheck",
  setChecked: "toggle",
  selectOption: "select",
  hover: "hover",
  focus: "focus",
  clear: "clear",
  setInputFiles: "upload",
  dragTo: "drag",
  handleDialog: "handle",
  waitForPopup: "open",
  newPage: "open",
  goto: "open",
};
const ROLE_NOUN: Record<string, string> = { textbox: "Field", combobox: "Dropdown", checkbox: "Checkbox" };
const KEY_NAME_RE =
  /^(Enter|Tab|Escape|Backspace|Delete|Space|Home|End|PageUp|PageDown|Insert|Arrow(Up|Down|Left|Right)|F\d{1,2}|((Control|Meta|Shift|Alt|ControlOrMeta)\+)+.+)$/;
const MAX_CONTENT_WORDS = 4;

// ─── Parameters ───────────────────────────────────────────────────────────────

function parameterBase(selector: ClassifiedSelector | null): string | null {
  if (!selector) return null;
  const d = selector.structured_details;
  const source = d.label ?? d.placeholder ?? d.accessible_name ?? d.attributes.name ?? d.test_id ?? derivableContent(d);
  if (!source) return null;
  const name = camelCase(words(source).slice(0, MAX_CONTENT_WORDS).join(" "));
  return name === "" ? null : name;
}

function parameterType(verb: string, arg: LiteralArgument): ParameterSuggestion["type"] {
  if (verb === "setInputFiles") return "file";
  if (arg.kind === "array") return "string[]";
  if (arg.kind === "number") return "number";
  if (arg.kind === "boolean") return "boolean";
  return "string";
}

/**
 * Values an action passes that a page-object method would take as arguments.
 * Key names and booleans are constant-like and stay literals.
 */
export function suggestParameters(
  action: Pick<ActionRecord, "id" | "action_verb" | "literal_arguments">,
  selector: ClassifiedSelector | null
): ParameterSuggestion[] {
  const verb = action.action_verb;
  if (verb === null || !VALUE_VERBS.has(verb)) return [];
  const args = action.literal_arguments.filter((a) => a.kind !== "object");
  const base = parameterBase(selector);

  return args.map((arg, i) => {
    const constant = arg.kind === "boolean" || (verb === "press" && KEY_NAME_RE.test(arg.value));
    const numbered = args.length > 1 ? `${i + 1}` : "";
    return {
      name: base ? `${base}${i === 0 ? "" : numbered}` : `value${i + 1}`,
      type: parameterType(verb, arg),
      example_value: arg.kind === "expression" ? null : arg.value,
      source_action_id: action.id,
      should_be_parameter: !constant,
    };
  });
}

const UNNAMED_RE = /^value\d+$/;

/** Dedupes by name; unnamed values are renumbered value1, value2, … across the method. */
function mergeParameters(actions: ActionRecord[]): ParameterSuggestion[] {
  const merged: ParameterSuggestion[] = [];
  const seen = new Set<string>();
  let unnamed = 0;
  for (const action of actions) {
    for (const parameter of action.parameters) {
      if (UNNAMED_RE.test(parameter.name)) {
        let name = `value${++unnamed}`;
        while (seen.has(name)) name = `value${++unnamed}`;
        seen.add(name);
        merged.push({ ...parameter, name });
        continue;
      }
      if (seen.has(parameter.name)) continue;
      seen.add(parameter.name);
      merged.push(parameter);
    }
  }
  return merged;
}

// ─── Relatedness ──────────────────────────────────────────────────────────────

/** First scoping level of a selector: the first accessor call or the first css compound. */
export function selectorRoot(selector: ClassifiedSelector | null): string | null {
  if (!selector) return null;
  const text = selector.normalized;
  if (/^[A-Za-z_$][\w$]*\(/.test(text)) {
    let depth = 0;
    let quote: string | null = null;
    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (quote) {
        if (ch === quote) quote = null;
        continue;
      }
      if (ch === "'" || ch === '"' || ch === "`") quote = ch;
      else if (ch === "(") depth++;
      else if (ch === ")" && --depth === 0) return text.slice(0, i + 1);
    }
    return text;
  }
  const compound = /^[^\s>+~]+/.exec(text);
  return compound ? compound[0] : text;
}

interface OpenGroup {
  actions: ActionRecord[];
  selectors: (ClassifiedSelector | null)[];
  assertions: AssertionRecord[];
}

function lastInteraction(group: OpenGroup): { action: ActionRecord; selector: ClassifiedSelector | null } | null {
  for (let i = group.actions.length - 1; i >= 0; i--) {
    if (group.actions[i].kind === "interaction") return { action: group.actions[i], selector: group.selectors[i] };
  }
  return null;
}

function isRelated(
  group: OpenGroup,
  action: ActionRecord,
  selector: ClassifiedSelector | null,
  config: MethodGroupingConfig,
  cohesive: boolean
): { related: boolean; closes: boolean } {
  if (action.kind === "wait") {
    return { related: true, closes: action.action_verb === "waitForURL" };
  }
  if (action.kind === "navigation") return { related: false, closes: false };
  if (cohesive) return { related: true, closes: false };

  const first = group.actions[0];
  if (group.actions.every((a) => a.kind !== "interaction") && first.kind === "navigation") {
    return { related: true, closes: false };
  }
  const previous = lastInteraction(group);
  if (!previous) return { related: true, closes: false };

  const verb = action.action_verb ?? "";
  const previousVerb = previous.action.action_verb ?? "";
  const fillRun = FILL_VERBS.has(previousVerb);

  if (config.group_related_fills && fillRun && TERMINAL_VERBS.has(verb)) return { related: true, closes: true };
  if (config.group_related_fills && fillRun && FILL_VERBS.has(verb)) return { related: true, closes: false };

  const rootA = selectorRoot(previous.selector);
  const rootB = selectorRoot(selector);
  if (rootA !== null && rootA === rootB) {
    return { related: true, closes: fillRun && TERMINAL_VERBS.has(verb) };
  }
  return { related: false, closes: false };
}

// ─── Naming ───────────────────────────────────────────────────────────────────

function verbPrefix(verb: string | null): string {
  if (verb === null) return "perform";
  return VERB_PREFIX[verb] ?? camelCase(verb);
}

function contentOf(selector: ClassifiedSelector | null): string | null {
  if (!selector) return null;
  const d = selector.structured_details;
  const content = d.test_id ?? derivableContent(d);
  if (!content) return null;
  const trimmed = words(content).slice(0, MAX_CONTENT_WORDS).join(" ");
  return trimmed === "" ? null : trimmed;
}

function targetNoun(selector: ClassifiedSelector | null): string | null {
  if (!selector) return null;
  const d = selector.structured_details;
  if (d.role) return ROLE_NOUN[d.role] ?? pascalCase(d.role);
  if (d.tag) return d.tag === "input" ? "Field" : d.tag === "a" ? "Link" : pascalCase(d.tag);
  const cls = d.attributes.class?.split(" ")[0];
  return cls ? pascalCase(cls) : null;
}

interface NameChoice {
  name: string;
  alternatives: string[];
  source: MethodSuggestion["name_source"];
  confidence: number;
}

function chooseName(
  group: OpenGroup,
  input: GroupingInput,
  taken: Set<string>,
  counter: GenericNameCounter
): NameChoice {
  const terminalIndex = group.actions.length - 1 - [...group.actions].reverse().findIndex((a) => a.kind === "interaction");
  const hasInteraction = group.actions.some((a) => a.kind === "interaction");
  const index = hasInteraction ? terminalIndex : group.actions.length - 1;
  const terminal = group.actions[index];
  const selector = group.selectors[index] ?? null;
  const prefix = group.actions.length === 0 ? "verify" : verbPrefix(terminal?.action_verb ?? null);
  const hasFills = group.actions.some((a) => FILL_VERBS.has(a.action_verb ?? ""));
  const submits = hasFills && TERMINAL_VERBS.has(terminal?.action_verb ?? "");

  const options: { source: NameChoice["source"]; name: string }[] = [];

  const content = contentOf(selector);
  if (content) {
    const isAction = words(content).some((w) => ACTION_WORDS.has(w));
    options.push({ source: "content", name: isAction ? camelCase(content) : `${prefix}${pascalCase(content)}` });
  }
  if (input.owner_noun) {
    const noun = pascalCase(input.owner_noun);
    const name = submits ? `submit${noun}Form` : hasFills ? `fill${noun}Form` : `${prefix}${noun}`;
    options.push({ source: "url", name });
  }
  const noun = targetNoun(selector);
  if (noun) options.push({ source: "verb_noun", name: `${prefix}${noun}` });

  const valid = options.filter((o) => o.name !== "" && /^[a-z]/.test(o.name));
  const chosen = valid[0];
  if (chosen) {
    const name = uniqueName(chosen.name, taken);
    const alternatives = [...new Set(valid.slice(1).map((o) => o.name))].filter((n) => n !== name);
    return { name, alternatives, source: chosen.source, confidence: NAME_CONFIDENCE[chosen.source] };
  }

  const n = counter.next++;
  const name = uniqueName(`performAction${n}`, taken);
  return {
    name,
    alternatives: [`${prefix}Step${n}`, `handleStep${n}`],
    source: "generic",
    confidence: NAME_CONFIDENCE.generic,
  };
}

// ─── Grouping ─────────────────────────────────────────────────────────────────

function complexity(group: OpenGroup, input: GroupingInput, parameters: ParameterSuggestion[], isLast: boolean): number {
  const w = COMPLEXITY_WEIGHTS;
  const contexts = [...group.actions.map((a) => a.context), ...group.assertions.map((a) => a.context)];
  const crossPage =
    group.actions.some((a) => a.kind === "navigation" || a.action_verb === "waitForURL") ||
    (isLast && input.exits_to_new_url);
  return (
    w.action * group.actions.length +
    w.parameter * parameters.filter((p) => p.should_be_parameter).length +
    (contexts.some((c) => c.in_branch) ? w.branch : 0) +
    (contexts.some((c) => c.in_loop) ? w.loop : 0) +
    (group.actions.some((a) => a.subtype === "file_upload") ? w.fileUpload : 0) +
    (group.assertions.length >= 2 ? w.multipleAssertions : 0) +
    (crossPage ? w.crossPage : 0) +
    (input.owner_kind === "component" ? w.componentDelegation : 0)
  );
}

/**
 * Partitions the owner's items into methods. Every grouped action lands in
 * exactly one method; delegated actions, assertions (when kept separate) and
 * navigation close the method being built.
 */
export function groupMethods(
  input: GroupingInput,
  config: MethodGroupingConfig,
  counter: GenericNameCounter
): { methods: MethodDraft[]; warnings: AnalysisWarning[] } {
  const cohesive = input.owner_kind === "component";
  const groups: OpenGroup[] = [];
  let current: OpenGroup | null = null;
  // Method that just ended on its own; a following assertion verifies it.
  const trail: { previous: OpenGroup | null } = { previous: null };
  let lastItemLine = -1;

  const close = (): void => {
    if (current && (current.actions.length > 0 || current.assertions.length > 0)) {
      groups.push(current);
      trail.previous = current;
    }
    current = null;
  };
  const separate = (): void => {
    close();
    trail.previous = null;
  };
  const start = (): OpenGroup => ({ actions: [], selectors: [], assertions: [] });

  for (const item of input.items) {
    lastItemLine = item.record.line_number;

    if (item.kind === "assertion") {
      if (config.separate_assertions) {
        separate();
      } else if (current) {
        current.assertions.push(item.record);
      } else if (trail.previous) {
        trail.previous.assertions.push(item.record);
      } else {
        current = start();
        current.assertions.push(item.record);
      }
      continue;
    }

    const { record, selector } = item;
    if (record.component_usage !== null && !cohesive) {
      separate();
      continue;
    }
    const skipNavigation =
      config.separate_navigation && (record.kind === "navigation" || (item.opens_page && record.kind === "wait"));
    if (skipNavigation) {
      separate();
      continue;
    }

    if (record.kind === "navigation") {
      separate();
      current = start();
    } else if (current && current.actions.length > 0) {
      const full = current.actions.length >= config.max_actions_per_method;
      const { related, closes } = isRelated(current, record, selector, config, cohesive);
      if (full || !related) {
        close();
        current = start();
      } else if (closes) {
        current.actions.push(record);
        current.selectors.push(selector);
        close();
        continue;
      }
    }

    current = current ?? start();
    current.actions.push(record);
    current.selectors.push(selector);
    if (record.kind === "wait" && record.action_verb === "waitForURL") close();
  }
  close();

  const methods: MethodDraft[] = [];
  const warnings: AnalysisWarning[] = [];
  const taken = new Set<string>();

  for (const group of groups) {
    const parameters = mergeParameters(group.actions);
    const lines = [...group.actions.map((a) => a.line_number), ...group.assertions.map((a) => a.line_number)];
    const end = Math.max(...lines);
    const choice = chooseName(group, input, taken, counter);
    if (choice.source === "generic") {
      const named = group.actions.length > 0 ? group.actions.map((a) => a.line_number) : lines;
      warnings.push({
        code: "GENERIC_METHOD_NAME",
        message: `No naming signal for the actions at lines ${named.join(", ")}; named ${choice.name}`,
        line_numbers: named,
      });
    }
    methods.push({
      name: choice.name,
      alternatives: choice.alternatives,
      name_source: choice.source,
      confidence: choice.confidence,
      action_ids: group.actions.map((a) => a.id),
      assertion_ids: group.assertions.map((a) => a.id),
      parameters,
      complexity: complexity(group, input, parameters, end === lastItemLine),
      line_range: { start: Math.min(...lines), end },
    });
  }
  return { methods, warnings };
}
