// src/analysis/selectors/classifier.ts
//
// Classifies a raw locator expression into one of six strategies. Two input
// shapes are understood: accessor chains as written after `page.`
// (`getByRole('button', { name: 'Save' }).first()`) and plain selector strings
// (`#login`, `//div[@id='x']`, `text=Sign in`, `role=button[name="Save"]`).

import { AST_NODE_TYPES, parse, TSESTree } from "@typescript-eslint/typescript-estree";
import {
  type ChainLink,
  extractStringValue,
  flattenChain,
  nodeText,
  readObjectLiteral,
} from "../../utils/ast-utils";
import type { ClassifiedSelector, SelectorDetails, SelectorStrategy } from "../../blueprint/types";

export const TEST_ID_ATTRIBUTES = ["data-testid", "data-test-id", "data-test", "data-cy", "data-qa"];

interface StrategySignals {
  testid: boolean;
  role: boolean;
  text: boolean;
  xpath: boolean;
  placeholder: boolean;
}

const POSITIONAL_PSEUDO_RE =
  /:(?:nth-child|nth-last-child|nth-of-type|nth-last-of-type|nth-match|first-child|last-child|first-of-type|last-of-type)(?:\([^)]*\))?/g;
const TEXT_PSEUDO_RE = /:(?:has-text|text-is|text-matches|text)\(\s*(["'])(.*?)\1\s*\)/;
const CSS_ATTRIBUTE_RE = /\[\s*([\w:-]+)\s*(?:[~|^$*]?=\s*(?:"([^"]*)"|'([^']*)'|([^\]\s]+)))?\s*\]/g;
const XPATH_POSITION_RE = /\[\s*(?:\d+|last\(\)|position\(\)[^\]]*)\s*\]/g;
const XPATH_ATTRIBUTE_RE = /@([\w:-]+)\s*=\s*(["'])(.*?)\2/g;
const ENGINE_RE = /^([a-z][\w-]*)\s*=\s*([\s\S]*)$/;

function emptyDetails(): SelectorDetails {
  return { attributes: {}, fragments: [], modifiers: [], nesting_depth: 0 };
}

function unquote(value: string): string {
  const m = /^(["'`])([\s\S]*)\1$/.exec(value.trim());
  return m ? m[2] : value.trim();
}

/** Removes quoted text and bracket/paren contents so structure can be read safely. */
function stripBracketed(selector: string): string {
  return selector
    .replace(/"[^"]*"|'[^']*'/g, '""')
    .replace(/\[[^\]]*\]/g, "[]")
    .replace(/\([^)]*\)/g, "()");
}

function recordAttribute(name: string, value: string, details: SelectorDetails, signals: StrategySignals): void {
  details.attributes[name] = value;
  if (TEST_ID_ATTRIBUTES.includes(name)) {
    details.test_id = value;
    signals.testid = true;
  }
}

// ─── String selectors ─────────────────────────────────────────────────────────

function analyzeXPath(xpath: string, details: SelectorDetails, signals: StrategySignals): void {
  signals.xpath = true;
  for (const m of xpath.matchAll(XPATH_ATTRIBUTE_RE)) recordAttribute(m[1], m[3], details, signals);

  const text = /text\(\)\s*(?:,|=)\s*(["'])(.*?)\1/.exec(xpath);
  if (text) details.text = text[2];

  for (const m of xpath.matchAll(XPATH_POSITION_RE)) details.modifiers.push(m[0]);

  const steps = xpath.replace(/\[[^\]]*\]/g, "").split(/\/\/?/).filter((s) => s.trim() !== "" && s !== "(" && s !== ")");
  details.nesting_depth += Math.max(0, steps.length - 1);
  const tag = /([A-Za-z][\w-]*)\s*\)?\s*(?:\[[^\]]*\]\s*)*$/.exec(xpath);
  if (tag && !details.tag) details.tag = tag[1];
}

function analyzeCss(css: string, details: SelectorDetails, signals: StrategySignals): void {
  const trimmed = css.trim();
  for (const m of trimmed.matchAll(CSS_ATTRIBUTE_RE)) {
    recordAttribute(m[1], m[2] ?? m[3] ?? m[4] ?? "", details, signals);
  }

  const structure = stripBracketed(trimmed);
  const ids = [...structure.matchAll(/#([\w-]+)/g)].map((m) => m[1]);
  if (ids.length > 0) details.attributes.id = ids[ids.length - 1];
  const classes = [...structure.matchAll(/\.([A-Za-z_-][\w-]*)/g)].map((m) => m[1]);
  if (classes.length > 0) details.attributes.class = classes.join(" ");

  const text = TEXT_PSEUDO_RE.exec(trimmed);
  if (text) {
    details.text = text[2];
    signals.text = true;
  }
  for (const m of trimmed.matchAll(POSITIONAL_PSEUDO_RE)) details.modifiers.push(m[0]);

  const role = details.attributes.role;
  if (role && !details.role) details.role = role;
  const ariaLabel = details.attributes["aria-label"];
  if (ariaLabel && !details.accessible_name) details.accessible_name = ariaLabel;

  const placeholder = details.attributes.placeholder;
  if (placeholder !== undefined) {
    details.placeholder = placeholder;
    const onlyPlaceholder = Object.keys(details.attributes).length === 1;
    if (onlyPlaceholder && /^[A-Za-z]*\s*\[[^\]]*\]$/.test(trimmed)) signals.placeholder = true;
  }

  const compounds = structure
    .replace(/,.*$/, "")
    .split(/\s*[>+~]\s*|\s+/)
    .filter(Boolean);
  details.nesting_depth += Math.max(0, compounds.length - 1);
  const last = compounds[compounds.length - 1] ?? "";
  const tag = /^[A-Za-z][\w-]*/.exec(last);
  if (tag) details.tag = tag[0].toLowerCase();
}

function analyzeRoleEngine(value: string, details: SelectorDetails, signals: StrategySignals): void {
  const m = /^([\w-]+)\s*(.*)$/.exec(value.trim());
  if (!m) return;
  signals.role = true;
  details.role = m[1];
  const name = /\[\s*name\s*=\s*(["'])(.*?)\1(\s*[is])?\s*\]/.exec(m[2]);
  if (name) {
    details.accessible_name = name[2];
    if (name[3]) details.exact = name[3].trim() === "s";
  }
}

function analyzeSingle(part: string, details: SelectorDetails, signals: StrategySignals): void {
  const trimmed = part.trim();
  if (/^\(?\s*(\/\/|\.\.?\/|\.\.$)/.test(trimmed)) {
    analyzeXPath(trimmed, details, signals);
    return;
  }
  if (/^(["']).*\1$/.test(trimmed)) {
    details.text = unquote(trimmed);
    signals.text = true;
    return;
  }

  const engine = ENGINE_RE.exec(trimmed);
  if (engine) {
    const [, name, value] = engine;
    switch (name) {
      case "text":
        details.text = unquote(value);
        signals.text = true;
        return;
      case "role":
        analyzeRoleEngine(value, details, signals);
        return;
      case "xpath":
        analyzeXPath(value, details, signals);
        return;
      case "css":
        analyzeCss(value, details, signals);
        return;
      case "id":
        details.attributes.id = unquote(value);
        return;
      case "nth":
        details.modifiers.push(`nth=${value.trim()}`);
        return;
      default:
        if (TEST_ID_ATTRIBUTES.includes(name)) {
          recordAttribute(name, unquote(value), details, signals);
          return;
        }
    }
  }
  analyzeCss(trimmed, details, signals);
}

/** Splits `a >> b` chains, leaving `>>` inside quotes alone. */
function splitEngineChain(selector: string): string[] {
  const parts: string[] = [];
  let quote: string | null = null;
  let current = "";
  for (let i = 0; i < selector.length; i++) {
    const ch = selector[i];
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    if (ch === ">" && selector[i + 1] === ">") {
      parts.push(current);
      current = "";
      i++;
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((p) => p.trim()).filter(Boolean);
}

function analyzeString(selector: string, details: SelectorDetails, signals: StrategySignals): void {
  const trimmed = selector.trim();
  details.fragments.push(trimmed);
  const parts = splitEngineChain(trimmed);
  details.nesting_depth += Math.max(0, parts.length - 1);
  for (const part of parts) analyzeSingle(part, details, signals);
}

// ─── Accessor chains ──────────────────────────────────────────────────────────

function parseAccessorChain(raw: string): ChainLink[] | null {
  if (!/^[A-Za-z_$][\w$]*\s*\(/.test(raw)) return null;
  let program: TSESTree.Program;
  try {
    program = parse(raw, { range: true, loc: false, comment: false });
  } catch {
    return null;
  }
  const [statement] = program.body;
  if (program.body.length !== 1 || statement.type !== AST_NODE_TYPES.ExpressionStatement) return null;
  const chain = flattenChain(statement.expression);
  if (!chain || chain.links.some((l) => l.args === null)) return null;
  return chain.links;
}

function analyzeAccessors(raw: string, links: ChainLink[], details: SelectorDetails, signals: StrategySignals): void {
  let scopes = 0;
  for (const link of links) {
    const args = link.args ?? [];
    const firstArg = args[0];
    const first = firstArg ? extractStringValue(firstArg) : null;
    const options = args[1] ? readObjectLiteral(args[1]) : {};

    switch (link.name) {
      case "getByTestId":
        details.test_id = first ?? (firstArg ? nodeText(raw, firstArg) : "");
        signals.testid = true;
        scopes++;
        break;
      case "getByRole": {
        scopes++;
        signals.role = true;
        if (first !== null) details.role = first;
        const name = options.name;
        if (typeof name === "string") details.accessible_name = name;
        if (typeof options.exact === "boolean") details.exact = options.exact;
        break;
      }
      case "getByText":
      case "getByLabel":
      case "getByAltText":
      case "getByTitle": {
        scopes++;
        signals.text = true;
        const value = first ?? (firstArg ? nodeText(raw, firstArg) : "");
        if (link.name === "getByText") details.text = value;
        else if (link.name === "getByLabel") details.label = value;
        else if (link.name === "getByAltText") details.alt_text = value;
        else details.title = value;
        if (typeof options.exact === "boolean") details.exact = options.exact;
        break;
      }
      case "getByPlaceholder":
        scopes++;
        signals.placeholder = true;
        details.placeholder = first ?? (firstArg ? nodeText(raw, firstArg) : "");
        break;
      case "locator":
      case "frameLocator":
        scopes++;
        if (first !== null) analyzeString(first, details, signals);
        else if (firstArg) details.fragments.push(nodeText(raw, firstArg));
        if (typeof options.hasText === "string") details.modifiers.push(`hasText=${options.hasText}`);
        break;
      case "nth":
        details.modifiers.push(`nth(${firstArg ? nodeText(raw, firstArg) : ""})`);
        break;
      case "filter": {
        const filter = firstArg ? readObjectLiteral(firstArg) : {};
        const hasText = filter.hasText;
        details.modifiers.push(typeof hasText === "string" ? `filter(hasText=${hasText})` : "filter()");
        break;
      }
      default:
        details.modifiers.push(`${link.name}()`);
    }
  }
  details.nesting_depth += Math.max(0, scopes - 1);
}

// ─── Public API ───────────────────────────────────────────────────────────────

function pickStrategy(signals: StrategySignals): SelectorStrategy {
  if (signals.testid) return "testid";
  if (signals.role) return "role";
  if (signals.text) return "text";
  if (signals.xpath) return "xpath";
  if (signals.placeholder) return "placeholder";
  return "css";
}

/**
 * Canonical form used for selector equality: whitespace collapsed, double
 * quotes turned into single quotes, and a lone `locator('x')` unwrapped to `x`.
 */
export function normalizeSelector(raw: string): string {
  const collapsed = raw
    .trim()
    .replace(/\s+/g, " ")
    .replace(/\(\s+/g, "(")
    .replace(/\s+\)/g, ")")
    .replace(/"/g, "'");
  const lone = /^locator\('([^']*)'\)$/.exec(collapsed);
  return lone ? lone[1] : collapsed;
}

export function classifySelector(raw: string): ClassifiedSelector {
  const details = emptyDetails();
  const signals: StrategySignals = { testid: false, role: false, text: false, xpath: false, placeholder: false };
  const trimmed = raw.trim();

  const links = parseAccessorChain(trimmed);
  if (links) analyzeAccessors(trimmed, links, details, signals);
  else analyzeString(trimmed, details, signals);

  return {
    raw,
    normalized: normalizeSelector(raw),
    strategy: pickStrategy(signals),
    structured_details: details,
  };
}
