// src/analysis/statement-extractor.ts
//
// Turns script text into an ordered list of Statements. The whole script is
// parsed with typescript-estree when it is valid; otherwise a line scanner cuts
// it into logical statements and each one is parsed on its own.

import { AST_NODE_TYPES, parse, TSESTree } from "@typescript-eslint/typescript-estree";
import { parseScript } from "./parser";
import {
  type Chain,
  type ChainLink,
  extractStringValue,
  flattenChain,
  nodeText,
  toLiteralArgument,
  unwrap,
} from "../utils/ast-utils";
import { ScriptParseError } from "../blueprint/errors";
import type {
  AnalysisWarning,
  AssertionMatcher,
  LiteralArgument,
  Statement,
  StatementContext,
  StatementKind,
} from "../blueprint/types";

export interface ExtractionResult {
  statements: Statement[];
  warnings: AnalysisWarning[];
  usedFallback: boolean;
}

// ─── Vocabulary ───────────────────────────────────────────────────────────────

const LOCATOR_BUILDERS = new Set([
  "locator", "getByRole", "getByText", "getByLabel", "getByPlaceholder",
  "getByTestId", "getByAltText", "getByTitle", "frameLocator", "filter",
  "first", "last", "nth", "and", "or", "contentFrame",
]);

export const ACTION_VERBS = new Set([
  "click", "dblclick", "fill", "type", "pressSequentially", "press", "check",
  "uncheck", "setChecked", "selectOption", "hover", "focus", "blur", "tap",
  "clear", "setInputFiles", "dragTo", "dragAndDrop", "selectText",
  "scrollIntoViewIfNeeded", "dispatchEvent", "textContent", "innerText",
  "innerHTML", "inputValue", "getAttribute", "isVisible", "isHidden",
  "isChecked", "isEnabled", "isDisabled", "count", "allTextContents",
  "allInnerTexts", "screenshot", "evaluate",
]);

const NAVIGATION_VERBS = new Set(["goto", "goBack", "goForward", "reload"]);

const WAIT_VERBS = new Set([
  "waitForURL", "waitForTimeout", "waitForLoadState", "waitForSelector",
  "waitForResponse", "waitForRequest", "waitForNavigation", "waitForFunction",
]);

const DEVICE_ACTORS = new Set(["keyboard", "mouse", "touchscreen"]);
const TEST_ROOTS = new Set(["test", "it"]);
const TEST_LINKS = new Set(["test", "it", "only", "skip", "fixme", "fail", "slow", "step"]);
const HOOKS = new Set(["beforeEach", "afterEach", "beforeAll", "afterAll"]);
const LOOP_CALLBACKS = new Set(["forEach", "map", "each", "for"]);
const ACTOR_NAME_RE = /^(this\.)?(page|popup|tab|frame|context|browser|newPage|newTab)\w*$|(Page|Popup|Tab|Frame)$/;

// ─── Extraction state ─────────────────────────────────────────────────────────

interface ExtractionState {
  code: string;
  lineOffset: number;
  /** locator variables: name → selector expression */
  bindings: Map<string, string>;
  actors: Set<string>;
  byLine: Map<number, Statement>;
  warnings: AnalysisWarning[];
}

type Classified = Pick<
  Statement,
  | "kind"
  | "action_verb"
  | "selector_expression"
  | "literal_arguments"
  | "target_url"
  | "subtype"
  | "actor"
  | "matcher"
  | "unsupported"
>;

function classified(kind: StatementKind, fields: Partial<Classified>): Classified {
  return {
    kind,
    action_verb: null,
    selector_expression: null,
    literal_arguments: [],
    target_url: null,
    subtype: null,
    actor: null,
    matcher: null,
    unsupported: false,
    ...fields,
  };
}

function isActor(state: ExtractionState, name: string): boolean {
  return state.bindings.has(name) || state.actors.has(name) || ACTOR_NAME_RE.test(name);
}

function literalArgs(state: ExtractionState, args: TSESTree.CallExpressionArgument[] | null): LiteralArgument[] {
  return (args ?? []).map((a) => toLiteralArgument(state.code, a));
}

function argString(state: ExtractionState, arg: TSESTree.CallExpressionArgument | undefined): string | null {
  if (!arg) return null;
  const str = extractStringValue(arg);
  if (str !== null) return str;
  return toLiteralArgument(state.code, arg).value;
}

/** Selector text for a locator-building expression, or null when the node is not one. */
function locatorExpression(state: ExtractionState, node: TSESTree.Node): string | null {
  const target = unwrap(node);
  if (target.type === AST_NODE_TYPES.Identifier) return state.bindings.get(target.name) ?? null;
  const chain = flattenChain(target);
  if (!chain || chain.links.length === 0) return null;
  if (!isActor(state, chain.root)) return null;
  if (!chain.links.every((l) => l.args !== null && LOCATOR_BUILDERS.has(l.name))) return null;
  return chainSelector(state, chain.root, chain.links);
}

function chainSelector(state: ExtractionState, root: string, builders: ChainLink[]): string {
  const bound = state.bindings.get(root);
  if (builders.length === 0) return bound ?? root;
  const text = state.code.slice(builders[0].start, builders[builders.length - 1].end);
  return bound ? `${bound}.${text}` : text;
}

// ─── Classification ───────────────────────────────────────────────────────────

function classifyExpression(state: ExtractionState, expression: TSESTree.Node): Classified | null {
  const target = unwrap(expression);

  // await Promise.all([page.waitForEvent('popup'), page.click('a')])
  if (
    target.type === AST_NODE_TYPES.CallExpression &&
    target.callee.type === AST_NODE_TYPES.MemberExpression &&
    target.callee.object.type === AST_NODE_TYPES.Identifier &&
    target.callee.object.name === "Promise" &&
    target.arguments[0]?.type === AST_NODE_TYPES.ArrayExpression
  ) {
    const parts = target.arguments[0].elements
      .filter((e): e is TSESTree.Expression => e !== null && e.type !== AST_NODE_TYPES.SpreadElement)
      .map((e) => classifyExpression(state, e))
      .filter((c): c is Classified => c !== null);
    if (parts.length === 0) return null;
    const primary = parts.find((p) => p.kind === "interaction" && p.subtype === "standard") ?? parts[0];
    const opensTab = parts.some((p) => p.subtype === "multi_tab");
    return opensTab && primary.kind === "interaction" ? { ...primary, subtype: "multi_tab" } : primary;
  }

  const chain = flattenChain(target);
  if (!chain || chain.links.length === 0) return null;
  if (chain.root === "expect") return classifyAssertion(state, chain);
  if (!isActor(state, chain.root)) return null;
  return classifyActorCall(state, chain);
}

function classifyAssertion(state: ExtractionState, chain: Chain): Classified | null {
  const [subjectLink, ...rest] = chain.links;
  if (!subjectLink.args) return null;
  const matcherLink = [...rest].reverse().find((l) => l.args !== null);
  if (!matcherLink || !matcherLink.args) return null;

  const subjectArg = subjectLink.args[0];
  let selector: string | null = null;
  let subject: AssertionMatcher["subject"] = "value";
  if (subjectArg) {
    selector = locatorExpression(state, subjectArg);
    if (selector !== null) {
      subject = "locator";
    } else {
      const bare = unwrap(subjectArg);
      if (bare.type === AST_NODE_TYPES.Identifier && isActor(state, bare.name)) subject = "page";
    }
  }

  return classified("assertion", {
    action_verb: matcherLink.name,
    selector_expression: selector,
    literal_arguments: literalArgs(state, matcherLink.args),
    matcher: {
      name: matcherLink.name,
      negated: rest.some((l) => l.name === "not" && l.args === null),
      soft: subjectLink.name === "soft",
      subject,
    },
  });
}

function classifyActorCall(state: ExtractionState, chain: Chain): Classified | null {
  const { root, links } = chain;
  const actor = root;

  // page.keyboard.press('Enter'), page.mouse.click(10, 20)
  if (links[0].args === null && DEVICE_ACTORS.has(links[0].name)) {
    const verbLink = links[1];
    if (!verbLink || !verbLink.args) return null;
    return classified("interaction", {
      action_verb: verbLink.name,
      literal_arguments: literalArgs(state, verbLink.args),
      subtype: "standard",
      actor,
    });
  }

  let builderCount = 0;
  while (
    builderCount < links.length &&
    links[builderCount].args !== null &&
    LOCATOR_BUILDERS.has(links[builderCount].name)
  ) {
    builderCount++;
  }
  const builders = links.slice(0, builderCount);
  const verbLink = links[builderCount];
  if (!verbLink || !verbLink.args) return null;

  const isBoundLocator = state.bindings.has(root);
  if (builders.length === 0 && !isBoundLocator) {
    return classifyPageCall(state, actor, verbLink);
  }

  const selector = chainSelector(state, root, builders);
  const args = literalArgs(state, verbLink.args);
  if (verbLink.name === "waitFor") {
    return classified("wait", { action_verb: "waitFor", selector_expression: selector, literal_arguments: args, actor });
  }
  if (ACTION_VERBS.has(verbLink.name)) {
    return classified("interaction", {
      action_verb: verbLink.name,
      selector_expression: selector,
      literal_arguments: args,
      subtype: verbLink.name === "setInputFiles" ? "file_upload" : "standard",
      actor,
    });
  }
  return classified("interaction", {
    action_verb: verbLink.name,
    selector_expression: selector,
    literal_arguments: args,
    subtype: "standard",
    actor,
    unsupported: true,
  });
}

function classifyPageCall(state: ExtractionState, actor: string, link: ChainLink): Classified | null {
  const args = link.args ?? [];
  const verb = link.name;

  if (NAVIGATION_VERBS.has(verb)) {
    return classified("navigation", {
      action_verb: verb,
      target_url: verb === "goto" ? argString(state, args[0]) : null,
      literal_arguments: literalArgs(state, args),
      actor,
    });
  }

  if (WAIT_VERBS.has(verb)) {
    return classified("wait", {
      action_verb: verb,
      target_url: verb === "waitForURL" ? argString(state, args[0]) : null,
      selector_expression: verb === "waitForSelector" ? argString(state, args[0]) : null,
      literal_arguments: literalArgs(state, verb === "waitForSelector" ? args.slice(1) : args),
      actor,
    });
  }

  const eventName = args[0] ? extractStringValue(args[0]) : null;
  if (verb === "waitForEvent" || verb === "on" || verb === "once") {
    if (eventName === "dialog") {
      return classified("interaction", { action_verb: "handleDialog", subtype: "dialog", actor });
    }
    if (eventName === "popup" || eventName === "page") {
      return classified("interaction", { action_verb: "waitForPopup", subtype: "multi_tab", actor });
    }
    if (eventName === "filechooser") {
      return classified("interaction", { action_verb: "waitForFileChooser", subtype: "file_upload", actor });
    }
    if (verb === "waitForEvent") {
      return classified("wait", { action_verb: verb, literal_arguments: literalArgs(state, args), actor });
    }
    return null;
  }

  if (verb === "newPage" || verb === "bringToFront") {
    return classified("interaction", { action_verb: verb, subtype: "multi_tab", actor });
  }

  // Legacy page-level form: page.fill('#email', 'value')
  if (ACTION_VERBS.has(verb) && args.length > 0) {
    return classified("interaction", {
      action_verb: verb,
      selector_expression: argString(state, args[0]),
      literal_arguments: literalArgs(state, args.slice(1)),
      subtype: verb === "setInputFiles" ? "file_upload" : "standard",
      actor,
    });
  }

  return null;
}

// ─── Statement emission ───────────────────────────────────────────────────────

function emit(
  state: ExtractionState,
  node: TSESTree.Node,
  fields: Classified,
  context: StatementContext,
  headerOnly = false
): void {
  const line = state.lineOffset + node.loc.start.line;
  const text = nodeText(state.code, node);
  const raw = headerOnly ? text.split("\n")[0].trim() : text.trim();
  const statement: Statement = {
    line_number: line,
    end_line: headerOnly ? line : state.lineOffset + node.loc.end.line,
    raw_text: raw,
    context,
    ...fields,
  };

  const existing = state.byLine.get(line);
  if (existing) {
    if (fields.kind === "structural") return;
    if (existing.kind !== "structural") {
      state.warnings.push({
        code: "SHARED_LINE_STATEMENT",
        message: `Line ${line} holds more than one statement; ${fields.kind} '${fields.action_verb ?? "?"}' (${raw}) is not analyzed on its own`,
        line_numbers: [line],
      });
      return;
    }
  }
  state.byLine.set(line, statement);

  if (fields.unsupported) {
    state.warnings.push({
      code: "UNSUPPORTED_ACTION",
      message: `Line ${line}: '${fields.action_verb}' is not a recognized action; kept as a generic interaction`,
      line_numbers: [line],
    });
  }
}

function structural(): Classified {
  return classified("structural", {});
}

// ─── AST traversal ────────────────────────────────────────────────────────────

function visitBody(state: ExtractionState, body: TSESTree.Node[], context: StatementContext): void {
  for (const node of body) visitStatement(state, node, context);
}

function visitNested(state: ExtractionState, node: TSESTree.Node, context: StatementContext): void {
  if (node.type === AST_NODE_TYPES.BlockStatement) visitBody(state, node.body, context);
  else visitStatement(state, node, context);
}

function visitStatement(state: ExtractionState, node: TSESTree.Node, context: StatementContext): void {
  switch (node.type) {
    case AST_NODE_TYPES.ExpressionStatement:
      handleExpression(state, node, node.expression, context);
      return;
    case AST_NODE_TYPES.VariableDeclaration:
      handleDeclaration(state, node, context);
      return;
    case AST_NODE_TYPES.IfStatement:
      emit(state, node, structural(), context, true);
      visitNested(state, node.consequent, { ...context, in_branch: true });
      if (node.alternate) visitNested(state, node.alternate, { ...context, in_branch: true });
      return;
    case AST_NODE_TYPES.ForStatement:
    case AST_NODE_TYPES.ForInStatement:
    case AST_NODE_TYPES.ForOfStatement:
    case AST_NODE_TYPES.WhileStatement:
    case AST_NODE_TYPES.DoWhileStatement:
      emit(state, node, structural(), context, true);
      visitNested(state, node.body, { ...context, in_loop: true });
      return;
    case AST_NODE_TYPES.TryStatement:
      emit(state, node, structural(), context, true);
      visitBody(state, node.block.body, context);
      if (node.handler) visitBody(state, node.handler.body.body, { ...context, in_branch: true });
      if (node.finalizer) visitBody(state, node.finalizer.body, context);
      return;
    case AST_NODE_TYPES.SwitchStatement:
      emit(state, node, structural(), context, true);
      for (const c of node.cases) visitBody(state, c.consequent, { ...context, in_branch: true });
      return;
    case AST_NODE_TYPES.BlockStatement:
      visitBody(state, node.body, context);
      return;
    case AST_NODE_TYPES.FunctionDeclaration:
      emit(state, node, structural(), context, true);
      visitBody(state, node.body.body, context);
      return;
    case AST_NODE_TYPES.ExportNamedDeclaration:
      if (node.declaration) visitStatement(state, node.declaration, context);
      else emit(state, node, structural(), context);
      return;
    default:
      emit(state, node, structural(), context);
  }
}

function isConditional(node: TSESTree.Node): boolean {
  const target = unwrap(node);
  return (
    target.type === AST_NODE_TYPES.ConditionalExpression ||
    (target.type === AST_NODE_TYPES.LogicalExpression && target.operator !== "??")
  );
}

/** For `cond && await page.click(...)` style statements, the expression doing the work. */
function conditionalBranch(node: TSESTree.Node): TSESTree.Node {
  const target = unwrap(node);
  if (target.type === AST_NODE_TYPES.LogicalExpression) return target.right;
  if (target.type === AST_NODE_TYPES.ConditionalExpression) return target.consequent;
  return target;
}

function handleExpression(
  state: ExtractionState,
  node: TSESTree.Node,
  expression: TSESTree.Node,
  context: StatementContext
): void {
  const branchy = isConditional(expression);
  const subject = branchy ? conditionalBranch(expression) : expression;
  const fields = classifyExpression(state, subject);
  if (fields) {
    emit(state, node, fields, { ...context, in_branch: context.in_branch || branchy });
    return;
  }

  const target = unwrap(subject);
  if (target.type !== AST_NODE_TYPES.CallExpression) {
    emit(state, node, structural(), context);
    return;
  }

  const callbacks = target.arguments.filter(
    (a): a is TSESTree.ArrowFunctionExpression | TSESTree.FunctionExpression =>
      a.type === AST_NODE_TYPES.ArrowFunctionExpression || a.type === AST_NODE_TYPES.FunctionExpression
  );
  if (callbacks.length === 0) {
    emit(state, node, structural(), context);
    return;
  }

  emit(state, node, structural(), context, true);
  const chain = flattenChain(target);
  const inner: StatementContext = {
    in_branch: context.in_branch,
    in_loop: context.in_loop || (chain !== null && LOOP_CALLBACKS.has(chain.links[chain.links.length - 1]?.name ?? "")),
    test_title: (chain && containerTitle(chain)) ?? context.test_title,
  };
  for (const callback of callbacks) {
    if (callback.body.type === AST_NODE_TYPES.BlockStatement) {
      visitBody(state, callback.body.body, inner);
    } else {
      handleExpression(state, callback.body, callback.body, inner);
    }
  }
}

/** test('title', …), it('title', …) and test.step('title', …) give their title; hooks give their name. */
function containerTitle(chain: Chain): string | null {
  const last = chain.links[chain.links.length - 1];
  if (!last || !last.args) return null;
  if (HOOKS.has(last.name)) return last.name;
  if (TEST_ROOTS.has(chain.root) && TEST_LINKS.has(last.name)) {
    const first = last.args[0];
    return first ? extractStringValue(first) : null;
  }
  return null;
}

function declaredNames(pattern: TSESTree.Node): string[] {
  if (pattern.type === AST_NODE_TYPES.Identifier) return [pattern.name];
  if (pattern.type === AST_NODE_TYPES.ArrayPattern) {
    return pattern.elements.flatMap((e) => (e ? declaredNames(e) : []));
  }
  return [];
}

function handleDeclaration(
  state: ExtractionState,
  node: TSESTree.VariableDeclaration,
  context: StatementContext
): void {
  let emitted = false;
  for (const declarator of node.declarations) {
    if (!declarator.init) continue;
    const names = declaredNames(declarator.id);
    const init = unwrap(declarator.init);

    const selector = locatorExpression(state, init);
    if (selector !== null && init.type !== AST_NODE_TYPES.Identifier) {
      for (const name of names) state.bindings.set(name, selector);
      continue;
    }

    // const popup = await popupPromise;
    if (init.type === AST_NODE_TYPES.Identifier && state.actors.has(init.name)) {
      for (const name of names) state.actors.add(name);
      continue;
    }

    const fields = classifyExpression(state, declarator.init);
    if (fields && !emitted) {
      emit(state, node, fields, context);
      emitted = true;
      if (fields.subtype === "multi_tab") {
        for (const name of names) state.actors.add(name);
      }
    }
  }
  if (!emitted) emit(state, node, structural(), context);
}

function addComments(state: ExtractionState, comments: TSESTree.Comment[], context: StatementContext): void {
  const covered = [...state.byLine.values()].filter((s) => s.kind !== "structural" || s.end_line > s.line_number);
  for (const comment of comments) {
    const line = state.lineOffset + comment.loc.start.line;
    if (state.byLine.has(line)) continue;
    if (covered.some((s) => s.line_number <= line && line <= s.end_line)) continue;
    const text = comment.type === "Line" ? `//${comment.value}` : `/*${comment.value}*/`;
    state.byLine.set(line, {
      ...structural(),
      line_number: line,
      end_line: state.lineOffset + comment.loc.end.line,
      raw_text: text.split("\n")[0].trim(),
      context,
    });
  }
}

// ─── Fallback line scanner ────────────────────────────────────────────────────

interface LogicalChunk {
  text: string;
  startLine: number;
  opener: boolean;
}

/**
 * Cuts text into logical statements by bracket balance, ignoring brackets inside
 * strings and comments. A line that leaves a `{` open is an opener (test wrapper,
 * if-block) and stands alone.
 */
export function scanLogicalStatements(code: string): LogicalChunk[] {
  const lines = code.split("\n");
  const chunks: LogicalChunk[] = [];
  let buffer: string[] = [];
  let startLine = 0;
  let depth = 0;
  let quote: string | null = null;
  let inBlockComment = false;

  lines.forEach((line, index) => {
    if (buffer.length === 0) {
      if (line.trim() === "" && quote === null && !inBlockComment) return;
      startLine = index + 1;
      depth = 0;
    }
    buffer.push(line);

    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      const next = line[i + 1];
      if (inBlockComment) {
        if (ch === "*" && next === "/") {
          inBlockComment = false;
          i++;
        }
        continue;
      }
      if (quote !== null) {
        if (ch === "\\") i++;
        else if (ch === quote) quote = null;
        continue;
      }
      if (ch === "/" && next === "/") break;
      if (ch === "/" && next === "*") {
        inBlockComment = true;
        i++;
        continue;
      }
      if (ch === "'" || ch === '"' || ch === "`") quote = ch;
      else if (ch === "(" || ch === "[" || ch === "{") depth++;
      else if (ch === ")" || ch === "]" || ch === "}") depth--;
    }

    // Template literals and block comments may legitimately span lines.
    if (quote !== null && quote !== "`") quote = null;
    if (quote !== null || inBlockComment) return;

    const opener = depth > 0 && /\{\s*$/.test(line.replace(/\/\/.*$/, ""));
    if (depth <= 0 || opener) {
      chunks.push({ text: buffer.join("\n"), startLine, opener });
      buffer = [];
    }
  });

  if (buffer.length > 0) chunks.push({ text: buffer.join("\n"), startLine, opener: false });
  return chunks;
}

const TITLE_RE = /^\s*(?:await\s+)?(?:test|it)(?:\.(?:only|skip|fixme|step))?\s*\(\s*(['"`])(.*?)\1/;
const HOOK_RE = /^\s*test\.(beforeEach|afterEach|beforeAll|afterAll)\s*\(/;

function extractWithScanner(state: ExtractionState, code: string): void {
  let context: StatementContext = { in_branch: false, in_loop: false, test_title: null };
  // One entry per open block; null for blocks that carry no title.
  const titles: (string | null)[] = [];
  const innermost = (): string | null => titles.reduce<string | null>((outer, title) => title ?? outer, null);

  for (const chunk of scanLogicalStatements(code)) {
    if (chunk.opener) {
      const title = TITLE_RE.exec(chunk.text)?.[2] ?? HOOK_RE.exec(chunk.text)?.[1] ?? null;
      titles.push(title);
      context = { ...context, test_title: innermost() };
      pushRaw(state, chunk, context);
      continue;
    }

    const text = chunk.text.trim();
    if (text.startsWith("}") && !text.endsWith("{")) {
      pushRaw(state, chunk, context);
      titles.pop();
      context = { ...context, test_title: innermost() };
      continue;
    }

    let program: TSESTree.Program | null = null;
    try {
      program = parse(chunk.text, { loc: true, range: true, comment: false, errorOnUnknownASTType: false });
    } catch {
      program = null;
    }
    if (!program || program.body.length === 0) {
      pushRaw(state, chunk, context);
      continue;
    }

    const chunkState: ExtractionState = { ...state, code: chunk.text, lineOffset: chunk.startLine - 1 };
    visitBody(chunkState, program.body, context);
  }
}

function pushRaw(state: ExtractionState, chunk: LogicalChunk, context: StatementContext): void {
  const raw = chunk.text.trim();
  if (!raw || state.byLine.has(chunk.startLine)) return;
  const lineCount = chunk.text.split("\n").length;
  state.byLine.set(chunk.startLine, {
    ...structural(),
    line_number: chunk.startLine,
    end_line: chunk.opener ? chunk.startLine : chunk.startLine + lineCount - 1,
    raw_text: chunk.opener ? raw.split("\n")[0].trim() : raw,
    context,
  });
}

// ─── Main export ──────────────────────────────────────────────────────────────

/**
 * Extracts the ordered statement list of a script. Unrecognized lines become
 * structural statements; only a script with no recognizable statement at all
 * is an error.
 */
export function extractStatements(code: string, source = "<inline>"): ExtractionResult {
  const state: ExtractionState = {
    code,
    lineOffset: 0,
    bindings: new Map(),
    actors: new Set(["page"]),
    byLine: new Map(),
    warnings: [],
  };
  const rootContext: StatementContext = { in_branch: false, in_loop: false, test_title: null };

  const parsed = parseScript(code, source);
  let usedFallback = false;
  if (parsed) {
    visitBody(state, parsed.ast.body, rootContext);
    addComments(state, parsed.ast.comments ?? [], rootContext);
  } else {
    usedFallback = true;
    extractWithScanner(state, code);
    state.warnings.unshift({
      code: "PARSE_FALLBACK",
      message: "Script is not syntactically valid as a whole; statements were recovered line by line",
      line_numbers: [],
    });
  }

  const statements = [...state.byLine.values()].sort((a, b) => a.line_number - b.line_number);
  if (!statements.some((s) => s.kind !== "structural")) {
    throw new ScriptParseError(
      `No navigation, interaction, wait or assertion statement found in ${source}`,
      source
    );
  }

  return { statements, warnings: state.warnings, usedFallback };
}
