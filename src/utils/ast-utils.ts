// src/utils/ast-utils.ts
// Shared AST helpers for the statement extractor and the selector classifier.

import { AST_NODE_TYPES, TSESTree } from "@typescript-eslint/typescript-estree";
import type { LiteralArgument } from "../blueprint/types";

/** Extract string literal value from a node (handles Literal + TemplateLiteral). */
export function extractStringValue(node: TSESTree.Node): string | null {
  if (node.type === AST_NODE_TYPES.Literal && typeof node.value === "string") return node.value;
  if (node.type === AST_NODE_TYPES.TemplateLiteral && node.quasis.length === 1) {
    return node.quasis[0].value.cooked ?? node.quasis[0].value.raw;
  }
  // Handle simple string concatenation: "/users" + "/" + "new" → "/users/new"
  if (node.type === AST_NODE_TYPES.BinaryExpression && node.operator === "+") {
    const left = node.left.type === AST_NODE_TYPES.PrivateIdentifier ? null : extractStringValue(node.left);
    const right = extractStringValue(node.right);
    if (left !== null && right !== null) return left + right;
  }
  return null;
}

/** Source text covered by a node. */
export function nodeText(code: string, node: TSESTree.Node): string {
  return code.slice(node.range[0], node.range[1]);
}

/** Reads `{ name: 'x', exact: true }` style option objects into a flat map of literal values. */
export function readObjectLiteral(node: TSESTree.Node): Record<string, string | boolean | number> {
  const result: Record<string, string | boolean | number> = {};
  if (node.type !== AST_NODE_TYPES.ObjectExpression) return result;
  for (const prop of node.properties) {
    if (prop.type !== AST_NODE_TYPES.Property) continue;
    let key: string | null = null;
    if (prop.key.type === AST_NODE_TYPES.Identifier) key = prop.key.name;
    else if (prop.key.type === AST_NODE_TYPES.Literal) key = String(prop.key.value);
    if (key === null) continue;
    const value = prop.value;
    if (value.type === AST_NODE_TYPES.Literal) {
      if (typeof value.value === "string" || typeof value.value === "boolean" || typeof value.value === "number") {
        result[key] = value.value;
      } else if ("regex" in value && value.regex) {
        result[key] = `/${value.regex.pattern}/${value.regex.flags}`;
      }
      continue;
    }
    const str = extractStringValue(value);
    if (str !== null) result[key] = str;
  }
  return result;
}

/** Converts a call argument into the literal form recorded on statements. */
export function toLiteralArgument(code: string, node: TSESTree.Node): LiteralArgument {
  if (node.type === AST_NODE_TYPES.Literal) {
    if ("regex" in node && node.regex) {
      return { kind: "regex", value: `/${node.regex.pattern}/${node.regex.flags}` };
    }
    if (typeof node.value === "string") return { kind: "string", value: node.value };
    if (typeof node.value === "number") return { kind: "number", value: String(node.value) };
    if (typeof node.value === "boolean") return { kind: "boolean", value: String(node.value) };
  }
  const str = extractStringValue(node);
  if (str !== null) return { kind: "string", value: str };
  if (node.type === AST_NODE_TYPES.ArrayExpression) return { kind: "array", value: nodeText(code, node) };
  if (node.type === AST_NODE_TYPES.ObjectExpression) return { kind: "object", value: nodeText(code, node) };
  return { kind: "expression", value: nodeText(code, node) };
}

// ─── Call chains ──────────────────────────────────────────────────────────────

export interface ChainLink {
  name: string;
  /** null for a plain property access such as `.not` or `.keyboard` */
  args: TSESTree.CallExpressionArgument[] | null;
  /** offset of the member name */
  start: number;
  /** offset just past the call (or the member access) */
  end: number;
}

export interface Chain {
  root: string;
  links: ChainLink[];
}

/** Strips await, optional-chain, non-null and void wrappers. */
export function unwrap(node: TSESTree.Node): TSESTree.Node {
  let current = node;
  for (;;) {
    if (current.type === AST_NODE_TYPES.AwaitExpression) current = current.argument;
    else if (current.type === AST_NODE_TYPES.ChainExpression) current = current.expression;
    else if (current.type === AST_NODE_TYPES.TSNonNullExpression) current = current.expression;
    else if (current.type === AST_NODE_TYPES.UnaryExpression && current.operator === "void") current = current.argument;
    else return current;
  }
}

/**
 * Flattens `page.getByRole('x').first().click()` into its root identifier and
 * the ordered member links. A bare call such as `expect(x)` or `getByText('x')`
 * becomes a link named after the callee, rooted at the same name.
 * Returns null for computed members and other shapes.
 */
export function flattenChain(expression: TSESTree.Node): Chain | null {
  const links: ChainLink[] = [];
  let current: TSESTree.Node = unwrap(expression);

  for (;;) {
    if (current.type === AST_NODE_TYPES.CallExpression) {
      const callee = current.callee;
      if (
        callee.type === AST_NODE_TYPES.MemberExpression &&
        !callee.computed &&
        callee.property.type === AST_NODE_TYPES.Identifier
      ) {
        links.unshift({
          name: callee.property.name,
          args: current.arguments,
          start: callee.property.range[0],
          end: current.range[1],
        });
        current = unwrap(callee.object);
        continue;
      }
      if (callee.type === AST_NODE_TYPES.Identifier) {
        links.unshift({ name: callee.name, args: current.arguments, start: callee.range[0], end: current.range[1] });
        return { root: callee.name, links };
      }
      return null;
    }
    if (
      current.type === AST_NODE_TYPES.MemberExpression &&
      !current.computed &&
      current.property.type === AST_NODE_TYPES.Identifier
    ) {
      links.unshift({ name: current.property.name, args: null, start: current.property.range[0], end: current.range[1] });
      current = unwrap(current.object);
      continue;
    }
    if (current.type === AST_NODE_TYPES.Identifier) return { root: current.name, links };
    if (current.type === AST_NODE_TYPES.ThisExpression) {
      // this.page.click(...) → actor "this.page"
      const [first, ...rest] = links;
      if (first && first.args === null) return { root: `this.${first.name}`, links: rest };
      return null;
    }
    return null;
  }
}
