// src/analysis/assertions/assertion-classifier.ts

import type { AssertionPlacement, AssertionType, Statement } from "../../blueprint/types";

const KNOWN_TYPES: AssertionType[] = ["toContainText", "toHaveURL", "toBeVisible", "toHaveValue"];

export function assertionType(matcher: string): AssertionType {
  return KNOWN_TYPES.find((t) => t === matcher) ?? "custom";
}

/** Assertions with the same key have the same shape: type plus selector pattern. */
export function assertionShapeKey(statement: Statement, normalizedSelector: string | null): string {
  const matcher = statement.matcher?.name ?? statement.action_verb ?? "unknown";
  const type = assertionType(matcher);
  const typeKey = type === "custom" ? `custom:${matcher}` : type;
  const subject = normalizedSelector ?? statement.matcher?.subject ?? "value";
  return `${typeKey}|${subject}`;
}

export interface PlacementDecision {
  placement: AssertionPlacement;
  reason: string;
}

/**
 * in_page_object: checks something the interaction right before it changed
 * (the URL, an element's visibility, or the value of the field it touched).
 * separate_method: the same shape recurs two or more times in the script.
 * in_test otherwise.
 */
export function recommendPlacement(
  statement: Statement,
  previous: Statement | null,
  normalizedSelector: string | null,
  previousNormalizedSelector: string | null,
  shapeCount: number
): PlacementDecision {
  const type = assertionType(statement.matcher?.name ?? statement.action_verb ?? "");

  if (previous !== null && previous.kind === "interaction") {
    const verb = previous.action_verb ?? "interaction";
    if (type === "toHaveURL") {
      return { placement: "in_page_object", reason: `verifies the URL change caused by the ${verb} on line ${previous.line_number}` };
    }
    if (type === "toBeVisible") {
      return {
        placement: "in_page_object",
        reason: `verifies the visibility change caused by the ${verb} on line ${previous.line_number}`,
      };
    }
    if (type === "toHaveValue" && normalizedSelector !== null && normalizedSelector === previousNormalizedSelector) {
      return { placement: "in_page_object", reason: `verifies the value entered by the ${verb} on line ${previous.line_number}` };
    }
  }

  if (shapeCount >= 2) {
    return { placement: "separate_method", reason: `the same ${type} check appears ${shapeCount} times` };
  }
  return { placement: "in_test", reason: "test-specific expectation" };
}
