// src/index.ts

import { buildBlueprint, type AnalyzeOptions } from "./blueprint/builder";
import { readScriptFile } from "./analysis/parser";
import type { PageObjectBlueprint } from "./blueprint/types";

/** Analyzes a script held in memory. */
export function analyzeScript(code: string, options: AnalyzeOptions = {}): PageObjectBlueprint {
  return buildBlueprint(code, options);
}

/** Reads a script from disk and analyzes it; metadata.source defaults to the path. */
export function analyzeScriptFile(filePath: string, options: AnalyzeOptions = {}): PageObjectBlueprint {
  const script = readScriptFile(filePath);
  return buildBlueprint(script.code, { ...options, source: options.source ?? script.source });
}

export { buildBlueprint, ANALYZER_VERSION, OPERATIONAL_LIMITS, type AnalyzeOptions } from "./blueprint/builder";
export { extractStatements } from "./analysis/statement-extractor";
export { classifySelector, normalizeSelector } from "./analysis/selectors/classifier";
export { scoreSelector, STABILITY_THRESHOLD } from "./analysis/selectors/fragility";
export { detectPageBoundaries } from "./analysis/pages/boundary-detector";
export { detectComponents } from "./analysis/components/component-detector";
export { groupMethods, suggestParameters } from "./analysis/methods/method-grouper";
export { assertionType, recommendPlacement } from "./analysis/assertions/assertion-classifier";
export { buildRecommendations, writeBlueprint } from "./output/reporter";
export { validateBlueprint, assertBlueprintIntegrity, type ValidationResult } from "./output/validator";
export { resolveConfig, loadConfigFile, type AnalyzerConfig, type AnalyzerConfigInput } from "./ingestion/config";
export { ScriptParseError, ConfigError, BlueprintIntegrityError } from "./blueprint/errors";
export type * from "./blueprint/types";
