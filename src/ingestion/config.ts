// src/ingestion/config.ts

import { z } from "zod";
import { readJsonFile } from "../utils/file-utils";
import { ConfigError } from "../blueprint/errors";

const strategyEnum = z.enum(["testid", "role", "text", "css", "xpath", "placeholder"]);

const PageDetectionSchema = z
  .object({
    url_change_creates_new_page: z.boolean().default(true),
    modal_detection: z.enum(["component", "page"]).default("component"),
    tab_switch_creates_new_page: z.boolean().default(false),
    url_change_threshold: z.enum(["full", "path", "domain"]).default("path"),
  })
  .default({});

const ComponentDetectionSchema = z
  .object({
    min_appearances_for_component: z.number().int().min(1).default(2),
    detect_headers: z.boolean().default(true),
    detect_footers: z.boolean().default(true),
    detect_modals: z.boolean().default(true),
    detect_navigation: z.boolean().default(true),
  })
  .default({});

const MethodGroupingSchema = z
  .object({
    max_actions_per_method: z.number().int().min(1).default(8),
    group_related_fills: z.boolean().default(true),
    separate_navigation: z.boolean().default(true),
    separate_assertions: z.boolean().default(true),
  })
  .default({});

const SelectorAnalysisSchema = z
  .object({
    suggest_improvements: z.boolean().default(true),
    preferred_strategies: z
      .array(strategyEnum)
      .default(["testid", "role", "text", "placeholder", "css", "xpath"]),
    flag_fragile_selectors: z.boolean().default(true),
  })
  .default({});

// Unknown keys are stripped (zod's default object behaviour), never rejected.
export const AnalyzerConfigSchema = z
  .object({
    page_detection: PageDetectionSchema,
    component_detection: ComponentDetectionSchema,
    method_grouping: MethodGroupingSchema,
    selector_analysis: SelectorAnalysisSchema,
  })
  .default({});

export type AnalyzerConfig = z.output<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;
export type PageDetectionConfig = AnalyzerConfig["page_detection"];
export type ComponentDetectionConfig = AnalyzerConfig["component_detection"];
export type MethodGroupingConfig = AnalyzerConfig["method_grouping"];
export type SelectorAnalysisConfig = AnalyzerConfig["selector_analysis"];

/**
 * Validates a configuration object and fills every missing option with its default.
 * Throws ConfigError when a recognized option has the wrong type or range.
 */
export function resolveConfig(input?: unknown): AnalyzerConfig {
  const result = AnalyzerConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** Reads a JSON configuration file and resolves it. */
export function loadConfigFile(filePath: string): AnalyzerConfig {
  const read = readJsonFile(filePath);
  if (!read.ok) {
    const problem = read.reason === "missing" ? "Cannot read configuration file" : "Configuration file is not valid JSON";
    throw new ConfigError(`${problem}: ${filePath}`, []);
  }
  return resolveConfig(read.value);
}
