import type { AnalyzerConfig } from "../ingestion/config";

// ─── Statements ───────────────────────────────────────────────────────────────

export type StatementKind =
  | "navigation"
  | "interaction"
  | "wait"
  | "assertion"
  | "structural";

export type InteractionSubtype =
  | "standard"
  | "file_upload"
  | "dialog"
  | "multi_tab";

export interface LiteralArgument {
  kind:
    | "string"
    | "number"
    | "boolean"
    | "regex"
    | "array"
    | "object"
    | "expression";
  value: string;
}

export interface StatementContext {
  in_branch: boolean;
  in_loop: boolean;
  /** Enclosing test / step title, or the hook name for beforeEach & co. */
  test_title: string | null;
}

export interface AssertionMatcher {
  name: string;
  negated: boolean;
  soft: boolean;
  subject: "locator" | "page" | "value";
}

export interface Statement {
  line_number: number;
  end_line: number;
  kind: StatementKind;
  raw_text: string;
  action_verb: string | null;
  selector_expression: string | null;
  literal_arguments: LiteralArgument[];
  target_url: string | null;
  subtype: InteractionSubtype | null;
  actor: string | null;
  matcher: AssertionMatcher | null;
  /** true when a locator chain ends in a method the extractor does not know */
  unsupported: boolean;
  context: StatementContext;
}

// ─── Selectors ────────────────────────────────────────────────────────────────

export type SelectorStrategy =
  | "testid"
  | "role"
  | "text"
  | "css"
  | "xpath"
  | "placeholder";

export interface SelectorDetails {
  role?: string;
  accessible_name?: string;
  exact?: boolean;
  test_id?: string;
  text?: string;
  label?: string;
  placeholder?: string;
  alt_text?: string;
  title?: string;
  tag?: string;
  attributes: Record<string, string>;
  /** Raw string selectors found in the expression (css / xpath / engine strings). */
  fragments: string[];
  /** Chain refinements such as nth(2), first(), filter(...). */
  modifiers: string[];
  /** Number of scoping levels (chained locators plus css/xpath combinators). */
  nesting_depth: number;
}

export interface ClassifiedSelector {
  raw: string;
  normalized: string;
  strategy: SelectorStrategy;
  structured_details: SelectorDetails;
}

export type FragilitySignal =
  | "path_expression"
  | "positional"
  | "placeholder_only"
  | "class_only"
  | "text_only"
  | "deep_nesting"
  | "id_only"
  | "multiple_attributes"
  | "test_id"
  | "role_based"
  | "name_with_type"
  | "aria_attribute"
  | "label_association";

export interface AppliedSignal {
  signal: FragilitySignal;
  weight: number;
}

export interface ImprovementCandidate {
  strategy: SelectorStrategy | "source_change";
  rendered_selector: string | null;
  rationale: string;
  actionable: boolean;
}

export interface FragilityAssessment {
  fragility_score: number;
  signals: AppliedSignal[];
  improvement_candidates: ImprovementCandidate[];
}

export interface SelectorRecord extends ClassifiedSelector, FragilityAssessment {
  id: string;
  used_by: string[];
  line_numbers: number[];
}

// ─── Pages ────────────────────────────────────────────────────────────────────

export type BoundaryEventType =
  | "navigation"
  | "wait_for_url"
  | "history"
  | "modal"
  | "tab_switch"
  | "start_of_input"
  | "end_of_input";

export interface BoundaryEvent {
  type: BoundaryEventType;
  line_number: number | null;
  action_id: string | null;
  url: string | null;
}

export type WaitStrategy =
  | "auto"
  | "fixed_timeout"
  | "url"
  | "load_state"
  | "selector"
  | "network"
  | "event";

export interface WaitBehavior {
  strategy: WaitStrategy;
  timeout_ms: number | null;
  wait_line: number | null;
  anti_pattern: boolean;
}

export interface ParameterSuggestion {
  name: string;
  type: "string" | "number" | "boolean" | "file" | "string[]";
  example_value: string | null;
  source_action_id: string;
  should_be_parameter: boolean;
}

export interface ComponentUsageRef {
  component_id: string;
  instance_index: number;
  position: number;
}

export interface ActionRecord {
  id: string;
  page_id: string;
  line_number: number;
  kind: "navigation" | "interaction" | "wait";
  action_verb: string | null;
  subtype: InteractionSubtype | null;
  raw_text: string;
  selector_id: string | null;
  target_url: string | null;
  literal_arguments: LiteralArgument[];
  parameters: ParameterSuggestion[];
  wait_behavior: WaitBehavior;
  component_usage: ComponentUsageRef | null;
  context: StatementContext;
}

export type AssertionType =
  | "toContainText"
  | "toHaveURL"
  | "toBeVisible"
  | "toHaveValue"
  | "custom";

export type AssertionPlacement = "in_page_object" | "in_test" | "separate_method";

export interface AssertionRecord {
  id: string;
  page_id: string;
  line_number: number;
  type: AssertionType;
  matcher: string;
  negated: boolean;
  raw_text: string;
  selector_id: string | null;
  expected_value: string | null;
  placement_recommendation: AssertionPlacement;
  placement_reason: string;
  context: StatementContext;
}

export interface MethodSuggestion {
  id: string;
  owner_id: string;
  name: string;
  alternatives: string[];
  name_source: "content" | "url" | "verb_noun" | "generic";
  confidence: number;
  action_ids: string[];
  assertion_ids: string[];
  parameters: ParameterSuggestion[];
  complexity: number;
  line_range: { start: number; end: number };
}

export interface PageComponentUsage {
  component_id: string;
  instance_index: number;
  action_ids: string[];
  line_numbers: number[];
}

export interface PageRecord {
  id: string;
  inferred_name: string;
  confidence: number;
  url_pattern: string | null;
  entry_event: BoundaryEvent;
  exit_event: BoundaryEvent;
  boundary_signals: string[];
  line_range: { start: number; end: number };
  actions: ActionRecord[];
  assertions: AssertionRecord[];
  structural_lines: number[];
  suggested_methods: MethodSuggestion[];
  component_usages: PageComponentUsage[];
}

// ─── Components ───────────────────────────────────────────────────────────────

export type ComponentType =
  | "header"
  | "footer"
  | "modal"
  | "navigation"
  | "form"
  | "custom";

export interface ComponentPatternStep {
  action_verb: string;
  selector_template: string;
}

export interface ComponentInstance {
  page_id: string;
  action_ids: string[];
  line_numbers: number[];
}

export interface ComponentRecord {
  id: string;
  inferred_name: string;
  type: ComponentType;
  confidence: number;
  /** Seen on one page only; kept on a strong type signal. */
  provisional: boolean;
  appears_on_page_ids: string[];
  appearance_count: number;
  pattern: ComponentPatternStep[];
  selector_templates: string[];
  instances: ComponentInstance[];
  suggested_methods: MethodSuggestion[];
}

// ─── Sequences ────────────────────────────────────────────────────────────────

export interface SequenceStep {
  ref_id: string;
  kind: "action" | "assertion";
  page_id: string;
  line_number: number;
  method_id: string | null;
  component_id: string | null;
}

export interface ActionSequence {
  id: string;
  name: string;
  test_title: string | null;
  page_ids: string[];
  steps: SequenceStep[];
}

// ─── Selector analysis ────────────────────────────────────────────────────────

export interface DuplicateSelector {
  selector_id: string;
  raw: string;
  occurrence_ids: string[];
  line_numbers: number[];
}

export interface SelectorAnalysis {
  total_selectors: number;
  by_strategy: Record<SelectorStrategy, number>;
  average_fragility: number;
  fragile_selector_ids: string[];
  selectors: SelectorRecord[];
  duplicates: DuplicateSelector[];
}

// ─── Recommendations & warnings ───────────────────────────────────────────────

export type WarningCode =
  | "UNCERTAIN_PAGE_BOUNDARIES"
  | "LOW_CONFIDENCE_BOUNDARY"
  | "PROVISIONAL_COMPONENT"
  | "GENERIC_METHOD_NAME"
  | "UNSUPPORTED_ACTION"
  | "SHARED_LINE_STATEMENT"
  | "UNSUPPORTED_ASSERTION"
  | "PARSE_FALLBACK"
  | "LIMIT_EXCEEDED_ACTIONS"
  | "LIMIT_EXCEEDED_PAGES"
  | "LIMIT_EXCEEDED_COMPONENTS";

export interface AnalysisWarning {
  code: WarningCode;
  message: string;
  line_numbers: number[];
}

export interface Recommendation {
  kind: string;
  severity: "info" | "warning" | "high";
  message: string;
  related_ids: string[];
  line_numbers: number[];
}

export interface Recommendations {
  architectural: Recommendation[];
  refactoring: Recommendation[];
  quality: Recommendation[];
}

// ─── Top-level blueprint ──────────────────────────────────────────────────────

export interface BlueprintMetadata {
  source: string;
  analyzer_version: string;
  total_lines: number;
  total_statements: number;
  structural_statements: number;
  total_actions: number;
  total_assertions: number;
  unique_pages_detected: number;
  total_components: number;
  total_methods: number;
  total_selectors: number;
  config: AnalyzerConfig;
  warnings: AnalysisWarning[];
}

export interface PageObjectBlueprint {
  metadata: BlueprintMetadata;
  pages: PageRecord[];
  components: ComponentRecord[];
  action_sequences: ActionSequence[];
  selector_analysis: SelectorAnalysis;
  recommendations: Recommendations;
}
