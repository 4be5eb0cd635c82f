import { classifySelector } from "../../analysis/selectors/classifier";
import { scoreSelector, STABILITY_THRESHOLD } from "../../analysis/selectors/fragility";
import { detail, divider, error as logError, fragilityBadge, info, row, section } from "../../utils/logger";
import { loadCommandConfig } from "./analyze";

export function selectorCommand(expression: string, options: { config?: string }): void {
  try {
    const config = loadCommandConfig(options.config);
    const classified = classifySelector(expression);
    const assessment = scoreSelector(classified, config.selector_analysis);

    section("Selector");
    row("Expression", classified.raw);
    row("Normalized", classified.normalized);
    row("Strategy", classified.strategy);
    row("Fragility", fragilityBadge(assessment.fragility_score, STABILITY_THRESHOLD));
    divider();
    for (const signal of assessment.signals) {
      detail(`${signal.weight > 0 ? "+" : ""}${signal.weight}  ${signal.signal}`);
    }
    for (const candidate of assessment.improvement_candidates) {
      info(`${candidate.rendered_selector ?? candidate.strategy}: ${candidate.rationale}`);
    }
  } catch (err) {
    logError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
