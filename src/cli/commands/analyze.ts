import * as fs from "fs";
import * as path from "path";
import { findFiles } from "../../utils/file-utils";
import { isTestFile, readScriptFile, SCRIPT_EXTENSIONS } from "../../analysis/parser";
import { ANALYZER_VERSION, buildBlueprint } from "../../blueprint/builder";
import { loadConfigFile, resolveConfig, type AnalyzerConfig } from "../../ingestion/config";
import { printSummary, writeBlueprint } from "../../output/reporter";
import { debug, error as logError, header, log, spinner, step, success, warn } from "../../utils/logger";

export interface AnalyzeCommandOptions {
  output: string;
  config?: string;
  stdout?: boolean;
}

/** --config wins over $POM_BLUEPRINT_CONFIG; neither means defaults. */
export function loadCommandConfig(configPath: string | undefined): AnalyzerConfig {
  const file = configPath ?? process.env["POM_BLUEPRINT_CONFIG"];
  return file ? loadConfigFile(path.resolve(file)) : resolveConfig();
}

/** A file is analyzed as given; a directory contributes its test scripts. */
export function collectScripts(target: string): string[] {
  const abs = path.resolve(target);
  if (fs.statSync(abs).isDirectory()) {
    return findFiles(abs, SCRIPT_EXTENSIONS, isTestFile);
  }
  return [abs];
}

/** "login.spec.ts" → "login.spec" */
export function blueprintName(filePath: string): string {
  return path.basename(filePath).replace(/\.[cm]?[jt]sx?$/, "");
}

// ─── Main export ──────────────────────────────────────────────────────────────

export function analyzeCommand(target: string, options: AnalyzeCommandOptions): void {
  let config: AnalyzerConfig;
  let scripts: string[];
  try {
    config = loadCommandConfig(options.config);
    scripts = collectScripts(target);
  } catch (err) {
    logError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  // JSON goes to stdout untouched by headers or spinners.
  if (options.stdout) {
    let failed = false;
    for (const file of scripts) {
      try {
        const script = readScriptFile(file);
        process.stdout.write(JSON.stringify(buildBlueprint(script.code, { source: script.source, config }), null, 2) + "\n");
      } catch (err) {
        failed = true;
        logError(`${file}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    if (failed) process.exit(1);
    return;
  }

  header(ANALYZER_VERSION);
  const outputDir = path.resolve(options.output);
  debug(`config: ${JSON.stringify(config)}`);

  if (scripts.length === 0) {
    warn(`No test scripts found under ${target}`);
    return;
  }

  let failures = 0;
  for (const [index, file] of scripts.entries()) {
    step(index + 1, scripts.length, path.relative(process.cwd(), file) || file);
    const s = spinner("Analyzing...");
    try {
      const script = readScriptFile(file);
      const blueprint = buildBlueprint(script.code, { source: script.source, config });
      const written = writeBlueprint(outputDir, blueprintName(file), blueprint);
      s.succeed(`Blueprint written to ${written}`);
      printSummary(blueprint);
    } catch (err) {
      failures++;
      s.fail(err instanceof Error ? err.message : String(err));
    }
  }

  if (failures > 0) {
    logError(`${failures} of ${scripts.length} script(s) could not be analyzed`);
    process.exit(1);
  }
  success(`${scripts.length} blueprint(s) written to ${outputDir}`);
  log("Review recommendations.quality before generating page objects.");
}
