// src/blueprint/errors.ts

/** The script contains no navigation, interaction, wait or assertion statement. */
export class ScriptParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = "ScriptParseError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised when an emitted blueprint breaks one of its own invariants
 * (dangling id, out-of-range score, statement owned twice). Always a bug.
 */
export class BlueprintIntegrityError extends Error {
  constructor(public readonly violations: string[]) {
    super(`Blueprint integrity check failed:\n  - ${violations.join("\n  - ")}`);
    this.name = "BlueprintIntegrityError";
  }
}
