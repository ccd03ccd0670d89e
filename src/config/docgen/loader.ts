/**
 * Generator configuration loader and validator.
 *
 * Validates against the schema with fail-fast behavior and freezes the
 * result so no stage can alter reserved keys mid-run.
 */

import type { ZodIssue } from "zod";
import { DocGenConfigSchema, type DocGenConfig } from "./schema.js";

/**
 * Structured validation error for generator configuration.
 */
export class DocGenConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "DocGenConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Generator configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function freezeConfig(config: DocGenConfig): Readonly<DocGenConfig> {
  Object.freeze(config.reservedSections.typeDocs);
  Object.freeze(config.reservedSections.termDefinitions);
  Object.freeze(config.reservedSections.responseFlags);
  Object.freeze(config.reservedSections);
  Object.freeze(config.layers);
  Object.freeze(config.output);
  return Object.freeze(config);
}

/**
 * Validate and load generator configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen DocGenConfig
 * @throws DocGenConfigError if validation fails
 */
export function loadDocGenConfig(input: unknown): Readonly<DocGenConfig> {
  const result = DocGenConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new DocGenConfigError(
      `Invalid generator configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return freezeConfig(result.data);
}

/**
 * Validate generator configuration without loading.
 */
export function validateDocGenConfig(
  input: unknown
):
  | { success: true; config: DocGenConfig }
  | { success: false; errors: ConfigValidationIssue[] } {
  const result = DocGenConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return { success: false, errors: formatZodIssues(result.error.issues) };
}
