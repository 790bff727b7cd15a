import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { InvalidParameterError } from "./errors";
import { isHeaderLine, isTimingLine, normalizeNewlines } from "./subtitles";
import { CompiledCorrectionRule, CorrectionRule } from "./types";

export const DEFAULT_RULES_PATH = path.resolve(
  __dirname,
  "..",
  "rules",
  "eye-exam-corrections.json"
);

const correctionRuleSchema = z.object({
  pattern: z.string().min(1),
  replacement: z.string(),
  caseSensitive: z.boolean().optional()
});

const correctionTableSchema = z.object({
  version: z.string().min(1),
  rules: z.array(correctionRuleSchema)
});

export type CorrectionTable = z.infer<typeof correctionTableSchema>;

export function parseCorrectionTable(data: unknown, source = "correction table"): CorrectionTable {
  const result = correctionTableSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new InvalidParameterError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

export function loadCorrectionTable(filePath: string = DEFAULT_RULES_PATH): CorrectionTable {
  const resolved = path.resolve(filePath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidParameterError(`Correction rules ${resolved} are not valid JSON: ${message}`);
  }
  return parseCorrectionTable(data, `correction rules ${resolved}`);
}

export function compileRules(rules: readonly CorrectionRule[]): CompiledCorrectionRule[] {
  return rules.map((rule, index) => {
    try {
      return {
        regex: new RegExp(rule.pattern, rule.caseSensitive ? "g" : "gi"),
        replacement: rule.replacement
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidParameterError(`Correction rule ${index} has an invalid pattern: ${message}`);
    }
  });
}

export function loadCorrectionRules(filePath: string = DEFAULT_RULES_PATH): CompiledCorrectionRule[] {
  return compileRules(loadCorrectionTable(filePath).rules);
}

let defaultRules: CompiledCorrectionRule[] | undefined;

export function defaultCorrectionRules(): CompiledCorrectionRule[] {
  defaultRules ??= loadCorrectionRules(DEFAULT_RULES_PATH);
  return defaultRules;
}

/**
 * Applies every rule in order to a single text line, then collapses whitespace.
 * Blank lines, timing lines and the header line are returned as they are.
 */
export function correctLine(
  line: string,
  rules: readonly CompiledCorrectionRule[] = defaultCorrectionRules()
): string {
  if (!line || isTimingLine(line) || isHeaderLine(line)) {
    return line;
  }
  let corrected = line;
  for (const rule of rules) {
    corrected = corrected.replace(rule.regex, rule.replacement);
  }
  return corrected.replace(/\s+/g, " ").trim();
}

export function correctTranscript(
  text: string,
  rules: readonly CompiledCorrectionRule[] = defaultCorrectionRules()
): string {
  const output: string[] = [];
  for (const line of normalizeNewlines(text).split("\n")) {
    const corrected = correctLine(line, rules);
    // a filler-only line would otherwise become a blank line inside its cue
    if (line.trim() && !corrected) {
      continue;
    }
    output.push(corrected);
  }
  return output.join("\n");
}
