/**
 * Instruction catalog.
 * Purpose: pick the instruction sequence for a task category and render each step with Handlebars.
 * Assumptions: templates come from config; every catalog has a "default" sequence.
 */

import path from "node:path";

import Handlebars from "handlebars";

import type { InstructionConfig } from "../../../core/config.js";
import { TaskError } from "../../../core/errors.js";
import { formatErrorMessage } from "../../../core/error-format.js";
import { dateStamp } from "../../../core/utils.js";
import type { TaskClassifier } from "../ports.js";
import { buildCandidatePaths } from "../results/result-channel.js";

// =============================================================================
// TYPES
// =============================================================================

export type InstructionCatalogOptions = {
  sets: Record<string, InstructionConfig[]>;
  projectDir: string;
  resultsDir: string;
  defaultTimeoutMs: number;
  today?: () => Date;
};

export type InstructionContext = {
  taskId: string;
  taskText: string;
};

export type RenderedInstruction = {
  step: number;
  totalSteps: number;
  instructionId: number;
  text: string;
  resultPath: string;
  candidatePaths: string[];
  controlPhrase?: string;
  timeoutMs: number;
};

export const DEFAULT_CATEGORY = "default";
const DEFAULT_RESULT_FILE = "{{results_dir}}/result_{{task_id}}_{{step}}.md";

type CompiledInstruction = {
  config: InstructionConfig;
  template: Handlebars.TemplateDelegate;
  resultFile: Handlebars.TemplateDelegate;
};

// =============================================================================
// CATALOG
// =============================================================================

export class InstructionCatalog {
  private readonly compiled = new Map<string, CompiledInstruction[]>();
  private readonly today: () => Date;

  constructor(private readonly options: InstructionCatalogOptions) {
    this.today = options.today ?? (() => new Date());

    for (const [category, steps] of Object.entries(options.sets)) {
      const ordered = [...steps].sort((a, b) => a.instruction_id - b.instruction_id);
      this.compiled.set(
        category,
        ordered.map((config) => ({
          config,
          template: compileTemplate(config.template),
          resultFile: compileTemplate(config.wait_for_file ?? DEFAULT_RESULT_FILE),
        })),
      );
    }

    if (!this.compiled.has(DEFAULT_CATEGORY)) {
      throw new TaskError(`Instruction catalog needs a "${DEFAULT_CATEGORY}" sequence`);
    }
  }

  resolveCategory(category: string): string {
    return this.compiled.has(category) ? category : DEFAULT_CATEGORY;
  }

  stepCount(category: string): number {
    return this.stepsFor(category).length;
  }

  render(category: string, step: number, context: InstructionContext): RenderedInstruction {
    const steps = this.stepsFor(category);
    const entry = steps[step - 1];
    if (!entry) {
      throw new TaskError(`Category ${category} has no instruction step ${step}`);
    }

    const values: Record<string, string | number> = {
      task_name: context.taskText,
      task_description: context.taskText,
      task_id: context.taskId,
      date: dateStamp(this.today()),
      step,
      total_steps: steps.length,
      results_dir: this.options.resultsDir,
      control_phrase: entry.config.control_phrase ?? "",
    };

    try {
      const resultPath = path.resolve(this.options.projectDir, entry.resultFile(values));
      const text = entry.template({ ...values, result_file: resultPath }).trim();

      return {
        step,
        totalSteps: steps.length,
        instructionId: entry.config.instruction_id,
        text,
        resultPath,
        candidatePaths: buildCandidatePaths(resultPath),
        controlPhrase: entry.config.control_phrase,
        timeoutMs: entry.config.timeout_seconds
          ? entry.config.timeout_seconds * 1000
          : this.options.defaultTimeoutMs,
      };
    } catch (err) {
      throw new TaskError(
        `Failed to render instruction ${entry.config.instruction_id} for ${category}: ${formatErrorMessage(err)}`,
        err,
      );
    }
  }

  private stepsFor(category: string): CompiledInstruction[] {
    return this.compiled.get(this.resolveCategory(category)) ?? [];
  }
}

// =============================================================================
// CLASSIFIER
// =============================================================================

export class KeywordTaskClassifier implements TaskClassifier {
  private readonly matchers: Array<{ category: string; patterns: RegExp[] }>;

  constructor(categories: Record<string, string[]>) {
    this.matchers = Object.entries(categories).map(([category, keywords]) => ({
      category,
      patterns: keywords.map((keyword) => new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i")),
    }));
  }

  classify(text: string): string {
    const match = this.matchers.find((matcher) => matcher.patterns.some((p) => p.test(text)));
    return match?.category ?? DEFAULT_CATEGORY;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function compileTemplate(raw: string): Handlebars.TemplateDelegate {
  return Handlebars.compile(raw, { noEscape: true, strict: true });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
