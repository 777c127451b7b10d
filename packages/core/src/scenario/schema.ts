/**
 * Scenario Schema
 *
 * zod schema for scenario documents. Validation happens before anything
 * runs: step ids are unique, regexes compile and entry criteria parse.
 */

import { z } from 'zod';

import type { DiagnosticRule, JsonValue, OutputAnalysisRule } from '../analysis/types.js';
import { SUPPORTED_SCHEMA_VERSIONS } from '../constants.js';
import { compileExpression } from '../expression/evaluator.js';
import { errorMessage } from '../errors.js';

import type { DockerSpec, StepDefinition } from './types.js';

// =============================================================================
// Building Blocks
// =============================================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const identifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const regexSchema = z.string().min(1).refine(compiles, (pattern) => ({ message: `Invalid regex: ${pattern}` }));

const expressionSchema = z.string().superRefine((expression, ctx) => {
  try {
    compileExpression(expression);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
  }
});

const criterionSchema = z
  .union([expressionSchema, z.object({ expression: expressionSchema })])
  .transform((criterion) => (typeof criterion === 'string' ? criterion : criterion.expression));

const entryCriteriaSchema = z
  .union([criterionSchema.transform((c) => [c]), z.array(criterionSchema)])
  .default([]);

const outputAnalysisSchema = z
  .object({ regex: regexSchema, parameter_to_set: z.string().min(1) })
  .transform((rule): OutputAnalysisRule => ({ regex: rule.regex, parameterToSet: rule.parameter_to_set }));

const diagnosticRuleSchema = z
  .object({
    search_string: z.string().min(1).optional(),
    diagnostic_search_string: regexSchema.optional(),
    diagnostic_result_code: identifierSchema.optional(),
    parameter_to_set: z.string().min(1).optional(),
    terminal: z.boolean().optional(),
    severity: z.enum(['error', 'warning', 'info']).optional(),
  })
  .superRefine((rule, ctx) => {
    const literal = rule.search_string !== undefined;
    const regex = rule.diagnostic_search_string !== undefined;
    if (literal === regex) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Rule needs exactly one of search_string or diagnostic_search_string',
      });
    }
    if (literal && rule.diagnostic_result_code === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['diagnostic_result_code'],
        message: 'search_string requires diagnostic_result_code',
      });
    }
    if (regex && rule.parameter_to_set === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parameter_to_set'],
        message: 'diagnostic_search_string requires parameter_to_set',
      });
    }
  })
  .transform(
    (rule): DiagnosticRule => ({
      searchString: rule.search_string,
      diagnosticSearchString: rule.diagnostic_search_string,
      diagnosticResultCode: rule.diagnostic_result_code,
      parameterToSet: rule.parameter_to_set,
      terminal: rule.terminal,
      severity: rule.severity,
    })
  );

const containerNameSchema = z
  .string()
  .regex(/^[a-zA-Z0-9_.-]+$/, 'container_name may only contain letters, digits, dots, underscores and hyphens');

const connectionTypeSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['local', 'ssh', 'redfish']));

// =============================================================================
// Steps
// =============================================================================

const baseStepShape = {
  step_id: identifierSchema,
  step_name: z.string().min(1),
  description: z.string().optional(),
  connection: z.string().min(1).optional(),
  connection_type: connectionTypeSchema.optional(),
  entry_criteria: entryCriteriaSchema,
  loop: z.number().int().positive().default(1),
  duration: z.number().positive().optional(),
  continue: z.boolean().default(false),
  use_sudo: z.boolean().default(false),
};

const commandStepSchema = z.object({
  ...baseStepShape,
  step_type: z.literal('command_execution'),
  step_command: z.string().min(1),
  container_name: containerNameSchema.optional(),
  validator_type: z.enum(['json', 'text', 'regex', 'text_regex', 'exact']).default('text'),
  expected_output: jsonValueSchema.optional(),
  expected_output_path: z.string().min(1).optional(),
  output_analysis: z.array(outputAnalysisSchema).default([]),
  diagnostic_analysis: z.array(diagnosticRuleSchema).default([]),
});

const logAnalysisStepSchema = z.object({
  ...baseStepShape,
  step_type: z.literal('log_analysis'),
  log_analysis_path: z.string().min(1),
  diagnostic_analysis: z.array(diagnosticRuleSchema).min(1),
});

const invokeStepSchema = z.object({
  ...baseStepShape,
  step_type: z.literal('invoke_scenario'),
  scenario_path: z.string().min(1),
});

const stepSchema = z
  .discriminatedUnion('step_type', [commandStepSchema, logAnalysisStepSchema, invokeStepSchema])
  .transform((step): StepDefinition => {
    const base = {
      stepId: step.step_id,
      stepName: step.step_name,
      description: step.description,
      connection: step.connection ?? 'local',
      connectionType:
        step.connection_type ?? (step.connection === undefined || step.connection.toLowerCase() === 'local' ? 'local' : 'ssh'),
      entryCriteria: step.entry_criteria,
      loop: step.loop,
      duration: step.duration,
      continueOnFailure: step.continue,
      useSudo: step.use_sudo,
    } as const;

    switch (step.step_type) {
      case 'command_execution':
        return {
          ...base,
          stepType: 'command_execution',
          command: step.step_command,
          containerName: step.container_name,
          validatorType: step.validator_type,
          expectedOutput: step.expected_output,
          expectedOutputPath: step.expected_output_path,
          outputAnalysis: step.output_analysis,
          diagnosticAnalysis: step.diagnostic_analysis,
        };
      case 'log_analysis':
        return {
          ...base,
          stepType: 'log_analysis',
          logAnalysisPath: step.log_analysis_path,
          diagnosticAnalysis: step.diagnostic_analysis,
        };
      case 'invoke_scenario':
        return { ...base, stepType: 'invoke_scenario', scenarioPath: step.scenario_path };
    }
  });

// =============================================================================
// Document
// =============================================================================

const dockerSchema = z
  .object({
    container_name: containerNameSchema,
    image: z.string().optional(),
    connection: z.string().optional(),
  })
  .transform(
    (docker): DockerSpec => ({
      containerName: docker.container_name,
      image: docker.image,
      connection: docker.connection,
    })
  );

const stepsSchema = z
  .array(stepSchema)
  .min(1, 'Scenario must have at least one step')
  .superRefine((steps, ctx) => {
    const seen = new Set<string>();
    steps.forEach((step, index) => {
      // Steps with their own issues arrive untransformed
      if (typeof step.stepId !== 'string') return;
      if (seen.has(step.stepId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'step_id'],
          message: `Duplicate step_id "${step.stepId}"`,
        });
      }
      seen.add(step.stepId);
    });
  });

/**
 * Scenario document schema.
 */
export const scenarioDocumentSchema = z.object({
  test_scenario: z.object({
    test_id: identifierSchema,
    test_name: z.string().min(1),
    test_group: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).default([]),
    schema_version: z
      .string()
      .refine((version) => SUPPORTED_SCHEMA_VERSIONS.some((supported) => supported === version), (version) => ({
        message: `Unsupported schema_version "${version}" (supported: ${SUPPORTED_SCHEMA_VERSIONS.join(', ')})`,
      }))
      .optional(),
    docker: z.array(dockerSchema).default([]),
    test_steps: stepsSchema,
  }),
});

export type ScenarioDocument = z.output<typeof scenarioDocumentSchema>;

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
