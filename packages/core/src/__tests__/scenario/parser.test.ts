/**
 * Scenario Parser Tests
 */

import { describe, it, expect } from 'vitest';

import { ScenarioCache } from '../../scenario/cache.js';
import { ParseError, SchemaError, parseScenario } from '../../scenario/parser.js';

const VALID_SCENARIO = `
test_scenario:
  test_id: BMC-001
  test_name: Power state check
  test_group: bmc
  tags: [power, smoke]
  test_steps:
    - step_id: 1
      step_name: Read power state
      step_type: command_execution
      connection: Inband
      connection_type: Redfish
      step_command: /redfish/v1/Systems/1
      validator_type: json
      expected_output: {PowerState: "On"}
      output_analysis:
        - regex: '"PowerState":\\s*"(\\w+)"'
          parameter_to_set: power
    - step_id: check
      step_name: Gate on power
      step_type: command_execution
      entry_criteria: power == "On"
      step_command: echo ok
`;

function stepsYaml(steps: string): string {
  return `
test_scenario:
  test_id: T-1
  test_name: Test
  test_steps:
${steps}`;
}

function schemaIssues(content: string): string[] {
  try {
    parseScenario(content, 'doc.yaml');
  } catch (error) {
    if (error instanceof SchemaError) return error.issues;
    throw error;
  }
  throw new Error('expected a schema error');
}

describe('parseScenario', () => {
  it('should parse a valid scenario', () => {
    const scenario = parseScenario(VALID_SCENARIO, 'bmc/power.yaml');

    expect(scenario).toMatchObject({
      testId: 'BMC-001',
      testName: 'Power state check',
      testGroup: 'bmc',
      tags: ['power', 'smoke'],
      docker: [],
      source: { file: 'bmc/power.yaml' },
    });
    expect(scenario.fingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should normalize step fields and apply defaults', () => {
    const [read, check] = parseScenario(VALID_SCENARIO).steps;

    expect(read).toEqual({
      stepId: '1',
      stepName: 'Read power state',
      description: undefined,
      connection: 'Inband',
      connectionType: 'redfish',
      entryCriteria: [],
      loop: 1,
      duration: undefined,
      continueOnFailure: false,
      useSudo: false,
      stepType: 'command_execution',
      command: '/redfish/v1/Systems/1',
      containerName: undefined,
      validatorType: 'json',
      expectedOutput: { PowerState: 'On' },
      expectedOutputPath: undefined,
      outputAnalysis: [{ regex: '"PowerState":\\s*"(\\w+)"', parameterToSet: 'power' }],
      diagnosticAnalysis: [],
    });
    expect(check).toMatchObject({
      stepId: 'check',
      connection: 'local',
      connectionType: 'local',
      entryCriteria: ['power == "On"'],
      validatorType: 'text',
    });
  });

  it('should default a named connection to ssh', () => {
    const [step] = parseScenario(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: command_execution
      connection: Inband
      step_command: uname -r`)
    ).steps;

    expect(step).toMatchObject({ connection: 'Inband', connectionType: 'ssh' });
  });

  it('should accept entry criteria objects', () => {
    const [step] = parseScenario(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: invoke_scenario
      scenario_path: ./child.yaml
      entry_criteria:
        - expression: temp > 80
        - ready == true`)
    ).steps;

    expect(step).toMatchObject({
      stepType: 'invoke_scenario',
      scenarioPath: './child.yaml',
      entryCriteria: ['temp > 80', 'ready == true'],
    });
  });

  // ===========================================================================
  // Rejections
  // ===========================================================================

  it('should reject a document without test_scenario', () => {
    expect(() => parseScenario('name: not a scenario')).toThrow(
      'Document must have a "test_scenario" object at <inline>:?'
    );
  });

  it('should reject invalid YAML', () => {
    expect(() => parseScenario('test_scenario: [unclosed', 'bad.yaml')).toThrow(ParseError);
    expect(() => parseScenario('test_scenario: [unclosed', 'bad.yaml')).toThrow(/^Invalid YAML: /);
  });

  it('should reject duplicate step ids', () => {
    const issues = schemaIssues(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: command_execution
      step_command: echo 1
    - step_id: a
      step_name: B
      step_type: command_execution
      step_command: echo 2`)
    );

    expect(issues).toEqual(['test_scenario.test_steps.1.step_id: Duplicate step_id "a"']);
  });

  it('should reject malformed entry criteria before anything runs', () => {
    const issues = schemaIssues(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: command_execution
      entry_criteria: temp >
      step_command: echo 1`)
    );

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^test_scenario\.test_steps\.0\.entry_criteria: Unexpected end of expression/);
  });

  it('should reject regexes that do not compile', () => {
    const issues = schemaIssues(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: command_execution
      step_command: echo 1
      output_analysis:
        - regex: '(unclosed'
          parameter_to_set: x`)
    );

    expect(issues).toEqual(['test_scenario.test_steps.0.output_analysis.0.regex: Invalid regex: (unclosed']);
  });

  it('should require a code for literal diagnostic rules', () => {
    const issues = schemaIssues(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: log_analysis
      log_analysis_path: /var/log/bmc.log
      diagnostic_analysis:
        - search_string: FATAL`)
    );

    expect(issues).toEqual([
      'test_scenario.test_steps.0.diagnostic_analysis.0.diagnostic_result_code: search_string requires diagnostic_result_code',
    ]);
  });

  it('should reject unsafe container names', () => {
    const issues = schemaIssues(
      stepsYaml(`    - step_id: a
      step_name: A
      step_type: command_execution
      container_name: "x; rm -rf /"
      step_command: echo 1`)
    );

    expect(issues).toEqual([
      'test_scenario.test_steps.0.container_name: container_name may only contain letters, digits, dots, underscores and hyphens',
    ]);
  });

  it('should reject an unsupported schema_version', () => {
    const issues = schemaIssues(`
test_scenario:
  test_id: T-1
  test_name: Test
  schema_version: v99
  test_steps:
    - step_id: a
      step_name: A
      step_type: command_execution
      step_command: echo 1`);

    expect(issues).toEqual([
      'test_scenario.schema_version: Unsupported schema_version "v99" (supported: scenario_recipe_schema_0.7)',
    ]);
  });

  it('should reject a scenario without steps', () => {
    const issues = schemaIssues(`
test_scenario:
  test_id: T-1
  test_name: Test
  test_steps: []`);

    expect(issues).toEqual(['test_scenario.test_steps: Scenario must have at least one step']);
  });
});

describe('ScenarioCache', () => {
  it('should reuse a parse of identical content from the same file', () => {
    const cache = new ScenarioCache();

    const first = cache.parse(VALID_SCENARIO, '/scenarios/power.yaml');
    const second = cache.parse(VALID_SCENARIO, '/scenarios/power.yaml');

    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('should parse again when the content or file differs', () => {
    const cache = new ScenarioCache();

    const first = cache.parse(VALID_SCENARIO, '/scenarios/power.yaml');
    const moved = cache.parse(VALID_SCENARIO, '/scenarios/copy.yaml');
    const edited = cache.parse(VALID_SCENARIO.replace('BMC-001', 'BMC-002'), '/scenarios/power.yaml');

    expect(moved).not.toBe(first);
    expect(edited.testId).toBe('BMC-002');
    expect(cache.stats()).toEqual({ hits: 0, misses: 3, size: 3 });
  });

  it('should not cache documents that fail the schema gate', () => {
    const cache = new ScenarioCache();

    expect(() => cache.parse('test_scenario: {}', '/scenarios/empty.yaml')).toThrow(SchemaError);
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, size: 0 });
  });
});
