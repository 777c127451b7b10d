/**
 * List Commands
 *
 * Print configured targets and discovered scenarios.
 */

import { ConnectionRegistry } from '../../connections/registry.js';
import { ScenarioCache } from '../../scenario/cache.js';
import { getAllTags, scenarioConnections } from '../../scenario/discovery.js';
import type { CliOptions } from '../options.js';
import * as output from '../utils/output.js';
import { createCliLogger, loadCliConfig, loadCliScenarios } from '../utils/session.js';

/**
 * Execute `--list`: the configured connection targets.
 *
 * @returns Exit code
 */
export function listTargetsCommand(options: CliOptions): number {
  const config = loadCliConfig(options, true);

  output.header(`Connection targets (${config.path ?? 'no config file'})`);
  if (config.targets.length === 0) {
    output.dim('  No targets configured.');
    return 0;
  }

  output.table(
    config.targets.map((target) => ({
      Target: target.name,
      Host: target.host ?? '',
      'SSH Port': target.sshPort,
      'Redfish Port': target.redfishPort,
      SSL: target.useSsl ? 'yes' : 'no',
      Auth: target.auth ? 'yes' : 'no',
      Tunnel: target.tunnel ? `${target.tunnel.agentHost ?? '?'}:${target.tunnel.agentPort}` : '',
    }))
  );
  return 0;
}

/**
 * Execute `--list_scenarios` / `--list_scenarios_with_connections`.
 *
 * @returns Exit code; 1 when a scenario document is invalid
 */
export function listScenariosCommand(options: CliOptions, withConnections: boolean): number {
  const logger = createCliLogger(options);
  const { scenarios, errors } = loadCliScenarios(options, new ScenarioCache(), logger);

  output.header(`Scenarios in ${options.test_dir}`);
  if (scenarios.length === 0) {
    output.dim('  No scenarios found.');
    return errors.length > 0 ? 1 : 0;
  }

  if (!withConnections) {
    output.table(
      scenarios.map((scenario) => ({
        'Test ID': scenario.testId,
        'Test Name': scenario.testName,
        'Test Group': scenario.testGroup ?? '',
        Tags: scenario.tags.join(', '),
        Description: output.truncate(scenario.description ?? '', 60),
      }))
    );
    const tags = getAllTags(scenarios);
    if (tags.length > 0) {
      output.dim(`\n  Tags: ${tags.join(', ')}`);
    }
    return errors.length > 0 ? 1 : 0;
  }

  const registry = new ConnectionRegistry({ logger });
  registry.initialize(loadCliConfig(options).targets);

  output.table(
    scenarios.map((scenario) => {
      const references = scenarioConnections(scenario);
      return {
        'Test ID': scenario.testId,
        'Test Name': scenario.testName,
        Connections: references.map((reference) => `${reference.target}/${reference.protocol}`).join(', '),
        Executable: output.statusCell(
          references.every((reference) => registry.isConfigured(reference)) ? 'yes' : 'no'
        ),
      };
    })
  );
  return errors.length > 0 ? 1 : 0;
}
