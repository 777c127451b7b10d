/**
 * Scenario runner wired to in-process connection fakes.
 */

import { ConnectionRegistry } from '../../connections/registry.js';
import { ScenarioRunner, type ScenarioRunnerOptions } from '../../runner/orchestrator.js';
import type { ScenarioDefinition } from '../../scenario/types.js';

import { createFakeFactory, createMockTarget, createOutput, type FakeBehavior } from './fake-connections.js';
import { InMemoryScenarioCache } from './scenarios.js';

export interface MockRunnerOptions extends Partial<Omit<ScenarioRunnerOptions, 'registry' | 'cache'>> {
  local?: FakeBehavior;
  ssh?: FakeBehavior;
  redfish?: FakeBehavior;
  /** Scenarios invoke_scenario steps can load */
  scenarios?: ScenarioDefinition[];
}

/**
 * Behavior answering commands from a table; other commands echo.
 */
export function respondWith(outputs: Record<string, string>): FakeBehavior {
  return { respond: (request) => createOutput(outputs[request.command] ?? request.command) };
}

export function createMockRunner(options: MockRunnerOptions = {}) {
  const { local: localBehavior, ssh: sshBehavior, redfish: redfishBehavior, scenarios, ...runnerOptions } = options;
  const local = createFakeFactory(localBehavior);
  const ssh = createFakeFactory(sshBehavior);
  const redfish = createFakeFactory(redfishBehavior);

  const registry = new ConnectionRegistry({
    factories: { local: local.factory, ssh: ssh.factory, redfish: redfish.factory },
  });
  registry.initialize([createMockTarget()]);

  const cache = new InMemoryScenarioCache(scenarios);
  const runner = new ScenarioRunner({ registry, cache, ...runnerOptions });

  return { runner, registry, cache, local, ssh, redfish };
}
