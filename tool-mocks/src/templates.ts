/**
 * Canned payloads printed by the stand-ins in place of the real tools.
 *
 * Each payload has no leading blank line and ends with a single newline.
 */

export const BURN_IN_TEST_FILE = 'tests/data/tests/test_0.js';

export const BURN_IN_TASK_NAMES = [
  'jsCore',
  'sharding_jscore_passthrough',
  'replica_sets_jscore_passthrough'
] as const;

export const BURN_IN_DISCOVERY = [
  'discovered_tasks:',
  ...BURN_IN_TASK_NAMES.flatMap(taskName => [
    `- task_name: ${taskName}`,
    '  test_list:',
    `  - ${BURN_IN_TEST_FILE}`
  ]),
  ''
].join('\n');

export const MULTIVERSION_CONFIG_FILE = 'multiversion-config.yml';

export const MULTIVERSION_CONFIG = `last_versions:
- last_lts
- last_continuous
requires_fcv_tag: requires_fcv_51,requires_fcv_52,requires_fcv_53,requires_fcv_60
`;

export const SUITE_CONFIG = `description: Auth tests run against a three node replica set
matrix_suite: false
test_kind: js_test

selector:
  roots:
    - jstests/auth/*.js
  exclude_files:
    - jstests/auth/repl.js

executor:
  config:
    shell_options:
      global_vars:
        TestData:
          roleGraphInvalidationIsFatal: true
      nodb: ''
  fixture:
    class: ReplicaSetFixture
    num_nodes: 3
`;

export const TEST_DISCOVERY_SUITE = 'my_suite';

export const TEST_DISCOVERY_COUNT = 15;

export function discoveredTestPath(index: number): string {
  return `tests/data/tests/test_${index}.js`;
}

/**
 * Render the test-discovery listing: the suite name followed by `count`
 * test paths numbered from 0.
 */
export function renderTestDiscovery(count: number = TEST_DISCOVERY_COUNT): string {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Test count must be a non-negative integer, got ${count}`);
  }

  const lines = [`suite_name: ${TEST_DISCOVERY_SUITE}`, 'tests:'];
  for (let index = 0; index < count; index += 1) {
    lines.push(`- ${discoveredTestPath(index)}`);
  }
  lines.push('');
  return lines.join('\n');
}
