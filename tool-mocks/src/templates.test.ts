import { describe, expect, it } from 'vitest';
import { parse } from 'yaml';

import {
  BURN_IN_DISCOVERY,
  MULTIVERSION_CONFIG,
  SUITE_CONFIG,
  discoveredTestPath,
  renderTestDiscovery
} from './templates.js';

describe('BURN_IN_DISCOVERY', () => {
  it('lists the three burn_in tasks, each with the single test file', () => {
    expect(parse(BURN_IN_DISCOVERY)).toEqual({
      discovered_tasks: [
        { task_name: 'jsCore', test_list: ['tests/data/tests/test_0.js'] },
        { task_name: 'sharding_jscore_passthrough', test_list: ['tests/data/tests/test_0.js'] },
        { task_name: 'replica_sets_jscore_passthrough', test_list: ['tests/data/tests/test_0.js'] }
      ]
    });
  });

  it('starts with the top-level key and ends with one newline', () => {
    expect(BURN_IN_DISCOVERY.startsWith('discovered_tasks:\n- task_name: jsCore\n')).toBe(true);
    expect(BURN_IN_DISCOVERY.endsWith('  - tests/data/tests/test_0.js\n')).toBe(true);
  });
});

describe('MULTIVERSION_CONFIG', () => {
  it('matches the file format the task generator reads', () => {
    expect(MULTIVERSION_CONFIG).toBe(
      'last_versions:\n' +
        '- last_lts\n' +
        '- last_continuous\n' +
        'requires_fcv_tag: requires_fcv_51,requires_fcv_52,requires_fcv_53,requires_fcv_60\n'
    );
  });
});

describe('SUITE_CONFIG', () => {
  it('describes a js_test suite on a three node replica set', () => {
    const config: unknown = parse(SUITE_CONFIG);

    expect(config).toEqual({
      description: 'Auth tests run against a three node replica set',
      matrix_suite: false,
      test_kind: 'js_test',
      selector: {
        roots: ['jstests/auth/*.js'],
        exclude_files: ['jstests/auth/repl.js']
      },
      executor: {
        config: {
          shell_options: {
            global_vars: { TestData: { roleGraphInvalidationIsFatal: true } },
            nodb: ''
          }
        },
        fixture: {
          class: 'ReplicaSetFixture',
          num_nodes: 3
        }
      }
    });
  });
});

describe('renderTestDiscovery', () => {
  it('lists fifteen tests numbered 0 through 14 by default', () => {
    const output: unknown = parse(renderTestDiscovery());

    expect(output).toEqual({
      suite_name: 'my_suite',
      tests: Array.from({ length: 15 }, (_, index) => `tests/data/tests/test_${index}.js`)
    });
  });

  it('renders the exact text for a short listing', () => {
    expect(renderTestDiscovery(2)).toBe(
      'suite_name: my_suite\n' +
        'tests:\n' +
        '- tests/data/tests/test_0.js\n' +
        '- tests/data/tests/test_1.js\n'
    );
  });

  it('renders an empty listing for zero tests', () => {
    expect(renderTestDiscovery(0)).toBe('suite_name: my_suite\ntests:\n');
  });

  it('rejects negative and fractional counts', () => {
    expect(() => renderTestDiscovery(-1)).toThrow(RangeError);
    expect(() => renderTestDiscovery(1.5)).toThrow('Test count must be a non-negative integer, got 1.5');
  });

  it('builds test paths from the index', () => {
    expect(discoveredTestPath(14)).toBe('tests/data/tests/test_14.js');
  });
});
