import { describe, expect, it } from 'vitest';

import { buildSchedule } from '@stepload/core';

import { formatResults, formatSchedule } from '../format.js';

describe('formatSchedule', () => {
  it('lists every step and marks loads placed elsewhere', () => {
    const schedule = buildSchedule(
      {
        name: 'Format',
        description: 'format test',
        accelerators: 8,
        timeout: 120,
        seed: 7,
        workloads: ['nst', ['sandstone', { workload: 'cornet', system: 'node-b' }]],
      },
      { localNode: 'test-host' },
    );
    expect(formatSchedule(schedule)).toBe(
      [
        'Schedule "Format": 2 step(s), 3 workload(s), seed 7',
        '  1. nst',
        '  2. sandstone, cornet (node-b)',
      ].join('\n'),
    );
  });
});

describe('formatResults', () => {
  it('aligns keys, exit codes and log paths', () => {
    const text = formatResults({
      '1.1/local/nst': { stdout: '', stderr: '', exitCode: 0, folder: '/out', log: '/out/stepload.log' },
      '2.1/node-b/cornet': { stdout: '', stderr: '', exitCode: 124, folder: null, log: null },
    });
    expect(text.split('\n')).toEqual([
      'RESULT             EXIT  LOG',
      '1.1/local/nst      0     /out/stepload.log',
      '2.1/node-b/cornet  124   -',
    ]);
  });

  it('says so when there is nothing to show', () => {
    expect(formatResults({})).toBe('No results');
  });
});
