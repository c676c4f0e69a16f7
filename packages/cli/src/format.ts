import type { Schedule, ScheduleResult } from '@stepload/core';

/**
 * One line per step; loads placed on other nodes than the schedule's show
 * them in parentheses.
 */
export function formatSchedule(schedule: Schedule): string {
  const nodes = schedule.info.nodes.join(',');
  const total = schedule.steps.reduce((sum, step) => sum + step.workloads.length, 0);
  const lines = [
    `Schedule "${schedule.info.name}": ${schedule.steps.length} step(s), ${total} workload(s), seed ${schedule.info.seed}`,
  ];
  schedule.steps.forEach((step, i) => {
    const loads = step.workloads.map((load) => {
      const placed = load.info.nodes.join(',');
      return placed === nodes ? load.workload : `${load.workload} (${placed})`;
    });
    lines.push(`  ${i + 1}. ${loads.join(', ')}`);
  });
  return lines.join('\n');
}

/** Aligned table of result key, exit code and log path. */
export function formatResults(results: ScheduleResult): string {
  const entries = Object.entries(results);
  if (entries.length === 0) return 'No results';

  const width = Math.max('RESULT'.length, ...entries.map(([key]) => key.length)) + 2;
  const lines = [`${'RESULT'.padEnd(width)}${'EXIT'.padEnd(6)}LOG`];
  for (const [key, output] of entries) {
    lines.push(`${key.padEnd(width)}${String(output.exitCode).padEnd(6)}${output.log ?? '-'}`);
  }
  return lines.join('\n');
}
