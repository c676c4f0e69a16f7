import { join, resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';

import type { LifecyclePhase } from './definitions.js';
import { ConnectivityError, DispatchError } from './errors.js';
import { LocalProcessExecutor } from './executor.js';
import type { CommandExecutor } from './executor.js';
import { localNodeId } from './info.js';
import { createRunLogger } from './logger.js';
import { TcpNodeProbe, isLocalNode, nodeLabel } from './node.js';
import type { NodeProbe } from './node.js';
import { SeededRandom } from './random.js';
import { DEFAULT_PROBE_RETRY, withRetry } from './retry.js';
import { verifySchedule } from './schedule.js';
import type { Load, Schedule, Step } from './schedule.js';
import { getTracer, withSpan } from './telemetry.js';
import type { RetryStrategy, WorkloadOutput } from './types.js';
import { emptyOutput } from './workload.js';
import type { WorkloadBase, WorkloadContext, WorkloadRegistry } from './workload.js';

const tracer = getTracer('@stepload/core');

/** Outputs keyed by `<step>.<load>/<node>/<workload>`, indices 1-based. */
export type ScheduleResult = Record<string, WorkloadOutput>;

export function resultKey(step: number, load: number, node: string, workload: string): string {
  return `${step}.${load}/${nodeLabel(node)}/${workload}`;
}

export interface DispatchRequest {
  phase: LifecyclePhase;
  node: string;
  load: Load;
  outputDir: string;
  signal: AbortSignal;
  output?: WorkloadOutput;
}

/** Deploys and drives a load's phases on a node other than this host. */
export interface RemoteDispatcher {
  dispatch(request: DispatchRequest): Promise<WorkloadOutput | null>;
}

/** Placeholder transport: every remote phase fails with `DispatchError`. */
export class RemoteDispatcherStub implements RemoteDispatcher {
  async dispatch(request: DispatchRequest): Promise<WorkloadOutput | null> {
    throw new DispatchError(
      `Remote ${request.phase} of ${request.load.workload} on node "${request.node}" is not implemented (stub)`,
    );
  }
}

export interface RunOptions {
  registry: WorkloadRegistry;
  random?: SeededRandom;
  probe?: NodeProbe;
  probeRetry?: RetryStrategy;
  dispatcher?: RemoteDispatcher;
  executor?: CommandExecutor;
  localNode?: string;
  /** Root for per-workload output folders. Defaults to `./results`. */
  outputRoot?: string;
  /** Also run each workload's verify phase after teardown. */
  verify?: boolean;
  signal?: AbortSignal;
}

interface Unit {
  load: Load;
  node: string;
  local: boolean;
  key: string;
  outputDir: string;
}

interface RunState {
  options: RunOptions;
  random: SeededRandom;
  executor: CommandExecutor;
  dispatcher: RemoteDispatcher;
  controller: AbortController;
  localNode: string;
  log: Logger;
  // Instances resolved for each load, per node. Loads themselves stay immutable.
  resolved: Map<Load, Map<string, WorkloadBase>>;
  results: ScheduleResult;
}

function allNodes(schedule: Schedule): string[] {
  const nodes = new Set(schedule.info.nodes);
  for (const step of schedule.steps) {
    for (const node of step.info.nodes) nodes.add(node);
    for (const load of step.workloads) {
      for (const node of load.info.nodes) nodes.add(node);
    }
  }
  return [...nodes];
}

async function checkNodes(
  nodes: readonly string[],
  probe: NodeProbe,
  localNode: string,
  strategy: RetryStrategy,
  log: Logger,
  signal: AbortSignal,
): Promise<void> {
  for (const node of nodes) {
    if (isLocalNode(node, localNode)) continue;
    await withRetry(async () => {
      if (!(await probe.isReachable(node, signal))) throw new ConnectivityError(node);
    }, strategy, signal);
    log.debug({ node }, 'Node reachable');
  }
}

function instanceFor(state: RunState, unit: Unit): WorkloadBase {
  const byNode = state.resolved.get(unit.load) ?? new Map<string, WorkloadBase>();
  state.resolved.set(unit.load, byNode);
  const existing = byNode.get(unit.node);
  if (existing) return existing;
  const instance = state.options.registry.resolve(unit.load.workload);
  byNode.set(unit.node, instance);
  return instance;
}

function contextFor(state: RunState, unit: Unit): WorkloadContext {
  return {
    info: unit.load.info,
    node: unit.node,
    random: state.random,
    executor: state.executor,
    outputDir: unit.outputDir,
    signal: state.controller.signal,
    logger: state.log.child({ workload: unit.load.workload, node: nodeLabel(unit.node) }),
  };
}

/**
 * Run one phase for every unit concurrently. The first failure aborts the run
 * signal; siblings are awaited before that failure is rethrown.
 */
async function runPhase(
  state: RunState,
  phase: LifecyclePhase,
  units: readonly Unit[],
  fn: (unit: Unit) => Promise<void>,
): Promise<void> {
  state.controller.signal.throwIfAborted();
  const failures: unknown[] = [];
  await withSpan(tracer, 'schedule.phase', { 'stepload.phase': phase, 'stepload.units': units.length }, async () => {
    const settled = await Promise.allSettled(
      units.map(async (unit) => {
        try {
          await fn(unit);
        } catch (err) {
          if (failures.length === 0) state.controller.abort(err);
          failures.push(err);
          throw err;
        }
      }),
    );
    state.log.debug(
      { phase, settled: settled.length, failed: failures.length },
      'Phase finished',
    );
    if (failures.length > 0) throw failures[0];
  });
}

async function runStep(state: RunState, step: Step, index: number, outputRoot: string): Promise<void> {
  const units: Unit[] = step.workloads.flatMap((load, j) =>
    load.info.nodes.map((node) => ({
      load,
      node,
      local: isLocalNode(node, state.localNode),
      key: resultKey(index, j + 1, node, load.workload),
      outputDir: join(outputRoot, `${index}.${j + 1}-${load.workload}`, nodeLabel(node)),
    })),
  );

  state.random.seed(step.info.seed);
  state.log.info({ step: index, workloads: step.workloads.map((l) => l.workload) }, 'Starting step');

  const dispatch = (phase: LifecyclePhase, unit: Unit, output?: WorkloadOutput) =>
    state.dispatcher.dispatch({
      phase,
      node: unit.node,
      load: unit.load,
      outputDir: unit.outputDir,
      signal: state.controller.signal,
      output,
    });

  await runPhase(state, 'setup', units, async (unit) => {
    if (!unit.local) {
      await dispatch('setup', unit);
      return;
    }
    await instanceFor(state, unit).setup(contextFor(state, unit));
  });

  await runPhase(state, 'run', units, async (unit) => {
    const output = unit.local
      ? await instanceFor(state, unit).run(contextFor(state, unit))
      : await dispatch('run', unit);
    state.results[unit.key] = output ?? emptyOutput(unit.outputDir);
  });

  await runPhase(state, 'teardown', units, async (unit) => {
    if (!unit.local) {
      await dispatch('teardown', unit);
      return;
    }
    await instanceFor(state, unit).teardown(contextFor(state, unit));
  });

  if (state.options.verify) {
    await runPhase(state, 'verify', units, async (unit) => {
      const output = state.results[unit.key] ?? emptyOutput(unit.outputDir);
      if (!unit.local) {
        await dispatch('verify', unit, output);
        return;
      }
      await instanceFor(state, unit).verify(contextFor(state, unit), output);
    });
  }

  state.log.info({ step: index }, 'Step finished');
}

/**
 * Execute a schedule: probe every node, then run the steps strictly in order.
 * Within a step all loads run each phase concurrently and the next phase
 * starts only after every load finished the previous one.
 */
export async function runSchedule(schedule: Schedule, options: RunOptions): Promise<ScheduleResult> {
  verifySchedule(schedule);

  const log = createRunLogger('runner', schedule.info);

  const controller = new AbortController();
  const external = options.signal;
  external?.throwIfAborted();
  const forwardAbort = () => controller.abort(external?.reason);
  external?.addEventListener('abort', forwardAbort, { once: true });

  const localNode = options.localNode ?? localNodeId();
  const state: RunState = {
    options,
    random: options.random ?? new SeededRandom(schedule.info.seed),
    executor: options.executor ?? new LocalProcessExecutor(),
    dispatcher: options.dispatcher ?? new RemoteDispatcherStub(),
    controller,
    localNode,
    log,
    resolved: new Map(),
    results: {},
  };
  const outputRoot = resolve(options.outputRoot ?? 'results');

  try {
    return await withSpan(
      tracer,
      'schedule.run',
      { 'stepload.schedule': schedule.info.name, 'stepload.steps': schedule.steps.length },
      async () => {
        await checkNodes(
          allNodes(schedule),
          options.probe ?? new TcpNodeProbe(undefined, undefined, localNode),
          localNode,
          options.probeRetry ?? DEFAULT_PROBE_RETRY,
          log,
          controller.signal,
        );

        for (const [i, step] of schedule.steps.entries()) {
          if (i > 0 && step.info.delay > 0) {
            log.debug({ seconds: step.info.delay }, 'Waiting before next step');
            await sleep(step.info.delay * 1000, undefined, { signal: controller.signal });
          }
          await withSpan(tracer, 'schedule.step', { 'stepload.step': i + 1 }, () =>
            runStep(state, step, i + 1, outputRoot),
          );
        }

        log.info({ schedule: schedule.info.name, results: Object.keys(state.results).length }, 'Schedule finished');
        return state.results;
      },
    );
  } finally {
    external?.removeEventListener('abort', forwardAbort);
  }
}
