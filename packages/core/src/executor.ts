import { spawn } from 'node:child_process';

const MAX_CAPTURE_BYTES = 1024 * 1024;
const TIMEOUT_EXIT_CODE = 124;
const KILL_GRACE_MS = 5_000;

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Pause between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  startedAt: string;
  finishedAt: string;
}

/** Runs workload commands. Swapped for a fake in tests. */
export interface CommandExecutor {
  exec(argv: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

interface CaptureState {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
}

function capture(state: CaptureState, chunk: Buffer): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) state.chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  state.chunks.push(chunk);
  state.bytes = next;
}

function collect(state: CaptureState, label: string): string {
  return Buffer.concat(state.chunks).toString('utf8') + (state.truncated ? `\n[${label} truncated]\n` : '');
}

/**
 * Spawns commands on this host without a shell. Output is captured up to 1 MiB
 * per stream; a command outliving `timeoutMs` is sent SIGTERM, then SIGKILL
 * if it is still running after `killGraceMs`, and reports exit code 124.
 */
export class LocalProcessExecutor implements CommandExecutor {
  async exec(argv: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (!command) throw new Error('command argv must be non-empty');
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    });

    const stdout: CaptureState = { chunks: [], bytes: 0, truncated: false };
    const stderr: CaptureState = { chunks: [], bytes: 0, truncated: false };
    child.stdout.on('data', (chunk: Buffer) => capture(stdout, chunk));
    child.stderr.on('data', (chunk: Buffer) => capture(stderr, chunk));

    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;
    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
            killTimer = setTimeout(() => child.kill('SIGKILL'), options.killGraceMs ?? KILL_GRACE_MS);
          }, options.timeoutMs)
        : undefined;

    try {
      const code = await new Promise<number | null>((resolve, reject) => {
        child.on('error', reject);
        child.on('close', (exitCode: number | null) => resolve(exitCode));
      });
      const exitCode = timedOut ? TIMEOUT_EXIT_CODE : (code ?? 1);
      return {
        exitCode,
        stdout: collect(stdout, 'stdout'),
        stderr: collect(stderr, 'stderr'),
        timedOut,
        startedAt,
        finishedAt: new Date().toISOString(),
      };
    } finally {
      clearTimeout(timer);
      clearTimeout(killTimer);
    }
  }
}
