/**
 * Process management utilities
 */

/** The part of a ChildProcess that termination needs */
export interface KillableProcess {
  exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: () => void): unknown;
}

/**
 * Send SIGTERM, then SIGKILL if the process is still running after
 * `gracePeriodMs`. `exitCode` is checked rather than `killed`, which only
 * records that a signal was sent.
 */
export function killWithEscalation(proc: KillableProcess, gracePeriodMs = 3000): void {
  proc.kill('SIGTERM');
  const timer = setTimeout(() => {
    if (proc.exitCode === null) {
      proc.kill('SIGKILL');
    }
  }, gracePeriodMs);
  timer.unref();
  proc.once('exit', () => clearTimeout(timer));
}
