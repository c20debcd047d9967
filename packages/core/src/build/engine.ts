/**
 * Typesetting engine invocation
 */

import { type SpawnOptions, spawn } from 'node:child_process';
import type { EngineResult } from '../types/index.js';

/**
 * Runs one engine pass. The default spawns a real process; tests supply their own.
 */
export interface EngineRunner {
  run(command: string, args: string[], cwd: string): Promise<EngineResult>;
}

export interface SpawnEngineRunnerOptions {
  /** stdio configuration (default: 'inherit') */
  stdio?: SpawnOptions['stdio'];
}

/**
 * Engine runner backed by child_process.spawn
 *
 * Waits for the process to close. There is no timeout: a hung engine hangs the build.
 * Rejects only when the process cannot be started (e.g. the executable is not on PATH).
 */
export function createSpawnEngineRunner(options: SpawnEngineRunnerOptions = {}): EngineRunner {
  const { stdio = 'inherit' } = options;

  return {
    run(command, args, cwd) {
      return new Promise<EngineResult>((resolve, reject) => {
        const child = spawn(command, args, { cwd, stdio });
        child.once('error', reject);
        child.once('close', (exitCode, signal) => resolve({ exitCode, signal }));
      });
    },
  };
}

/**
 * Argument list for one pass: configured engine arguments, then the source file name
 */
export function buildEngineArgs(engineArgs: readonly string[], sourceFileName: string): string[] {
  return [...engineArgs, sourceFileName];
}

export function describeResult(result: EngineResult): string {
  if (result.signal) {
    return `killed by ${result.signal}`;
  }
  return `exit code ${result.exitCode}`;
}
