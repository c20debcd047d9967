/**
 * Outcome of a single engine invocation
 */
export interface EngineResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface BuildResult {
  outputPath: string;
  snippetCount: number;
  /** Both engine passes, in order */
  passes: EngineResult[];
}

export interface RenderResult {
  document: string;
  snippetCount: number;
}
