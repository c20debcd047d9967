/**
 * Error types for framedeck
 *
 * Every failure in a build surfaces as one of these. Nothing is retried;
 * the CLI reports the message and exits non-zero.
 */

export type FramedeckErrorCode =
  | 'BUILD_CONFIG'
  | 'INPUT_DIRECTORY'
  | 'TEMPLATE_READ'
  | 'TEMPLATE_FORMAT'
  | 'COMPILE_FAILED'
  | 'ARTIFACT_MISSING';

export class FramedeckError extends Error {
  readonly code: FramedeckErrorCode;
  /** File or directory the failure relates to */
  readonly path: string;

  constructor(code: FramedeckErrorCode, message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FramedeckError';
    this.code = code;
    this.path = path;
  }
}

/**
 * Paths given to a build conflict with each other (e.g. output inside the working directory)
 */
export class BuildConfigError extends FramedeckError {
  constructor(message: string, path: string, options?: ErrorOptions) {
    super('BUILD_CONFIG', message, path, options);
    this.name = 'BuildConfigError';
  }
}

/**
 * Input directory (or a snippet inside it) could not be read
 */
export class SnippetDirectoryError extends FramedeckError {
  constructor(message: string, path: string, options?: ErrorOptions) {
    super('INPUT_DIRECTORY', message, path, options);
    this.name = 'SnippetDirectoryError';
  }
}

/**
 * Template is unreadable, or its placeholder is missing or malformed
 */
export class TemplateError extends FramedeckError {
  constructor(
    code: Extract<FramedeckErrorCode, 'TEMPLATE_READ' | 'TEMPLATE_FORMAT'>,
    message: string,
    path: string,
    options?: ErrorOptions
  ) {
    super(code, message, path, options);
    this.name = 'TemplateError';
  }
}

export class CompileError extends FramedeckError {
  readonly exitCode: number | null;

  constructor(message: string, path: string, exitCode: number | null, options?: ErrorOptions) {
    super('COMPILE_FAILED', message, path, options);
    this.name = 'CompileError';
    this.exitCode = exitCode;
  }
}

/**
 * Engine finished but its output file is not where it should be
 */
export class ArtifactError extends FramedeckError {
  constructor(message: string, path: string, options?: ErrorOptions) {
    super('ARTIFACT_MISSING', message, path, options);
    this.name = 'ArtifactError';
  }
}

export function isFramedeckError(error: unknown): error is FramedeckError {
  return error instanceof FramedeckError;
}

/**
 * Node filesystem errors carry a string `code` (ENOENT, EXDEV, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
