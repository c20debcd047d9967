/**
 * Deck Builder
 *
 * collect snippets → render document → write it to a working directory →
 * run the engine twice → move the artifact out → remove the working directory.
 */

import { writeFile } from 'node:fs/promises';
import { basename, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { DeckConfig } from '../config/index.js';
import { loadTemplate, renderDocument } from '../render/template.js';
import { collectSnippets } from '../snippets/collector.js';
import type { BuildResult, EngineResult, RenderResult } from '../types/index.js';
import { BuildConfigError, CompileError, errorMessage } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import {
  buildEngineArgs,
  createSpawnEngineRunner,
  describeResult,
  type EngineRunner,
} from './engine.js';
import { moveArtifact, withWorkDir } from './workdir.js';

/** Extension of the intermediate document handed to the engine */
export const SOURCE_EXTENSION = '.tex';

/** The second pass resolves references the first one could not */
export const ENGINE_PASSES = 2;

export interface RenderDeckOptions {
  textDir: string;
  templatePath: string;
  logger?: Logger;
}

export interface BuildDeckOptions {
  textDir: string;
  outputPath: string;
  config: DeckConfig;
  logger?: Logger;
  /** Defaults to a runner that spawns `config.engine` with inherited stdio */
  runner?: EngineRunner;
}

/**
 * Output file name without its extension (`slides/deck.pdf` -> `deck`)
 */
export function outputStem(outputPath: string): string {
  const name = basename(outputPath);
  return basename(name, extname(name));
}

/**
 * True when `path` is `dir` itself or somewhere below it (both absolute)
 */
export function isSameOrInside(dir: string, path: string): boolean {
  const rel = relative(dir, path);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * Reject path combinations that would make the build destroy its own inputs or output.
 *
 * The working directory is removed recursively after every build, so it must not
 * hold the snippet directory or the output file. An output ending in the source
 * extension would be the generated document itself, not the engine's artifact.
 */
export function assertBuildPaths(textDir: string, outputPath: string, workDir: string): void {
  if (isSameOrInside(workDir, textDir)) {
    throw new BuildConfigError(
      `Working directory ${workDir} contains the snippet directory ${textDir}; it is removed after every build`,
      workDir
    );
  }
  if (isSameOrInside(workDir, outputPath)) {
    throw new BuildConfigError(
      `Working directory ${workDir} contains the output ${outputPath}; it is removed after every build`,
      workDir
    );
  }
  if (extname(outputPath) === SOURCE_EXTENSION) {
    throw new BuildConfigError(
      `Output ${outputPath} has the ${SOURCE_EXTENSION} extension of the generated source`,
      outputPath
    );
  }
}

/**
 * Collect snippets and produce the rendered document, without running the engine
 */
export async function renderDeck(options: RenderDeckOptions): Promise<RenderResult> {
  const logger = options.logger ?? silentLogger;

  const snippets = await collectSnippets(options.textDir, { logger: logger.child('collector') });
  const template = await loadTemplate(options.templatePath);
  const document = renderDocument(snippets, template, options.templatePath);
  logger.debug(`Rendered document: ${document.length} chars from ${options.templatePath}`);

  return { document, snippetCount: snippets.size };
}

/**
 * Build the deck at `outputPath`.
 *
 * Path conflicts, input and template errors are all raised before the engine is started.
 * Both engine passes always run; only the outcome of the second pass decides
 * whether the build failed.
 */
export async function buildDeck(options: BuildDeckOptions): Promise<BuildResult> {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? createSpawnEngineRunner();

  const outputPath = resolve(options.outputPath);
  const workDirPath = resolve(config.workDir);
  assertBuildPaths(resolve(options.textDir), outputPath, workDirPath);

  const { document, snippetCount } = await renderDeck({
    textDir: options.textDir,
    templatePath: config.templatePath,
    logger,
  });

  const stem = outputStem(outputPath);
  const sourceFileName = `${stem}${SOURCE_EXTENSION}`;
  const engineLogger = logger.child('engine');

  const passes = await withWorkDir(
    workDirPath,
    async (workDir) => {
      const sourcePath = join(workDir, sourceFileName);
      await writeFile(sourcePath, document, 'utf-8');
      logger.info(`Wrote ${sourcePath}`);

      const args = buildEngineArgs(config.engineArgs, sourceFileName);
      const results: EngineResult[] = [];

      for (let pass = 1; pass <= ENGINE_PASSES; pass++) {
        engineLogger.info(`Pass ${pass}/${ENGINE_PASSES}: ${config.engine} ${args.join(' ')}`);
        let result: EngineResult;
        try {
          result = await runner.run(config.engine, args, workDir);
        } catch (error) {
          throw new CompileError(
            `Failed to start ${config.engine}: ${errorMessage(error)}`,
            sourcePath,
            null,
            { cause: error }
          );
        }
        results.push(result);

        if (result.exitCode !== 0) {
          engineLogger.warn(`Pass ${pass}/${ENGINE_PASSES} finished with ${describeResult(result)}`);
        } else {
          engineLogger.debug(`Pass ${pass}/${ENGINE_PASSES} finished with exit code 0`);
        }
      }

      const last = results[results.length - 1];
      if (last.exitCode !== 0) {
        throw new CompileError(
          `${config.engine} failed on ${sourceFileName} (${describeResult(last)})`,
          sourcePath,
          last.exitCode
        );
      }

      await moveArtifact(join(workDir, basename(outputPath)), outputPath);
      logger.info(`Moved artifact to ${outputPath}`);
      return results;
    },
    logger.child('workdir')
  );

  return { outputPath, snippetCount, passes };
}
