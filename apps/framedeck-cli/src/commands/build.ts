/**
 * `framedeck build <dir> <output>` - Compile snippets into a slide deck
 */

import { buildDeck, resolveDeckConfig } from '@framedeck/core';
import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../base-command.js';

export default class Build extends BaseCommand {
  static override description =
    'Compile a directory of text snippets (.txt, .TXT, .text, .TEXT) into a slide deck';

  static override examples = [
    '<%= config.bin %> <%= command.id %> ./snippets deck.pdf',
    '',
    '# Custom template, log to a file',
    '<%= config.bin %> <%= command.id %> ./snippets out/deck.pdf -t talk.tex -l build.log -v 2',
    '',
    '# Another engine with extra arguments',
    '<%= config.bin %> <%= command.id %> ./snippets deck.pdf -e lualatex --engine-arg=-halt-on-error',
  ];

  static override args = {
    dir: Args.string({
      description: 'Directory containing the text files; each base name becomes a slide title',
      required: true,
    }),
    output: Args.string({
      description: 'Path of the compiled deck',
      required: true,
    }),
  };

  static override flags = {
    template: Flags.string({
      char: 't',
      description: 'Template file with a single %s placeholder (env: FRAMEDECK_TEMPLATE)',
    }),
    engine: Flags.string({
      char: 'e',
      description: 'Typesetting engine executable (env: FRAMEDECK_ENGINE, default: pdflatex)',
    }),
    'engine-arg': Flags.string({
      description: 'Extra argument passed to the engine before the source file (repeatable)',
      multiple: true,
    }),
    'work-dir': Flags.string({
      char: 'w',
      description: 'Scratch directory, removed after the build (env: FRAMEDECK_WORK_DIR, default: tmp)',
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Build);
    const logger = this.createLogger(flags);

    const { config, sources } = resolveDeckConfig({
      templatePath: flags.template,
      engine: flags.engine,
      engineArgs: flags['engine-arg'],
      workDir: flags['work-dir'],
    });
    logger.debug(`Template: ${config.templatePath} (${sources.templatePath})`);
    logger.debug(`Engine: ${config.engine} (${sources.engine})`);
    logger.debug(`Working directory: ${config.workDir} (${sources.workDir})`);

    try {
      const result = await buildDeck({
        textDir: args.dir,
        outputPath: args.output,
        config,
        logger,
      });

      this.log(
        `${chalk.green('✓')} Built ${chalk.cyan(result.outputPath)} from ${result.snippetCount} snippet(s)`
      );
    } catch (error) {
      this.reportFailure('Failed to build deck', error);
    }
  }
}
