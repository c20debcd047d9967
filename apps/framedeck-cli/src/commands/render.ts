/**
 * `framedeck render <dir>` - Print the document that `build` would compile
 */

import { renderDeck, resolveDeckConfig } from '@framedeck/core';
import { Args, Flags } from '@oclif/core';
import { BaseCommand } from '../base-command.js';

export default class Render extends BaseCommand {
  static override description = 'Render snippets into the template without running the engine';

  static override examples = [
    '<%= config.bin %> <%= command.id %> ./snippets # outputs to stdout',
    '<%= config.bin %> <%= command.id %> ./snippets -t talk.tex -o deck.tex',
  ];

  static override args = {
    dir: Args.string({
      description: 'Directory containing the text files',
      required: true,
    }),
  };

  static override flags = {
    template: Flags.string({
      char: 't',
      description: 'Template file with a single %s placeholder (env: FRAMEDECK_TEMPLATE)',
    }),
    output: Flags.string({
      char: 'o',
      description: 'Write the document to this file instead of stdout',
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Render);
    const logger = this.createLogger(flags);
    const { config } = resolveDeckConfig({ templatePath: flags.template });

    try {
      const { document, snippetCount } = await renderDeck({
        textDir: args.dir,
        templatePath: config.templatePath,
        logger,
      });

      if (flags.output) {
        const fs = await import('node:fs/promises');
        await fs.writeFile(flags.output, document, 'utf-8');
        logger.info(`Rendered ${snippetCount} snippet(s) to ${flags.output}`);
      } else {
        this.log(document);
      }
    } catch (error) {
      this.reportFailure('Failed to render deck', error);
    }
  }
}
