import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { substitute } from '../render/template.js';
import {
  DEFAULT_ENGINE,
  DEFAULT_TEMPLATE_PATH,
  DEFAULT_WORK_DIR,
  resolveDeckConfig,
} from './deck-config.js';

describe('resolveDeckConfig', () => {
  it('falls back to defaults', () => {
    const { config, sources } = resolveDeckConfig({}, {});

    expect(config).toEqual({
      templatePath: DEFAULT_TEMPLATE_PATH,
      engine: 'pdflatex',
      engineArgs: [],
      workDir: 'tmp',
    });
    expect(sources).toEqual({ templatePath: 'default', engine: 'default', workDir: 'default' });
  });

  it('reads environment variables', () => {
    const { config, sources } = resolveDeckConfig(
      {},
      { FRAMEDECK_TEMPLATE: 'talk.tex', FRAMEDECK_ENGINE: 'lualatex', FRAMEDECK_WORK_DIR: 'build' }
    );

    expect(config.templatePath).toBe('talk.tex');
    expect(config.engine).toBe('lualatex');
    expect(config.workDir).toBe('build');
    expect(sources).toEqual({ templatePath: 'env', engine: 'env', workDir: 'env' });
  });

  it('prefers explicit overrides over the environment', () => {
    const { config, sources } = resolveDeckConfig(
      { engine: 'xelatex', engineArgs: ['-halt-on-error'] },
      { FRAMEDECK_ENGINE: 'lualatex' }
    );

    expect(config.engine).toBe('xelatex');
    expect(config.engineArgs).toEqual(['-halt-on-error']);
    expect(sources.engine).toBe('flag');
  });

  it('treats empty values as unset', () => {
    const { config, sources } = resolveDeckConfig({ workDir: '' }, { FRAMEDECK_WORK_DIR: '' });

    expect(config.workDir).toBe(DEFAULT_WORK_DIR);
    expect(sources.workDir).toBe('default');
    expect(DEFAULT_ENGINE).toBe('pdflatex');
  });
});

describe('bundled template', () => {
  it('lives in the package assets directory', () => {
    expect(DEFAULT_TEMPLATE_PATH.endsWith(join('core', 'assets', 'default.tex'))).toBe(true);
  });

  it('has exactly one placeholder inside the document body', async () => {
    const template = await readFile(DEFAULT_TEMPLATE_PATH, 'utf-8');

    const document = substitute(template, 'FRAMES', DEFAULT_TEMPLATE_PATH);

    expect(document.startsWith('% Default framedeck template.\n')).toBe(true);
    expect(document).toContain('\\begin{document}\n\nFRAMES\n\n\\end{document}\n');
  });
});
