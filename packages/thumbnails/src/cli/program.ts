/**
 * spindle-thumbnail command definitions
 */

import { writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import { Command } from 'commander';
import { ErrorFactory, SDK_VERSION, type Logger } from '@spindle/sdk';
import { readSourceFile } from '../source-file';
import { Thumbnailer } from '../thumbnailer';
import type { Env } from '../env';
import type { Thumbnail } from '../types';

export interface ProgramIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export const consoleIO: ProgramIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  }
};

export const EXIT_RENDER_FAILED = 1;
export const EXIT_UNSUPPORTED = 2;

export function createProgram(env: Env, logger: Logger, io: ProgramIO = consoleIO): Command {
  const program = new Command();

  program
    .name('spindle-thumbnail')
    .description('Render thumbnails with pluggable renderers')
    .version(SDK_VERSION)
    .option('-m, --manifest <path>', 'renderer manifest to load', env.SPINDLE_MANIFEST);

  const thumbnailer = (): Promise<Thumbnailer> => {
    const { manifest } = program.opts<{ manifest?: string }>();
    return Thumbnailer.create({ logger, manifestPath: manifest, size: env.SPINDLE_THUMBNAIL_SIZE });
  };

  program
    .command('list')
    .description('List available renderers in the order they are tried')
    .action(async () => {
      const renderers = (await thumbnailer()).renderers();
      renderers.forEach((renderer, index) => {
        io.out(`${index + 1}. ${chalk.bold(renderer.name.padEnd(12))} ${renderer.description}`);
      });
    });

  program
    .command('which')
    .description('Show the renderer that would handle a file')
    .argument('<file>', 'file to inspect')
    .action(async (path: string) => {
      const file = await readSourceFile(path);
      const renderers = await thumbnailer();
      const selected = renderers.selectRenderer(file);
      if (!selected) {
        io.out(chalk.yellow(`${file.name}: unsupported`));
        io.setExitCode(EXIT_UNSUPPORTED);
        return;
      }
      io.out(`${file.name}: ${selected.name}`);

      let others: number;
      try {
        others = renderers.candidatesFor(file).length - 1;
      } catch (error) {
        logger.warn('Could not count other renderers', { path: file.path, error: ErrorFactory.describe(error) });
        return;
      }
      if (others > 0) {
        io.out(chalk.gray(`  ${others} other renderer(s) would also accept it`));
      }
    });

  program
    .command('render')
    .description('Render a thumbnail for a file')
    .argument('<file>', 'file to render')
    .option('-o, --output <path>', 'where to write the SVG (default: <file>.thumb.svg)')
    .action(async (path: string, options: { output?: string }) => {
      const file = await readSourceFile(path);

      let thumbnail: Thumbnail | undefined;
      try {
        thumbnail = await (await thumbnailer()).render(file);
      } catch (error) {
        io.err(chalk.red(`✗ ${file.name}: ${ErrorFactory.describe(error)}`));
        io.setExitCode(EXIT_RENDER_FAILED);
        return;
      }

      if (!thumbnail) {
        io.err(chalk.yellow(`${file.name}: unsupported input`));
        io.setExitCode(EXIT_UNSUPPORTED);
        return;
      }

      const output = options.output ?? `${path}.thumb.svg`;
      await writeFile(output, thumbnail.data, 'utf8');
      io.out(chalk.green(`✓ ${output} (${thumbnail.width}x${thumbnail.height})`));
    });

  return program;
}
