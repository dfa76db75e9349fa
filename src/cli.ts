/**
 * CLI for tidy-tree-layout
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { TidyTreeLayout } from './converter';
import { validateTreeJson } from './transform';
import type { LayoutDirection, TreeLayoutOptions } from './types';

const VERSION = '1.0.0';

interface LayoutCommandOptions {
  output?: string;
  horizontalGap?: string;
  verticalGap?: string;
  direction?: string;
  separation?: string;
  pretty?: boolean;
}

export function createProgram(stdin: NodeJS.ReadableStream = process.stdin): Command {
  const program = new Command();

  program
    .name('tidy-tree')
    .description('Compute tidy coordinates for the nodes of a JSON tree')
    .version(VERSION);

  program
    .command('layout <input>')
    .description('Lay out a JSON tree (nested or adjacency form); use - for stdin')
    .option('-o, --output <file>', 'Output file path (default: stdout)')
    .option('--horizontal-gap <number>', 'Horizontal drawing distance per grid unit')
    .option('--vertical-gap <number>', 'Vertical drawing distance per grid unit')
    .option('--direction <direction>', 'Growth direction: DOWN or RIGHT')
    .option('--separation <number>', 'Minimum grid distance between neighbouring nodes')
    .option('--pretty', 'Pretty print JSON output', true)
    .action(async (input: string, options: LayoutCommandOptions) => {
      try {
        const content = await readInput(input, stdin);

        let document: unknown;
        try {
          document = JSON.parse(content);
        } catch {
          console.error('Error: Invalid JSON input');
          process.exitCode = 1;
          return;
        }

        const converter = new TidyTreeLayout(buildLayoutOptions(options));
        const layouted = converter.to_json(document);
        const result = JSON.stringify(layouted, null, options.pretty ? 2 : 0);

        if (options.output) {
          await writeFile(options.output, result);
          console.error(`Output written to ${options.output}`);
        } else {
          console.log(result);
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command('validate <input>')
    .description('Validate a JSON tree document; use - for stdin')
    .action(async (input: string) => {
      try {
        const content = await readInput(input, stdin);
        const errors = validateTreeJson(JSON.parse(content));

        if (errors.length > 0) {
          console.error('Validation failed:');
          errors.forEach((err) => console.error(`  - ${err}`));
          process.exitCode = 1;
          return;
        }

        console.log('Validation passed!');
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  return program;
}

/**
 * Parse the command line and run the selected command
 */
export async function run(argv: readonly string[]): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

// Helper functions

export function buildLayoutOptions(options: LayoutCommandOptions): Partial<TreeLayoutOptions> {
  const layoutOptions: Partial<TreeLayoutOptions> = {};

  const horizontalGap = parseNumber(options.horizontalGap, '--horizontal-gap');
  if (horizontalGap !== undefined) layoutOptions.horizontalGap = horizontalGap;

  const verticalGap = parseNumber(options.verticalGap, '--vertical-gap');
  if (verticalGap !== undefined) layoutOptions.verticalGap = verticalGap;

  const separation = parseNumber(options.separation, '--separation');
  if (separation !== undefined) layoutOptions.separation = separation;

  if (options.direction) {
    const direction = options.direction.toUpperCase();
    if (isDirection(direction)) {
      layoutOptions.direction = direction;
    } else {
      console.error(`Warning: Invalid --direction "${options.direction}", ignoring`);
    }
  }

  return layoutOptions;
}

function parseNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || isNaN(parsed)) {
    console.error(`Warning: Invalid ${flag} "${value}", ignoring`);
    return undefined;
  }
  return parsed;
}

function isDirection(value: string): value is LayoutDirection {
  return value === 'DOWN' || value === 'RIGHT';
}

async function readInput(input: string, stdin: NodeJS.ReadableStream): Promise<string> {
  return input === '-' ? readStream(stdin) : readFile(input, 'utf-8');
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk: Buffer | string) => chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    stream.on('error', reject);
  });
}
