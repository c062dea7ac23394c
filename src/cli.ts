#!/usr/bin/env node
/**
 * CPK archive reader - CLI Interface
 *
 * Command-line inspection of CPK archives: list, tree, exists and cat.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { CpkArchive } from './cpk-archive.js';
import { CPK_DEFAULT_SEPARATOR } from './constants/cpk-format.js';
import { describeError } from './errors.js';
import type { CpkEntry } from './types/cpk-entry.js';

type GlobalOptions = {
  readonly separator: string;
  readonly encoding: string;
};

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('cpk')
  .description('Inspect CPK game archives')
  .version(version)
  .option('--separator <char>', 'Separator used in virtual paths', CPK_DEFAULT_SEPARATOR)
  .option('--encoding <name>', 'Legacy encoding of entry names', 'gbk');

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function withArchive(archivePath: string, action: (archive: CpkArchive) => Promise<void>): Promise<void> {
  const { separator, encoding } = globalOptions();
  const archive: CpkArchive = await CpkArchive.open(resolve(archivePath), { pathSeparator: separator, encoding });
  try {
    await action(archive);
  } finally {
    await archive.close();
  }
}

function fail(label: string, error: unknown): never {
  console.error(`❌ ${label} failed:`, describeError(error));
  process.exit(1);
}

function printTree(entries: readonly CpkEntry[], depth: number): void {
  for (const entry of entries) {
    console.log(`${'  '.repeat(depth)}${entry.name}${entry.isDirectory ? '/' : ''}`);
    printTree(entry.children, depth + 1);
  }
}

program
  .command('ls')
  .description('List entries at the root or inside a directory')
  .argument('<archive>', 'Path to the .cpk archive')
  .argument('[dir]', 'Virtual directory to list')
  .action(async (archivePath: string, dir: string | undefined) => {
    try {
      await withArchive(archivePath, async (archive) => {
        const entries: CpkEntry[] = dir ? archive.list(dir) : archive.listRoot();
        for (const entry of entries) {
          const size: string = entry.isDirectory ? '<dir>' : String(entry.record.originalSize);
          console.log(`${size.padStart(12)}  ${entry.virtualPath}`);
        }
      });
    } catch (error) {
      fail('List', error);
    }
  });

program
  .command('tree')
  .description('Print the whole virtual directory tree')
  .argument('<archive>', 'Path to the .cpk archive')
  .action(async (archivePath: string) => {
    try {
      await withArchive(archivePath, async (archive) => {
        printTree(archive.listRoot(), 0);
      });
    } catch (error) {
      fail('Tree', error);
    }
  });

program
  .command('exists')
  .description('Exit with 0 if the virtual path exists, 1 otherwise')
  .argument('<archive>', 'Path to the .cpk archive')
  .argument('<path>', 'Virtual path to check')
  .action(async (archivePath: string, path: string) => {
    let found = false;
    try {
      await withArchive(archivePath, async (archive) => {
        found = archive.exists(path);
      });
    } catch (error) {
      fail('Exists', error);
    }
    console.log(found ? 'yes' : 'no');
    process.exitCode = found ? 0 : 1;
  });

program
  .command('cat')
  .description('Write the content of an archived file to stdout')
  .argument('<archive>', 'Path to the .cpk archive')
  .argument('<path>', 'Virtual path of the file')
  .action(async (archivePath: string, path: string) => {
    try {
      await withArchive(archivePath, async (archive) => {
        await pipeline(archive.open(path).stream, process.stdout);
      });
    } catch (error) {
      fail('Cat', error);
    }
  });

program.parseAsync().catch((error: unknown) => fail('Command', error));
