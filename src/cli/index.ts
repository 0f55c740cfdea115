#!/usr/bin/env node

/**
 * misp-stix CLI: MISP galaxy to STIX bundle conversion
 *
 * Usage:
 *   misp-stix convert --input threat-actor.json --output bundle.json
 *   misp-stix convert --config converter.yaml --dry-run
 */

import 'dotenv/config';

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import chalk from 'chalk';

import { registerConvertCommand } from './commands/convert.js';

const pkg: unknown = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
);
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('misp-stix')
  .description('Convert MISP threat-actor galaxies into STIX bundles')
  .version(version);

registerConvertCommand(program);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // Commander throws for help and version output under exitOverride
    if (err instanceof Error && 'code' in err) {
      const { code } = err;
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return;
      }
    }

    console.error('');
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    console.error('');
    console.error(chalk.gray('Run "misp-stix --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
