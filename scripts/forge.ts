#!/usr/bin/env node

/**
 * PCB Forge command line
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { buildProject } from '../src/features/forge/utils/buildProject';

const DEFAULT_CONFIG = join(homedir(), '.config', 'pcb_forge', 'config.yaml');

interface BuildCommandOptions {
    config?: string;
    out: string;
    archive?: string;
    debugSvg?: boolean;
}

const program = new Command();

program
    .name('forge')
    .description('Turn Gerber and Excellon files into G-code for PCB mills and lasers')
    .version('0.1.0');

program
    .command('build [forge-file]')
    .description('Generate every G-code file the forge file describes')
    .option('-c, --config <path>', 'Global machine config', DEFAULT_CONFIG)
    .option('-o, --out <dir>', 'Output directory', 'forge')
    .option('-a, --archive <zip>', 'Read artwork from a zip of fabrication outputs')
    .option('--debug-svg', 'Also draw the polygons of every artwork file as SVG')
    .action(async (forgeFile: string | undefined, options: BuildCommandOptions) => {
        try {
            const summary = await buildProject({
                forgeFile: forgeFile ?? 'forge.yaml',
                outDir: options.out,
                configPath: options.config ?? DEFAULT_CONFIG,
                configOptional: options.config === undefined || options.config === DEFAULT_CONFIG,
                archivePath: options.archive,
                debugSvg: options.debugSvg,
            });

            console.log(chalk.bold(`\n${summary.project}`));
            for (const path of summary.written) {
                console.log(chalk.green(`  wrote  ${path}`));
            }
            for (const failure of summary.failed) {
                console.error(chalk.red(`  failed ${failure.name}: ${failure.error.message}`));
            }
            if (summary.failed.length > 0) {
                process.exitCode = 1;
            }
        } catch (error) {
            console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
            process.exitCode = 1;
        }
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Error:'), error);
    process.exitCode = 1;
});
