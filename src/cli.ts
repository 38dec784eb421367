/**
 * treeprompt CLI
 *
 * Turn a directory into a single prompt document: a directory tree followed
 * by the contents of every visible file.
 */

import { Command, CommanderError, Option } from 'commander';
import { createRequire } from 'module';
import { resolve } from 'path';
import clipboardy from 'clipboardy';
import pc from 'picocolors';
import { buildPromptDocument } from './context/gather.js';
import { cleanPromptFiles } from './context/clean.js';
import { isMatchMode, MATCH_MODES, type MatchMode } from './context/filter.js';
import { loadConfig, loadDefaultIgnoreConfig, mergeIgnoreConfig, type IgnoreConfig } from './config/config.js';
import { resolveOutputPath, writeFileAtomic } from './output/writer.js';
import { InvalidInputError, describeError } from './errors.js';

interface CliOptions {
    filter?: string[];
    ignoreDir?: string[];
    ignoreFile?: string[];
    outpath: string;
    outfile?: string;
    config?: string;
    matchMode: string;
    notebooks?: boolean;
    clean?: boolean;
    tree?: boolean;
    cp?: boolean;
    verbose?: boolean;
}

export interface CliDeps {
    /** Ignore lists used unless --config is given */
    defaults: IgnoreConfig;
    copyToClipboard: (text: string) => Promise<void>;
}

function readPackageVersion(): string {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require('../package.json');
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
    }
    return '0.0.0';
}

function parseMatchMode(value: string): MatchMode {
    if (!isMatchMode(value)) {
        throw new InvalidInputError(`Invalid match mode "${value}". Use one of: ${MATCH_MODES.join(', ')}`);
    }
    return value;
}

function activeConfig(options: CliOptions, deps: CliDeps): IgnoreConfig {
    const base = options.config ? loadConfig(options.config) : deps.defaults;
    return mergeIgnoreConfig(base, options.ignoreDir, options.ignoreFile);
}

function runClean(dir: string, options: CliOptions, deps: CliDeps): void {
    const config = activeConfig(options, deps);
    const result = cleanPromptFiles(dir, config.IGNORE_DIRS, {
        matchMode: parseMatchMode(options.matchMode),
        onRemove: filePath => console.log(`Removed ${pc.cyan(filePath)}`),
    });

    if (result.count === 0) {
        console.log(`No matching prompt files found to clean starting from '${pc.cyan(dir)}'.`);
    }
}

async function runGenerate(dir: string, options: CliOptions, deps: CliDeps): Promise<void> {
    const config = activeConfig(options, deps);

    if (options.verbose) {
        console.log(`Scanning ${resolve(dir)}`);
        console.log(`  Ignoring ${config.IGNORE_DIRS.length} directory and ${config.IGNORE_FILES.length} file patterns`);
    }

    const result = buildPromptDocument({
        root: dir,
        filters: options.filter ?? [],
        ignoreDirs: config.IGNORE_DIRS,
        ignoreFiles: config.IGNORE_FILES,
        treeOnly: options.tree ?? false,
        matchMode: parseMatchMode(options.matchMode),
        notebooks: options.notebooks ?? false,
        verbose: options.verbose ?? false,
    });

    if (options.tree) {
        console.log(result.document);
    }

    if (options.cp) {
        try {
            await deps.copyToClipboard(result.document);
            console.log(pc.green('Prompt copied to clipboard.'));
        } catch (error) {
            console.warn(pc.yellow(`Warning: Failed to copy to clipboard: ${describeError(error)}`));
        }
    }

    const outputPath = resolveOutputPath(options.outpath, options.outfile ?? `${result.rootName}_prompt`);
    writeFileAtomic(outputPath, result.document);
    console.log(`Prompt saved to ${pc.cyan(outputPath)}`);

    if (options.verbose) {
        console.log(`  Done in ${result.timing.totalMs}ms`);
    }
}

export function createProgram(deps: CliDeps): Command {
    const program = new Command();

    program
        .name('treeprompt')
        .description('Generate a prompt for a directory')
        .version(readPackageVersion())
        .argument('[dir]', 'The directory to generate the prompt for', '.')
        .option('--filter <suffix...>', 'Only process files ending with these suffixes (e.g. --filter py rs md)')
        .option('--ignore-dir <name...>', 'Additional directories to ignore (e.g. --ignore-dir experiments __pycache__)')
        .option('--ignore-file <name...>', 'Additional files or extensions to ignore (e.g. --ignore-file old.py rs)')
        .option('--outpath <dir>', 'Output path for the prompt file (default: current directory)', '.')
        .option('--outfile <name>', 'Output file name without .txt (default: <dir_name>_prompt)')
        .option('--config <path>', 'Path to a config file replacing the bundled ignore lists')
        .addOption(
            new Option('--match-mode <mode>', 'Match ignore globs against the entry name or its relative path')
                .choices(MATCH_MODES)
                .default('name')
        )
        .option('--notebooks', 'Render .ipynb notebooks cell by cell')
        .option('--clean', 'Remove all <folder>_prompt.txt files for discovered directories')
        .option('--tree', 'Only include the directory tree and print it to the terminal')
        .option('--cp', 'Copy the generated prompt to the clipboard')
        .option('--verbose', 'Verbose output')
        .exitOverride()
        .action(async (dir: string, options: CliOptions) => {
            if (options.clean) {
                runClean(dir, options, deps);
            } else {
                await runGenerate(dir, options, deps);
            }
        });

    return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(argv: readonly string[], deps: Partial<CliDeps> = {}): Promise<number> {
    try {
        const program = createProgram({
            defaults: deps.defaults ?? loadDefaultIgnoreConfig(),
            copyToClipboard: deps.copyToClipboard ?? (text => clipboardy.write(text)),
        });
        await program.parseAsync([...argv], { from: 'user' });
        return 0;
    } catch (error) {
        // Commander has already printed usage errors, help and version
        if (error instanceof CommanderError) return error.exitCode;
        console.error(pc.red('Error:'), describeError(error));
        return 1;
    }
}
