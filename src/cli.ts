#!/usr/bin/env node
/**
 * hub-tags command line entry point
 *
 * Usage: hub-tags <repository> [--arch amd64] [--os linux] [--variant v8] [--format text|json]
 */

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DEFAULTS, DOCKER_HUB, OUTPUT_FORMATS, OutputFormat, loadConfig } from './config/constants';
import { HubService } from './services/hub-service';
import { PlatformFilter } from './services/ordering-service';
import { SummaryService, TagSource, formatSummary } from './services/summary-service';
import { HubTagsError, ValidationError, getErrorMessage } from './utils/errors';
import { ConsoleLogger, LogLevel, isLogLevel, logger as defaultLogger, parseLogLevel } from './utils/logger';

export interface CliOptions {
    repository: string;
    filter: PlatformFilter;
    format: OutputFormat;
    showPlatform: boolean;
    logLevel: LogLevel;
    pageSize?: number;
}

export interface RunDependencies {
    source?: TagSource;
    logger?: ConsoleLogger;
    write?: (text: string) => void;
    exitProcess?: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * LOG_LEVEL in any case; unknown or empty values fall back to warn
 */
function defaultLogLevel(value: string | undefined): LogLevel {
    const normalized = (value ?? '').trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : LogLevel.WARN;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArguments(args: string[], exitProcess = true): CliOptions {
    const config = loadConfig();
    const argv = yargs(args)
        .scriptName('hub-tags')
        .usage('$0 <repository> [options]\n\nSummarize the tags of a Docker Hub repository, grouped by image digest')
        .option('arch', {
            alias: 'a',
            type: 'string',
            description: `Architecture to report, or "${DEFAULTS.ANY_ARCHITECTURE}" for every platform`,
            default: DEFAULTS.ARCHITECTURE,
        })
        .option('os', {
            type: 'string',
            description: 'Only report images for this operating system',
        })
        .option('variant', {
            type: 'string',
            description: 'Only report images for this CPU variant (e.g. v7, v8)',
        })
        .option('format', {
            alias: 'f',
            type: 'string',
            choices: OUTPUT_FORMATS,
            description: 'Output format',
            default: DEFAULTS.FORMAT,
        })
        .option('show-platform', {
            type: 'boolean',
            description: 'Print a heading for each platform',
            default: false,
        })
        .option('page-size', {
            type: 'number',
            description: `Tags requested per page (1-${DOCKER_HUB.MAX_PAGE_SIZE})`,
        })
        .option('log-level', {
            type: 'string',
            choices: ['debug', 'info', 'warn', 'error'],
            description: 'Log level',
            default: defaultLogLevel(config.logLevel),
        })
        .demandCommand(1, 'A repository is required')
        .strictOptions()
        .help()
        .alias('help', 'h')
        .exitProcess(exitProcess)
        .fail((message, error) => {
            throw new ValidationError(message || getErrorMessage(error), error ? { cause: error } : undefined);
        })
        .parseSync();

    const repository = argv._[0];
    if (repository === undefined) {
        throw new ValidationError('A repository is required');
    }
    if (argv._.length > 1) {
        throw new ValidationError(`Unexpected arguments: ${argv._.slice(1).join(' ')}`);
    }

    const format = String(argv.format);
    if (!isOutputFormat(format)) {
        throw new ValidationError(`Unknown output format: ${format}`);
    }

    const pageSize = argv['page-size'];
    if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > DOCKER_HUB.MAX_PAGE_SIZE)) {
        throw new ValidationError(`--page-size must be an integer between 1 and ${DOCKER_HUB.MAX_PAGE_SIZE}`);
    }

    const filter: PlatformFilter = { architecture: argv.arch };
    if (argv.os !== undefined) {
        filter.os = argv.os;
    }
    if (argv.variant !== undefined) {
        filter.variant = argv.variant;
    }

    return {
        repository: String(repository),
        filter,
        format,
        showPlatform: argv['show-platform'],
        logLevel: parseLogLevel(argv['log-level']),
        pageSize,
    };
}

/**
 * Run the tool and return the process exit code
 */
export async function run(args: string[], deps: RunDependencies = {}): Promise<number> {
    const logger = deps.logger || defaultLogger;
    const write = deps.write || ((text: string) => {
        process.stdout.write(`${text}\n`);
    });

    try {
        const options = parseArguments(args, deps.exitProcess ?? true);
        logger.setLevel(options.logLevel);

        const source = deps.source || new HubService({ logger, pageSize: options.pageSize });
        const service = new SummaryService({ source, logger });
        const summaries = await service.summarizeRepository(options.repository, options.filter);

        const output = formatSummary(summaries, { format: options.format, showPlatform: options.showPlatform });
        if (output) {
            write(output);
        }
        return 0;
    } catch (error) {
        logger.error(getErrorMessage(error), {
            ...(error instanceof HubTagsError && { code: error.code }),
            ...(error instanceof Error && error.cause !== undefined && { cause: getErrorMessage(error.cause) }),
        });
        return 1;
    }
}

if (require.main === module) {
    dotenv.config();
    run(hideBin(process.argv))
        .then((exitCode) => {
            process.exitCode = exitCode;
        })
        .catch((error: unknown) => {
            console.error('FATAL: Unexpected failure', error);
            process.exit(1);
        });
}
