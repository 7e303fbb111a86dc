import { parseArgs } from 'util';
import { NAMING_STYLE_NAMES, OutputFormatSchema, type OutputFormat } from '@docpath/core';

export const USAGE = `Usage: docpath [options] <file|dir>...

Suggest an archival path and filename for each document. Files are never moved.

Options:
  -f, --format <json|csv|tsv>      Output format (default: json)
  -s, --style <compact|descriptive> Naming style (default: DOCPATH_NAMING_STYLE or descriptive)
  -t, --taxonomy <file>            JSON or YAML taxonomy override
      --fallback                   Map unknown categories/doctypes to "other" instead of failing
      --no-cache                   Do not read or write the classification cache
  -v, --verbose                    Log progress to stderr
  -h, --help                       Show this help`;

export type CliOptions = {
  format: OutputFormat;
  style?: string;
  taxonomy?: string;
  /** false with --fallback; undefined leaves the DOCPATH_TAXONOMY_STRICT setting in charge */
  strictMode?: boolean;
  cache: boolean;
  verbose: boolean;
  help: boolean;
  inputs: string[];
};

/** Bad command line; the CLI exits with status 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parseRawArguments(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        format: { type: 'string', short: 'f', default: 'json' },
        style: { type: 'string', short: 's' },
        taxonomy: { type: 'string', short: 't' },
        fallback: { type: 'boolean', default: false },
        'no-cache': { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArguments(argv: string[]): CliOptions {
  const { values, positionals } = parseRawArguments(argv);

  const requestedFormat = values.format ?? 'json';
  const format = OutputFormatSchema.safeParse(requestedFormat.trim().toLowerCase());
  if (!format.success) {
    throw new CliUsageError(`Unknown format '${requestedFormat}'. Allowed: ${OutputFormatSchema.options.join(', ')}`);
  }

  let style: string | undefined;
  if (values.style !== undefined) {
    style = values.style.trim().toLowerCase();
    if (!NAMING_STYLE_NAMES.some((name) => name === style)) {
      throw new CliUsageError(`Unknown naming style '${values.style}'. Allowed: ${NAMING_STYLE_NAMES.join(', ')}`);
    }
  }

  const help = values.help ?? false;
  if (!help && positionals.length === 0) {
    throw new CliUsageError('No input files or directories given');
  }

  return {
    format: format.data,
    style,
    taxonomy: values.taxonomy,
    strictMode: values.fallback ? false : undefined,
    cache: !values['no-cache'],
    verbose: values.verbose ?? false,
    help,
    inputs: positionals,
  };
}
