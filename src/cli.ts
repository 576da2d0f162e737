#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { openValidator } from './index.js';
import { ConfigNotFoundError, isFatalValidationError } from './core/errors.js';
import { parseFieldValuesFile } from './core/input/parse.js';
import { buildReport } from './core/report/buildReport.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import type { FieldValues } from './core/rules/schema.js';
import type { OutputFormat } from './core/report/reportTypes.js';
import type { FormErrors } from './core/validate/validateForm.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_INVALID = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_RULES_ERROR = 3;
const EXIT_CONFIG_FAULT = 4;

function printUsage(): void {
  process.stdout.write(
    `Usage: yaml-field-validator [options]

Options:
  --rules <path>        Path to the YAML rule file
  --section <name>      Section (form) to validate
  --input <path>        JSON object of field values to validate
  --format <fmt>        Output format: json | text (default: json)
  --out <path>          Write output to file instead of stdout
  --no-timestamp        Omit timestamp from output
  --pretty              Pretty-print JSON output
  --allow-subs          Enable "sub" expression checks
  --list-fields         Print the field names of --section (or of all sections)
  --help                Show this help message
`,
  );
}

function writeOutput(output: string, outPath: string | undefined): void {
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

export function main(argv?: string[]): number {
  let args: ReturnType<typeof parseArgs>;

  try {
    args = parseArgs({
      args: argv,
      options: {
        rules: { type: 'string' },
        section: { type: 'string' },
        input: { type: 'string' },
        format: { type: 'string', default: 'json' },
        out: { type: 'string' },
        'no-timestamp': { type: 'boolean', default: false },
        pretty: { type: 'boolean', default: false },
        'allow-subs': { type: 'boolean', default: false },
        'list-fields': { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
      },
      strict: true,
    });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values['help'] === true) {
    printUsage();
    return EXIT_OK;
  }

  const rulesArg = args.values['rules'];
  if (typeof rulesArg !== 'string') {
    process.stderr.write('Error: --rules is required. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }
  const rulesPath = resolve(rulesArg);

  const format = args.values['format'];
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(
      `Error: Invalid format "${String(format)}". Must be "json" or "text".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  const sectionArg = args.values['section'];
  const section = typeof sectionArg === 'string' ? sectionArg : undefined;
  const outArg = args.values['out'];
  const outPath = typeof outArg === 'string' ? outArg : undefined;

  const loaded = openValidator(rulesPath, { allowSubs: args.values['allow-subs'] === true });
  if (!loaded.ok) {
    if (loaded.error instanceof ConfigNotFoundError) {
      process.stderr.write(`Error: Rules file not found: ${rulesPath}\n`);
      return EXIT_CLI_ERROR;
    }
    process.stderr.write(`Error: Failed to load rules. ${loaded.error.message}\n`);
    return EXIT_RULES_ERROR;
  }
  const validator = loaded.value;

  // Handle --list-fields
  if (args.values['list-fields'] === true) {
    writeOutput(validator.fieldNames(section).join('\n'), outPath);
    return EXIT_OK;
  }

  if (section === undefined) {
    process.stderr.write('Error: --section is required. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }
  if (!validator.sections().includes(section)) {
    process.stderr.write(`Error: Unknown section "${section}".\n`);
    return EXIT_CLI_ERROR;
  }

  const inputArg = args.values['input'];
  if (typeof inputArg !== 'string') {
    process.stderr.write('Error: --input is required. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }
  const inputPath = resolve(inputArg);
  if (!existsSync(inputPath)) {
    process.stderr.write(`Error: Input file not found: ${inputPath}\n`);
    return EXIT_CLI_ERROR;
  }

  let values: FieldValues;
  try {
    values = parseFieldValuesFile(inputPath);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : '';
    process.stderr.write(`Error: Invalid input file.${detail !== '' ? ` ${detail}` : ''}\n`);
    return EXIT_CLI_ERROR;
  }

  // Run validation
  let errors: FormErrors;
  try {
    errors = validator.validate(section, values);
  } catch (error: unknown) {
    if (!isFatalValidationError(error)) {
      throw error;
    }
    process.stderr.write(`Error: ${error.message}\n`);
    return EXIT_CONFIG_FAULT;
  }

  const report = buildReport({
    section,
    rulesPath,
    fieldNames: validator.fieldNames(section),
    errors,
    noTimestamp: args.values['no-timestamp'] === true,
  });

  const output =
    outputFormat === 'json' ? toJson(report, args.values['pretty'] === true) : toText(report);
  writeOutput(output, outPath);

  return report.valid ? EXIT_OK : EXIT_INVALID;
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = main();
}
