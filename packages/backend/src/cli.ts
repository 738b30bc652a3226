import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import type { AllocationConfig, AllocationWarning } from '@callup/shared';
import { DEFAULT_ROSTER_SHEET } from '@callup/shared';
import { parseConfigOverrides } from './services/call-up-allocator/index.js';
import {
  allocateWorkbook,
  formatImportError,
  type WorkbookAllocationOutcome,
} from './services/workbook-allocation.js';
import { readWorkbookFile } from './services/workbook.js';

const USAGE = `Usage: allocate INPUT.xlsx OUTPUT.xlsx [options]

Options:
  --sheet NAME                        Roster sheet (default: "${DEFAULT_ROSTER_SHEET}")
  --max-home-base N                   Max home call-ups per player (default: 2)
  --max-away-base N                   Max away call-ups per player (default: 2)
  --gk-cap N                          Max goalkeeper matches per player (default: 1)
  --slot-target N                     Call-ups per match, goalkeeper included (default: 9)
  --require-exact-reserve-four        Reserve chain only with exactly four left (default)
  --no-require-exact-reserve-four     Reserve chain from whoever is left, up to four
  --prefer-gk-volunteers              Pick goalkeeper volunteers first (default)
  --no-prefer-gk-volunteers           Pick goalkeepers in roster order
  --fill-shortfall-from-reserves      Top up short matches with reserve volunteers
  --verbose                           Print the allocation log
  -h, --help                          Show this help`;

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      sheet: { type: 'string' },
      'max-home-base': { type: 'string' },
      'max-away-base': { type: 'string' },
      'gk-cap': { type: 'string' },
      'slot-target': { type: 'string' },
      'require-exact-reserve-four': { type: 'boolean' },
      'no-require-exact-reserve-four': { type: 'boolean' },
      'prefer-gk-volunteers': { type: 'boolean' },
      'no-prefer-gk-volunteers': { type: 'boolean' },
      'fill-shortfall-from-reserves': { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export interface CliOptions {
  input: string;
  output: string;
  sheet: string;
  config: Partial<AllocationConfig>;
  verbose: boolean;
}

/**
 * Parse command-line arguments. Returns a message instead of options when
 * the arguments are unusable or help was asked for.
 */
export function parseCliArgs(argv: string[]): CliOptions | { message: string; exitCode: number } {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { message: `${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`, exitCode: 1 };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { message: USAGE, exitCode: 0 };
  }
  const [input, output] = positionals;
  if (!input || !output || positionals.length > 2) {
    return { message: USAGE, exitCode: 1 };
  }

  const flag = (on: boolean | undefined, off: boolean | undefined): string | undefined => {
    if (off) return 'false';
    if (on) return 'true';
    return undefined;
  };

  return {
    input,
    output,
    sheet: values.sheet ?? DEFAULT_ROSTER_SHEET,
    verbose: values.verbose ?? false,
    config: parseConfigOverrides({
      maxHomeBase: values['max-home-base'],
      maxAwayBase: values['max-away-base'],
      gkCap: values['gk-cap'],
      slotTarget: values['slot-target'],
      requireExactReserveFour: flag(
        values['require-exact-reserve-four'],
        values['no-require-exact-reserve-four']
      ),
      preferGkVolunteers: flag(values['prefer-gk-volunteers'], values['no-prefer-gk-volunteers']),
      fillShortfallFromReserves: flag(values['fill-shortfall-from-reserves'], undefined),
    }),
  };
}

function printWarnings(warnings: AllocationWarning[]): void {
  console.error(`Warnings (${warnings.length}):`);
  for (const warning of warnings) {
    console.error(`  [${warning.type}] ${warning.message}`);
  }
}

export async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (!('input' in options)) {
    if (options.exitCode === 0) console.log(options.message);
    else console.error(options.message);
    return options.exitCode;
  }

  let outcome: WorkbookAllocationOutcome;
  try {
    const workbook = await readWorkbookFile(options.input);
    outcome = allocateWorkbook(workbook, options.sheet, options.config, { verbose: options.verbose });
  } catch (error) {
    console.error(`Could not read "${options.input}" / sheet "${options.sheet}":`, error instanceof Error ? error.message : error);
    return 1;
  }

  if (!outcome.ok) {
    if (outcome.stage === 'import') {
      console.error('Invalid roster sheet:');
      for (const error of outcome.importErrors) {
        console.error(`  ${formatImportError(error)}`);
      }
      return 1;
    }
    console.error(`Allocation failed: ${outcome.result.message}`);
    for (const error of outcome.result.errors ?? []) {
      console.error(`  [${error.type}] ${error.message}`);
    }
    return 2;
  }

  try {
    await outcome.output.xlsx.writeFile(options.output);
  } catch (error) {
    console.error(`Could not write "${options.output}":`, error instanceof Error ? error.message : error);
    return 2;
  }

  if (outcome.result.warnings) {
    printWarnings(outcome.result.warnings);
  }
  console.log(`Done! ${outcome.result.message}. Result written to: ${options.output}`);
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Unexpected error:', error);
      process.exitCode = 2;
    }
  );
}
