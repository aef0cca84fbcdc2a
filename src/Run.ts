import { readFileSync } from 'node:fs';
import { Command, Option } from '@commander-js/extra-typings';
import { checkDerivation } from './CheckUtil';
import type { DecideResult } from './DecideUtil';
import { decide } from './DecideUtil';
import { stringifyDerivation } from './DerivationUtil';
import type { Formula } from './FormulaUtil';
import type { LogLevel } from './LogUtil';
import { getLogger, LOG_LEVELS, setLogLevel } from './LogUtil';
import type { ParseError } from './ParseUtil';
import { parseFormula, stringifyFormula, stringifyValuation } from './ParseUtil';

const logger = getLogger('Run');

export type RunOptions = {
  input: string;
  maxSteps?: number;
  check?: boolean;
  logLevel?: LogLevel;
};

export type InvalidResult = {
  type: 'Invalid';
  error: ParseError;
};

// `problems` is only set when the derivation was checked
export type RunResult = InvalidResult | (DecideResult & { formula: Formula; problems?: string[] });

export function runCli(args: string[]): void {
  const program = new Command()
    .name('sentential')
    .showHelpAfterError()
    .argument('[formula]', 'SL sentence to decide, if no file was provided')
    .option('-f, --file <string>', 'file to read the sentence from')
    .option('-s, --steps <number>', 'max amount of rewrites per normalization pass, 0 means no limit', '0')
    .option('-c, --check', 'verifies the derivation after it is generated')
    .addOption(new Option(
      '-l, --logLevel <level>',
      'logger level, debug shows every rewrite',
    ).choices(LOG_LEVELS).default('info' as const));

  program.parse(args);

  const opts = program.opts();
  if (program.args.length > 1) {
    program.error('Only 1 argument is accepted');
  }
  if (program.args.length > 0 && opts.file) {
    program.error('File option can not be combined with string input');
  }
  if (program.args.length === 0 && !opts.file) {
    program.error('Either a file or string input is required');
  }
  const maxSteps = Number.parseInt(opts.steps, 10);
  if (Number.isNaN(maxSteps)) {
    program.error(`Invalid amount of steps: ${opts.steps}`);
  }

  const input = opts.file ? readFileSync(opts.file).toString() : program.args[0];

  const result = run({
    input,
    maxSteps,
    check: opts.check,
    logLevel: opts.logLevel,
  });

  console.log(stringifyRunResult(result));
  if (result.type === 'Invalid' || (result.problems && result.problems.length > 0)) {
    process.exitCode = 1;
  }
}

export function run(opts: RunOptions): RunResult {
  setLogLevel(opts.logLevel ?? 'error');

  const parsed = parseFormula(opts.input);
  if (!parsed.success) {
    logger.debug(`Unable to parse ${JSON.stringify(opts.input)}`);
    return { type: 'Invalid', error: parsed.error };
  }
  const { formula } = parsed;
  logger.info(`Deciding ${stringifyFormula(formula)}`);

  const result = decide(formula, { maxSteps: opts.maxSteps });
  if (result.type === 'Tautology' && opts.check) {
    const problems = checkDerivation(result.proof, formula);
    logger.info(problems.length === 0 ? 'Derivation is correct' : `Derivation has ${problems.length} problems`);
    return { ...result, formula, problems };
  }
  return { ...result, formula };
}

export function stringifyRunResult(result: RunResult): string {
  if (result.type === 'Invalid') {
    return `Not a sentence: ${result.error.message}`;
  }

  const lines = [ stringifyFormula(result.formula) ];
  if (result.type === 'Refutable') {
    lines.push('Counterexample found:', stringifyValuation(result.valuation, '    '));
    return lines.join('\n');
  }

  lines.push('Success!', stringifyDerivation(result.proof));
  if (result.problems) {
    if (result.problems.length === 0) {
      lines.push('Derivation checked without problems.');
    } else {
      lines.push('Derivation check failed:', ...result.problems.map((problem): string => `    ${problem}`));
    }
  }
  return lines.join('\n');
}
