import { Command } from 'commander';
import { SETTINGS, settingId } from '../infrastructure/config/index.js';

export const PROGRAM_NAME = 'synthlog';
export const VERSION = '0.1.0';

/**
 * Builds the command line. Every setting gets a flag; values stay strings
 * here and are validated with the rest of the configuration.
 */
export function buildProgram(): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description('Generate rate-limited synthetic log traffic and ship it to a logs collector in batches')
    .version(VERSION, '-v, --version', 'Show version number');

  for (const setting of SETTINGS) {
    program.option(setting.flag, `${setting.description} [env: ${setting.env}]`);
  }

  return program;
}

/**
 * Parses user arguments (without the node/script prefix) into raw settings
 * keyed by setting id. Only flags given on the command line are returned,
 * so a negatable flag's implicit default never hides the environment.
 */
export function parseCliArgs(args: readonly string[], program: Command = buildProgram()): Map<string, string> {
  program.parse(args, { from: 'user' });
  const opts = program.opts();

  const values = new Map<string, string>();
  for (const setting of SETTINGS) {
    const option = program.options.find((o) => o.flags === setting.flag);
    if (option === undefined) continue;

    const key = option.attributeName();
    if (program.getOptionValueSource(key) !== 'cli') continue;

    const value: unknown = opts[key];
    // `--no-gzip` yields `false`; it goes through the same schema as the env value.
    if (typeof value === 'string' || typeof value === 'boolean') {
      values.set(settingId(setting), String(value));
    }
  }
  return values;
}
