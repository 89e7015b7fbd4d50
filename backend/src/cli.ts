import { parseArgs } from 'util';
import { ConfigurationError, describeError } from './errors';

export interface CliOptions {
  configPath?: string;
  logLevel?: string;
  version: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: speedwatch [options]',
  '',
  '  -c, --config <path>     config file (default: CONFIG_PATH or ./config.json)',
  '  -l, --log-level <level> silent, error, warn, info or debug',
  '  -v, --version           print the version and exit',
  '  -h, --help              print this help and exit',
].join('\n');

/** Command-line flags; they win over the config file and the environment */
export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        'log-level': { type: 'string', short: 'l' },
        version: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      configPath: values.config,
      logLevel: values['log-level'],
      version: values.version ?? false,
      help: values.help ?? false,
    };
  } catch (error) {
    throw new ConfigurationError(`${describeError(error)}\n\n${USAGE}`);
  }
}
