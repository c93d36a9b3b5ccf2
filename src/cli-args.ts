import { ConfigurationError } from './errors.js';

export interface CliArgs {
  /** Continue this run from its latest checkpoint instead of starting a new one. */
  resume?: string;
  /** Overrides CONTENT_TOPIC for a new run. */
  topic?: string;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === '--resume' || token === '--topic') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigurationError(`${token} requires a value`);
      }
      if (token === '--resume') out.resume = value;
      else out.topic = value;
      i += 1;
    } else {
      throw new ConfigurationError(`Unknown argument: ${token}`);
    }
  }
  if (out.resume !== undefined && out.topic !== undefined) {
    throw new ConfigurationError('--topic cannot be combined with --resume');
  }
  return out;
}
