export interface CliOptions {
  logPath?: string;
  verbose: boolean;
  once: boolean;
}

export function parseOptions(args: string[]): CliOptions {
  const logIdx = args.indexOf('--log');
  const logPath = logIdx >= 0 && logIdx + 1 < args.length ? args[logIdx + 1] : undefined;

  return {
    logPath,
    verbose: args.includes('--verbose'),
    once: args.includes('--once'),
  };
}
