export type AnalyzeCliArgs = {
  severityPath: string;
  ticketsPath: string;
  configPath?: string;
};

export const ANALYZE_USAGE =
  "Usage: npm run analyze -- --severity=<criteria.md> --tickets=<tickets.json> [--config=<config.json>]";

function readFlag(argv: string[], name: string): string | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg?.startsWith(`--${name}=`)) {
      return arg.slice(`--${name}=`.length);
    }
    if (arg === `--${name}`) {
      return argv[index + 1];
    }
  }
  return undefined;
}

export function readAnalyzeArgs(argv: string[]): AnalyzeCliArgs {
  const severityPath = readFlag(argv, "severity");
  const ticketsPath = readFlag(argv, "tickets");
  if (!severityPath || !ticketsPath) {
    throw new Error(ANALYZE_USAGE);
  }

  return { severityPath, ticketsPath, configPath: readFlag(argv, "config") };
}
