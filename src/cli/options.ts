import { TirError } from "../tir/errors/tir_errors.js";

export interface CliOptions {
  input: string | null;
  output: string | null;
  targetBits: number;
  print: boolean;
  verbose: boolean;
  help: boolean;
}

export const DEFAULT_TARGET_BITS = 32;

const requireValue = (argv: readonly string[], index: number, flag: string): string => {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new TirError("InvalidArgument", `Missing value for ${flag}`);
  }
  return value;
};

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = {
    input: null,
    output: null,
    targetBits: DEFAULT_TARGET_BITS,
    print: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === "-i" || arg === "--input") {
      opts.input = requireValue(argv, i, "-i/--input");
      i += 1;
      continue;
    }
    if (arg === "-o" || arg === "--output") {
      opts.output = requireValue(argv, i, "-o/--output");
      i += 1;
      continue;
    }
    if (arg === "-t" || arg === "--target-bits") {
      const value = requireValue(argv, i, "-t/--target-bits");
      if (!/^\d+$/.test(value)) {
        throw new TirError(
          "InvalidArgument",
          `Invalid value for -t/--target-bits: ${value}`,
        );
      }
      opts.targetBits = Number(value);
      i += 1;
      continue;
    }
    if (arg === "--print") {
      opts.print = true;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (!arg.startsWith("-") && opts.input === null) {
      opts.input = arg;
      continue;
    }
    throw new TirError("InvalidArgument", `Unknown option: ${arg}`);
  }

  return opts;
}

export const HELP_TEXT = `Usage: tir-narrow -i <module.json> [options]

Options:
  -i, --input <file>        Input module (JSON)
  -o, --output <file>       Output file (default: stdout)
  -t, --target-bits <n>     Target integer width (default: ${DEFAULT_TARGET_BITS})
  --print                   Write the narrowed module as text instead of JSON
  -v, --verbose             Log every width decision
  -h, --help                Show this help

Examples:
  tir-narrow -i matmul.json
  tir-narrow -i matmul.json -t 16 --print -v
`;

export function printHelp(): void {
  console.log(HELP_TEXT);
}
