/**
 * Command line flags
 */

export interface CliOptions {
  inputs: string[];
  files: string[];
  output: string;
  rounds: number;
  verify: boolean;
  verbose: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    inputs: [],
    files: [],
    output: "output/local-opts",
    rounds: 1,
    verify: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? "";
    if (arg === "-i" || arg === "--input") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -i/--input");
      opts.inputs.push(value);
      i += 1;
      continue;
    }
    if (arg === "-o" || arg === "--output") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -o/--output");
      opts.output = value;
      i += 1;
      continue;
    }
    if (arg === "-r" || arg === "--rounds") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -r/--rounds");
      const rounds = Number(value);
      if (!Number.isInteger(rounds) || rounds < 1) {
        throw new Error(`Invalid value for -r/--rounds: ${value}`);
      }
      opts.rounds = rounds;
      i += 1;
      continue;
    }
    if (arg === "--verify") {
      opts.verify = true;
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
    if (!arg.startsWith("-")) {
      opts.files.push(arg);
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}
