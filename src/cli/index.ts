#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import {
  BatchOptimizer,
  type BatchOptimizerOptions,
  runRounds,
} from "../batch/batch_optimizer.js";
import { parseModule } from "../ir/ir_parser.js";
import { printModule } from "../ir/ir_printer.js";
import { LocalOptimizer } from "../ir/optimizer/local_optimizer.js";
import { type CliOptions, parseArgs } from "./args.js";

function printHelp(): void {
  console.log(`Usage: local-opts -i <dir> [options]
       local-opts <file.lir> [options]

Options:
  -i, --input <dir>     Input directory of .lir files (repeatable)
  -o, --output <dir>    Output directory (default: output/local-opts)
  -r, --rounds <n>      Invoke the optimizer n times (default: 1)
  --verify              Check use lists after every function
  -v, --verbose         Verbose logging
  -h, --help            Show this help

Files given without -i are optimized and printed to stdout.

Examples:
  local-opts -i ir
  local-opts -i ir/core -i ir/extra -o out -r 2
  local-opts kernel.lir --verify
`);
}

function optimizeFileToStdout(file: string, opts: CliOptions): void {
  const resolved = path.resolve(file);
  const module = parseModule(fs.readFileSync(resolved, "utf8"), file);
  const optimizer = new LocalOptimizer({
    verbose: opts.verbose,
    verify: opts.verify,
  });
  runRounds(optimizer, module, opts.rounds);
  process.stdout.write(printModule(module));
}

async function main() {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    printHelp();
    return;
  }
  if (opts.inputs.length === 0 && opts.files.length === 0) {
    printHelp();
    process.exitCode = 1;
    return;
  }

  for (const file of opts.files) {
    try {
      optimizeFileToStdout(file, opts);
    } catch (err) {
      console.error(`Error optimizing ${file}:`);
      if (err instanceof Error) console.error(err.message);
      else console.error(err);
      process.exitCode = 1;
    }
  }

  const optimizer = new BatchOptimizer();
  for (const input of opts.inputs) {
    const resolvedInput = path.resolve(input);
    if (!fs.existsSync(resolvedInput)) {
      console.error(`Input not found: ${resolvedInput}`);
      process.exitCode = 1;
      continue;
    }
    if (!fs.statSync(resolvedInput).isDirectory()) {
      console.error(`Input must be a directory: ${resolvedInput}`);
      process.exitCode = 1;
      continue;
    }

    const outBase = path.resolve(opts.output);
    const outDir = path.join(outBase, path.basename(resolvedInput));

    if (opts.verbose) {
      console.log(`Optimizing ${resolvedInput} -> ${outDir}`);
    }

    const options: BatchOptimizerOptions = {
      sourceDir: resolvedInput,
      outputDir: outDir,
      rounds: opts.rounds,
      verify: opts.verify,
      verbose: opts.verbose,
    };

    try {
      const result = optimizer.optimize(options);
      if (opts.verbose) {
        console.log(
          `${result.outputs.length} file(s), ${result.outputs.filter((o) => o.changed).length} changed`,
        );
      }
    } catch (err) {
      console.error(`Error optimizing ${input}:`);
      if (err instanceof Error) console.error(err.message);
      else console.error(err);
      process.exitCode = 1;
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
