/**
 * Batch optimizer: every IR file under a directory, mirrored to an output
 * directory
 */

import fs from "node:fs";
import path from "node:path";
import { ErrorCollector } from "../errors/error_collector.js";
import { IRParseError } from "../errors/ir_errors.js";
import type { IRModule } from "../ir/ir_function.js";
import { parseModule } from "../ir/ir_parser.js";
import { printModule } from "../ir/ir_printer.js";
import { LocalOptimizer } from "../ir/optimizer/local_optimizer.js";
import type { OptimizationStats } from "../ir/optimizer/stats.js";
import { discoverIRFiles, IR_FILE_EXTENSION } from "./file_discovery.js";

export interface BatchOptimizerOptions {
  sourceDir: string;
  outputDir: string;
  rounds?: number;
  verify?: boolean;
  verbose?: boolean;
  excludeDirs?: string[];
  outputExtension?: string;
}

export interface BatchFileResult {
  inputPath: string;
  outputPath: string;
  changed: boolean;
}

export interface BatchResult {
  outputs: BatchFileResult[];
  stats: OptimizationStats;
}

export const DEFAULT_OUTPUT_EXTENSION = ".opt.lir";

/**
 * Invoke the optimizer `rounds` times. Each round is one ordinary call;
 * the optimizer itself never iterates.
 */
export const runRounds = (
  optimizer: LocalOptimizer,
  module: IRModule,
  rounds: number,
): boolean => {
  let changed = false;
  for (let round = 0; round < rounds; round++) {
    if (optimizer.optimizeModule(module)) changed = true;
  }
  return changed;
};

export class BatchOptimizer {
  optimize(options: BatchOptimizerOptions): BatchResult {
    const rounds = options.rounds ?? 1;
    if (!Number.isInteger(rounds) || rounds < 1) {
      throw new Error(`rounds must be a positive integer, got ${rounds}`);
    }
    const outputExtension = options.outputExtension ?? DEFAULT_OUTPUT_EXTENSION;
    const errorCollector = new ErrorCollector();
    const optimizer = new LocalOptimizer({
      verbose: options.verbose,
      verify: options.verify,
    });
    const outputs: BatchFileResult[] = [];

    const files = discoverIRFiles({
      sourceDir: options.sourceDir,
      excludeDirs: options.excludeDirs,
      skipExtension: outputExtension,
    });

    for (const inputPath of files) {
      const relative = path.relative(options.sourceDir, inputPath);
      let module: IRModule;
      try {
        module = parseModule(fs.readFileSync(inputPath, "utf8"), relative);
      } catch (err) {
        if (err instanceof IRParseError) {
          errorCollector.add(err);
          continue;
        }
        throw err;
      }

      if (module.functions.length === 0) {
        console.warn(`No functions found in ${relative}`);
      }

      const changed = runRounds(optimizer, module, rounds);
      const outputPath = path.join(
        options.outputDir,
        relative.slice(0, relative.length - IR_FILE_EXTENSION.length) +
          outputExtension,
      );
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(outputPath, printModule(module), "utf8");
      if (options.verbose) {
        console.log(
          `${changed ? "Optimized" : "Unchanged"}: ${relative} -> ${outputPath}`,
        );
      }
      outputs.push({ inputPath, outputPath, changed });
    }

    errorCollector.throwIfErrors();
    return { outputs, stats: optimizer.getStats() };
  }
}
