import type { BasicBlock } from "../basic_block.js";
import type { IRFunction, IRModule } from "../ir_function.js";
import { assertValid } from "../ir_verifier.js";
import { algebraicSimplification } from "./passes/algebraic_simplification.js";
import { deadCodeElimination } from "./passes/dead_code.js";
import { inverseCancellation } from "./passes/inverse_cancellation.js";
import {
  addStats,
  createStats,
  formatStats,
  type OptimizationStats,
} from "./stats.js";

export interface LocalOptimizerOptions {
  verbose?: boolean;
  verify?: boolean;
}

/**
 * Run every local pass over one block, once, in fixed order.
 * No fixpoint: chains that need another round converge on a later call.
 */
export const optimizeBlock = (
  block: BasicBlock,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;

  // Algebraic identities and strength reduction
  if (algebraicSimplification(block, stats)) changed = true;
  // Collapse (x + C) - C and (x - C) + C
  if (inverseCancellation(block, stats)) changed = true;
  // Erase unused arithmetic
  if (deadCodeElimination(block, stats)) changed = true;

  return changed;
};

export const optimizeFunction = (
  fn: IRFunction,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;
  for (const block of fn.blocks) {
    if (optimizeBlock(block, stats)) changed = true;
  }
  return changed;
};

export const optimizeModule = (
  module: IRModule,
  stats?: OptimizationStats,
): boolean => {
  let changed = false;
  for (const fn of module.functions) {
    if (optimizeFunction(fn, stats)) changed = true;
  }
  return changed;
};

/**
 * Local optimizer with logging, verification and accumulated statistics
 */
export class LocalOptimizer {
  private readonly stats = createStats();

  constructor(private readonly options: LocalOptimizerOptions = {}) {}

  optimizeModule(module: IRModule): boolean {
    let changed = false;
    for (const fn of module.functions) {
      if (this.optimizeFunction(fn)) changed = true;
    }
    return changed;
  }

  optimizeFunction(fn: IRFunction): boolean {
    let changed = false;
    for (const block of fn.blocks) {
      if (this.optimizeBlock(block)) changed = true;
    }
    if (this.options.verify) {
      assertValid(fn);
    }
    return changed;
  }

  optimizeBlock(block: BasicBlock): boolean {
    const blockStats = createStats();
    const changed = optimizeBlock(block, blockStats);
    addStats(this.stats, blockStats);
    if (this.options.verbose) {
      const owner = block.parent ? `@${block.parent.name}/` : "";
      console.log(
        `${owner}${block.label}: ${changed ? "changed" : "unchanged"} (${formatStats(blockStats)})`,
      );
    }
    return changed;
  }

  getStats(): OptimizationStats {
    return { ...this.stats };
  }
}
