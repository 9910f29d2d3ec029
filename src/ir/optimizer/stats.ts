/**
 * Rewrite counters reported by the local optimizer
 */
export interface OptimizationStats {
  identities: number;
  strengthReductions: number;
  cancellations: number;
  erasedInstructions: number;
}

export const createStats = (): OptimizationStats => ({
  identities: 0,
  strengthReductions: 0,
  cancellations: 0,
  erasedInstructions: 0,
});

export const addStats = (
  target: OptimizationStats,
  source: OptimizationStats,
): void => {
  target.identities += source.identities;
  target.strengthReductions += source.strengthReductions;
  target.cancellations += source.cancellations;
  target.erasedInstructions += source.erasedInstructions;
};

export const formatStats = (stats: OptimizationStats): string => {
  return `identities=${stats.identities} strength=${stats.strengthReductions} cancellations=${stats.cancellations} erased=${stats.erasedInstructions}`;
};
