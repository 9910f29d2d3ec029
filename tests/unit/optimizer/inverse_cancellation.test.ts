import { describe, expect, it } from "vitest";
import { parseFunction } from "../../../src/ir/ir_parser.js";
import { printFunction } from "../../../src/ir/ir_printer.js";
import { inverseCancellation } from "../../../src/ir/optimizer/passes/inverse_cancellation.js";
import { createStats } from "../../../src/ir/optimizer/stats.js";

const cancel = (lines: string[]) => {
  const fn = parseFunction(
    ["func @f(i32 %x) -> i32 {", "entry:", ...lines, "}"].join("\n"),
  );
  const block = fn.blocks[0];
  if (!block) throw new Error("missing block");
  const stats = createStats();
  const changed = inverseCancellation(block, stats);
  return { changed, stats, lines: printFunction(fn).split("\n").slice(2, -1) };
};

describe("inverse cancellation", () => {
  it("collapses (x + C) - C", () => {
    const result = cancel([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 5",
      "  ret i32 %r",
    ]);
    expect(result.changed).toBe(true);
    expect(result.stats.cancellations).toBe(1);
    expect(result.lines).toEqual([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 5",
      "  ret i32 %x",
    ]);
  });

  it("collapses (x - C) + C with the constant first in the add", () => {
    const result = cancel([
      "  %t = sub i32 %x, 9",
      "  %r = add i32 9, %t",
      "  ret i32 %r",
    ]);
    expect(result.lines.at(-1)).toBe("  ret i32 %x");
  });

  it("matches the constant in either operand of sub", () => {
    const result = cancel([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 5, %t",
      "  ret i32 %r",
    ]);
    expect(result.lines.at(-1)).toBe("  ret i32 %x");
  });

  it("requires equal constants", () => {
    const result = cancel([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 6",
      "  ret i32 %r",
    ]);
    expect(result.changed).toBe(false);
    expect(result.lines.at(-1)).toBe("  ret i32 %r");
  });

  it("compares constants by bit pattern", () => {
    const result = cancel([
      "  %t = add i32 %x, -1",
      "  %r = sub i32 %t, 4294967295",
      "  ret i32 %r",
    ]);
    expect(result.lines.at(-1)).toBe("  ret i32 %x");
  });

  it("reports no change when the cancelled value is unused", () => {
    const result = cancel([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 5",
      "  ret i32 %x",
    ]);
    expect(result.changed).toBe(false);
    expect(result.stats.cancellations).toBe(0);
  });

  it("rewrites only the matching users", () => {
    const result = cancel([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 5",
      "  %q = sub i32 %t, 6",
      "  %w = add i32 %t, 5",
      "  %s = add i32 %r, %q",
      "  %u = add i32 %s, %w",
      "  ret i32 %u",
    ]);
    expect(result.stats.cancellations).toBe(1);
    expect(result.lines).toEqual([
      "  %t = add i32 %x, 5",
      "  %r = sub i32 %t, 5",
      "  %q = sub i32 %t, 6",
      "  %w = add i32 %t, 5",
      "  %s = add i32 %x, %q",
      "  %u = add i32 %s, %w",
      "  ret i32 %u",
    ]);
  });
});
