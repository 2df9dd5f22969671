import { describe, it, expect } from "vitest";
import {
  formatDistribution,
  formatProbability,
  formatProbabilityAsPercentage,
} from "./formatProbability";
import { ProbabilityTable } from "./probabilityTable";

describe("formatProbability", () => {
  it("keeps the requested significant figures", () => {
    expect(formatProbability(0.692307692)).toBe("0.6923");
    expect(formatProbability(0.692307692, 2)).toBe("0.69");
  });

  it("drops padding zeros", () => {
    expect(formatProbability(0.25)).toBe("0.25");
  });

  it("prints certainties as integers", () => {
    expect(formatProbability(0)).toBe("0");
    expect(formatProbability(1)).toBe("1");
  });

  it("keeps exponent notation for tiny values", () => {
    expect(formatProbability(1.234e-7)).toBe("1.234e-7");
  });
});

describe("formatProbabilityAsPercentage", () => {
  it("scales to percent", () => {
    expect(formatProbabilityAsPercentage(0.5)).toBe("50%");
    expect(formatProbabilityAsPercentage(0.123)).toBe("12%");
    expect(formatProbabilityAsPercentage(1)).toBe("100%");
    expect(formatProbabilityAsPercentage(0)).toBe("0%");
  });
});

describe("formatDistribution", () => {
  it("prints one aligned line per outcome", () => {
    const table = ProbabilityTable.fromRecord({ yes: 0.25, no: 0.75 });

    expect(formatDistribution(table)).toBe("yes  0.25\nno   0.75");
  });

  it("keeps a line for each outcome whose labels would collide", () => {
    const table = ProbabilityTable.normalize<boolean | string>([
      [true, 1],
      ["true", 3],
    ]);

    expect(formatDistribution(table)).toBe('true    0.25\n"true"  0.75');
  });
});
