import { describe, it, expect } from "vitest";
import { ProbabilityTable } from "./probabilityTable";
import { sample } from "./sample";

describe("sample", () => {
  const table = ProbabilityTable.fromRecord({ a: 1, b: 3 });

  it("returns the first outcome whose cumulative probability reaches the draw", () => {
    expect(sample(table, () => 0.1)).toBe("a");
    expect(sample(table, () => 0.25)).toBe("a");
    expect(sample(table, () => 0.3)).toBe("b");
    expect(sample(table, () => 0.99)).toBe("b");
  });

  it("falls back to the last outcome when the walk comes up short", () => {
    expect(sample(table, () => 1)).toBe("b");
  });

  it("draws joint rows as well as single outcomes", () => {
    const joint = ProbabilityTable.normalize([
      [["x", true], 1],
      [["y", false], 1],
    ]);

    expect(sample(joint, () => 0.75)).toEqual(["y", false]);
  });

  it("follows the table's distribution with the default generator", () => {
    const coin = ProbabilityTable.binary(1);

    for (let i = 0; i < 20; i++) {
      expect(sample(coin)).toBe(true);
    }
  });
});
