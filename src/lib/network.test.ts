import { describe, it, expect } from "vitest";
import { ask } from "./enumerationQuery";
import {
  DuplicateVariableError,
  InvalidConditionalTableError,
  MissingConditionalRowError,
  MissingParentValueError,
  UnknownVariableError,
  VariableNotInNetworkError,
} from "./errors";
import { Network } from "./network";
import type { Outcome } from "./outcome";
import type { Variable } from "./variable";

function createRainNetwork(): Network {
  return new Network({ name: "rain" })
    .add("Rain", [], { yes: 0.2, no: 0.8 })
    .add("Wet", ["Rain"], {
      yes: { yes: 0.9, no: 0.1 },
      no: { yes: 0.1, no: 0.9 },
    });
}

describe("Network", () => {
  it("keeps variables in the order they were added", () => {
    const network = createRainNetwork();

    expect(network.variables.map((v) => v.name)).toEqual(["Rain", "Wet"]);
    expect(network.size).toBe(2);
    expect(network.variableIndex(network.lookup("Wet"))).toBe(1);
  });

  it("resolves parents by name", () => {
    const network = createRainNetwork();
    const wet = network.lookup("Wet");

    expect(wet.parents).toHaveLength(1);
    expect(wet.parents[0]).toBe(network.lookup("Rain"));
    expect(wet.domain).toEqual(["yes", "no"]);
  });

  it("throws for a parent that was never added", () => {
    const network = new Network().add("Rain", [], 0.2);

    expect(() => network.add("Wet", ["Sprinkler"], [[true, 0.5]])).toThrow(
      UnknownVariableError,
    );
    expect(() => network.add("Wet", ["Sprinkler"], [[true, 0.5]])).toThrow(
      "Unknown variable: Sprinkler",
    );
    expect(network.size).toBe(1);
  });

  it("matches record keys to a boolean parent's outcomes", () => {
    const network = new Network()
      .add("A", [], 0.3)
      .add("B", ["A"], { true: 0.9, false: 0.2 });
    const b = network.lookup("B");

    expect(b.table.rows()).toEqual([[true], [false]]);
    expect(ask(b, new Map(), network).probability(true)).toBeCloseTo(
      0.3 * 0.9 + 0.7 * 0.2,
      10,
    );
  });

  it("matches record keys to a numeric parent's outcomes", () => {
    const network = new Network()
      .add("Level", [], new Map([
        [1, 1],
        [2, 1],
      ]))
      .add("Alert", ["Level"], { 1: 0.1, 2: 0.8 });

    expect(network.lookup("Alert").table.rows()).toEqual([[1], [2]]);
  });

  it("rejects record keys outside the parent's domain when added", () => {
    const network = new Network().add("A", [], 0.3);

    expect(() => network.add("B", ["A"], { yes: 0.5, no: 0.5 })).toThrow(
      InvalidConditionalTableError,
    );
    expect(() => network.add("B", ["A"], { yes: 0.5, no: 0.5 })).toThrow(
      "CPT row yes for B matches no outcome of A",
    );
    expect(network.size).toBe(1);
  });

  it("throws when a name is added twice", () => {
    const network = new Network().add("Rain", [], 0.2);

    expect(() => network.add("Rain", [], 0.3)).toThrow(DuplicateVariableError);
  });

  it("throws when looking up an unknown name", () => {
    expect(() => createRainNetwork().lookup("Snow")).toThrow(
      UnknownVariableError,
    );
  });

  it("rejects variables from another network", () => {
    const first = createRainNetwork();
    const second = createRainNetwork();

    expect(second.has(first.lookup("Rain"))).toBe(false);
    expect(() => second.variableIndex(first.lookup("Rain"))).toThrow(
      VariableNotInNetworkError,
    );
  });

  it("builds evidence from names", () => {
    const network = createRainNetwork();
    const evidence = network.evidence({ Wet: "yes" });

    expect(Array.from(evidence)).toEqual([[network.lookup("Wet"), "yes"]]);
    expect(() => network.evidence({ Snow: "yes" })).toThrow(
      UnknownVariableError,
    );
  });
});

describe("Variable", () => {
  it("derives its domain from every CPT row in first-seen order", () => {
    const network = new Network()
      .add("Season", [], { summer: 1, winter: 1 })
      .add("Temp", ["Season"], {
        summer: { hot: 0.7, mild: 0.3 },
        winter: { cold: 0.6, mild: 0.4 },
      });

    expect(network.lookup("Temp").domain).toEqual(["hot", "mild", "cold"]);
  });

  it("selects the CPT row from its parents' values", () => {
    const network = createRainNetwork();
    const rain = network.lookup("Rain");
    const wet = network.lookup("Wet");
    const assignment = new Map<Variable, Outcome>([
      [rain, "no"],
      [wet, "yes"],
    ]);

    expect(wet.conditional(assignment).get("yes")).toBeCloseTo(0.1, 12);
    expect(wet.probabilityOf("no", assignment)).toBeCloseTo(0.9, 12);
  });

  it("throws when a parent has no value", () => {
    const wet = createRainNetwork().lookup("Wet");

    expect(() => wet.conditional(new Map())).toThrow(MissingParentValueError);
  });

  it("throws when the parent value has no CPT row", () => {
    const network = createRainNetwork();
    const assignment = new Map<Variable, Outcome>([
      [network.lookup("Rain"), "maybe"],
    ]);

    expect(() => network.lookup("Wet").conditional(assignment)).toThrow(
      MissingConditionalRowError,
    );
  });
});
