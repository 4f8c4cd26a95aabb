import { describe, it, expect } from "vitest";
import { assignFlowsNashEquilibrium } from "./nash-equilibrium.js";
import { NotFoundError } from "../domain/errors.js";
import type { Path } from "../domain/index.js";

function makePaths(count: number): Path[] {
  return Array.from({ length: count }, (_, i) => ({
    nodeIds: ["s", `m${i}`, "t"],
    edgeIds: [`s->m${i}`, `m${i}->t`],
  }));
}

describe("assignFlowsNashEquilibrium", () => {
  it("splits demand equally across paths", () => {
    expect(assignFlowsNashEquilibrium(makePaths(2), 10)).toEqual([5, 5]);
    expect(assignFlowsNashEquilibrium(makePaths(4), 10)).toEqual([2.5, 2.5, 2.5, 2.5]);
  });

  it("conserves demand when it does not divide evenly", () => {
    const flows = assignFlowsNashEquilibrium(makePaths(3), 10);
    const total = flows.reduce((a, b) => a + b, 0);
    expect(Math.abs(total - 10)).toBeLessThanOrEqual(1e-9);
    expect(flows[0]).toBe(10 / 3);
  });

  it("returns an empty vector when there are no paths", () => {
    expect(assignFlowsNashEquilibrium([], 10)).toEqual([]);
  });

  it("assigns zeros for zero demand", () => {
    expect(assignFlowsNashEquilibrium(makePaths(2), 0)).toEqual([0, 0]);
  });

  it("rejects negative demand", () => {
    expect(() => assignFlowsNashEquilibrium(makePaths(2), -3)).toThrow(NotFoundError);
  });
});
