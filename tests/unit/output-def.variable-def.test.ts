import { describe, it, expect } from "vitest";
import { OutputVariableDef } from "../../src/output-def/variable-def.js";
import { ConstructionInvariantError } from "../../src/output-def/errors.js";
import { OutputVariableCategory } from "../../src/output-def/category.js";
import { captureError } from "../helpers/capture-error.js";

interface Flags {
  reducible: boolean;
  rDifferentiable: boolean;
  cDifferentiable: boolean;
  atomic: boolean;
  intensive: boolean;
  rHessian: boolean;
}

const FLAG_NAMES: (keyof Flags)[] = [
  "reducible",
  "rDifferentiable",
  "cDifferentiable",
  "atomic",
  "intensive",
  "rHessian",
];

function allFlagCombinations(): Flags[] {
  const combos: Flags[] = [];
  for (let bits = 0; bits < 1 << FLAG_NAMES.length; bits++) {
    combos.push({
      reducible: (bits & 1) !== 0,
      rDifferentiable: (bits & 2) !== 0,
      cDifferentiable: (bits & 4) !== 0,
      atomic: (bits & 8) !== 0,
      intensive: (bits & 16) !== 0,
      rHessian: (bits & 32) !== 0,
    });
  }
  return combos;
}

function satisfiesInvariants(f: Flags): boolean {
  return (
    (!f.cDifferentiable || f.rDifferentiable) &&
    (!f.reducible || f.atomic) &&
    (!f.intensive || f.reducible) &&
    (!f.rHessian || (f.reducible && f.rDifferentiable))
  );
}

describe("OutputVariableDef", () => {
  describe("defaults", () => {
    it("is an atomic fitting output with no derivation flags", () => {
      const def = new OutputVariableDef({ name: "energy", shape: [1] });
      expect(def.atomic).toBe(true);
      expect(def.reducible).toBe(false);
      expect(def.rDifferentiable).toBe(false);
      expect(def.cDifferentiable).toBe(false);
      expect(def.intensive).toBe(false);
      expect(def.rHessian).toBe(false);
      expect(def.magnetic).toBe(false);
      expect(def.category).toBe(OutputVariableCategory.OUT);
    });
  });

  describe("size", () => {
    it("is the product of the shape", () => {
      expect(new OutputVariableDef({ name: "energy", shape: [1] }).size).toBe(1);
      expect(new OutputVariableDef({ name: "polar", shape: [3, 3] }).size).toBe(9);
      expect(new OutputVariableDef({ name: "tensor", shape: [2, 3, 4] }).size).toBe(24);
      expect(new OutputVariableDef({ name: "scalar", shape: [] }).size).toBe(1);
    });

    it("is -1 when a dimension is a wildcard", () => {
      const dos = new OutputVariableDef({ name: "dos", shape: [-1] });
      expect(dos.size).toBe(-1);
      expect(dos.hasWildcard).toBe(true);
      expect(new OutputVariableDef({ name: "x", shape: [-1, 3] }).size).toBe(-1);
      expect(new OutputVariableDef({ name: "x", shape: [2, 3] }).hasWildcard).toBe(false);
    });
  });

  describe("construction invariants", () => {
    it("accepts exactly the flag combinations satisfying every invariant", () => {
      for (const flags of allFlagCombinations()) {
        const build = () => new OutputVariableDef({ name: "v", shape: [2, 3], ...flags });
        if (satisfiesInvariants(flags)) {
          expect(build().size).toBe(6);
        } else {
          expect(build).toThrow(ConstructionInvariantError);
        }
      }
    });

    it("requires r_differentiable for c_differentiable", () => {
      const error = captureError(
        () => new OutputVariableDef({ name: "energy", shape: [1], cDifferentiable: true }),
        ConstructionInvariantError
      );
      expect(error.message).toBe('Output variable "energy": c differentiable requires r_differentiable');
      expect(error.invariant).toBe("c_differentiable_requires_r_differentiable");
      expect(error.variable).toBe("energy");
    });

    it("requires atomic for reducible", () => {
      const error = captureError(
        () => new OutputVariableDef({ name: "energy", shape: [1], reducible: true, atomic: false }),
        ConstructionInvariantError
      );
      expect(error.invariant).toBe("reducible_requires_atomic");
    });

    it("requires reducible for intensive", () => {
      const error = captureError(
        () => new OutputVariableDef({ name: "band_gap", shape: [1], intensive: true }),
        ConstructionInvariantError
      );
      expect(error.invariant).toBe("intensive_requires_reducible");
    });

    it("requires reducible and r_differentiable for the Hessian", () => {
      expect(
        captureError(
          () => new OutputVariableDef({ name: "energy", shape: [1], rHessian: true, rDifferentiable: true }),
          ConstructionInvariantError
        ).invariant
      ).toBe("hessian_requires_reducible");
      expect(
        captureError(
          () => new OutputVariableDef({ name: "energy", shape: [1], rHessian: true, reducible: true }),
          ConstructionInvariantError
        ).invariant
      ).toBe("hessian_requires_r_differentiable");
    });

    it("rejects malformed shapes", () => {
      expect(
        captureError(() => new OutputVariableDef({ name: "x", shape: [2.5] }), ConstructionInvariantError).invariant
      ).toBe("integer_shape");
      expect(
        captureError(() => new OutputVariableDef({ name: "x", shape: [3, -2] }), ConstructionInvariantError)
          .invariant
      ).toBe("non_negative_shape");
    });

    it("rejects an empty name", () => {
      expect(
        captureError(() => new OutputVariableDef({ name: "", shape: [1] }), ConstructionInvariantError).invariant
      ).toBe("non_empty_name");
    });

    it("rejects unknown category bits", () => {
      expect(
        captureError(
          () => new OutputVariableDef({ name: "x", shape: [1], category: 32 }),
          ConstructionInvariantError
        ).invariant
      ).toBe("known_category_bits");
      expect(() => new OutputVariableDef({ name: "x", shape: [1], category: -1 })).toThrow(
        ConstructionInvariantError
      );
    });
  });

  describe("immutability", () => {
    it("freezes the definition and its shape", () => {
      const shape = [3];
      const def = new OutputVariableDef({ name: "dipole", shape });
      shape.push(4);
      expect(def.shape).toEqual([3]);
      expect(Object.isFrozen(def)).toBe(true);
      expect(Object.isFrozen(def.shape)).toBe(true);
    });
  });

  describe("squeeze", () => {
    const def = new OutputVariableDef({
      name: "energy_derv_r",
      shape: [3, 1],
      rDifferentiable: true,
      category: OutputVariableCategory.DERV_R,
    });

    it("removes a unit dimension", () => {
      const squeezed = def.squeeze(1);
      expect(squeezed.shape).toEqual([3]);
      expect(squeezed.name).toBe("energy_derv_r");
      expect(squeezed.rDifferentiable).toBe(true);
      expect(squeezed.category).toBe(OutputVariableCategory.DERV_R);
      expect(squeezed.size).toBe(3);
    });

    it("counts negative dimensions from the end", () => {
      expect(def.squeeze(-1).shape).toEqual([3]);
    });

    it("leaves non-unit and out-of-range dimensions alone", () => {
      expect(def.squeeze(0)).toBe(def);
      expect(def.squeeze(2)).toBe(def);
      expect(def.squeeze(-3)).toBe(def);
      expect(def.shape).toEqual([3, 1]);
    });
  });
});
