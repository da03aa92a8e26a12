import { describe, it, expect } from "vitest";
import { doDerivative, doMask, doReduce, type VariableDefMap } from "../../src/output-def/derivation.js";
import { OutputVariableDef, type OutputVariableDefOptions } from "../../src/output-def/variable-def.js";
import { OutputVariableCategory } from "../../src/output-def/category.js";
import { OperationAlreadyAppliedError } from "../../src/output-def/errors.js";

function defs(...list: OutputVariableDef[]): VariableDefMap {
  return new Map(list.map((def) => [def.name, def]));
}

const energy = (extra: Partial<OutputVariableDefOptions> = {}) =>
  new OutputVariableDef({
    name: "energy",
    shape: [1],
    reducible: true,
    rDifferentiable: true,
    cDifferentiable: true,
    ...extra,
  });

describe("Derivation rules", () => {
  describe("doReduce", () => {
    it("reduces reducible variables to per-frame quantities", () => {
      const redu = doReduce(defs(energy()));
      expect([...redu.keys()]).toEqual(["energy_redu"]);

      const def = redu.get("energy_redu");
      expect(def?.shape).toEqual([1]);
      expect(def?.atomic).toBe(false);
      expect(def?.reducible).toBe(false);
      expect(def?.rDifferentiable).toBe(false);
      expect(def?.cDifferentiable).toBe(false);
      expect(def?.category).toBe(OutputVariableCategory.REDU);
    });

    it("skips variables that are not reducible", () => {
      const charge = new OutputVariableDef({ name: "charge", shape: [1] });
      expect(doReduce(defs(charge)).size).toBe(0);
    });

    it("keeps the input mapping unchanged", () => {
      const input = defs(energy());
      doReduce(input);
      doDerivative(input);
      expect([...input.keys()]).toEqual(["energy"]);
    });
  });

  describe("doDerivative", () => {
    it("appends a coordinate axis for the force and a cell axis for the virial", () => {
      const [dervR, dervC] = doDerivative(defs(energy()));
      expect([...dervR.keys()]).toEqual(["energy_derv_r"]);
      expect([...dervC.keys()]).toEqual(["energy_derv_c"]);

      const force = dervR.get("energy_derv_r");
      expect(force?.shape).toEqual([1, 3]);
      expect(force?.atomic).toBe(true);
      expect(force?.reducible).toBe(false);
      expect(force?.rDifferentiable).toBe(false);
      expect(force?.category).toBe(OutputVariableCategory.DERV_R);

      const virial = dervC.get("energy_derv_c");
      expect(virial?.shape).toEqual([1, 9]);
      expect(virial?.reducible).toBe(true);
      expect(virial?.atomic).toBe(true);
      expect(virial?.category).toBe(OutputVariableCategory.DERV_C);
    });

    it("emits only the coordinate derivative when the cell derivative is not requested", () => {
      const [dervR, dervC] = doDerivative(defs(energy({ cDifferentiable: false })));
      expect([...dervR.keys()]).toEqual(["energy_derv_r"]);
      expect(dervC.size).toBe(0);
    });

    it("keeps a force differentiable when the Hessian is requested", () => {
      const [dervR] = doDerivative(defs(energy({ rHessian: true })));
      expect(dervR.get("energy_derv_r")?.rDifferentiable).toBe(true);

      const [hess, hessC] = doDerivative(dervR);
      expect([...hess.keys()]).toEqual(["energy_derv_r_derv_r"]);
      expect(hessC.size).toBe(0);

      const hessian = hess.get("energy_derv_r_derv_r");
      expect(hessian?.shape).toEqual([1, 3, 3]);
      expect(hessian?.category).toBe(OutputVariableCategory.DERV_R_DERV_R);
      expect(hessian?.rDifferentiable).toBe(false);
    });

    it("only chains the Hessian from fitting outputs", () => {
      const reduced = energy({ rHessian: true, cDifferentiable: false, category: OutputVariableCategory.REDU });
      const [dervR] = doDerivative(defs(reduced));
      expect(dervR.get("energy_derv_r")?.rDifferentiable).toBe(false);
    });

    it("adds magnetic twins, with the magnetic virial in the coordinate mapping", () => {
      const [dervR, dervC] = doDerivative(defs(energy({ magnetic: true })));
      expect([...dervR.keys()]).toEqual(["energy_derv_r", "energy_derv_r_mag", "energy_derv_c_mag"]);
      expect([...dervC.keys()]).toEqual(["energy_derv_c"]);

      const magForce = dervR.get("energy_derv_r_mag");
      expect(magForce?.shape).toEqual([1, 3]);
      expect(magForce?.magnetic).toBe(true);
      expect(magForce?.category).toBe(OutputVariableCategory.DERV_R);

      const magVirial = dervR.get("energy_derv_c_mag");
      expect(magVirial?.shape).toEqual([1, 9]);
      expect(magVirial?.magnetic).toBe(true);
      expect(magVirial?.reducible).toBe(true);
      expect(magVirial?.category).toBe(OutputVariableCategory.DERV_C);
    });

    it("rejects differentiating a second derivative again", () => {
      const hessian = new OutputVariableDef({
        name: "energy_derv_r_derv_r",
        shape: [1, 3, 3],
        rDifferentiable: true,
        category: OutputVariableCategory.DERV_R_DERV_R,
      });
      expect(() => doDerivative(defs(hessian))).toThrow(OperationAlreadyAppliedError);
    });

    it("keeps a wildcard dimension in place", () => {
      const dos = new OutputVariableDef({ name: "dos", shape: [-1], reducible: true, rDifferentiable: true });
      const [dervR] = doDerivative(defs(dos));
      expect(dervR.get("dos_derv_r")?.shape).toEqual([-1, 3]);
    });
  });

  describe("doMask", () => {
    it("always emits the atom mask", () => {
      const mask = doMask(defs(energy()));
      expect([...mask.keys()]).toEqual(["mask"]);
      const def = mask.get("mask");
      expect(def?.shape).toEqual([1]);
      expect(def?.atomic).toBe(true);
      expect(def?.reducible).toBe(false);
      expect(def?.rDifferentiable).toBe(false);
    });

    it("adds the magnetic mask when any variable is magnetic", () => {
      const dipole = new OutputVariableDef({ name: "dipole", shape: [3] });
      const mask = doMask(defs(dipole, energy({ magnetic: true })));
      expect([...mask.keys()]).toEqual(["mask", "mask_mag"]);
    });
  });
});
