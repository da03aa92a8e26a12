/**
 * Output declarations of common fitting networks.
 */

import { FittingOutputDef } from "./fitting-output-def.js";
import { OutputVariableDef, WILDCARD_DIM } from "./variable-def.js";

export interface EnergyFittingOptions {
  varName?: string;
  /** Also derive the Hessian */
  rHessian?: boolean;
  /** Derivatives have magnetic parts (spin models) */
  magnetic?: boolean;
}

/**
 * Atomic energy: reduced to the frame energy, differentiated into
 * forces and virials.
 */
export function energyFittingOutput(options: EnergyFittingOptions = {}): FittingOutputDef {
  return new FittingOutputDef([
    new OutputVariableDef({
      name: options.varName ?? "energy",
      shape: [1],
      reducible: true,
      rDifferentiable: true,
      cDifferentiable: true,
      rHessian: options.rHessian ?? false,
      magnetic: options.magnetic ?? false,
    }),
  ]);
}

export interface DipoleFittingOptions {
  varName?: string;
  rDifferentiable?: boolean;
  cDifferentiable?: boolean;
}

export function dipoleFittingOutput(options: DipoleFittingOptions = {}): FittingOutputDef {
  return new FittingOutputDef([
    new OutputVariableDef({
      name: options.varName ?? "dipole",
      shape: [3],
      reducible: true,
      rDifferentiable: options.rDifferentiable ?? true,
      cDifferentiable: options.cDifferentiable ?? true,
    }),
  ]);
}

/**
 * Density of states. The number of grid points is a property of the
 * trained model, so the last dimension is left open.
 */
export function dosFittingOutput(varName = "dos"): FittingOutputDef {
  return new FittingOutputDef([
    new OutputVariableDef({
      name: varName,
      shape: [WILDCARD_DIM],
      reducible: true,
      atomic: true,
    }),
  ]);
}

export interface PropertyFittingOptions {
  varName?: string;
  taskDim: number;
  intensive?: boolean;
}

export function propertyFittingOutput(options: PropertyFittingOptions): FittingOutputDef {
  return new FittingOutputDef([
    new OutputVariableDef({
      name: options.varName ?? "property",
      shape: [options.taskDim],
      reducible: true,
      intensive: options.intensive ?? false,
    }),
  ]);
}
