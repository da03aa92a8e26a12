import { z } from "zod";
import { DeclarationParseError } from "../output-def/errors.js";
import { FittingOutputDef } from "../output-def/fitting-output-def.js";
import { OutputVariableDef } from "../output-def/variable-def.js";
import { zodToDeclarationIssues } from "../validators/zod-error-mapper.js";

/**
 * JSON form of an output variable definition, as stored alongside model
 * weights. Keys are snake_case; omitted flags take their defaults.
 */
export const OutputVariableDeclaration = z
  .object({
    name: z.string().min(1),
    shape: z.array(z.number().int().min(-1)),
    reducible: z.boolean().optional(),
    r_differentiable: z.boolean().optional(),
    c_differentiable: z.boolean().optional(),
    atomic: z.boolean().optional(),
    category: z.number().int().min(0).optional(),
    r_hessian: z.boolean().optional(),
    magnetic: z.boolean().optional(),
    intensive: z.boolean().optional(),
  })
  .strict();

export const FittingOutputDeclaration = z
  .object({
    var_defs: z.array(OutputVariableDeclaration),
  })
  .strict();

export type OutputVariableDeclarationT = z.infer<typeof OutputVariableDeclaration>;
export type FittingOutputDeclarationT = z.infer<typeof FittingOutputDeclaration>;

export function variableDefFromDeclaration(decl: OutputVariableDeclarationT): OutputVariableDef {
  return new OutputVariableDef({
    name: decl.name,
    shape: decl.shape,
    reducible: decl.reducible,
    rDifferentiable: decl.r_differentiable,
    cDifferentiable: decl.c_differentiable,
    atomic: decl.atomic,
    category: decl.category,
    rHessian: decl.r_hessian,
    magnetic: decl.magnetic,
    intensive: decl.intensive,
  });
}

/**
 * Validate a JSON declaration and build the fitting output definition.
 *
 * @throws DeclarationParseError when the input does not match the declaration schema
 * @throws ConstructionInvariantError when a declared variable breaks a definition invariant
 */
export function parseFittingOutputDef(input: unknown): FittingOutputDef {
  const result = FittingOutputDeclaration.safeParse(input);
  if (!result.success) {
    const issues = zodToDeclarationIssues(result.error);
    throw new DeclarationParseError(
      `Invalid fitting output declaration: ${issues.map((issue) => issue.message).join("; ")}`,
      issues
    );
  }
  return new FittingOutputDef(result.data.var_defs.map(variableDefFromDeclaration));
}

export function serializeVariableDef(def: OutputVariableDef): OutputVariableDeclarationT {
  return {
    name: def.name,
    shape: [...def.shape],
    reducible: def.reducible,
    r_differentiable: def.rDifferentiable,
    c_differentiable: def.cDifferentiable,
    atomic: def.atomic,
    category: def.category,
    r_hessian: def.rHessian,
    magnetic: def.magnetic,
    intensive: def.intensive,
  };
}

export function serializeFittingOutputDef(fitDefs: FittingOutputDef): FittingOutputDeclarationT {
  return {
    var_defs: [...fitDefs.getData().values()].map(serializeVariableDef),
  };
}
