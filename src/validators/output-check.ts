/**
 * Output Checking
 *
 * Wraps a model or fitting network so that every call's result is
 * validated against the producer's declared output definition before it
 * is returned. The wrapper exposes the same contract as what it wraps.
 *
 * Failures are rethrown to the caller unchanged; nothing is recovered.
 *
 * @module validators/output-check
 */

import { getConfig } from "../config/index.js";
import { KeyNotFoundError, isOutputDefError } from "../output-def/errors.js";
import type { FittingOutputDef } from "../output-def/fitting-output-def.js";
import type { ModelOutputDef } from "../output-def/model-output-def.js";
import { getDerivName, getReduceName } from "../output-def/naming.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { checkVar, type ShapedTensor } from "./shape-validator.js";

/**
 * Result of a forward call: tensors keyed by output variable name
 */
export type OutputMap = { readonly [name: string]: ShapedTensor | undefined };

/**
 * A component that declares its outputs and produces them on call.
 */
export interface OutputProducer<TArgs extends unknown[], TDef, TOut extends OutputMap = OutputMap> {
  outputDef(): TDef;
  call(...args: TArgs): TOut;
}

export interface OutputCheckOptions {
  /** Emit a failure event before rethrowing. Defaults to OUTPUT_CHECK_LOG_FAILURES. */
  logFailures?: boolean;
}

type Component = "model" | "fitting";

abstract class OutputChecker<TArgs extends unknown[], TDef, TOut extends OutputMap>
  implements OutputProducer<TArgs, TDef, TOut>
{
  protected readonly md: TDef;
  private readonly options: Required<OutputCheckOptions>;

  constructor(
    protected readonly inner: OutputProducer<TArgs, TDef, TOut>,
    private readonly component: Component,
    options?: OutputCheckOptions
  ) {
    const defaults = getConfig().outputCheck;
    this.options = {
      logFailures: options?.logFailures ?? defaults.logFailures,
    };
    this.md = inner.outputDef();
  }

  outputDef(): TDef {
    return this.md;
  }

  call(...args: TArgs): TOut {
    const ret = this.inner.call(...args);

    try {
      this.check(ret);
    } catch (error) {
      if (this.options.logFailures) {
        emit(TelemetryEvents.OutputCheckFailed, {
          component: this.component,
          error_code: isOutputDefError(error) ? error.code : "INTERNAL",
          message: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }

    emit(TelemetryEvents.OutputCheckPassed, { component: this.component });
    return ret;
  }

  protected abstract check(ret: TOut): void;
}

function requireOutput(ret: OutputMap, key: string): ShapedTensor {
  // own keys only: a result object inherits "constructor", "toString", ...
  const tensor = Object.hasOwn(ret, key) ? ret[key] : undefined;
  if (tensor === undefined) {
    throw new KeyNotFoundError(`Output "${key}" is missing from the result`, key, "output");
  }
  return tensor;
}

/**
 * Checks a model's fitting outputs and, where declared, their reduced,
 * coordinate-derivative and cell-derivative companions.
 */
export class ModelOutputChecker<TArgs extends unknown[], TOut extends OutputMap = OutputMap>
  extends OutputChecker<TArgs, ModelOutputDef, TOut>
{
  constructor(inner: OutputProducer<TArgs, ModelOutputDef, TOut>, options?: OutputCheckOptions) {
    super(inner, "model", options);
  }

  protected check(ret: TOut): void {
    const md = this.md;
    for (const key of md.keysOutp()) {
      const def = md.get(key);
      checkVar(requireOutput(ret, key), def);

      if (def.reducible) {
        const reduName = getReduceName(key);
        checkVar(requireOutput(ret, reduName), md.get(reduName));
      }

      const [rName, cName] = getDerivName(key);
      if (def.rDifferentiable) {
        checkVar(requireOutput(ret, rName), md.get(rName));
      }
      if (def.cDifferentiable) {
        if (!def.rDifferentiable) {
          throw new Error(`Contract violation: "${key}" is c_differentiable but not r_differentiable`);
        }
        checkVar(requireOutput(ret, cName), md.get(cName));
      }
    }
  }
}

/**
 * Checks every declared output of a fitting network. Fitting networks do
 * not produce derivatives, so nothing else is checked.
 */
export class FittingOutputChecker<TArgs extends unknown[], TOut extends OutputMap = OutputMap>
  extends OutputChecker<TArgs, FittingOutputDef, TOut>
{
  constructor(inner: OutputProducer<TArgs, FittingOutputDef, TOut>, options?: OutputCheckOptions) {
    super(inner, "fitting", options);
  }

  protected check(ret: TOut): void {
    for (const [key, def] of this.md) {
      checkVar(requireOutput(ret, key), def);
    }
  }
}

export function modelCheckOutput<TArgs extends unknown[], TOut extends OutputMap>(
  model: OutputProducer<TArgs, ModelOutputDef, TOut>,
  options?: OutputCheckOptions
): ModelOutputChecker<TArgs, TOut> {
  return new ModelOutputChecker(model, options);
}

export function fittingCheckOutput<TArgs extends unknown[], TOut extends OutputMap>(
  fitting: OutputProducer<TArgs, FittingOutputDef, TOut>,
  options?: OutputCheckOptions
): FittingOutputChecker<TArgs, TOut> {
  return new FittingOutputChecker(fitting, options);
}
