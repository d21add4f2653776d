import { UnknownPassError } from "../ir/errors";
import {
  createFunctionalToExecutorConversionPass,
  FUNCTIONAL_TO_EXECUTOR_CONVERSION,
} from "./functional-to-executor";
import type { FunctionPass } from "./pass";
import {
  createReplicateInvariantOpHoistingPass,
  REPLICATE_INVARIANT_OP_HOISTING,
} from "./replicate-invariant-op-hoisting";

export type PassRegistration = {
  name: string;
  description: string;
  factory: () => FunctionPass;
};

const passes = new Map<string, PassRegistration>();

export function registerPass(
  name: string,
  description: string,
  factory: () => FunctionPass,
): void {
  passes.set(name, { name, description, factory });
}

registerPass(
  REPLICATE_INVARIANT_OP_HOISTING.name,
  REPLICATE_INVARIANT_OP_HOISTING.description,
  () => createReplicateInvariantOpHoistingPass(),
);
registerPass(
  FUNCTIONAL_TO_EXECUTOR_CONVERSION.name,
  FUNCTIONAL_TO_EXECUTOR_CONVERSION.description,
  () => createFunctionalToExecutorConversionPass(),
);

export function getPassRegistration(name: string): PassRegistration | undefined {
  return passes.get(name);
}

export function createPass(name: string): FunctionPass {
  const registration = passes.get(name);
  if (!registration) {
    throw new UnknownPassError(`Unknown pass: ${name}`);
  }
  return registration.factory();
}

export function listPasses(): PassRegistration[] {
  return Array.from(passes.values()).sort((a, b) => a.name.localeCompare(b.name));
}

/** Split a comma-separated pipeline description into pass names. */
export function parsePipeline(pipeline: string): string[] {
  return pipeline
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}
