/**
 * Evaluation errors
 */

export type VmErrorKind = 'NonEvaluable' | 'NotAFunction' | 'InvalidUsage' | 'NotASymbol' | 'DepthExceeded';

const errorMessages: Record<VmErrorKind, string> = {
  NonEvaluable: 'Cannot evaluate an empty list',
  NotAFunction: 'Head of list is not a function',
  InvalidUsage: 'Invalid arguments',
  NotASymbol: 'Expected a symbol',
  DepthExceeded: 'Maximum evaluation depth exceeded',
};

export class VmError extends Error {
  constructor(
    public readonly kind: VmErrorKind,
    detail?: string
  ) {
    super(detail ? `${errorMessages[kind]}: ${detail}` : errorMessages[kind]);
    this.name = 'VmError';
  }
}

/**
 * Whether an error may be turned into an Error atom. Depth exhaustion is
 * never reified, so it always unwinds to the host.
 */
export function isReifiable(error: unknown): error is VmError {
  return error instanceof VmError && error.kind !== 'DepthExceeded';
}
