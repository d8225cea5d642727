/**
 * Farm Errors
 *
 * Expected, recoverable failures of the farm model. Callers surface these
 * as notices and carry on; they never end the process.
 */

export type FarmErrorKind =
  | 'InvalidTimestamp'
  | 'OutOfBounds'
  | 'SlotOccupied'
  | 'EmptySlot'
  | 'CropNotReady'
  | 'InsufficientFunds'
  | 'CropLocked'
  | 'UnknownCropType';

export interface FarmErrorDetails {
  x?: number;
  y?: number;
  cropTypeId?: string;
  timestamp?: number;
  required?: number;
  available?: number;
  remainingSeconds?: number;
  unlockLevel?: number;
}

export class FarmError extends Error {
  constructor(
    public readonly kind: FarmErrorKind,
    message: string,
    public readonly details: FarmErrorDetails = {}
  ) {
    super(message);
    this.name = 'FarmError';
  }
}

export function isFarmError(error: unknown): error is FarmError {
  return error instanceof FarmError;
}

/** Narrow to a specific kind, e.g. `isFarmErrorKind(e, 'EmptySlot')` */
export function isFarmErrorKind(error: unknown, kind: FarmErrorKind): error is FarmError {
  return error instanceof FarmError && error.kind === kind;
}
