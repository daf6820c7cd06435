/**
 * cmdtree Kernel — Error and Result Types
 *
 * Failure taxonomy of the registry tree:
 *
 * - RegistryValidationError: invalid construction or linking arguments.
 *   Thrown synchronously; the tree is left unchanged.
 * - RegistryStateError: an operation the entity's state forbids
 *   (disabling an essential entity, configuring a placeholder). No effect.
 * - A lookup miss is not an error: resolve() returns undefined.
 * - A registration conflict is not thrown either: registerCommand() returns
 *   a failed RegistrationResult and mutates nothing.
 */

// ---------------------------------------------------------------------------
// Thrown errors
// ---------------------------------------------------------------------------

export class RegistryValidationError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'RegistryValidationError';
  }
}

export class RegistryStateError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'RegistryStateError';
  }
}

// ---------------------------------------------------------------------------
// Registration results
// ---------------------------------------------------------------------------

/**
 * Why a command could not be registered into a node.
 */
export enum RegistrationFailure {
  /** Another command with the same name exists somewhere under the same root. */
  DuplicateName = 'DuplicateName',
  /** Sub-commands are reached through their parent command, never registered directly. */
  SubCommand = 'SubCommand',
  /** Placeholders anchor structure only and cannot own commands. */
  Placeholder = 'Placeholder',
}

export type RegistrationResult =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: RegistrationFailure;
      readonly message: string;
    };

/**
 * Outcome of a bulk registration. Items are attempted independently, so a
 * report may contain both registered and rejected names.
 */
export interface BulkRegistrationReport {
  readonly registered: ReadonlyArray<string>;
  readonly rejected: ReadonlyArray<{
    readonly name: string;
    readonly reason: RegistrationFailure;
    readonly message: string;
  }>;
}

// ---------------------------------------------------------------------------
// Structural validation results
// ---------------------------------------------------------------------------

/**
 * A validation error produced by the module validator or config validation.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
