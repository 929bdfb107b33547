/**
 * Fleetwire Kernel: Validation Result Types
 *
 * Used wherever untrusted input (inventory documents, configuration files)
 * is checked before it is allowed into the typed model.
 */

/** A single validation failure. `context` names where it was found. */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Result of a validation pass.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
