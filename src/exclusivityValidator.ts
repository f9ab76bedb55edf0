import type { ActiveKeyState, PolymorphicMapping } from './model';
import type { AttributeSource } from './resolver';
import { resolve } from './resolver';
import { singularize } from './naming';

export const EXCLUSIVE_ASSOCIATION_CODE = 'exclusive_association';

export interface ValidationIssue {
  /** The polymorphic role, never an individual column. */
  readonly field: string;
  readonly code: string;
  readonly message: string;
}

export type ValidationResult =
  | { readonly valid: true; readonly state: ActiveKeyState }
  | { readonly valid: false; readonly state: ActiveKeyState; readonly errors: readonly ValidationIssue[] };

/**
 * Host-side collector of validation failures, e.g. a model's error list.
 */
export interface ValidationSink {
  add(field: string, message: string): void;
}

/**
 * Application-level check of the exclusivity invariant, for the host's pre-save phase.
 * The database trigger stays the authoritative check.
 */
export class ExclusivityValidator {
  private readonly _message: string;

  constructor(private readonly _mapping: PolymorphicMapping) {
    const names = _mapping.relations.map(r => singularize(r.referencedTable));
    this._message = `exactly one of ${names.join(', ')} must be present`;
  }

  validate(values: AttributeSource): ValidationResult {
    const state = resolve(this._mapping, values);
    if (state.type === 'resolved') {
      return { valid: true, state };
    }
    return {
      valid: false,
      state,
      errors: [{ field: this._mapping.role, code: EXCLUSIVE_ASSOCIATION_CODE, message: this._message }],
    };
  }

  /**
   * Record any failure into the host's sink.
   * @returns whether the values are valid
   */
  validateInto(values: AttributeSource, sink: ValidationSink): boolean {
    const result = this.validate(values);
    if (!result.valid) {
      for (const error of result.errors) {
        sink.add(error.field, error.message);
      }
    }
    return result.valid;
  }
}
