/**
 * Engine type definitions: planned changes in, violations out
 */

/**
 * Lifecycle verb from a Terraform plan: create, read, update, delete or no-op
 */
export type ChangeAction = string;

/**
 * One planned change to one resource
 */
export interface ResourceChange {
  /** Unique address, e.g. `aws_s3_bucket.logs` or `module.app.aws_instance.web[0]` */
  address: string;
  /** Resource kind, e.g. `aws_s3_bucket` */
  type: string;
  actions: readonly ChangeAction[];
  /**
   * Tags declared on the resource (`after.tags`), as found in the plan.
   * `undefined`/`null` means the resource does not expose the field.
   */
  declaredTags?: unknown;
  /**
   * Fully resolved tags including provider defaults (`after.tags_all`).
   * `undefined`/`null` means the resource does not expose the field.
   */
  resolvedTags?: unknown;
}

/**
 * Tag name → value
 */
export type TagMap = Readonly<Record<string, string>>;

/**
 * Source position of a resource declaration
 */
export interface ResourceLocation {
  /** File name relative to the Terraform directory */
  file: string;
  /** 1-based line number */
  line: number;
}

/**
 * Looks up where a resource is declared; `null` when it cannot be found
 */
export type ResourceLocator = (address: string) => ResourceLocation | null;

// =============================================================================
// Violations
// =============================================================================

export type ViolationKind = 'MissingTag' | 'InvalidValue' | 'InvalidFormat';

interface ViolationBase {
  resourceAddress: string;
  location?: ResourceLocation;
  tagName: string;
}

export interface MissingTagViolation extends ViolationBase {
  kind: 'MissingTag';
  reason: 'absent' | 'empty value';
}

export interface InvalidValueViolation extends ViolationBase {
  kind: 'InvalidValue';
  actualValue: string;
  allowedValues: readonly string[];
}

export interface InvalidFormatViolation extends ViolationBase {
  kind: 'InvalidFormat';
  actualValue: string;
  formatDescription: string;
}

/**
 * A single rule failure for one resource and one tag
 */
export type Violation = Readonly<MissingTagViolation | InvalidValueViolation | InvalidFormatViolation>;

/**
 * Outcome of one validation run
 */
export interface ValidationResult {
  /** Resource order, then rule order, then check order */
  readonly violations: readonly Violation[];
  /** Number of in-scope resources evaluated */
  readonly resourcesChecked: number;
}
