/**
 * Structured error type for the PCI inventory tools.
 *
 * Carries a machine-readable code, category, and optional
 * remediation hint so callers can programmatically handle errors.
 */

export type ErrorCategory =
  | "validation"
  | "connection"
  | "timeout"
  | "not_found"
  | "source_unavailable"
  | "enumeration";

export class InventoryError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly remediation?: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    remediation?: string,
  ) {
    super(message);
    this.name = "InventoryError";
    this.code = code;
    this.category = category;
    this.remediation = remediation;
  }
}
