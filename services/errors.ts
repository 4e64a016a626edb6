// services/errors.ts

export type ImporterErrorKind =
  | "Misconfigured"
  | "NotFound"
  | "SupplierUnavailable"
  | "CategoryNotFound"
  | "DestinationUnavailable"
  | "DestinationRejected"
  | "PartialWriteFailure"
  | "InvalidRequest";

export class ImporterError extends Error {
  readonly kind: ImporterErrorKind;

  constructor(kind: ImporterErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImporterError";
    this.kind = kind;
  }
}

export function isImporterError(err: unknown): err is ImporterError {
  return err instanceof ImporterError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Message shown to the operator. Supplier outages get a generic text;
 * the specific cause only goes to the log.
 */
export function operatorMessage(err: ImporterError): string {
  if (err.kind === "SupplierUnavailable") {
    return "The supplier could not be reached. Please try again later.";
  }
  return err.message;
}

export const HTTP_STATUS: Record<ImporterErrorKind, number> = {
  InvalidRequest: 400,
  NotFound: 404,
  CategoryNotFound: 422,
  Misconfigured: 500,
  SupplierUnavailable: 503,
  DestinationUnavailable: 502,
  DestinationRejected: 502,
  PartialWriteFailure: 207
};
