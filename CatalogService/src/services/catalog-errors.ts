export type CatalogErrorCode = "INVALID_EVENT" | "NOT_FOUND" | "STORE_FAILURE";

export class CatalogServiceError extends Error {
  constructor(
    public readonly code: CatalogErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CatalogServiceError";
  }
}

export function isCatalogServiceError(
  error: unknown,
  code?: CatalogErrorCode
): error is CatalogServiceError {
  return (
    error instanceof CatalogServiceError &&
    (code === undefined || error.code === code)
  );
}
