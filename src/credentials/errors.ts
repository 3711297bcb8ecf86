export const CREDENTIAL_STORE_ERROR_CODES = [
  "ITEM_NOT_FOUND",
  "DUPLICATE_ITEM",
  "UNEXPECTED_STATUS",
  "INVALID_DATA",
] as const;

export type CredentialStoreErrorCode = (typeof CREDENTIAL_STORE_ERROR_CODES)[number];

export class CredentialStoreError extends Error {
  readonly code: CredentialStoreErrorCode;
  /** Exit status of the keychain tool, when one was involved. */
  readonly status: number | null;

  constructor(
    code: CredentialStoreErrorCode,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CredentialStoreError";
    this.code = code;
    this.status = options.status ?? null;
  }
}
