import { CredentialStoreError } from "./errors.js";

const ACCESS_TOKEN_PATTERN = /\\?"accessToken\\?"\s*:\s*\\?"([^"\\]+)\\?"/;
const TOKEN_PREFIX = "sk-ant-";
const NULL_BYTES = /\u0000/g;

function isHexPayload(value: string): boolean {
  return value.length > 0 && value.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(value);
}

/**
 * The keychain tool prints an item as hex when it holds non-printable bytes,
 * so both spellings are accepted.
 */
function normalizePayload(raw: string): string {
  const trimmed = raw.replace(NULL_BYTES, "").trim();
  if (isHexPayload(trimmed)) {
    return Buffer.from(trimmed, "hex").toString("utf8").replace(NULL_BYTES, "");
  }
  return trimmed;
}

/**
 * Pulls the OAuth access token out of the Claude CLI credentials blob.
 *
 * The blob is JSON in principle, but keychain copies are known to carry
 * embedded null bytes and to be cut off mid-document, so the field is found
 * with a pattern search instead of a full parse.
 */
export function extractPrimaryToken(raw: string): string {
  const payload = normalizePayload(raw);
  const match = ACCESS_TOKEN_PATTERN.exec(payload);
  const token = match?.[1];
  if (!token) {
    throw new CredentialStoreError("INVALID_DATA", "No accessToken field in the primary credentials");
  }
  if (!token.startsWith(TOKEN_PREFIX)) {
    throw new CredentialStoreError("INVALID_DATA", "Primary access token has an unexpected format");
  }
  return token;
}

/** Manual tokens are stored verbatim; surrounding whitespace is not part of them. */
export function normalizeManualToken(raw: string): string | null {
  const token = raw.replace(NULL_BYTES, "").trim();
  return token.length > 0 ? token : null;
}
