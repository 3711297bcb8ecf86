import { describe, it, expect } from "vitest";
import { extractPrimaryToken, normalizeManualToken } from "../../src/credentials/extract.js";
import { CredentialStoreError } from "../../src/credentials/errors.js";
import { PRIMARY_TOKEN, primaryBlob } from "../helpers/fixtures.js";

function invalidDataMessage(raw: string): string | null {
  try {
    extractPrimaryToken(raw);
    return null;
  } catch (err) {
    expect(err).toBeInstanceOf(CredentialStoreError);
    if (!(err instanceof CredentialStoreError)) return null;
    expect(err.code).toBe("INVALID_DATA");
    return err.message;
  }
}

describe("extractPrimaryToken", () => {
  it("reads the access token from the credentials blob", () => {
    expect(extractPrimaryToken(primaryBlob())).toBe(PRIMARY_TOKEN);
  });

  it("decodes hex-encoded payloads", () => {
    const hex = Buffer.from(primaryBlob(), "utf8").toString("hex");
    expect(extractPrimaryToken(hex)).toBe(PRIMARY_TOKEN);
  });

  it("strips null bytes around and inside the payload", () => {
    expect(extractPrimaryToken(`\u0000${primaryBlob()}\u0000\n`)).toBe(PRIMARY_TOKEN);
  });

  it("tolerates a document cut off after the token", () => {
    const truncated = `{"claudeAiOauth":{"accessToken":"${PRIMARY_TOKEN}","refreshTo`;
    expect(extractPrimaryToken(truncated)).toBe(PRIMARY_TOKEN);
  });

  it("accepts JSON that was escaped once more", () => {
    const escaped = '{\\"accessToken\\":\\"sk-ant-test-escaped\\"}';
    expect(extractPrimaryToken(escaped)).toBe("sk-ant-test-escaped");
  });

  it("rejects a blob without an accessToken field", () => {
    expect(invalidDataMessage('{"claudeAiOauth":{}}')).toBe(
      "No accessToken field in the primary credentials",
    );
  });

  it("rejects a token without the expected prefix", () => {
    expect(invalidDataMessage('{"accessToken":"test-secret"}')).toBe(
      "Primary access token has an unexpected format",
    );
  });
});

describe("normalizeManualToken", () => {
  it("trims surrounding whitespace", () => {
    expect(normalizeManualToken("  test-secret \n")).toBe("test-secret");
  });

  it("returns null for blank input", () => {
    expect(normalizeManualToken("   ")).toBeNull();
    expect(normalizeManualToken("\u0000\u0000")).toBeNull();
  });
});
