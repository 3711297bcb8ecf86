import { execFile } from "node:child_process";
import type { CredentialStore, SecretName, WritableSecretName } from "./store.js";
import { CredentialStoreError } from "./errors.js";

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Runs a program to completion. Rejects only when it could not be started. */
export type ExecFn = (file: string, args: readonly string[]) => Promise<ExecResult>;

export interface KeychainStoreOptions {
  readonly primaryService: string;
  readonly manualService: string;
  readonly manualAccount: string;
  readonly exec?: ExecFn;
}

const SECURITY_BIN = "security";
// Exit statuses of security(1) for errSecItemNotFound and errSecDuplicateItem.
const EXIT_ITEM_NOT_FOUND = 44;
const EXIT_DUPLICATE_ITEM = 45;

export const execFileResult: ExecFn = (file, args) =>
  new Promise<ExecResult>((resolve, reject) => {
    execFile(file, [...args], { encoding: "utf8" }, (error, stdout, stderr) => {
      if (error && typeof error.code !== "number") {
        reject(error);
        return;
      }
      resolve({ exitCode: error ? Number(error.code) : 0, stdout, stderr });
    });
  });

function isNotFound(result: ExecResult): boolean {
  return result.exitCode === EXIT_ITEM_NOT_FOUND || result.stderr.includes("could not be found");
}

/** Secrets kept in the macOS login keychain, driven through security(1). */
export class KeychainCredentialStore implements CredentialStore {
  readonly kind = "keychain";
  private readonly exec: ExecFn;

  constructor(private readonly options: KeychainStoreOptions) {
    this.exec = options.exec ?? execFileResult;
  }

  async read(name: SecretName): Promise<string | null> {
    const args =
      name === "primary"
        ? ["find-generic-password", "-s", this.options.primaryService, "-w"]
        : [
            "find-generic-password",
            "-s",
            this.options.manualService,
            "-a",
            this.options.manualAccount,
            "-w",
          ];

    const result = await this.run(args);
    if (result.exitCode === 0) {
      // -w terminates the secret with a newline.
      return result.stdout.replace(/\r?\n$/, "");
    }
    if (isNotFound(result)) return null;
    throw this.unexpected(`read ${name}`, result);
  }

  async write(name: WritableSecretName, secret: string): Promise<void> {
    await this.delete(name);

    const result = await this.run([
      "add-generic-password",
      "-s",
      this.options.manualService,
      "-a",
      this.options.manualAccount,
      "-w",
      secret,
    ]);
    if (result.exitCode === 0) return;
    if (result.exitCode === EXIT_DUPLICATE_ITEM) {
      throw new CredentialStoreError("DUPLICATE_ITEM", `A ${name} token already exists in the keychain`, {
        status: result.exitCode,
      });
    }
    throw this.unexpected(`write ${name}`, result);
  }

  async delete(name: WritableSecretName): Promise<void> {
    const result = await this.run([
      "delete-generic-password",
      "-s",
      this.options.manualService,
      "-a",
      this.options.manualAccount,
    ]);
    if (result.exitCode === 0 || isNotFound(result)) return;
    throw this.unexpected(`delete ${name}`, result);
  }

  private async run(args: readonly string[]): Promise<ExecResult> {
    try {
      return await this.exec(SECURITY_BIN, args);
    } catch (err) {
      throw new CredentialStoreError("UNEXPECTED_STATUS", "Could not run the keychain tool", {
        cause: err,
      });
    }
  }

  private unexpected(action: string, result: ExecResult): CredentialStoreError {
    const detail = result.stderr.trim();
    return new CredentialStoreError(
      "UNEXPECTED_STATUS",
      `Keychain ${action} failed with status ${result.exitCode}${detail ? `: ${detail}` : ""}`,
      { status: result.exitCode },
    );
  }
}
