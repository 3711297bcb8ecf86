import { chmod, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CredentialStore, SecretName, WritableSecretName } from "./store.js";
import { CredentialStoreError } from "./errors.js";
import { withFileLock } from "../utils/file-lock.js";

export interface FileStoreOptions {
  /** Credentials file owned by the Claude CLI. Never written here. */
  readonly primaryFile: string;
  /** Directory holding this process's own secrets file. */
  readonly stateDir: string;
}

type SecretsFile = Partial<Record<WritableSecretName, string>>;

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

/**
 * File-backed secrets for hosts without a keychain. The manual secret lives in
 * `<stateDir>/credentials.json`, readable by the owner only.
 */
export class FileCredentialStore implements CredentialStore {
  readonly kind = "file";
  private readonly secretsPath: string;

  constructor(private readonly options: FileStoreOptions) {
    this.secretsPath = join(options.stateDir, "credentials.json");
  }

  async read(name: SecretName): Promise<string | null> {
    if (name === "primary") {
      return this.readText(this.options.primaryFile);
    }
    const secrets = await this.readSecrets();
    return secrets[name] ?? null;
  }

  async write(name: WritableSecretName, secret: string): Promise<void> {
    await withFileLock(this.secretsPath, async () => {
      const secrets = await this.readSecrets();
      delete secrets[name];
      await this.writeSecrets({ ...secrets, [name]: secret });
    });
  }

  async delete(name: WritableSecretName): Promise<void> {
    await withFileLock(this.secretsPath, async () => {
      const secrets = await this.readSecrets();
      if (!(name in secrets)) return;
      delete secrets[name];
      await this.writeSecrets(secrets);
    });
  }

  private async readText(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw new CredentialStoreError("UNEXPECTED_STATUS", `Could not read ${path}`, { cause: err });
    }
  }

  private async readSecrets(): Promise<SecretsFile> {
    const raw = await this.readText(this.secretsPath);
    if (raw === null) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CredentialStoreError("INVALID_DATA", `${this.secretsPath} is not valid JSON`, {
        cause: err,
      });
    }
    if (typeof parsed !== "object" || parsed === null) {
      throw new CredentialStoreError("INVALID_DATA", `${this.secretsPath} does not hold an object`);
    }
    const manual: unknown = "manual" in parsed ? parsed.manual : undefined;
    return typeof manual === "string" ? { manual } : {};
  }

  private async writeSecrets(secrets: SecretsFile): Promise<void> {
    try {
      await writeFile(this.secretsPath, `${JSON.stringify(secrets, null, 2)}\n`, {
        encoding: "utf-8",
        mode: 0o600,
      });
      // mode only applies when the file is created
      await chmod(this.secretsPath, 0o600);
    } catch (err) {
      throw new CredentialStoreError("UNEXPECTED_STATUS", `Could not write ${this.secretsPath}`, {
        cause: err,
      });
    }
  }
}
