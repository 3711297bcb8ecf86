import type { CredentialsConfig } from "../config/types.js";
import { getClaudeCredentialsPath } from "../config/paths.js";
import type { CredentialStore } from "./store.js";
import { KeychainCredentialStore } from "./keychain-store.js";
import { FileCredentialStore } from "./file-store.js";

export function createCredentialStore(
  config: CredentialsConfig,
  stateDir: string,
  platform: NodeJS.Platform = process.platform,
): CredentialStore {
  const backend = config.backend === "auto" ? (platform === "darwin" ? "keychain" : "file") : config.backend;

  if (backend === "keychain") {
    return new KeychainCredentialStore({
      primaryService: config.primaryService,
      manualService: config.manualService,
      manualAccount: config.manualAccount,
    });
  }

  return new FileCredentialStore({
    primaryFile: config.primaryFile ?? getClaudeCredentialsPath(),
    stateDir,
  });
}
