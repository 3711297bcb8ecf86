/** Names of the two secrets the monitor knows about. */
export type SecretName = "primary" | "manual";

/** Only the manual secret is ever written by this process. */
export type WritableSecretName = Extract<SecretName, "manual">;

/**
 * Named-secret storage. `read` resolves `null` when the item does not exist
 * and rejects with a {@link CredentialStoreError} for anything else.
 */
export interface CredentialStore {
  readonly kind: string;
  read(name: SecretName): Promise<string | null>;
  /** Replaces any existing value. */
  write(name: WritableSecretName, secret: string): Promise<void>;
  /** Succeeds when the item is already absent. */
  delete(name: WritableSecretName): Promise<void>;
}
