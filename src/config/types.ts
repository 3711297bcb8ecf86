export type CredentialBackend = "auto" | "keychain" | "file";

export interface MonitorConfig {
  readonly refresh: RefreshConfig;
  readonly api: ApiConfig;
  readonly credentials: CredentialsConfig;
  readonly state: StateConfig;
  readonly server: ServerConfig;
  readonly logging?: LoggingConfig;
}

export interface RefreshConfig {
  /** Delay between two scheduled refreshes. */
  readonly intervalMs: number;
}

export interface ApiConfig {
  readonly endpoint: string;
  readonly betaHeader: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
}

export interface CredentialsConfig {
  readonly backend: CredentialBackend;
  /** Keychain service the Claude CLI writes its OAuth credentials to. */
  readonly primaryService: string;
  readonly manualService: string;
  readonly manualAccount: string;
  /** Credentials file read by the file backend; defaults to ~/.claude/.credentials.json. */
  readonly primaryFile?: string;
}

export interface StateConfig {
  /** Per-subscriber buffer before the oldest undelivered states are dropped. */
  readonly subscriberBufferSize: number;
}

export interface ServerConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
