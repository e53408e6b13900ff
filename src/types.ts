/**
 * MailGuard Configuration Types
 */

export interface PIIConfig {
  /** Run detection at all; a disabled guard reports everything safe */
  enabled: boolean;
  /** Confidence (0-1) at or above which detected PII blocks a send */
  threshold: number;
}

export interface MailGuardConfig {
  /** Config schema version */
  version: string;
  pii: PIIConfig;
}

/**
 * Where the effective configuration came from.
 */
export interface ResolvedConfig {
  config: MailGuardConfig;
  /** Config file that was read, if any */
  file: string | null;
  /** Environment variables that overrode the file */
  envOverrides: string[];
}
