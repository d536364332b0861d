export interface SiteConfig {
  name: string;
  /** Public origin used in e-mail links, without trailing slash. */
  baseUrl: string;
}

export interface ServerConfig {
  port: number;
  corsOrigin: string;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  connectionTimeoutMs: number;
  idleTimeoutMs: number;
  /** 0 disables the statement timeout. */
  statementTimeoutMs: number;
}

export interface AuthConfig {
  sessionTtlMinutes: number;
  rememberTtlDays: number;
  /** When true, unconfirmed accounts cannot log in. */
  requireConfirmedLogin: boolean;
  failDelayMs: number;
  passwordMinLength: number;
  bcryptRounds: number;
}

export type MailProviderName = 'log' | 'resend';

export interface MailConfig {
  provider: MailProviderName;
  from: string;
  apiKey?: string;
}

export interface DocsConfig {
  upstreamVersion?: string;
  translatedVersion?: string;
}

export interface CommonroomConfig {
  version: string;
  site: SiteConfig;
  server: ServerConfig;
  /** Absent: the in-memory store is used. */
  database?: DatabaseConfig;
  auth: AuthConfig;
  mail: MailConfig;
  docs: DocsConfig;
}
