/**
 * Exit relay policy
 */
export interface ExitPolicy {
  /** Lowercase country codes, in order of preference */
  countries: string[];
  strict: boolean;
}

export type FallbackSpec =
  | { kind: 'any' }
  | { kind: 'countries'; countries: string[] };

/**
 * Service supervision
 */
export type ServiceManagerKind = 'systemd' | 'sysv' | 'none';

export type ServiceAction = 'start' | 'stop' | 'reload' | 'restart';

/**
 * External command execution
 */
export interface CommandSpec {
  program: string;
  args: string[];
}

export interface CommandOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Connectivity probing
 */
export interface ProbeResult {
  ip?: string;
  succeeded: boolean;
}

export interface SocksEndpoint {
  host: string;
  port: number;
}

/**
 * Rotation scheduling
 */
export type IntervalSpec =
  | { kind: 'fixed'; seconds: number }
  | { kind: 'range'; min: number; max: number };

export interface RotationConfig {
  interval: IntervalSpec;
  /** 0 rotates until interrupted */
  count: number;
}

export interface RotationRecord {
  id: string;
  iteration: number;
  waitedSeconds: number;
  ip?: string;
  at: Date;
}

/**
 * Policy application
 */
export type PolicyApplierState =
  | 'idle'
  | 'try-preferred'
  | 'verify-preferred'
  | 'try-fallback'
  | 'verify-fallback'
  | 'done';

export interface PolicyOutcome {
  stage: 'preferred' | 'fallback';
  policy: ExitPolicy;
  ip?: string;
  verified: boolean;
  interrupted: boolean;
  states: PolicyApplierState[];
}

/**
 * Application configuration
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  interval: string;
  count: number;
  preferredCountry: string;
  fallbackExits: string;
  torrcPath: string;
  serviceName: string;
  processName: string;
  socksHost: string;
  socksPort: number;
  probeUrl: string;
  connectivityUrl: string;
  logLevel: LogLevel;
}
