import type { StorageConfig } from './types/storage';

export interface FileEntry {
  path: string;
  content: Buffer;
  mode: number;
}

export type EnvMap = Record<string, string>;

export interface EnvChange {
  oldValue: string;
  newValue: string;
}

export interface EnvDiff {
  added: EnvMap;
  removed: EnvMap;
  changed: Record<string, EnvChange>;
}

export interface EncryptionConfig {
  enabled: boolean;
  key?: string;
  keyFile?: string;
  allowPlaintext?: boolean;
}

export interface TagenvConfig {
  storage: StorageConfig;
  encryption: EncryptionConfig;
  envFiles: string[];
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export type ConfirmFn = (message: string) => Promise<boolean>;

export * from './types/storage';
