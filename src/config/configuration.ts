import { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const UPLOAD_CONFIG = 'UPLOAD_CONFIG';

export interface UploadConfig {
  uploadDir: string;
  maxFileSize: number;
  allowedExtensions: string[];
}

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10 MB
export const DEFAULT_ALLOWED_EXTENSIONS = ['.pdf', '.doc', '.docx'];

const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error'];

export function buildUploadConfig(configService: ConfigService): UploadConfig {
  return {
    uploadDir: configService.get<string>('UPLOAD_DIR', 'uploads'),
    maxFileSize: toPositiveInt(
      configService.get<string>('MAX_FILE_SIZE'),
      DEFAULT_MAX_FILE_SIZE,
    ),
    allowedExtensions: splitList(
      configService.get<string>('ALLOWED_EXTENSIONS'),
      DEFAULT_ALLOWED_EXTENSIONS,
    ).map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
  };
}

/**
 * Levels enabled for a minimum level name, e.g. `warn` -> [warn, error].
 * Unknown names fall back to `log`.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = (level ?? 'log').toLowerCase();
  const index = LOG_LEVELS.findIndex((candidate) => candidate === normalized);
  return LOG_LEVELS.slice(index === -1 ? LOG_LEVELS.indexOf('log') : index);
}

export function splitList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return [...fallback];
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : [...fallback];
}

function toPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}
