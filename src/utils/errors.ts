export type CatalogRole = 'staging' | 'production';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CatalogReadError extends Error {
  constructor(readonly role: CatalogRole, readonly filePath: string, options?: { cause?: unknown }) {
    super(`Cannot read ${role} catalog: ${filePath}`, options);
    this.name = 'CatalogReadError';
  }
}

export class ReportWriteError extends Error {
  constructor(readonly filePath: string, options?: { cause?: unknown }) {
    super(`Cannot write report: ${filePath}`, options);
    this.name = 'ReportWriteError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
