export class ConfigError extends Error {
  readonly keyPath?: string;

  constructor(message: string, keyPath?: string) {
    super(keyPath ? `${keyPath}: ${message}` : message);
    this.name = 'ConfigError';
    this.keyPath = keyPath;
  }
}

export class UnsupportedRepoKindError extends ConfigError {
  readonly kind: string;

  constructor(kind: string, keyPath: string) {
    super(`repository kind ${kind} is not supported yet`, keyPath);
    this.name = 'UnsupportedRepoKindError';
    this.kind = kind;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorCode = (error: unknown): string | undefined => {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
};
