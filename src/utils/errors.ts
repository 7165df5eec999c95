export type BrandAssistantErrorCode =
  | 'CREDENTIAL_MISSING'
  | 'MODEL_UNAVAILABLE'
  | 'REMOTE_CALL_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'INVALID_MODEL_ID';

export class BrandAssistantError extends Error {
  constructor(
    readonly code: BrandAssistantErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CredentialMissingError extends BrandAssistantError {
  constructor(reason = 'API key is missing or too short') {
    super('CREDENTIAL_MISSING', reason);
  }
}

export class ModelUnavailableError extends BrandAssistantError {
  constructor(
    readonly tried: string[],
    cause?: unknown
  ) {
    super(
      'MODEL_UNAVAILABLE',
      tried.length > 0
        ? `No usable model found (tried: ${tried.join(', ')})`
        : cause === undefined
          ? 'No usable model found'
          : `No usable model found: ${describeError(cause)}`,
      { cause }
    );
  }
}

export class RemoteCallFailedError extends BrandAssistantError {
  constructor(operation: string, cause?: unknown) {
    super('REMOTE_CALL_FAILED', `${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export class PersistenceFailedError extends BrandAssistantError {
  constructor(operation: 'load' | 'save', target: string, cause?: unknown) {
    super('PERSISTENCE_FAILED', `Profile ${operation} failed for ${target}: ${describeError(cause)}`, {
      cause
    });
  }
}

export class InvalidModelIdError extends BrandAssistantError {
  constructor(modelId: string) {
    super('INVALID_MODEL_ID', `Invalid model identifier "${modelId}"`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  if (err === undefined) return 'unknown error';
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
