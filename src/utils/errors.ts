export type ExtractionErrorKind = 'corrupt-archive' | 'metadata-parse-error';

export type ConnectorErrorKind =
  | 'not-found'
  | 'permission-denied'
  | 'io-error'
  | 'connection-lost'
  | 'auth-failure'
  | 'protocol-error';

const CONNECTION_LEVEL_KINDS: ReadonlySet<ConnectorErrorKind> = new Set([
  'connection-lost',
  'auth-failure',
  'protocol-error',
]);

/**
 * Connection-level failures leave the session unusable, so a plan or scan
 * cannot go on after one. Everything else only concerns one entry.
 */
export function isConnectionLevel(kind: ConnectorErrorKind): boolean {
  return CONNECTION_LEVEL_KINDS.has(kind);
}

export class ExtractionError extends Error {
  constructor(
    public kind: ExtractionErrorKind,
    public filename: string,
    message: string,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class ConnectorError extends Error {
  constructor(
    public kind: ConnectorErrorKind,
    public operation: string,
    message: string,
    public entry?: string,
  ) {
    super(message);
    this.name = 'ConnectorError';
  }

  get connectionLevel(): boolean {
    return isConnectionLevel(this.kind);
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class OperationCancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

export function corruptArchive(filename: string, reason: string): ExtractionError {
  return new ExtractionError(
    'corrupt-archive',
    filename,
    `Cannot open ${filename} as an archive: ${reason}`,
  );
}

export function metadataParseError(
  filename: string,
  metadataEntry: string,
  reason: string,
): ExtractionError {
  return new ExtractionError(
    'metadata-parse-error',
    filename,
    `Malformed ${metadataEntry} in ${filename}: ${reason}`,
  );
}
