export class AppError extends Error {
  constructor(
    public message: string,
    public code: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigurationError';
  }
}

export class PartitionMismatchError extends AppError {
  constructor(candidateSize: number, referenceSize: number) {
    super(
      'Cannot compare partitions over different identity sets ' +
        `(${candidateSize} vs ${referenceSize} identities)`,
      'PARTITION_MISMATCH'
    );
    this.name = 'PartitionMismatchError';
  }
}
