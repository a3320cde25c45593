export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ContainerErrorKind = 'not-found' | 'permission-denied' | 'unreadable';

/** The mail container cannot be opened or read. Always aborts the run. */
export class ContainerError extends ArchiveError {
  constructor(
    readonly kind: ContainerErrorKind,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(describeContainerError(kind, path), options);
  }
}

export class ConfigError extends ArchiveError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

function describeContainerError(kind: ContainerErrorKind, path: string): string {
  switch (kind) {
    case 'not-found':
      return `MBOX file not found: ${path}`;
    case 'permission-denied':
      return `Permission denied reading MBOX file: ${path}`;
    case 'unreadable':
      return `Error opening MBOX file: ${path}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
