export class NotFoundError extends Error {
  constructor(
    public readonly kind: 'control' | 'group' | 'heading' | 'path',
    public readonly id: string
  ) {
    super(`No ${kind} found for '${id}'`);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when a catalog breaks an invariant the index relies on, such as two
 * controls sharing an id. Callers treat it as fatal.
 */
export class CatalogIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogIntegrityError';
  }
}

export class CatalogFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'CatalogFormatError';
  }
}

export class MalformedTemplateError extends Error {
  constructor(templatePath: string, detail: string) {
    super(`Template ${templatePath} is malformed: ${detail}`);
    this.name = 'MalformedTemplateError';
  }
}

export class IoFailureError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string
  ) {
    super(`${filePath}: ${detail}`);
    this.name = 'IoFailureError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
