// Error taxonomy for page analysis and result output

export class FormScoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The page failed to load (timeout, DNS, refused connection, bad URL) */
export class NavigationError extends FormScoutError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Failed to navigate to ${url}: ${errorMessage(cause)}`, { cause });
    this.url = url;
  }
}

/** A single field or form could not be read; callers skip it */
export class ElementReadError extends FormScoutError {
  readonly element: string;

  constructor(element: string, cause: unknown) {
    super(`Could not read ${element}: ${errorMessage(cause)}`, { cause });
    this.element = element;
  }
}

export class WriteError extends FormScoutError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class ToolInputError extends FormScoutError {
  readonly issues: string[];

  constructor(tool: string, issues: string[]) {
    super(`Invalid input for ${tool}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
