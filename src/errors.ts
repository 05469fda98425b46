export class LibraryPanelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class LibraryPanelNotFoundError extends LibraryPanelError {
  constructor() {
    super('library panel could not be found');
  }
}

export class LibraryPanelExistsError extends LibraryPanelError {
  constructor() {
    super('library panel with that name or uid already exists');
  }
}

export class LibraryPanelDashboardNotFoundError extends LibraryPanelError {
  constructor() {
    super('library panel dashboard could not be found');
  }
}

/**
 * Raised when a lookup that the unique index should keep to one row finds
 * several. Means the table is corrupt; never handled as a plain miss.
 */
export class LibraryPanelInvariantError extends LibraryPanelError {
  constructor(found: number) {
    super(`found ${found} panels, while expecting at most one`);
  }
}

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

export function isUniqueConstraintViolation(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && UNIQUE_VIOLATION_CODES.has(error.code);
}
