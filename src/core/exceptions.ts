/**
 * Error classes raised by dbee operations.
 *
 * Every error carries the process exit status the CLI reports for it.
 */

export class DbeeError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "DbeeError";
    this.exitCode = exitCode;
  }
}

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export class InvalidArgumentsError extends DbeeError {
  usage?: string;

  constructor(message: string, usage?: string) {
    super(message, 2);
    this.name = "InvalidArgumentsError";
    this.usage = usage;
  }
}

export class UnknownCommandError extends DbeeError {
  command: string;

  constructor(command: string) {
    super(`Unknown command: ${command}`, 2);
    this.name = "UnknownCommandError";
    this.command = command;
  }
}

export class PasswordMismatchError extends DbeeError {
  constructor() {
    super("Passwords do not match", 2);
    this.name = "PasswordMismatchError";
  }
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export class FileNotFoundError extends DbeeError {
  path: string;

  constructor(path: string) {
    super(`File not found: ${path}`, 3);
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

export class FileAlreadyExistsError extends DbeeError {
  path: string;

  constructor(path: string) {
    super(`File already exists: ${path}`, 4);
    this.name = "FileAlreadyExistsError";
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Tables and columns
// ---------------------------------------------------------------------------

export class TableNotFoundError extends DbeeError {
  constructor(table: string) {
    super(`Table '${table}' does not exist`, 5);
    this.name = "TableNotFoundError";
  }
}

export class TableAlreadyExistsError extends DbeeError {
  constructor(table: string) {
    super(`Table '${table}' already exists`, 5);
    this.name = "TableAlreadyExistsError";
  }
}

export class ColumnNotFoundError extends DbeeError {
  column: string;

  constructor(column: string) {
    super(`Table header '${column}' does not exist`, 5);
    this.name = "ColumnNotFoundError";
    this.column = column;
  }
}

export class ColumnAlreadyExistsError extends DbeeError {
  column: string;

  constructor(column: string) {
    super(`Table header '${column}' already exists`, 5);
    this.name = "ColumnAlreadyExistsError";
    this.column = column;
  }
}

// ---------------------------------------------------------------------------
// Lock state
// ---------------------------------------------------------------------------

export class DatabaseLockedError extends DbeeError {
  constructor(path: string) {
    super(`Database is locked: ${path} (run unlock_db first)`, 6);
    this.name = "DatabaseLockedError";
  }
}

export class AlreadyLockedError extends DbeeError {
  constructor(path: string) {
    super(`Database is already locked: ${path}`, 6);
    this.name = "AlreadyLockedError";
  }
}

export class NotLockedError extends DbeeError {
  constructor(path: string) {
    super(`Database is not locked: ${path}`, 6);
    this.name = "NotLockedError";
  }
}

export class AuthenticationError extends DbeeError {
  constructor(message?: string) {
    super(
      message
        ? `Authentication failed: ${message}`
        : "Authentication failed: wrong password or corrupted file",
      7,
    );
    this.name = "AuthenticationError";
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class EngineError extends DbeeError {
  code?: string;

  constructor(message: string, code?: string) {
    super(`Database error: ${message}`, 8);
    this.name = "EngineError";
    this.code = code;
  }
}
