export class OperationInUseError extends Error {
  name = "OperationInUseError";
}

export class DetachedOperationError extends Error {
  name = "DetachedOperationError";
}

export class UnknownEntityError extends Error {
  name = "UnknownEntityError";
}

export class InvalidReplicateError extends Error {
  name = "InvalidReplicateError";
}

export class UnknownPassError extends Error {
  name = "UnknownPassError";
}

export class IRVerificationError extends Error {
  name = "IRVerificationError";
  readonly diagnostics: string[];

  constructor(diagnostics: string[], context?: string) {
    const header = context
      ? `IR verification failed after ${context}`
      : "IR verification failed";
    super(`${header}:\n${diagnostics.map((d) => `  ${d}`).join("\n")}`);
    this.diagnostics = diagnostics;
  }
}
