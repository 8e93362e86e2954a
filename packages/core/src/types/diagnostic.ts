/**
 * Diagnostic types and the error carrying them
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Definition errors (raised at declaration/assembly time)
  | "GEN1001" // Malformed explicit-binding accessor
  | "GEN1002" // Cyclic operator precedence
  | "GEN1003" // Missing no-argument constructor
  | "GEN1004" // Unknown entity
  | "GEN1005" // Invalid entity declaration
  // Resolution errors (resolver misuse)
  | "GEN2001" // Placeholder not declared by an entity
  | "GEN2002" // Placeholder not owned by the instance's entity
  | "GEN2003" // Entity is not a descendant of the parameterized type
  // Dispatch failures (recoverable)
  | "GEN3001" // Operation failed: no candidate succeeded
  | "GEN3002" // Result read from an unsuccessful operation
  | "GEN3003" // Operation already evaluated
  | "GEN3004" // Value is not an instance of the position's type
  // Execution failures
  | "GEN4001" // Operator raised during perform
  // Re-entrancy failures
  | "GEN5001" // Reentrant operation detected
  // Configuration / manifest loading (GEN9001-GEN9006)
  | "GEN9001" // Config or manifest file not found
  | "GEN9002" // Failed to read file
  | "GEN9003" // Invalid JSON
  | "GEN9004" // Top level must be an object
  | "GEN9005" // Missing or invalid field
  | "GEN9006"; // Invalid entity entry

export type DiagnosticCategory =
  | "definition"
  | "resolution"
  | "dispatch"
  | "execution"
  | "reentrancy"
  | "configuration";

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly category: DiagnosticCategory;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly hint?: string;
};

export const categoryOf = (code: DiagnosticCode): DiagnosticCategory => {
  switch (code.charAt(3)) {
    case "1":
      return "definition";
    case "2":
      return "resolution";
    case "3":
      return "dispatch";
    case "4":
      return "execution";
    case "5":
      return "reentrancy";
    default:
      return "configuration";
  }
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  hint?: string
): Diagnostic => ({
  code,
  category: categoryOf(code),
  severity,
  message,
  hint,
});

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [`${diagnostic.severity} ${diagnostic.code}:`];
  parts.push(diagnostic.message);
  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }
  return parts.join(" ");
};

/**
 * Thrown for misuse and fatal failures; recoverable paths return a Result.
 */
export class GenerisError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic, options?: { readonly cause?: unknown }) {
    super(formatDiagnostic(diagnostic), options);
    this.name = "GenerisError";
    this.diagnostic = diagnostic;
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }

  get category(): DiagnosticCategory {
    return this.diagnostic.category;
  }
}

export const fail = (
  code: DiagnosticCode,
  message: string,
  hint?: string,
  cause?: unknown
): never => {
  throw new GenerisError(
    createDiagnostic(code, "error", message, hint),
    cause === undefined ? undefined : { cause }
  );
};

export const isGenerisError = (
  value: unknown,
  code?: DiagnosticCode
): value is GenerisError =>
  value instanceof GenerisError && (code === undefined || value.code === code);
