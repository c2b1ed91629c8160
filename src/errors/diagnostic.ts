export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export interface Diagnostic {
  severity: Severity;
  message: string;
}

export function error(message: string): Diagnostic {
  return { severity: Severity.Error, message };
}

export function warning(message: string): Diagnostic {
  return { severity: Severity.Warning, message };
}

/** Render as `<severity>: <message>`, the form printed on stderr. */
export function formatDiagnostic(diag: Diagnostic): string {
  return `${diag.severity}: ${diag.message}`;
}
