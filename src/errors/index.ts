export { type Diagnostic, error, formatDiagnostic, Severity, warning } from "./diagnostic.ts";
