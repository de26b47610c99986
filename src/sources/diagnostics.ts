import type { Diagnostic, DiagnosticCode, InputSource, RecordOrigin } from "../domain/reconciliation/types.js";

export function rowDiagnostic(
  source: InputSource,
  origin: RecordOrigin,
  code: DiagnosticCode,
  message: string,
  evidence?: Record<string, unknown>,
  dropped = true
): Diagnostic {
  return {
    code,
    severity: "warning",
    source,
    message: `${origin.source} row ${origin.row}: ${message}`,
    dropped,
    origin,
    ...(evidence ? { evidence } : {})
  };
}
