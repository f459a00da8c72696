import { ErrorDiagnostician, formatDiagnosticReport } from "../core/diagnostics.js";

export interface DiagnoseOptions {
  message: string;
  operation: string;
  state?: string;
  json?: boolean;
}

/** State given as JSON is parsed; anything else is kept as text. */
function parseState(state: string | undefined): unknown {
  if (state === undefined) return undefined;
  try {
    return JSON.parse(state);
  } catch {
    return state;
  }
}

export function diagnoseCommand(options: DiagnoseOptions): void {
  const report = new ErrorDiagnostician().diagnose({
    errorMessage: options.message,
    operation: options.operation,
    systemState: parseState(options.state),
    timestamp: new Date().toISOString(),
  });

  console.log(options.json ? JSON.stringify(report, null, 2) : formatDiagnosticReport(report));
}
