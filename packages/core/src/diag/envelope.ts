import {
  type DiagnosticCode,
  type DiagnosticPhase,
  getDiagnosticPhase,
} from './codes.js';

export type DiagnosticSeverity = 'info' | 'warn' | 'error';

export interface DiagnosticEnvelope<Details = unknown> {
  code: DiagnosticCode;
  phase: DiagnosticPhase;
  severity: DiagnosticSeverity;
  /** JSON Pointer (or catalog id) the note refers to; '' for the root */
  canonPath: string;
  message: string;
  details?: Details;
}

export function createDiagnostic<Details>(
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  canonPath: string,
  message: string,
  details?: Details
): DiagnosticEnvelope<Details> {
  const envelope: DiagnosticEnvelope<Details> = {
    code,
    phase: getDiagnosticPhase(code),
    severity,
    canonPath,
    message,
  };
  if (details !== undefined) {
    envelope.details = details;
  }
  return envelope;
}

export type DiagnosticSink = (diagnostic: DiagnosticEnvelope) => void;

export interface SinkOptions {
  level: 'silent' | 'warn' | 'info';
  onWarning?: DiagnosticSink;
}

const warnedCodes = new Set<DiagnosticCode>();

function passesLevel(
  severity: DiagnosticSeverity,
  level: SinkOptions['level']
): boolean {
  if (level === 'silent') return false;
  if (level === 'info') return true;
  return severity !== 'info';
}

/**
 * Route diagnostics to the configured sink. Without a sink, each code is
 * printed once per process so long-running hosts are not flooded.
 */
export function createDiagnosticSink(options: SinkOptions): DiagnosticSink {
  return (diagnostic) => {
    if (!passesLevel(diagnostic.severity, options.level)) return;
    if (options.onWarning) {
      options.onWarning(diagnostic);
      return;
    }
    if (warnedCodes.has(diagnostic.code)) return;
    warnedCodes.add(diagnostic.code);
    console.warn(
      `[provcat] ${diagnostic.severity === 'info' ? 'note' : 'warning'}: ` +
        `${diagnostic.message} (${diagnostic.code} at '${diagnostic.canonPath}')`
    );
  };
}

/** Forget which codes were already printed (tests only) */
export function resetWarnedCodes(): void {
  warnedCodes.clear();
}
