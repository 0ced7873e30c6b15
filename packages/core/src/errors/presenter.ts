/**
 * ErrorPresenter - pure presentation layer for ProvcatError instances and
 * validation reports
 * - No business logic; formats into environment-specific view objects
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import type {
  CatalogIssue,
  ErrorContext,
  ProvcatError,
  SerializedError,
} from '../types/errors.js';
import type { ValidationResult, Violation } from '../types/validation.js';
import { isPlainObject } from '../util/guards.js';

export interface PresenterOptions {
  colors?: boolean;
  redactKeys?: string[];
  requestId?: string;
}

export interface ConsoleErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  details: string[];
  colors: boolean;
}

export interface APIErrorView {
  status: number;
  type: string;
  title: string;
  detail: string;
  instance?: string;
  code: ErrorCode;
  path?: string;
}

export interface ValidationReportView {
  valid: boolean;
  summary: string;
  lines: string[];
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = ['key', 'kek', 'password', 'secret', 'token', 'privateKey'];

function contextString(ctx: ErrorContext | undefined, key: string): string | undefined {
  const value = ctx?.[key];
  return typeof value === 'string' ? value : undefined;
}

function hasIssues(error: ProvcatError): error is ProvcatError & { issues: readonly CatalogIssue[] } {
  return 'issues' in error && Array.isArray(error.issues);
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForConsole(error: ProvcatError): ConsoleErrorView {
    const details: string[] = [];
    if (hasIssues(error)) {
      for (const issue of error.issues) {
        details.push(`${issue.path || '/'}: ${issue.message}`);
      }
    }
    if (error.cause) {
      details.push(`caused by: ${error.cause.message}`);
    }
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      details,
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  formatForAPI(error: ProvcatError): APIErrorView {
    return {
      status: getHttpStatus(error.errorCode),
      type: `provcat:error:${error.errorCode}`,
      title: error.message,
      detail: this.#getDetail(error),
      instance: this.#getRequestId(),
      code: error.errorCode,
      path: error.context?.path,
    };
  }

  formatForProduction(error: ProvcatError): ProductionView {
    // Delegate to the error's safe serializer, then redact configured keys
    const base = error.toJSON('prod');
    const redacted = this.#applyAdditionalRedaction(base);
    return { ...redacted, requestId: this.#getRequestId() };
  }

  /** One line per violation, sorted by path */
  formatValidation(result: ValidationResult): ValidationReportView {
    const lines = [...result.violations]
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
      .map((violation) => this.#formatViolation(violation));
    const count = result.violations.length;
    return {
      valid: result.valid,
      summary: result.valid
        ? 'Configuration is valid'
        : `Configuration has ${count} problem${count === 1 ? '' : 's'}`,
      lines,
    };
  }

  // Helpers
  #formatTitle(error: ProvcatError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatViolation(violation: Violation): string {
    const where = violation.path === '' ? '(root)' : violation.path;
    const rule = violation.rule && this._env === 'dev' ? ` [${violation.rule}]` : '';
    return `${where}: ${violation.kind}: ${violation.message}${rule}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const parts = [
      ctx.deviceId,
      ctx.revision,
      ctx.region,
      ctx.fragment,
      ctx.artifact,
    ].filter((part): part is string => typeof part === 'string');
    const path = contextString(ctx, 'path');
    if (path) parts.push(path);
    return parts.length > 0 ? `Location: ${parts.join(' / ')}` : undefined;
  }

  #getDetail(error: ProvcatError): string {
    const parts: string[] = [error.message];
    const loc = error.context?.path;
    if (loc) parts.push(`at ${loc}`);
    return parts.join(' ');
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactor);
      if (isPlainObject(val)) {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    if (!view.context) return view;
    const context: ErrorContext = {};
    for (const [k, v] of Object.entries(view.context)) {
      context[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
    }
    return { ...view, context };
  }
}

export default ErrorPresenter;
