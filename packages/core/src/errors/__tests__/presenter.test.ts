import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../../errors/presenter';
import { ErrorCode } from '../../errors/codes';
import { CatalogError, DeviceProfileError, SchemaError } from '../../types/errors';
import type { ValidationResult } from '../../types/validation';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
    process.env.REQUEST_ID = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('formatForAPI maps error code to HTTP status', () => {
    const err = new SchemaError({
      kind: 'UnknownSchemaFragment',
      message: "Unknown schema fragment: 'nope'",
      context: { fragment: 'nope', path: '/fragments/0' },
    });
    const presenter = new ErrorPresenter('prod', { requestId: 'req-1' });
    const api = presenter.formatForAPI(err);
    expect(api.status).toBe(404);
    expect(api.code).toBe(ErrorCode.UNKNOWN_SCHEMA_FRAGMENT);
    expect(api.type).toBe('provcat:error:E100');
    expect(api.detail).toBe("Unknown schema fragment: 'nope' at /fragments/0");
    expect(api.instance).toBe('req-1');
  });

  test('formatForConsole lists location, issues and cause', () => {
    const cause = new CatalogError({
      message: "Device 'chip_x' contains invalid entries",
      issues: [{ path: '/latest', message: "latest revision 'z9' is not declared" }],
    });
    const err = new DeviceProfileError({
      kind: 'UnknownDevice',
      message: "Device 'chip_x' failed to load",
      context: { deviceId: 'chip_x', revision: 'a0' },
      cause,
    });
    const view = new ErrorPresenter('dev').formatForConsole(err);
    expect(view.title).toBe("Error E001: Device 'chip_x' failed to load");
    expect(view.location).toBe('Location: chip_x / a0');
    expect(view.details).toEqual([
      "caused by: Device 'chip_x' contains invalid entries",
    ]);
    expect(view.colors).toBe(true);

    const catalogView = new ErrorPresenter('dev', { colors: false }).formatForConsole(cause);
    expect(catalogView.details).toEqual(["/latest: latest revision 'z9' is not declared"]);
    expect(catalogView.colors).toBe(false);
  });

  test('NO_COLOR wins over the environment default', () => {
    process.env.NO_COLOR = '1';
    const err = new SchemaError({ kind: 'UnknownArtifact', message: 'x' });
    expect(new ErrorPresenter('dev').formatForConsole(err).colors).toBe(false);
  });

  test('formatForProduction redacts key material from context', () => {
    const err = new SchemaError({
      kind: 'IncompatibleRedefinition',
      message: 'conflict',
      context: { fragment: 'ibkek', kek: 'test-secret', nested: { token: 'test-token', keep: 1 } },
    });
    const view = new ErrorPresenter('prod').formatForProduction(err);
    expect(view.stack).toBeUndefined();
    expect(view.context?.kek).toBe('[REDACTED]');
    expect(view.context?.nested).toEqual({ token: '[REDACTED]', keep: 1 });
    expect(view.context?.fragment).toBe('ibkek');
  });

  test('formatValidation sorts lines by path and shows rules in dev', () => {
    const result: ValidationResult = {
      valid: false,
      normalized: {},
      violations: [
        {
          kind: 'MissingRequiredProperty',
          path: '/signer',
          message: "'signer' is required",
          rule: 'certificate_v21#/allOf/0',
        },
        { kind: 'TypeMismatch', path: '', message: 'expected an object document, got array' },
        { kind: 'EnumViolation', path: '/mode', message: 'string "x" is not one of "plain"' },
      ],
    };
    const dev = new ErrorPresenter('dev').formatValidation(result);
    expect(dev.summary).toBe('Configuration has 3 problems');
    expect(dev.lines).toEqual([
      '(root): TypeMismatch: expected an object document, got array',
      '/mode: EnumViolation: string "x" is not one of "plain"',
      "/signer: MissingRequiredProperty: 'signer' is required [certificate_v21#/allOf/0]",
    ]);

    const prod = new ErrorPresenter('prod').formatValidation(result);
    expect(prod.lines[2]).toBe("/signer: MissingRequiredProperty: 'signer' is required");
  });

  test('formatValidation reports a valid document', () => {
    const view = new ErrorPresenter('dev').formatValidation({
      valid: true,
      violations: [],
      normalized: {},
    });
    expect(view).toEqual({ valid: true, summary: 'Configuration is valid', lines: [] });
  });
});
