import { describe, test, expect } from 'vitest';
import {
  CATEGORY_BY_CODE,
  ErrorCode,
  HTTP_STATUS_BY_CODE,
  getErrorCategory,
  getHttpStatus,
} from '../codes';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('every code has a category and an HTTP status', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(CATEGORY_BY_CODE)).toHaveLength(enumCodes.length);
    expect(Object.keys(HTTP_STATUS_BY_CODE)).toHaveLength(enumCodes.length);
  });

  test('codes follow their numeric ranges', () => {
    expect(getErrorCategory(ErrorCode.MIRROR_CYCLE)).toBe('device');
    expect(getErrorCategory(ErrorCode.UNSUPPORTED_CONDITION)).toBe('schema');
    expect(getErrorCategory(ErrorCode.CATALOG_READ_FAILED)).toBe('catalog');
    expect(getHttpStatus(ErrorCode.CONFIG_VALIDATION_FAILED)).toBe(422);
    expect(getHttpStatus(ErrorCode.UNKNOWN_REVISION)).toBe(404);
  });
});
