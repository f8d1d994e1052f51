import { describe, expect, it } from 'vitest';
import {
  BackendErrorCode,
  WarningCode,
  createBackendError,
  createDiagnostic,
  diagnosticFromError,
  formatDiagnostic,
  formatError,
  getErrorCategory,
  getErrorSeverity,
  isBackendError,
  isLayoutsmithError,
} from './index.js';

describe('error codes', () => {
  it('derives the category from the code prefix', () => {
    expect(getErrorCategory('P001')).toBe('parser');
    expect(getErrorCategory('V030')).toBe('validation');
    expect(getErrorCategory('M010')).toBe('mapping');
    expect(getErrorCategory('B013')).toBe('backend');
    expect(getErrorCategory('R010')).toBe('runtime');
  });

  it('assigns warnings to the layer that raises them', () => {
    expect(getErrorCategory(WarningCode.RESOURCE_WITHOUT_LAYOUT_OBJECT)).toBe('validation');
    expect(getErrorCategory(WarningCode.CONNECTION_WITHOUT_TARGET)).toBe('parser');
    expect(getErrorCategory(WarningCode.DEFAULT_VALUE_USED)).toBe('mapping');
    expect(getErrorCategory(WarningCode.OBJECT_WITHOUT_CONNECTIONS)).toBe('runtime');
  });

  it('treats only W-codes as warnings', () => {
    expect(getErrorSeverity('W102')).toBe('warning');
    expect(getErrorSeverity('M001')).toBe('error');
  });
});

describe('coded errors', () => {
  it('are real errors that keep their code, subject and cause', () => {
    const cause = new Error('socket closed');
    const error = createBackendError(BackendErrorCode.CONNECT_FAILED, 'Cannot connect A to B', {
      subject: { entityKind: 'connection', identifier: 'c1' },
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.cause).toBe(cause);
    expect(isLayoutsmithError(error)).toBe(true);
    expect(isBackendError(error)).toBe(true);
    expect(isBackendError(new Error('plain'))).toBe(false);
  });

  it('format with subject and suggestion lines', () => {
    const error = createBackendError(BackendErrorCode.UNKNOWN_BACKEND_MODE, 'Unknown backend mode "x"', {
      subject: { entityKind: 'document' },
      suggestion: 'Use one of: live, in-process, mock',
    });

    expect(formatError(error)).toBe(
      '[B020] Unknown backend mode "x"\n  Subject: document\n  Suggestion: Use one of: live, in-process, mock',
    );
  });
});

describe('diagnostics', () => {
  it('take their severity from the code', () => {
    expect(createDiagnostic('W101', 'No placement information found')).toEqual({
      code: 'W101',
      severity: 'warning',
      message: 'No placement information found',
      subject: undefined,
    });
  });

  it('keep the code of coded errors and fall back for anything else', () => {
    const coded = createBackendError(BackendErrorCode.TEMPLATE_NOT_FOUND, 'Object .X does not exist');
    expect(diagnosticFromError(coded, 'B011').code).toBe('B010');
    expect(diagnosticFromError(new Error('boom'), 'B011')).toMatchObject({ code: 'B011', message: 'boom' });
    expect(diagnosticFromError('text thrown', 'B012')).toMatchObject({ code: 'B012', message: 'text thrown' });
  });

  it('format on one line per part', () => {
    const diagnostic = createDiagnostic('V031', "Connection 'c1' references unknown target resource 'X'", {
      entityKind: 'connection',
      identifier: 'c1',
      referenceId: 'X',
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "ERROR [V031]: Connection 'c1' references unknown target resource 'X'\n  Subject: connection 'c1' -> 'X'",
    );
  });
});
