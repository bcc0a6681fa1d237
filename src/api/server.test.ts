import { describe, it, expect } from 'vitest';
import { toErrorResponse } from './server';
import { ComplianceViolationError, NotFoundError, UnsupportedCommandError, ValidationError } from '../core/errors';
import { ComplianceValidationResult } from '../core/types';

describe('toErrorResponse', () => {
  it('should map client errors to 400', () => {
    expect(toErrorResponse(new ValidationError('userId is required', 'userId'))).toEqual({
      status: 400,
      body: { error: 'userId is required', type: 'ValidationError' },
    });
    expect(toErrorResponse(new UnsupportedCommandError('Unsupported command: x')).status).toBe(400);
  });

  it('should map missing entities to 404', () => {
    expect(toErrorResponse(new NotFoundError('Workflow', 'wf-1'))).toEqual({
      status: 404,
      body: { error: 'Workflow not found: wf-1', type: 'NotFoundError' },
    });
  });

  it('should attach the compliance result to 422 responses', () => {
    const result: ComplianceValidationResult = {
      traceId: 't1',
      totalActions: 1,
      validatedActions: 0,
      unvalidatedActions: 1,
      violations: ["Action 'send_resource' lacks validation metadata"],
      isCompliant: false,
      checkedAt: new Date('2024-06-15T12:00:00.000Z'),
    };
    expect(toErrorResponse(new ComplianceViolationError('Agent response failed compliance validation', result))).toEqual({
      status: 422,
      body: { error: 'Agent response failed compliance validation', type: 'ComplianceViolationError', details: result },
    });
  });

  it('should hide everything else behind 500', () => {
    expect(toErrorResponse(new Error('socket hang up'))).toEqual({
      status: 500,
      body: { error: 'socket hang up', type: 'InternalError' },
    });
    expect(toErrorResponse('plain string').body.error).toBe('plain string');
  });
});
