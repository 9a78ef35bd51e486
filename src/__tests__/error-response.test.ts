import { toErrorResponse } from '../index';
import { InputError, SessionNotFoundError } from '../core/errors';

describe('toErrorResponse', () => {
  test('should keep the status and code of domain errors', () => {
    expect(toErrorResponse(new SessionNotFoundError('507f1f77bcf86cd799439011'))).toEqual({
      status: 404,
      body: {
        success: false,
        message: 'Session not found: 507f1f77bcf86cd799439011',
        error: {
          message: 'Session not found: 507f1f77bcf86cd799439011',
          code: 'SESSION_NOT_FOUND',
          details: { sessionId: '507f1f77bcf86cd799439011' },
        },
      },
    });
    expect(toErrorResponse(new InputError('text is required')).status).toBe(400);
  });

  test('should answer a malformed JSON body with 400', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected token } in JSON at position 9'), {
      status: 400,
      type: 'entity.parse.failed',
    });

    expect(toErrorResponse(parseError)).toEqual({
      status: 400,
      body: {
        success: false,
        message: 'Malformed request body',
        error: { message: 'Malformed request body', code: 'BAD_REQUEST' },
      },
    });
  });

  test('should answer an oversized body with 413', () => {
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413 });

    expect(toErrorResponse(tooLarge).status).toBe(413);
    expect(toErrorResponse(tooLarge).body.message).toBe('Request body too large');
  });

  test('should hide unexpected errors behind a 500', () => {
    expect(toErrorResponse(new Error('database exploded'))).toEqual({
      status: 500,
      body: {
        success: false,
        message: 'Internal server error',
        error: { message: 'Internal server error', code: 'INTERNAL_ERROR' },
      },
    });
  });
});
