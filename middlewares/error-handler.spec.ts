import { describe, expect, test } from 'vitest';
import {
  GENERIC_MESSAGE,
  InsufficientCollateralError,
  ProtocolPausedError,
  TransferFailedError,
} from '../utils/ledger-error';
import { UnauthorizedError } from '../utils/request';
import { classifyError } from './error-handler';

describe('classifyError', () => {
  test('ledger errors keep their code, status and message', () => {
    expect(classifyError(new InsufficientCollateralError())).toEqual({
      statusCode: 400,
      code: 'InsufficientCollateral',
      message: 'Insufficient collateral',
    });
    expect(classifyError(new ProtocolPausedError())).toEqual({
      statusCode: 423,
      code: 'ProtocolPaused',
      message: 'Protocol is paused; please try again later',
    });
    expect(classifyError(new TransferFailedError('horizon timeout'))).toEqual({
      statusCode: 502,
      code: 'TransferFailed',
      message: 'Transfer failed: horizon timeout',
    });
  });

  test('errors carrying an HTTP status map to client errors', () => {
    expect(classifyError(new UnauthorizedError())).toEqual({
      statusCode: 401,
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
    const parseError = Object.assign(new SyntaxError('Unexpected token } in JSON'), { status: 400 });
    expect(classifyError(parseError)).toEqual({
      statusCode: 400,
      code: 'BAD_REQUEST',
      message: 'Unexpected token } in JSON',
    });
  });

  test('mongoose validation and duplicate keys', () => {
    const validation = new Error('amount: Path `amount` is required.');
    validation.name = 'ValidationError';
    expect(classifyError(validation)).toMatchObject({ statusCode: 400, code: 'VALIDATION_ERROR' });
    expect(classifyError({ code: 11000 })).toMatchObject({ statusCode: 409, code: 'DUPLICATE_ENTRY' });
  });

  test('unexpected errors become a 500 without internals', () => {
    expect(classifyError(new Error('Cannot read properties of undefined'))).toEqual({
      statusCode: 500,
      code: 'INTERNAL_SERVER_ERROR',
      message: GENERIC_MESSAGE,
    });
    expect(classifyError(new Error('ledger offline'))).toEqual({
      statusCode: 500,
      code: 'INTERNAL_SERVER_ERROR',
      message: 'ledger offline',
    });
  });
});
