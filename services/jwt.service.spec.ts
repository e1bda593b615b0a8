import { describe, expect, test } from 'vitest';
import { JwtService } from './jwt.service';

const service = new JwtService('test-secret');

describe('JwtService', () => {
  test('decodes the user it signed', () => {
    const token = service.generateToken({ id: 'alice', role: 'admin' });
    expect(service.decodeTokenWithDetails(token)).toEqual({
      payload: { id: 'alice', role: 'admin' },
      isExpired: false,
    });
  });

  test('flags expired tokens', () => {
    const token = service.generateToken({ id: 'alice' }, -10);
    expect(service.decodeTokenWithDetails(token)).toEqual({ payload: null, isExpired: true, error: 'jwt expired' });
  });

  test('rejects tokens signed with another secret', () => {
    const token = new JwtService('other-secret').generateToken({ id: 'alice' });
    const result = service.decodeTokenWithDetails(token);
    expect(result.payload).toBeNull();
    expect(result.isExpired).toBe(false);
    expect(result.error).toBe('invalid signature');
  });
});
