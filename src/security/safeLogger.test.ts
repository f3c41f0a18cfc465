import { safeLogger } from './safeLogger';

describe('safeLogger redaction', () => {
  it('redacts answers and personal fields', () => {
    const spy = jest.spyOn(console, 'info').mockImplementation(() => {});
    safeLogger.info('event', {
      responses: { sleep_enough: 1 },
      email: 'someone@example.test',
      nested: { password: 'test-password', ok: 'fine' },
      list: [{ registryNumber: 'AB00000000' }],
    });
    const payload = spy.mock.calls[0][1];
    expect(spy.mock.calls[0][0]).toBe('event');
    expect(payload.responses).toBe('[REDACTED]');
    expect(payload.email).toBe('[REDACTED]');
    expect(payload.nested.password).toBe('[REDACTED]');
    expect(payload.nested.ok).toBe('fine');
    expect(payload.list[0].registryNumber).toBe('[REDACTED]');
    spy.mockRestore();
  });

  it('writes errors through console.error', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    safeLogger.error('request.failed', { message: 'boom', passwordHash: 'x' });
    expect(spy).toHaveBeenCalledWith('request.failed', { message: 'boom', passwordHash: '[REDACTED]' });
    spy.mockRestore();
  });
});
