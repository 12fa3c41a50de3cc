import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { audit, getLogger } from '../../../src/lib/logger';

describe('getLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('tags entries with the module scope ahead of the call context', () => {
    const lines: string[] = [];
    jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
      lines.push(String(line));
    });

    getLogger('ledger').error('Append failed', new Error('disk full'), { tenantId: 't1', module: 'override' });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'error',
      message: 'Append failed',
      context: { module: 'override', tenantId: 't1' },
      error: 'disk full',
    });
  });

  it('shares one instance per scope', () => {
    expect(getLogger('ledger')).toBe(getLogger('ledger'));
    expect(getLogger('ledger')).not.toBe(getLogger('governor'));
  });

  it('drops entries below the configured level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    getLogger('ledger').info('Event appended');
    getLogger('ledger').warn('Late event');
    audit(true, 'tenant.created', { tenantId: 't1' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
