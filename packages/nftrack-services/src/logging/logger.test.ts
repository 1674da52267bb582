import { describe, it, expect, vi } from 'vitest';
import { LogPatterns, createServiceLogger, rootLogger, type ServiceLogger } from './logger.js';

describe('createServiceLogger', () => {
  it('should create a child of the root logger tagged with the service name', () => {
    const logger: ServiceLogger = createServiceLogger('OwnershipService');

    expect(logger.bindings()).toMatchObject({ service: 'OwnershipService' });
    expect(logger.level).toBe(rootLogger.level);
  });

  it('should write LogPatterns entries at debug level', () => {
    const logger = createServiceLogger('OwnershipService');
    const debug = vi.spyOn(logger, 'debug').mockImplementation(() => undefined);

    LogPatterns.dbOperation(logger, 'upsert', 'ownership_records', { tokenId: 7 });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[0]).toEqual({
      operation: 'upsert',
      table: 'ownership_records',
      tokenId: 7,
      msg: 'DB upsert on ownership_records',
    });
  });
});
