import { describe, it, expect } from 'vitest';
import { handler } from '@/lambda';
import { ValidationError } from '@/utils/error-handler';

describe('lambda handler', () => {
  it('rejects an unknown report type before touching configuration', async () => {
    await expect(handler({ reportType: 'monthly' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects invalid options', async () => {
    await expect(handler({ reportType: 'daily', days: 0 })).rejects.toThrow(/^Invalid event: days /);
    await expect(handler({ entityType: 'account' })).rejects.toThrow(/^Invalid event: entityType /);
  });
});
