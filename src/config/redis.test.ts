import { describe, expect, it } from '@jest/globals';
import { exportJobId } from './redis';

describe('exportJobId', () => {
  it('derives one stable id per text', () => {
    expect(exportJobId('665f1c2e9b1e8a0012345678')).toBe('export-665f1c2e9b1e8a0012345678');
    expect(exportJobId('text-1')).toBe(exportJobId('text-1'));
  });

  it('never contains the separator BullMQ reserves for repeatable jobs', () => {
    // Custom ids with ':' are only accepted when they split into exactly three parts
    for (const textId of ['text-1', '665f1c2e9b1e8a0012345678', 'a.b_c']) {
      expect(exportJobId(textId)).not.toContain(':');
    }
  });
});
