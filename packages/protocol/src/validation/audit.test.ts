// Tests for audit change-set validation

import { describe, it, expect } from 'vitest';
import { auditChangeSetDraftSchema, parseAuditChangeSet, validateAuditChangeSet } from './audit.js';
import { isDefaultId } from '../types/common.js';
import type { AuditChangeSet } from '../types/audit.js';

function createChangeSet(overrides: Partial<AuditChangeSet> = {}): AuditChangeSet {
  return {
    id: 'trail-1',
    entityName: 'Order',
    primaryKey: '42',
    timestamp: '2024-03-01T10:00:00.000Z',
    trailType: 'Update',
    userId: 'user-7',
    changedColumns: ['Price'],
    oldValuesJson: '{"Price":50}',
    newValuesJson: '{"Price":99.99}',
    ...overrides,
  };
}

describe('validateAuditChangeSet', () => {
  it('accepts a well-formed change set', () => {
    const result = validateAuditChangeSet(createChangeSet());

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.changeSet.entityName).toBe('Order');
    }
  });

  it('accepts null blobs', () => {
    const result = validateAuditChangeSet(
      createChangeSet({ oldValuesJson: null, newValuesJson: null, changedColumns: [] })
    );
    expect(result.valid).toBe(true);
  });

  it('rejects a missing entity name', () => {
    const result = validateAuditChangeSet(createChangeSet({ entityName: '' }));

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toEqual([{ path: 'entityName', message: 'entityName is required' }]);
    }
  });

  it('rejects an unknown trail type', () => {
    const result = validateAuditChangeSet({ ...createChangeSet(), trailType: 'Archive' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('trailType');
    }
  });

  it('rejects a non-object input', () => {
    const result = validateAuditChangeSet('nope');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('(root)');
    }
  });
});

describe('parseAuditChangeSet', () => {
  it('returns the parsed change set', () => {
    expect(parseAuditChangeSet(createChangeSet()).primaryKey).toBe('42');
  });

  it('throws on an invalid timestamp', () => {
    expect(() => parseAuditChangeSet(createChangeSet({ timestamp: 'yesterday' }))).toThrow();
  });
});

describe('auditChangeSetDraftSchema', () => {
  it('does not require an id', () => {
    const { id: _id, ...draft } = createChangeSet();
    expect(auditChangeSetDraftSchema.safeParse(draft).success).toBe(true);
  });
});

describe('isDefaultId', () => {
  it('treats empty values of every id kind as default', () => {
    expect(isDefaultId(undefined)).toBe(true);
    expect(isDefaultId(null)).toBe(true);
    expect(isDefaultId('')).toBe(true);
    expect(isDefaultId(0)).toBe(true);
    expect(isDefaultId(0n)).toBe(true);
  });

  it('treats assigned ids as non-default', () => {
    expect(isDefaultId('a')).toBe(false);
    expect(isDefaultId(42)).toBe(false);
    expect(isDefaultId(-1)).toBe(false);
    expect(isDefaultId(7n)).toBe(false);
  });
});
