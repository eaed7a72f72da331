// Tests for the audit trail entity

import { describe, it, expect } from 'vitest';
import type { AuditChangeSet } from '@plinth/protocol';
import { InvalidStateError, ValidationError } from '../errors.js';
import { AuditTrail } from './trail.js';

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

describe('AuditTrail', () => {
  it('reads back values written from a span', () => {
    const trail = new AuditTrail();
    trail.setValuesFromSpan(['Price'], [50], [99.99]);

    expect(trail.changedColumns).toEqual(['Price']);
    expect(trail.readOldValue('Price')).toBe(50);
    expect(trail.readNewValue('Price')).toBe(99.99);
    expect(trail.oldValues).toEqual({ Price: 50 });
    expect(trail.newValues).toEqual({ Price: 99.99 });
  });

  it('refuses an empty column name and keeps no change data', () => {
    const trail = new AuditTrail();

    expect(() => trail.setValuesFromSpan([''], [50], [99.99])).toThrow(ValidationError);
    expect(trail.hasChangeData()).toBe(false);
    expect(trail.changedColumns).toEqual([]);
  });

  it('treats empty maps as no values', () => {
    const trail = new AuditTrail();
    trail.setValues({}, {});

    expect(trail.hasChangeData()).toBe(true);
    expect(trail.oldValuesJson).toBeNull();
    expect(trail.newValuesJson).toBeNull();
    expect(trail.oldValues).toEqual({});
  });

  it('keeps changed columns when given pre-encoded blobs', () => {
    const trail = new AuditTrail();
    trail.changedColumns = ['Status'];
    trail.setValuesFromJson('{"Status":"open"}', '{"Status":"closed"}');

    expect(trail.changedColumns).toEqual(['Status']);
    expect(trail.readNewValue('Status')).toBe('closed');
  });

  describe('changeFor', () => {
    it('requires change data', () => {
      expect(() => new AuditTrail().changeFor('Price')).toThrow(InvalidStateError);
    });

    it('returns both sides of a recorded column', () => {
      const trail = new AuditTrail();
      trail.setValuesFromSpan(['Price'], [50], [99.99]);

      expect(trail.changeFor('Price')).toEqual({ column: 'Price', oldValue: 50, newValue: 99.99 });
      expect(trail.changeFor('Name')).toBeUndefined();
    });

    it('reports a creation with no old value', () => {
      const trail = new AuditTrail();
      trail.setValues(null, { Name: 'Widget' });

      expect(trail.changeFor('Name')).toEqual({ column: 'Name', oldValue: undefined, newValue: 'Widget' });
    });
  });

  describe('toChangeSet', () => {
    it('requires an id', () => {
      expect(() => new AuditTrail().toChangeSet()).toThrow(InvalidStateError);
    });

    it('round-trips a persisted change set', () => {
      const changeSet = createChangeSet();
      expect(AuditTrail.fromChangeSet(changeSet).toChangeSet()).toEqual(changeSet);
    });

    it('renders numeric ids as text', () => {
      const trail = new AuditTrail<number>(7);
      trail.entityName = 'Order';
      trail.timestamp = new Date('2024-03-01T10:00:00.000Z');
      trail.setValuesFromSpan(['Qty'], [1], [2]);

      expect(trail.toChangeSet()).toEqual({
        id: '7',
        entityName: 'Order',
        primaryKey: null,
        timestamp: '2024-03-01T10:00:00.000Z',
        trailType: 'None',
        userId: null,
        changedColumns: ['Qty'],
        oldValuesJson: '{"Qty":1}',
        newValuesJson: '{"Qty":2}',
      });
    });
  });
});
