// Tests for entity identity

import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidStateError, ValidationError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { createDomainRuntime } from '../runtime.js';
import { AuditableEntity } from './auditable-entity.js';
import { Entity } from './entity.js';
import { markProxyType } from './type-resolution.js';
import { UserAuditableEntity } from './user-auditable-entity.js';

// --- Test Fixtures ---

class Order extends Entity<number> {
  constructor(id?: number) {
    super(id);
  }
}

class OrderProxy_123 extends Order {}
markProxyType(OrderProxy_123);

class Customer extends Entity<number> {
  constructor(id?: number) {
    super(id);
  }
}

class Invoice extends AuditableEntity<string> {
  constructor(id?: string) {
    super(id);
  }
}

class Shipment extends UserAuditableEntity<number> {
  constructor(id?: number) {
    super(id);
  }
}

// --- Tests ---

describe('Entity', () => {
  it('equates a proxy with its domain instance of the same id', () => {
    const order = new Order(42);
    const proxy = new OrderProxy_123(42);

    expect(order.equals(proxy)).toBe(true);
    expect(proxy.equals(order)).toBe(true);
    expect(order.hashCode()).toBe(proxy.hashCode());
  });

  it('distinguishes different types and different ids', () => {
    expect(new Order(42).equals(new Customer(42))).toBe(false);
    expect(new Order(42).equals(new Order(43))).toBe(false);
    expect(new Order(42).equals(null)).toBe(false);
  });

  it('never equates transient entities with other instances', () => {
    const a = new Order();
    const b = new Order();

    expect(a.isTransient()).toBe(true);
    expect(new Order(0).isTransient()).toBe(true);
    expect(a.equals(b)).toBe(false);
    expect(a.equals(a)).toBe(true);
    expect(a.hashCode()).toBe(a.hashCode());
  });

  it('compares string ids', () => {
    expect(new Invoice('doc-1').equals(new Invoice('doc-1'))).toBe(true);
    expect(new Invoice('').isTransient()).toBe(true);
  });

  it('rejects a NaN id', () => {
    expect(() => new Order(NaN)).toThrow(ValidationError);
  });

  describe('assignId', () => {
    it('persists a transient entity', () => {
      const order = new Order();
      order.assignId(7);

      expect(order.id).toBe(7);
      expect(order.isTransient()).toBe(false);
      expect(order.equals(new Order(7))).toBe(true);
    });

    it('refuses to reassign an id', () => {
      const order = new Order(7);
      expect(() => order.assignId(8)).toThrow(InvalidStateError);
    });

    it('refuses a default id', () => {
      expect(() => new Order().assignId(0)).toThrow(ValidationError);
    });
  });

  describe('type cache', () => {
    beforeEach(() => {
      Entity.clearTypeCache();
    });

    it('starts empty after clearing', () => {
      expect(Entity.getPerformanceStats()).toEqual({
        hits: 0,
        misses: 0,
        hitRatio: 0,
        size: 0,
        capacity: 1024,
      });
    });

    it('counts resolutions', () => {
      new Order(1).equals(new OrderProxy_123(1));
      new Order(1).equals(new OrderProxy_123(1));

      expect(Entity.getPerformanceStats()).toMatchObject({ hits: 2, misses: 2, hitRatio: 0.5, size: 2 });
    });
  });
});

describe('EntityIdentity', () => {
  it('keeps a hit ratio above 0.99 over repeated comparisons', () => {
    const runtime = createDomainRuntime({}, { logger: silentLogger });
    const order = new Order(42);
    const proxy = new OrderProxy_123(42);

    for (let i = 0; i < 10_000; i++) {
      expect(runtime.entities.equals(order, proxy)).toBe(true);
    }

    const stats = runtime.types.getCacheStats();
    expect(stats.misses).toBe(2);
    expect(stats.hitRatio).toBeGreaterThanOrEqual(0.99);
  });

  it('stays correct when the type cache is full', () => {
    const runtime = createDomainRuntime({ typeCacheCapacity: 1 }, { logger: silentLogger });

    expect(runtime.entities.equals(new Customer(1), new Customer(1))).toBe(true);
    expect(runtime.entities.equals(new Order(42), new OrderProxy_123(42))).toBe(true);
    expect(runtime.entities.equals(new Order(42), new OrderProxy_123(42))).toBe(true);
    expect(runtime.types.getCacheStats().size).toBe(1);
  });

  it('hashes persisted entities by id', () => {
    const runtime = createDomainRuntime({}, { logger: silentLogger });

    expect(runtime.entities.hashOf(new Order(42))).toBe(42);
    expect(runtime.entities.hashOf(new Invoice('a'))).toBe(97);
  });

  it('compares plain records by id', () => {
    const runtime = createDomainRuntime({}, { logger: silentLogger });

    expect(runtime.entities.equals({ id: 1 }, { id: 1 })).toBe(true);
    expect(runtime.entities.equals({ id: 1 }, { id: '1' })).toBe(false);
    expect(runtime.entities.equals({ id: null }, { id: null })).toBe(false);
  });
});

describe('AuditableEntity', () => {
  it('records creation and update times', () => {
    const doc = new Invoice('doc-1');
    const created = new Date('2024-03-01T10:00:00.000Z');
    const updated = new Date('2024-03-02T10:00:00.000Z');

    doc.markCreated(created);
    doc.markUpdated(updated);

    expect(doc.created).toBe(created);
    expect(doc.updated).toBe(updated);
    expect(doc.isDeleted()).toBe(false);
  });

  it('keeps the first deletion time', () => {
    const doc = new Invoice('doc-1');
    const first = new Date('2024-03-01T10:00:00.000Z');

    doc.markDeleted(first);
    doc.markDeleted(new Date('2024-03-05T10:00:00.000Z'));

    expect(doc.isDeleted()).toBe(true);
    expect(doc.deleted).toBe(first);
  });

  it('refuses updates after deletion', () => {
    const doc = new Invoice('doc-1');
    doc.markDeleted();

    expect(() => doc.markUpdated()).toThrow(InvalidStateError);
  });
});

describe('UserAuditableEntity', () => {
  it('records the acting user with each change', () => {
    const shipment = new Shipment(1);
    const created = new Date('2024-03-01T10:00:00.000Z');
    const updated = new Date('2024-03-02T10:00:00.000Z');

    shipment.markCreated(created, 'user-7');
    shipment.markUpdated(updated, 'user-9');

    expect(shipment.created).toBe(created);
    expect(shipment.createdBy).toBe('user-7');
    expect(shipment.updated).toBe(updated);
    expect(shipment.updatedBy).toBe('user-9');
    expect(shipment.deletedBy).toBeNull();
  });

  it('leaves the user null when none is given', () => {
    const shipment = new Shipment(1);
    shipment.markCreated();

    expect(shipment.created).toBeInstanceOf(Date);
    expect(shipment.createdBy).toBeNull();
  });

  it('keeps the first deletion time and user', () => {
    const shipment = new Shipment(1);
    const first = new Date('2024-03-01T10:00:00.000Z');

    shipment.markDeleted(first, 'user-7');
    shipment.markDeleted(new Date('2024-03-05T10:00:00.000Z'), 'user-9');

    expect(shipment.isDeleted()).toBe(true);
    expect(shipment.deleted).toBe(first);
    expect(shipment.deletedBy).toBe('user-7');
  });

  it('refuses updates after deletion without touching the updating user', () => {
    const shipment = new Shipment(1);
    shipment.markDeleted(new Date('2024-03-01T10:00:00.000Z'), 'user-7');

    expect(() => shipment.markUpdated(new Date(), 'user-9')).toThrow(InvalidStateError);
    expect(shipment.updatedBy).toBeNull();
  });
});
