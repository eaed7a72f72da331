import type { AuditChangeSet } from '@plinth/protocol';
import type { AuditTrailRow, NewAuditTrailRow } from '../schema/index.js';

export function changeSetToRow(changeSet: AuditChangeSet): NewAuditTrailRow {
  return {
    id: changeSet.id,
    entityName: changeSet.entityName,
    primaryKey: changeSet.primaryKey,
    timestamp: new Date(changeSet.timestamp),
    trailType: changeSet.trailType,
    userId: changeSet.userId,
    changedColumns: [...changeSet.changedColumns],
    oldValues: changeSet.oldValuesJson,
    newValues: changeSet.newValuesJson,
  };
}

export function rowToChangeSet(row: AuditTrailRow): AuditChangeSet {
  return {
    id: row.id,
    entityName: row.entityName,
    primaryKey: row.primaryKey,
    timestamp: row.timestamp.toISOString(),
    trailType: row.trailType,
    userId: row.userId,
    changedColumns: row.changedColumns,
    oldValuesJson: row.oldValues,
    newValuesJson: row.newValues,
  };
}
