/**
 * Domain record operations for DatabaseService
 *
 * Inspections, NCRs and maintenance events are inserted once, keyed by
 * their natural key, and never updated by the ingestion pipeline.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type {
  EntityKind,
  Inspection,
  InspectionRecord,
  MaintenanceEvent,
  MaintenanceRecord,
  NcrRecord,
  NonConformanceReport,
} from '../../../models/records.js';
import type { InspectionRow, MaintenanceEventRow, NcrRow } from './types.js';
import { runWithConstraintCheck } from './helpers.js';
import { rowToInspection, rowToMaintenanceEvent, rowToNcr } from './converters.js';

/**
 * Table and natural key column per entity
 */
export const ENTITY_TABLES: Record<EntityKind, { table: string; keyColumn: string }> = {
  inspection: { table: 'inspections', keyColumn: 'inspection_id' },
  ncr: { table: 'ncrs', keyColumn: 'ncr_id' },
  maintenance: { table: 'maintenance_events', keyColumn: 'event_id' },
};

/**
 * Look up the surrogate id of a record by its natural key
 */
export function findRecordId(
  db: Database.Database,
  entity: EntityKind,
  naturalKey: string
): string | null {
  const { table, keyColumn } = ENTITY_TABLES[entity];
  const row = db.prepare(`SELECT id FROM ${table} WHERE ${keyColumn} = ?`).get(naturalKey) as
    | { id: string }
    | undefined;
  return row?.id ?? null;
}

export function countRecords(db: Database.Database, entity: EntityKind): number {
  const { table } = ENTITY_TABLES[entity];
  const row = db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number };
  return row.count;
}

export function insertInspection(
  db: Database.Database,
  record: InspectionRecord,
  documentId: string | null
): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO inspections (
      id, inspection_id, document_id, site, production_line, supplier, part_number,
      part_description, inspection_date, inspector, result, measurement_value,
      measurement_unit, spec_min, spec_max, notes, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      id,
      record.inspection_id,
      documentId,
      record.site,
      record.production_line,
      record.supplier,
      record.part_number,
      record.part_description,
      record.inspection_date,
      record.inspector,
      record.result,
      record.measurement_value,
      record.measurement_unit,
      record.spec_min,
      record.spec_max,
      record.notes,
      new Date().toISOString(),
    ],
    `inserting inspection ${record.inspection_id}`
  );

  return id;
}

/**
 * Insert an NCR with its soft back-reference already resolved
 * (null when the referenced inspection is not known yet).
 */
export function insertNcr(
  db: Database.Database,
  record: NcrRecord,
  documentId: string | null,
  linkedInspectionId: string | null
): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO ncrs (
      id, ncr_id, document_id, linked_inspection_key, linked_inspection_id, site, supplier,
      part_number, part_description, severity, status, description, root_cause,
      corrective_action, opened_at, reviewed_at, closed_at, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      id,
      record.ncr_id,
      documentId,
      record.linked_inspection_key,
      linkedInspectionId,
      record.site,
      record.supplier,
      record.part_number,
      record.part_description,
      record.severity,
      record.status,
      record.description,
      record.root_cause,
      record.corrective_action,
      record.opened_at,
      record.reviewed_at,
      record.closed_at,
      new Date().toISOString(),
    ],
    `inserting NCR ${record.ncr_id}`
  );

  return id;
}

export function insertMaintenanceEvent(
  db: Database.Database,
  record: MaintenanceRecord,
  documentId: string | null
): string {
  const id = uuidv4();
  const stmt = db.prepare(`
    INSERT INTO maintenance_events (
      id, event_id, document_id, site, machine_id, machine_description, event_type,
      event_date, downtime_hours, technician, description, parts_replaced, notes, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      id,
      record.event_id,
      documentId,
      record.site,
      record.machine_id,
      record.machine_description,
      record.event_type,
      record.event_date,
      record.downtime_hours,
      record.technician,
      record.description,
      record.parts_replaced,
      record.notes,
      new Date().toISOString(),
    ],
    `inserting maintenance event ${record.event_id}`
  );

  return id;
}

export function getInspectionByKey(db: Database.Database, inspectionId: string): Inspection | null {
  const row = db.prepare('SELECT * FROM inspections WHERE inspection_id = ?').get(inspectionId) as
    | InspectionRow
    | undefined;
  return row ? rowToInspection(row) : null;
}

export function getNcrByKey(db: Database.Database, ncrId: string): NonConformanceReport | null {
  const row = db.prepare('SELECT * FROM ncrs WHERE ncr_id = ?').get(ncrId) as NcrRow | undefined;
  return row ? rowToNcr(row) : null;
}

export function getMaintenanceEventByKey(
  db: Database.Database,
  eventId: string
): MaintenanceEvent | null {
  const row = db.prepare('SELECT * FROM maintenance_events WHERE event_id = ?').get(eventId) as
    | MaintenanceEventRow
    | undefined;
  return row ? rowToMaintenanceEvent(row) : null;
}
