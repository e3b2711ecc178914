/**
 * Domain record interfaces: inspections, non-conformance reports and
 * maintenance events.
 *
 * The `*Record` types are the closed schema a row has after normalization.
 * The persisted types add identity, ownership and resolved references.
 */

export type EntityKind = 'inspection' | 'ncr' | 'maintenance';

export const ENTITY_KINDS: readonly EntityKind[] = ['inspection', 'ncr', 'maintenance'];

export type InspectionResult = 'PASS' | 'FAIL' | 'CONDITIONAL';

export const INSPECTION_RESULTS: readonly InspectionResult[] = ['PASS', 'FAIL', 'CONDITIONAL'];

export type NcrStatus = 'OPEN' | 'IN_REVIEW' | 'CLOSED' | 'CANCELLED';

export const NCR_STATUSES: readonly NcrStatus[] = ['OPEN', 'IN_REVIEW', 'CLOSED', 'CANCELLED'];

export type NcrSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const NCR_SEVERITIES: readonly NcrSeverity[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export interface InspectionRecord {
  /** Natural key */
  inspection_id: string;
  site: string;
  production_line: string | null;
  supplier: string | null;
  part_number: string | null;
  part_description: string | null;
  /** YYYY-MM-DD */
  inspection_date: string;
  inspector: string | null;
  result: InspectionResult;
  /** measurement_value, spec_min and spec_max are all in measurement_unit */
  measurement_value: number | null;
  measurement_unit: string | null;
  spec_min: number | null;
  spec_max: number | null;
  notes: string | null;
}

export interface NcrRecord {
  /** Natural key */
  ncr_id: string;
  /** Natural key of the inspection this NCR points back to, as written in the source */
  linked_inspection_key: string | null;
  site: string;
  supplier: string | null;
  part_number: string | null;
  part_description: string | null;
  severity: NcrSeverity;
  status: NcrStatus;
  description: string;
  root_cause: string | null;
  corrective_action: string | null;
  /** YYYY-MM-DDTHH:MM:SS */
  opened_at: string;
  reviewed_at: string | null;
  closed_at: string | null;
}

export interface MaintenanceRecord {
  /** Natural key */
  event_id: string;
  site: string;
  machine_id: string;
  machine_description: string | null;
  event_type: string | null;
  /** YYYY-MM-DD */
  event_date: string;
  downtime_hours: number | null;
  technician: string | null;
  description: string | null;
  parts_replaced: string | null;
  notes: string | null;
}

/** Columns every persisted domain record carries */
interface PersistedColumns {
  /** UUID v4 identifier */
  id: string;
  /** Document that introduced the record */
  document_id: string | null;
  /** ISO 8601 */
  created_at: string;
}

export type Inspection = InspectionRecord & PersistedColumns;

export type NonConformanceReport = NcrRecord &
  PersistedColumns & {
    /** Soft back-reference, null when the inspection was not known at ingest time */
    linked_inspection_id: string | null;
  };

export type MaintenanceEvent = MaintenanceRecord & PersistedColumns;

/**
 * A normalized row, tagged by entity so persistence can dispatch on it
 */
export type NormalizedRecord =
  | { entity: 'inspection'; naturalKey: string; record: InspectionRecord }
  | { entity: 'ncr'; naturalKey: string; record: NcrRecord }
  | { entity: 'maintenance'; naturalKey: string; record: MaintenanceRecord };
