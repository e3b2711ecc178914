/**
 * DatabaseService class for all database operations
 *
 * An explicitly passed storage handle: the pipeline receives one per batch
 * (or per worker) and closes it when done. Uses prepared statements for
 * every query.
 */

import Database from 'better-sqlite3';
import type { Document } from '../../../models/document.js';
import type { ProcessingRun, RunCompletion } from '../../../models/processing-run.js';
import type {
  EntityKind,
  Inspection,
  InspectionRecord,
  MaintenanceEvent,
  MaintenanceRecord,
  NcrRecord,
  NonConformanceReport,
} from '../../../models/records.js';
import type { DatabaseInfo, DatabaseStats, IngestionStatus, ListRunsOptions } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
} from './static-operations.js';
import { getStats, getIngestionStatus, updateMetadataModified } from './stats-operations.js';
import * as docOps from './document-operations.js';
import * as runOps from './run-operations.js';
import * as recordOps from './record-operations.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  getIngestionStatus(recentLimit = 10): IngestionStatus {
    return getIngestionStatus(this.db, recentLimit);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Run fn in a transaction. Calls nested inside another transaction
   * become savepoints: an exception rolls back only the inner work.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== DOCUMENT OPERATIONS ====================

  /** Document row and metadata touch commit together */
  insertDocument(doc: Document): string {
    return this.transaction(() =>
      docOps.insertDocument(this.db, doc, () => {
        updateMetadataModified(this.db);
      })
    );
  }

  getDocument(id: string): Document | null {
    return docOps.getDocument(this.db, id);
  }

  getDocumentByChecksum(checksum: string): Document | null {
    return docOps.getDocumentByChecksum(this.db, checksum);
  }

  listDocuments(options?: { limit?: number; offset?: number }): Document[] {
    return docOps.listDocuments(this.db, options);
  }

  // ==================== PROCESSING RUN OPERATIONS ====================

  insertRun(run: ProcessingRun): string {
    return runOps.insertRun(this.db, run);
  }

  finalizeRun(id: string, completion: RunCompletion): void {
    runOps.finalizeRun(this.db, id, completion);
  }

  getRun(id: string): ProcessingRun | null {
    return runOps.getRun(this.db, id);
  }

  getRunsByDocument(documentId: string): ProcessingRun[] {
    return runOps.getRunsByDocument(this.db, documentId);
  }

  listRuns(options?: ListRunsOptions): ProcessingRun[] {
    return runOps.listRuns(this.db, options);
  }

  // ==================== DOMAIN RECORD OPERATIONS ====================

  findRecordId(entity: EntityKind, naturalKey: string): string | null {
    return recordOps.findRecordId(this.db, entity, naturalKey);
  }

  countRecords(entity: EntityKind): number {
    return recordOps.countRecords(this.db, entity);
  }

  insertInspection(record: InspectionRecord, documentId: string | null): string {
    return recordOps.insertInspection(this.db, record, documentId);
  }

  insertNcr(
    record: NcrRecord,
    documentId: string | null,
    linkedInspectionId: string | null
  ): string {
    return recordOps.insertNcr(this.db, record, documentId, linkedInspectionId);
  }

  insertMaintenanceEvent(record: MaintenanceRecord, documentId: string | null): string {
    return recordOps.insertMaintenanceEvent(this.db, record, documentId);
  }

  getInspectionByKey(inspectionId: string): Inspection | null {
    return recordOps.getInspectionByKey(this.db, inspectionId);
  }

  getNcrByKey(ncrId: string): NonConformanceReport | null {
    return recordOps.getNcrByKey(this.db, ncrId);
  }

  getMaintenanceEventByKey(eventId: string): MaintenanceEvent | null {
    return recordOps.getMaintenanceEventByKey(this.db, eventId);
  }
}
