import initSqlJs, { Database, SqlJsStatic, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
    if (!sqlJs) {
        sqlJs = initSqlJs();
    }
    return sqlJs;
}

/**
 * Opens the reconciliation database. With a path, an existing file is loaded
 * and the schema is applied idempotently; `null` gives an in-memory database.
 */
export async function openDatabase(dbPath: string | null): Promise<Database> {
    const SQL = await loadSqlJs();

    let db: Database;
    if (dbPath && fs.existsSync(dbPath)) {
        db = new SQL.Database(fs.readFileSync(dbPath));
    } else {
        db = new SQL.Database();
    }

    initializeSchema(db);
    return db;
}

export function saveDatabase(db: Database, dbPath: string | null): void {
    if (!dbPath) return;

    // Ensure data directory exists
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
    }

    fs.writeFileSync(dbPath, Buffer.from(db.export()));
}

export function closeDatabase(db: Database, dbPath: string | null): void {
    saveDatabase(db, dbPath);
    db.close();
}

/** Runs `work` inside a transaction, rolling back if it throws. */
export function inTransaction<T>(db: Database, work: () => T): T {
    db.run('BEGIN');
    try {
        const result = work();
        db.run('COMMIT');
        return result;
    } catch (error) {
        db.run('ROLLBACK');
        throw error;
    }
}

/** Reads every row of a query as a column -> value record. */
export function queryRows(db: Database, sql: string, params: SqlValue[] = []): Record<string, SqlValue>[] {
    const stmt = db.prepare(sql);
    try {
        stmt.bind(params);
        const rows: Record<string, SqlValue>[] = [];
        while (stmt.step()) {
            rows.push(stmt.getAsObject());
        }
        return rows;
    } finally {
        stmt.free();
    }
}

export function textColumn(row: Record<string, SqlValue>, column: string): string {
    const value = row[column];
    if (typeof value !== 'string') {
        throw new TypeError(`Column ${column} is not text`);
    }
    return value;
}

export function optionalTextColumn(row: Record<string, SqlValue>, column: string): string | null {
    const value = row[column];
    return typeof value === 'string' ? value : null;
}

function initializeSchema(database: Database): void {
    // Rate Cache Table (HSN/SAC -> GST rate, rates as decimal text)
    database.run(`
    CREATE TABLE IF NOT EXISTS rate_cache (
      product_code TEXT PRIMARY KEY,
      rate TEXT NOT NULL,
      description TEXT,
      source TEXT NOT NULL,
      resolved_at TEXT NOT NULL
    )
  `);

    // Review Summaries Table (one per invoice)
    database.run(`
    CREATE TABLE IF NOT EXISTS review_summaries (
      id TEXT PRIMARY KEY,
      invoice_id TEXT NOT NULL UNIQUE,
      invoice_number TEXT,
      verdict TEXT NOT NULL,
      row_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

    // Review Lines Table
    database.run(`
    CREATE TABLE IF NOT EXISTS review_lines (
      id TEXT PRIMARY KEY,
      invoice_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      row_json TEXT NOT NULL
    )
  `);

    // Review Mismatches Table
    database.run(`
    CREATE TABLE IF NOT EXISTS review_mismatches (
      id TEXT PRIMARY KEY,
      invoice_id TEXT NOT NULL,
      sequence INTEGER NOT NULL,
      severity TEXT NOT NULL,
      row_json TEXT NOT NULL
    )
  `);

    // Create indexes
    database.run(`CREATE INDEX IF NOT EXISTS idx_review_lines_invoice ON review_lines(invoice_id, position)`);
    database.run(`CREATE INDEX IF NOT EXISTS idx_review_mismatches_invoice ON review_mismatches(invoice_id, sequence)`);
}
