import Database from 'better-sqlite3';
import { RecordOutcome, RunFailure, RunHistoryEntry, RunSummary, SendMode } from '../types';

let db: Database.Database | null = null;

export function initDatabase(databasePath: string): Database.Database {
    if (db) return db;

    db = new Database(databasePath);

    // Create tables if not exist
    db.exec(`
    CREATE TABLE IF NOT EXISTS merge_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at DATETIME NOT NULL,
      completed_at DATETIME NOT NULL,
      mode TEXT NOT NULL,
      label_name TEXT NOT NULL,
      input_file TEXT NOT NULL,
      output_file TEXT NOT NULL,
      sent INTEGER NOT NULL DEFAULT 0,
      drafted INTEGER NOT NULL DEFAULT 0,
      skipped INTEGER NOT NULL DEFAULT 0,
      errors INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS merge_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES merge_runs(id),
      row_index INTEGER NOT NULL,
      email TEXT NOT NULL,
      status TEXT NOT NULL,
      thread_id TEXT,
      rfc_message_id TEXT,
      error_message TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_merge_results_run ON merge_results(run_id);
    CREATE INDEX IF NOT EXISTS idx_merge_results_status ON merge_results(status);
  `);

    return db;
}

export function getDatabase(): Database.Database {
    if (!db) {
        throw new Error('Database not initialized; call initDatabase first');
    }
    return db;
}

export function closeDatabase(): void {
    if (db) {
        db.close();
        db = null;
    }
}

// Store a finished run and its per-recipient outcomes, returning the run id
export function recordRun(summary: RunSummary, inputFile: string, outcomes: RecordOutcome[]): number {
    const db = getDatabase();

    const insertRun = db.prepare(`
    INSERT INTO merge_runs (started_at, completed_at, mode, label_name, input_file, output_file, sent, drafted, skipped, errors)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
    const insertResult = db.prepare(`
    INSERT INTO merge_results (run_id, row_index, email, status, thread_id, rfc_message_id, error_message)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

    const store = db.transaction(() => {
        const info = insertRun.run(
            summary.startedAt.toISOString(),
            summary.completedAt.toISOString(),
            summary.mode,
            summary.labelName,
            inputFile,
            summary.outputFilePath,
            summary.sent,
            summary.drafted,
            summary.skipped.length,
            summary.errors.length,
        );
        const runId = Number(info.lastInsertRowid);

        for (const outcome of outcomes) {
            insertResult.run(
                runId,
                outcome.index,
                outcome.address,
                outcome.status,
                outcome.threadId ?? null,
                outcome.rfcMessageId ?? null,
                outcome.errorMessage ?? null,
            );
        }
        return runId;
    });

    return store();
}

interface RunRow {
    id: number;
    startedAt: string;
    completedAt: string;
    mode: SendMode;
    labelName: string;
    inputFile: string;
    outputFile: string;
    sent: number;
    drafted: number;
    skipped: number;
    errors: number;
}

export function getRunHistory(limit: number = 20): RunHistoryEntry[] {
    const db = getDatabase();
    const stmt = db.prepare<[number], RunRow>(`
    SELECT id, started_at as startedAt, completed_at as completedAt, mode, label_name as labelName,
           input_file as inputFile, output_file as outputFile, sent, drafted, skipped, errors
    FROM merge_runs
    ORDER BY id DESC
    LIMIT ?
  `);
    return stmt.all(limit);
}

export function getRunFailures(runId: number): RunFailure[] {
    const db = getDatabase();
    const stmt = db.prepare<[number], RunFailure>(`
    SELECT email, status, error_message as error
    FROM merge_results
    WHERE run_id = ? AND status IN ('Error', 'Skipped')
    ORDER BY row_index
  `);
    return stmt.all(runId);
}
