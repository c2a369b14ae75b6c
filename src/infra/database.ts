import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import pino from 'pino';

const logger = pino({ name: 'infra/db', level: process.env.LOG_LEVEL || 'info' });

export async function openDatabase(filename: string): Promise<Database> {
    const db = await open({
        filename,
        driver: sqlite3.Database
    });

    logger.info({ filename }, 'Connected to SQLite database.');
    if (filename !== ':memory:') {
        await db.exec('PRAGMA journal_mode = WAL;');
    }
    await initSchema(db);

    return db;
}

async function initSchema(db: Database) {
    logger.info('Initializing schema...');

    // One row per submission cycle; the header is fixed, re-investments add rows, never columns
    await db.exec(`
        CREATE TABLE IF NOT EXISTS investment_records (
            seq INTEGER PRIMARY KEY AUTOINCREMENT,
            record_id TEXT UNIQUE NOT NULL,
            user_id TEXT NOT NULL,
            name TEXT NOT NULL,
            national_id TEXT NOT NULL,
            amount INTEGER NOT NULL CHECK (amount BETWEEN 200000 AND 500000),
            referral_code TEXT NOT NULL,
            assigned_code TEXT,
            created_at TEXT NOT NULL,
            expected_payout_date TEXT NOT NULL,
            proof_reference TEXT,
            status TEXT NOT NULL,
            reviewer_note TEXT NOT NULL DEFAULT ''
        );
    `);

    await db.exec(`
        CREATE TABLE IF NOT EXISTS user_sessions (
            user_id TEXT PRIMARY KEY,
            state TEXT NOT NULL,
            context TEXT NOT NULL
        );
    `);

    // Arm times survive restarts; fired_at marks the one nudge as spent
    await db.exec(`
        CREATE TABLE IF NOT EXISTS reminders (
            record_id TEXT PRIMARY KEY,
            user_id TEXT NOT NULL,
            fire_at INTEGER NOT NULL,
            fired_at INTEGER
        );
    `);

    await db.exec(`
        CREATE TABLE IF NOT EXISTS events (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            uuid TEXT UNIQUE NOT NULL,
            type TEXT NOT NULL,
            payload TEXT NOT NULL,
            timestamp INTEGER NOT NULL,
            user_id TEXT,
            record_id TEXT,
            amount INTEGER,
            external_ref TEXT
        );
    `);

    await db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS idx_records_assigned_code ON investment_records(assigned_code);`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_records_user_id ON investment_records(user_id, created_at);`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_events_user_id ON events(user_id);`);
    await db.exec(`CREATE INDEX IF NOT EXISTS idx_events_record_id ON events(record_id);`);

    logger.info('Schema initialized.');
}
