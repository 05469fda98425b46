import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../utils/logger';
import { allSchemas } from './schema';

const IN_MEMORY = ':memory:';

function initializeSchemas(db: Database.Database): void {
  try {
    db.transaction(() => {
      for (const schema of allSchemas) {
        try {
          db.exec(schema);
        } catch (error) {
          logger.error('Error executing schema:', { error, schema });
          throw error; // This will trigger transaction rollback
        }
      }
    })();
    logger.info('Database schemas initialized successfully');
  } catch (error) {
    logger.error('Schema initialization failed:', { error });
    throw new Error(
      `Schema initialization failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Opens a SQLite database at `dbPath` (or in memory for `:memory:`) with
 * every table created. Each call returns a new, independent handle.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dbDir = dirname(dbPath);
    try {
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    } catch (error) {
      logger.error('Failed to create database directory:', { error, dbDir });
      throw new Error(
        `Failed to create database directory: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    initializeSchemas(db);
    return db;
  } catch (error) {
    logger.error('Failed to initialize database:', { error, dbPath });
    // Clean up if instance creation succeeded but schema init failed
    if (db) {
      try {
        db.close();
      } catch (closeError) {
        logger.error('Error while closing database after initialization failure:', { closeError });
      }
    }
    throw new Error(
      `Database initialization failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

class DatabaseConnection {
  private static instance: Database.Database | null = null;
  private static instancePath: string | null = null;

  static getInstance(dbPath: string): Database.Database {
    if (this.instance) {
      if (this.instancePath !== dbPath) {
        throw new Error(
          `Database already open at ${this.instancePath}; close it before opening ${dbPath}`
        );
      }
      return this.instance;
    }

    this.instance = openDatabase(dbPath);
    this.instancePath = dbPath;
    return this.instance;
  }

  static closeConnection(): void {
    if (this.instance) {
      try {
        this.instance.close();
        this.instance = null;
        this.instancePath = null;
        logger.info('Database connection closed successfully');
      } catch (error) {
        logger.error('Error closing database connection:', { error });
        throw new Error(
          `Failed to close database connection: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }
}

export { DatabaseConnection };
