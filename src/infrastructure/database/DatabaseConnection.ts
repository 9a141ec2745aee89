import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { StorageError, errorMessage } from '../../core/errors.js';

export const IN_MEMORY = ':memory:';

// Columns added after the first release of anonymous_posts
const POST_COLUMN_UPGRADES: Array<{ name: string; type: string }> = [
  { name: 'mood', type: 'TEXT' },
  { name: 'mood_color', type: 'TEXT' },
  { name: 'mood_score', type: 'REAL' },
  { name: 'post_date', type: 'DATE' },
  { name: 'subjectivity', type: 'REAL' },
];

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - file path relative to the working directory, or ':memory:'
   */
  constructor(dbPath: string = 'data/cultural_navigator.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(process.cwd(), dbPath);

    try {
      if (this.dbPath !== IN_MEMORY) {
        // Ensure data directory exists
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath);
      if (this.dbPath !== IN_MEMORY) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');

      this.initializeTables();
    } catch (error) {
      throw new StorageError(`Failed to open database at ${this.dbPath}: ${errorMessage(error)}`, error);
    }
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS anonymous_posts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        content TEXT NOT NULL,
        category TEXT,
        sentiment_score REAL,
        timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS emotional_states (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_session TEXT,
        emotion TEXT,
        timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_emotional_states_session ON emotional_states(user_session);
    `);

    this.upgradePostColumns();

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_posts_timestamp ON anonymous_posts(timestamp);
      CREATE INDEX IF NOT EXISTS idx_posts_post_date ON anonymous_posts(post_date);
    `);
  }

  private upgradePostColumns() {
    const existing = new Set(
      this.db
        .prepare<[], { name: string }>('PRAGMA table_info(anonymous_posts)')
        .all()
        .map((column) => column.name)
    );

    for (const column of POST_COLUMN_UPGRADES) {
      if (!existing.has(column.name)) {
        this.db.exec(`ALTER TABLE anonymous_posts ADD COLUMN ${column.name} ${column.type}`);
      }
    }
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalPosts: number;
    totalEmotionalStates: number;
    databaseSize: number;
  } {
    const count = (table: 'anonymous_posts' | 'emotional_states'): number => {
      const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get();
      return row?.count ?? 0;
    };

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalPosts: count('anonymous_posts'),
      totalEmotionalStates: count('emotional_states'),
      databaseSize,
    };
  }
}
