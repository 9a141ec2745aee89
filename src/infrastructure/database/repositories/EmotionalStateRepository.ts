import Database from 'better-sqlite3';
import type { IEmotionalStateRepository } from '../../../core/interfaces/IEmotionalStateRepository.js';
import type { EmotionalStateRecord } from '../../../core/entities/Profile.js';
import { StorageError, errorMessage } from '../../../core/errors.js';

interface EmotionalStateRow {
  id: number;
  user_session: string;
  emotion: string;
  timestamp: string;
}

/**
 * SQLite implementation of the emotional_states log
 */
export class EmotionalStateRepository implements IEmotionalStateRepository {
  constructor(private db: Database.Database) {}

  record(sessionId: string, emotion: string, recordedAt: Date): EmotionalStateRecord {
    try {
      const result = this.db
        .prepare('INSERT INTO emotional_states (user_session, emotion, timestamp) VALUES (?, ?, ?)')
        .run(sessionId, emotion, recordedAt.toISOString());

      return { id: Number(result.lastInsertRowid), sessionId, emotion, recordedAt };
    } catch (error) {
      throw new StorageError(`Failed to record emotional state: ${errorMessage(error)}`, error);
    }
  }

  listForSession(sessionId: string): EmotionalStateRecord[] {
    try {
      const rows = this.db
        .prepare<[string], EmotionalStateRow>(
          'SELECT * FROM emotional_states WHERE user_session = ? ORDER BY timestamp, id'
        )
        .all(sessionId);

      return rows.map((row) => ({
        id: row.id,
        sessionId: row.user_session,
        emotion: row.emotion,
        recordedAt: new Date(row.timestamp),
      }));
    } catch (error) {
      throw new StorageError(`Failed to load emotional states: ${errorMessage(error)}`, error);
    }
  }
}
