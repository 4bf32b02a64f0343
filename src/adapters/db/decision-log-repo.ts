import type Database from 'better-sqlite3';
import type { DecisionLog, DecisionRecord } from '../../core/ports';
import type { FollowUp, ImportanceLevel, MessageIdentity, RoutingOutcome } from '../../core/domain';

type DecisionRow = {
  id: number;
  folder: string;
  uid: string;
  category: string;
  confidence: number;
  method: string;
  explanation: string;
  destination: string | null;
  outcome: string;
  importance: number;
  importance_level: string;
  follow_up: string;
  decided_at: string;
};

const OUTCOMES: readonly RoutingOutcome[] = ['moved', 'kept', 'dry-run', 'failed'];

const LEVELS: readonly ImportanceLevel[] = ['urgent', 'high', 'medium', 'low'];
const FOLLOW_UPS: readonly FollowUp[] = ['respond', 'verify', 'track', 'review', 'none'];

function isOutcome(value: string): value is RoutingOutcome {
  return OUTCOMES.some(o => o === value);
}

function isLevel(value: string): value is ImportanceLevel {
  return LEVELS.some(l => l === value);
}

function isFollowUp(value: string): value is FollowUp {
  return FOLLOW_UPS.some(f => f === value);
}

export function createDecisionLogRepo(getDb: () => Database.Database): DecisionLog {
  return {
    async record({ result, destination, outcome, importance }): Promise<void> {
      const db = getDb();
      db.prepare(`
        INSERT INTO decisions (
          folder, uid, category, confidence, method, explanation, destination, outcome,
          importance, importance_level, follow_up, decided_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        result.identity.folder,
        result.identity.uid,
        result.category,
        result.confidence,
        result.method,
        result.explanation,
        destination,
        outcome,
        importance.score,
        importance.level,
        importance.followUp,
        result.timestamp.toISOString()
      );
    },

    async findByIdentity(identity: MessageIdentity): Promise<DecisionRecord[]> {
      const db = getDb();
      const rows = db
        .prepare<[string, string], DecisionRow>(
          `SELECT * FROM decisions WHERE folder = ? AND uid = ? ORDER BY decided_at DESC, id DESC`
        )
        .all(identity.folder, identity.uid);
      return rows.map(mapRow);
    },

    async findRecent(limit = 50): Promise<DecisionRecord[]> {
      const db = getDb();
      const rows = db
        .prepare<[number], DecisionRow>(`SELECT * FROM decisions ORDER BY decided_at DESC, id DESC LIMIT ?`)
        .all(limit);
      return rows.map(mapRow);
    },

    async stats() {
      const db = getDb();
      const totals = db
        .prepare<[], { total: number; average: number | null }>(
          `SELECT COUNT(*) AS total, AVG(confidence) AS average FROM decisions`
        )
        .get();
      const byMethod = db
        .prepare<[], { key: string; n: number }>(`SELECT method AS key, COUNT(*) AS n FROM decisions GROUP BY method`)
        .all();
      const byCategory = db
        .prepare<[], { key: string; n: number }>(`SELECT category AS key, COUNT(*) AS n FROM decisions GROUP BY category`)
        .all();
      const byImportance = db
        .prepare<[], { key: string; n: number }>(
          `SELECT importance_level AS key, COUNT(*) AS n FROM decisions WHERE importance_level != 'low' GROUP BY importance_level`
        )
        .all();

      return {
        total: totals?.total ?? 0,
        averageConfidence: totals?.average ?? 0,
        byMethod: Object.fromEntries(byMethod.map(r => [r.key, r.n])),
        byCategory: Object.fromEntries(byCategory.map(r => [r.key, r.n])),
        byImportance: Object.fromEntries(byImportance.map(r => [r.key, r.n])),
      };
    },
  };
}

function mapRow(row: DecisionRow): DecisionRecord {
  return {
    id: row.id,
    folder: row.folder,
    uid: row.uid,
    category: row.category,
    confidence: row.confidence,
    method: row.method,
    explanation: row.explanation,
    destination: row.destination,
    outcome: isOutcome(row.outcome) ? row.outcome : 'failed',
    importance: row.importance,
    importanceLevel: isLevel(row.importance_level) ? row.importance_level : 'low',
    followUp: isFollowUp(row.follow_up) ? row.follow_up : 'none',
    decidedAt: new Date(row.decided_at),
  };
}
