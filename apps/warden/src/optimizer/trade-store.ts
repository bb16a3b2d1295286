import { and, asc, eq, gte, lt } from 'drizzle-orm';
import { checkIntegrity, closeDb, positions, type Db, type IntegrityReport } from '@botkeeper/db';
import { errorMessage } from '../errors';

export interface ClosedTrade {
  symbol: string;
  strategy: string | null;
  realizedPnl: number;
  exitedAt: Date;
}

/** Read-only access to the bot's outcome records. */
export interface TradeStore {
  checkIntegrity(): IntegrityReport;
  /** Closed positions with `start <= exit < end`, oldest first. */
  closedBetween(start: Date, end: Date): Promise<ClosedTrade[]>;
  close(): void;
}

/** The bot stores naive UTC timestamps: `YYYY-MM-DD HH:MM:SS[.ffffff]`. */
export function toSqliteTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function fromSqliteTimestamp(value: string): Date {
  return new Date(`${value.trim().replace(' ', 'T').slice(0, 23)}Z`);
}

export class DrizzleTradeStore implements TradeStore {
  private db: Db | null = null;

  /** The database is opened on first use so commands that never read trades never touch it. */
  constructor(private readonly open: () => Db) {}

  checkIntegrity(): IntegrityReport {
    try {
      return checkIntegrity(this.connection());
    } catch (err) {
      return { ok: false, detail: `cannot open database: ${errorMessage(err)}` };
    }
  }

  async closedBetween(start: Date, end: Date): Promise<ClosedTrade[]> {
    const rows = this.connection()
      .select({
        symbol: positions.symbol,
        strategy: positions.strategy,
        realized_pnl: positions.realized_pnl,
        exit_date: positions.exit_date,
      })
      .from(positions)
      .where(
        and(
          eq(positions.status, 'CLOSED'),
          gte(positions.exit_date, toSqliteTimestamp(start)),
          lt(positions.exit_date, toSqliteTimestamp(end)),
        ),
      )
      .orderBy(asc(positions.exit_date))
      .all();

    return rows.flatMap((row) =>
      row.exit_date === null
        ? []
        : [
            {
              symbol: row.symbol,
              strategy: row.strategy,
              realizedPnl: row.realized_pnl ?? 0,
              exitedAt: fromSqliteTimestamp(row.exit_date),
            },
          ],
    );
  }

  close(): void {
    if (this.db) {
      closeDb(this.db);
      this.db = null;
    }
  }

  private connection(): Db {
    this.db ??= this.open();
    return this.db;
  }
}
