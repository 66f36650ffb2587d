import { getWeekLabel } from "./calendar";
import { errorMessage } from "./errors";
import { emptyLedger, setCoach } from "./ledger";
import { createLogger } from "./logger";
import { getTimeZone } from "./runtime";
import { createLedgerStore, type LedgerStore } from "./store";
import type { Ledger, RawTable, StudentMinutes, UploadOptions } from "./types";
import { processUpload } from "./upload";

const log = createLogger("ledger-session");

export type FlushStatus = {
  persisted: boolean;
  persistError?: string;
};

export type SessionUploadResult = FlushStatus & {
  weekLabel: string;
  students: StudentMinutes[];
  ledger: Ledger;
};

export type SessionLedgerResult = FlushStatus & {
  ledger: Ledger;
};

/**
 * Process-wide ledger: loaded once, mutated one request at a time and flushed
 * after every mutation. A failed flush leaves memory ahead of the file until
 * the next successful one.
 */
export class LedgerSession {
  private ledger: Ledger | null = null;
  private loading: Promise<Ledger> | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: LedgerStore,
    private readonly timeZone = getTimeZone()
  ) {}

  async init(): Promise<Ledger> {
    if (this.ledger) return this.ledger;
    if (!this.loading) {
      this.loading = this.store
        .read()
        .then((ledger) => {
          this.ledger = ledger;
          log.info(`Ledger loaded from ${this.store.filePath} (${ledger.rows.length} students)`);
          return ledger;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  async current(): Promise<Ledger> {
    return this.init();
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async flush(ledger: Ledger): Promise<FlushStatus> {
    try {
      await this.store.write(ledger);
      return { persisted: true };
    } catch (error) {
      log.error("Ledger flush failed, in-memory ledger is ahead of storage", error);
      return { persisted: false, persistError: errorMessage(error, "Ledger could not be saved") };
    }
  }

  applyUpload(table: RawTable, options: UploadOptions, now = new Date()): Promise<SessionUploadResult> {
    return this.exclusive(async () => {
      const ledger = await this.init();
      const weekLabel = getWeekLabel(now, this.timeZone);
      const result = processUpload(table, options, ledger, weekLabel);
      this.ledger = result.ledger;
      log.info(`Week ${weekLabel} merged for ${result.students.length} students`);
      const status = await this.flush(result.ledger);
      return { ...status, weekLabel, students: result.students, ledger: result.ledger };
    });
  }

  updateCoach(name: string, coach: string): Promise<SessionLedgerResult> {
    return this.exclusive(async () => {
      const next = setCoach(await this.init(), name, coach);
      this.ledger = next;
      return { ...(await this.flush(next)), ledger: next };
    });
  }

  reset(): Promise<SessionLedgerResult> {
    return this.exclusive(async () => {
      const next = emptyLedger();
      this.ledger = next;
      try {
        await this.store.remove();
        log.info("Ledger reset");
        return { persisted: true, ledger: next };
      } catch (error) {
        log.error("Ledger file could not be removed after reset", error);
        return { persisted: false, persistError: errorMessage(error, "Ledger file could not be removed"), ledger: next };
      }
    });
  }
}

let session: LedgerSession | null = null;

export function getLedgerSession(): LedgerSession {
  if (!session) session = new LedgerSession(createLedgerStore());
  return session;
}
