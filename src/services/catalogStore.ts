import Database from 'better-sqlite3';
import { Logger } from 'winston';
import logger from '../utils/logger';
import { StoreFault, describeError } from '../utils/errors';

/**
 * Durable title -> playlist path mapping kept in a SQLite file.
 *
 * Every method runs one synchronous statement, so calls made by concurrent
 * requests never interleave. Failures are rethrown as {@link StoreFault}.
 */
export class CatalogStore {
    private db: Database.Database;
    private logger: Logger;

    private constructor(db: Database.Database, loggerInstance?: Logger) {
        this.db = db;
        this.logger = loggerInstance || logger;
    }

    public static open(dbPath: string, loggerInstance?: Logger): CatalogStore {
        let db: Database.Database | undefined;
        try {
            db = new Database(dbPath);
            db.exec('CREATE TABLE IF NOT EXISTS videos (title TEXT PRIMARY KEY, path TEXT NOT NULL)');
        } catch (error) {
            db?.close();
            throw new StoreFault(`Failed to open catalog at ${dbPath}: ${describeError(error)}`, { cause: error });
        }
        const store = new CatalogStore(db, loggerInstance);
        store.logger.debug(`Catalog opened at ${dbPath}`);
        return store;
    }

    private run<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            throw new StoreFault(`Catalog ${operation} failed: ${describeError(error)}`, { cause: error });
        }
    }

    public exists(title: string): boolean {
        return this.run('lookup', () => {
            const row = this.db
                .prepare<[string], { found: number }>('SELECT EXISTS(SELECT 1 FROM videos WHERE title = ?) AS found')
                .get(title);
            return row?.found === 1;
        });
    }

    /** Adds an entry. A title that is already cataloged raises a StoreFault. */
    public insert(title: string, path: string): void {
        if (!this.insertIfAbsent(title, path)) {
            throw new StoreFault(`Catalog insert failed: ${title} is already cataloged`);
        }
        this.logger.debug(`Catalog insert: ${title} -> ${path}`);
    }

    /**
     * Adds an entry unless the title is already cataloged; true when a row was added.
     * Catalog files created without the primary key on `title` get the same
     * guarantee, since the check is part of the statement.
     */
    public insertIfAbsent(title: string, path: string): boolean {
        const result = this.run('insert', () =>
            this.db
                .prepare<[string, string, string]>(
                    'INSERT INTO videos (title, path) SELECT ?, ? WHERE NOT EXISTS (SELECT 1 FROM videos WHERE title = ?)'
                )
                .run(title, path, title)
        );
        return result.changes === 1;
    }

    public lookup(title: string): string | undefined {
        return this.run('lookup', () => {
            const row = this.db
                .prepare<[string], { path: string }>('SELECT path FROM videos WHERE title = ?')
                .get(title);
            return row?.path;
        });
    }

    public listTitles(): string[] {
        return this.run('listing', () =>
            this.db
                .prepare<[], { title: string }>('SELECT title FROM videos')
                .all()
                .map(row => row.title)
        );
    }

    public close(): void {
        this.run('close', () => this.db.close());
    }
}
