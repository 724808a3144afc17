import { DataSource, EntityManager } from 'typeorm';

const sqliteQueues = new WeakMap<DataSource, Promise<void>>();

/**
 * `DataSource.transaction`, queued one at a time on SQLite.
 * TypeORM shares a single SQLite connection, so overlapping transactions would nest as
 * savepoints of each other; PostgreSQL transactions get their own connection and row locks.
 */
export function runInTransaction<T>(dataSource: DataSource, work: (manager: EntityManager) => Promise<T>): Promise<T> {
    if (dataSource.options.type === 'postgres') {
        return dataSource.transaction(work);
    }

    const previous = sqliteQueues.get(dataSource) ?? Promise.resolve();
    const result = previous.then(() => dataSource.transaction(work));
    // The queue only orders the work; the outcome goes to the caller
    sqliteQueues.set(dataSource, result.then(() => undefined, () => undefined));
    return result;
}
