export { createPool, connectDatabase } from './connection';
export { migrate, rollback } from './migrate';
export { MemoryDataStore } from './memory.datastore';
export { PgDataStore } from './pg.datastore';
export type * from './datastore';
export type * from './models';
