import { createDb, migrate, type DB } from '@payoff-planner/engine';

const dbPath = process.env.PAYOFF_DB_PATH ?? './data/payoff.db';
export const db: DB = createDb(dbPath);
migrate(db);
