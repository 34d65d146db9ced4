import { runSqlMigrations } from './migrations/run';

runSqlMigrations().catch((error) => {
  console.error('[db:migrate] failed:', error);
  process.exit(1);
});
