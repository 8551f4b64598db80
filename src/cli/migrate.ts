import Database from 'better-sqlite3';
import path from 'path';
import { migrate } from '../db/migrate';
import { ENV } from '../pipeline/env';

async function main() {
  const db = new Database(ENV.dbPath);
  try {
    const applied = migrate(db);
    console.log(
      applied.length
        ? `Applied ${applied.join(', ')} to ${path.resolve(ENV.dbPath)}`
        : `Up to date: ${path.resolve(ENV.dbPath)}`
    );
  } finally {
    db.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
