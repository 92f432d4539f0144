import { migrate } from "drizzle-orm/node-postgres/migrator";
import logger from "../helpers/Logger";
import { db, pool } from "./client";

const log = logger.child("migrate");

/** Applies the migrations drizzle-kit generated into `drizzle/` (`npm run db:generate`). */
async function run() {
	try {
		await migrate(db, { migrationsFolder: "./drizzle" });
		log.info("Migrations applied");
	} finally {
		await pool.end();
	}
}

run().catch((error: unknown) => {
	log.error("Migration failed", { message: error instanceof Error ? error.message : String(error) });
	process.exit(1);
});
