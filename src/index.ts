import app from "./config/app";
import env from "./config/env";
import { pool } from "./db/client";
import { checkDatabaseConnection } from "./db/health";
import logger from "./helpers/Logger";

async function startServer() {
	const dbHealth = await checkDatabaseConnection();

	if (dbHealth.connected) {
		logger.info("Database connection successful", { latencyMs: dbHealth.latencyMs });
	} else {
		logger.error("Database connection failed", { error: dbHealth.error });
		process.exit(1);
	}

	const server = app.listen(env.PORT, () => {
		logger.info(`Server is running on port ${env.PORT}`);
	});

	const shutdown = (signal: string) => {
		logger.info("Shutting down", { signal });
		server.close(() => {
			pool.end().then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error("Failed to close the database pool", { error: error instanceof Error ? error.message : String(error) });
					process.exit(1);
				},
			);
		});
	};
	process.once("SIGTERM", shutdown);
	process.once("SIGINT", shutdown);
}

startServer().catch((error) => {
	logger.error("Failed to start server", { error: error instanceof Error ? error.message : String(error) });
	process.exit(1);
});
