import { sql } from "drizzle-orm";
import logger from "../helpers/Logger";
import { db } from "./client";

const log = logger.child("db");

export interface DatabaseHealth {
	connected: boolean;
	latencyMs?: number;
	error?: string;
}

export async function checkDatabaseConnection(): Promise<DatabaseHealth> {
	const startedAt = performance.now();
	try {
		await db.execute(sql`SELECT 1`);
		return { connected: true, latencyMs: Math.round(performance.now() - startedAt) };
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown database error";
		log.error("database health check failed", { message });
		return { connected: false, error: message };
	}
}
