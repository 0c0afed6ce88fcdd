import { config } from "dotenv";

/**
 * Loads .env.local then .env into process.env. Variables already set are never overwritten,
 * so the process environment wins over .env.local, which wins over .env.
 */
export function loadEnvFiles(): void {
	config({ path: ".env.local", quiet: true });
	config({ path: ".env", quiet: true });
}

loadEnvFiles();
