import { getLog } from "../util/Logger";
import neo4j, { type Driver } from "neo4j-driver";

const log = getLog(import.meta);

export type GraphRow = Record<string, unknown>;

/**
 * Read-only access to the graph database.
 */
export interface GraphQueryClient {
	/**
	 * Runs a query in a read-access transaction. Parameters are passed to the driver, never spliced into the text.
	 * @throws the driver's error when the query fails or times out
	 */
	runReadQuery(query: string, params: Record<string, unknown>): Promise<Array<GraphRow>>;
	close(): Promise<void>;
}

export interface GraphQueryClientOptions {
	readonly uri: string;
	readonly username: string;
	readonly password?: string | undefined;
	readonly database?: string | undefined;
	/** Transaction timeout in milliseconds */
	readonly timeoutMs: number;
}

export function createGraphQueryClient(options: GraphQueryClientOptions): GraphQueryClient {
	const { uri, username, password, database, timeoutMs } = options;
	// Connected on first query so the gateway starts without the database
	let driver: Driver | undefined;

	return {
		runReadQuery,
		close,
	};

	function getDriver(): Driver {
		if (!driver) {
			const auth = password ? neo4j.auth.basic(username, password) : undefined;
			// Plain numbers instead of Integer objects so rows serialize as JSON
			driver = neo4j.driver(uri, auth, { disableLosslessIntegers: true });
			log.info({ uri, database }, "Created graph database driver");
		}
		return driver;
	}

	async function runReadQuery(query: string, params: Record<string, unknown>): Promise<Array<GraphRow>> {
		const session = getDriver().session({ defaultAccessMode: neo4j.session.READ, database });
		try {
			return await session.executeRead(
				async tx => {
					const result = await tx.run(query, params);
					return result.records.map(record => {
						const row: GraphRow = record.toObject();
						return row;
					});
				},
				{ timeout: timeoutMs },
			);
		} finally {
			await session.close();
		}
	}

	async function close(): Promise<void> {
		if (driver) {
			await driver.close();
			driver = undefined;
		}
	}
}
