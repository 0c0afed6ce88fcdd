import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

/**
 * Comma-separated list, trimmed, empty entries dropped.
 */
function listSchema(defaultValue: string) {
	return z
		.string()
		.default(defaultValue)
		.transform(s =>
			s
				.split(",")
				.map(item => item.trim())
				.filter(item => item.length > 0),
		);
}

/**
 * A string holding JSON, parsed and then validated against the given schema.
 */
function jsonSchema<T extends z.ZodTypeAny>(schema: T, defaultValue: z.input<T>) {
	return z
		.string()
		.default(JSON.stringify(defaultValue))
		.transform((input, ctx) => {
			try {
				const parsed: unknown = JSON.parse(input);
				return parsed;
			} catch (_e) {
				ctx.addIssue({
					code: "custom",
					message: "Invalid JSON string",
				});
				return z.NEVER;
			}
		})
		.pipe(schema);
}

const RegexListSchema = listSchema(
	["\\.env$", "\\.env\\.local$", "credentials", "secrets", "\\.pem$", "\\.key$", "password", "\\.ssh"].join(","),
).superRefine((patterns, ctx) => {
	for (const pattern of patterns) {
		try {
			new RegExp(pattern);
		} catch (_e) {
			ctx.addIssue({ code: "custom", message: `Invalid pattern: ${pattern}` });
		}
	}
});

const NameMapSchema = z.record(z.string().min(1));

export const DEFAULT_REPO_PATHS: Record<string, string> = {
	web: "/opt/stack/web",
	api: "/opt/stack/api",
	workers: "/opt/stack/workers",
	deployment: "/opt/stack/deployment",
};

export const DEFAULT_SERVICE_REPOS: Record<string, string> = {
	frontend: "web",
	apis: "api",
	"worker-main": "workers",
	"worker-sources": "workers",
};

export const DEFAULT_COMMAND_PREFIXES: Array<string> = [
	"docker ps",
	"docker logs",
	"docker inspect",
	"docker stats --no-stream",
	"df -h",
	"free",
	"uptime",
	"ps aux",
	"netstat -tlnp",
	"ls ",
	"cat /proc/",
	"wc -l",
	"head ",
	"tail ",
];

/**
 * Configuration schema definition
 */
const configSchema = {
	server: {
		NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
		HOST: z.string().default("0.0.0.0"),
		PORT: z.coerce.number().int().min(1).max(65535).default(8002),
		/**
		 * Comma-separated credentials accepted in the X-API-Key header or `key` query parameter.
		 */
		API_KEYS: z
			.string()
			.transform(s =>
				s
					.split(",")
					.map(key => key.trim())
					.filter(key => key.length > 0),
			)
			.refine(keys => keys.length > 0, { message: "At least one API key is required" }),
		ALLOWED_PATHS: listSchema("/opt/stack,/app,/var/log,/tmp"),
		/**
		 * Comma-separated regular expressions matched against the lower-cased canonical path.
		 */
		BLOCKED_PATH_PATTERNS: RegexListSchema,
		ALLOWED_SERVICES: listSchema("frontend,apis,worker-main,worker-sources,neo4j,nginx,qdrant,mcp-server"),
		/**
		 * JSON object mapping repository names to their checkout directories.
		 */
		REPO_PATHS: jsonSchema(NameMapSchema, DEFAULT_REPO_PATHS),
		/**
		 * JSON object mapping service names to the repository they are built from.
		 */
		SERVICE_REPOS: jsonSchema(NameMapSchema, DEFAULT_SERVICE_REPOS),
		/**
		 * JSON array of literal prefixes a raw command must start with.
		 */
		ALLOWED_COMMAND_PREFIXES: jsonSchema(z.array(z.string().min(1)), DEFAULT_COMMAND_PREFIXES),
		COMPOSE_DIRECTORY: z.string().default("/opt/stack/deployment"),
		FILE_READ_MAX_CHARS: z.coerce.number().int().positive().default(100000),
		NEO4J_URI: z.string().default("bolt://neo4j:7687"),
		NEO4J_USERNAME: z.string().default("neo4j"),
		NEO4J_PASSWORD: z.string().optional(),
		NEO4J_DATABASE: z.string().optional(),
		NEO4J_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
		BACKEND_API_URL: z.string().url().default("http://apis:8000"),
		BACKEND_API_KEY: z.string().optional(),
		BACKEND_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
		AUDIT_ENABLED: BooleanSchema.default("true"),
		AUDIT_LOG_PATH: z.string().default("./logs/audit.log"),
		/**
		 * Comma-separated allowed CORS origins, or "*" for any origin.
		 */
		CORS_ORIGINS: listSchema("*"),
	},

	/**
	 * What object holds the environment variables at runtime.
	 */
	runtimeEnv: process.env,

	/**
	 * Treat `PORT=` in a .env file as unset so defaults apply.
	 */
	emptyStringAsUndefined: true,
};

/**
 * Creates a new configuration object from the current environment
 */
function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

/**
 * Current configuration object (internal mutable reference)
 */
let currentConfig: Config | undefined;

/**
 * Gets the current configuration object, creating it from process.env on first use.
 * @throws Error if the environment does not satisfy the schema
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the configuration cache, forcing it to be recreated on the next call to getConfig().
 * This is primarily useful for testing when environment variables change between tests.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
