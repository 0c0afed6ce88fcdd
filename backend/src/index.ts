export { createAndStartServer, createExpressApp, createToolDeps, SERVICE_NAME } from "./AppFactory";
export { type Config, getConfig } from "./config/Config";
export { createGatewaySettings, type GatewaySettings } from "./config/GatewaySettings";
export { createDefaultTools, createToolDispatcher, createToolRegistry } from "./tools";

/**
 * A callback run when the server is shutting down.
 */
export interface ExitHandler {
	stop(code?: number): void | Promise<void>;
}
