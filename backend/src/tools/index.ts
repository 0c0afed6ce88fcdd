import { createDailyStatsToolDefinition } from "./DailyStatsTool";
import { createDeployServiceToolDefinition } from "./DeployServiceTool";
import { createDockerStatusToolDefinition } from "./DockerStatusTool";
import { createGitToolDefinition } from "./GitTool";
import { createGrepToolDefinition } from "./GrepTool";
import { createHideRecordToolDefinition } from "./HideRecordTool";
import { createListDirectoryToolDefinition } from "./ListDirectoryTool";
import { createQueryDatabaseToolDefinition } from "./QueryDatabaseTool";
import { createReadFileToolDefinition } from "./ReadFileTool";
import { createReadLogToolDefinition } from "./ReadLogTool";
import { createRestartServiceToolDefinition } from "./RestartServiceTool";
import { createRunCommandToolDefinition } from "./RunCommandTool";
import { createSearchFilesToolDefinition } from "./SearchFilesTool";
import { createSearchLogsToolDefinition } from "./SearchLogsTool";
import { createSystemHealthToolDefinition } from "./SystemHealthTool";
import { createTailLogsToolDefinition } from "./TailLogsTool";
import type { RegisteredTool } from "./ToolTypes";
import { createTriggerReanalysisToolDefinition } from "./TriggerReanalysisTool";

export { ToolError, type ToolErrorKind } from "./ToolError";
export {
	createToolDispatcher,
	type DispatchError,
	type DispatchErrorKind,
	type DispatchResult,
	INTERNAL_ERROR_MESSAGE,
	type ToolDispatcher,
} from "./ToolDispatcher";
export { createToolRegistry, type ToolRegistry, toInputSchema } from "./ToolRegistry";
export type { RegisteredTool, ToolDeps } from "./ToolTypes";

/**
 * The gateway's tool catalog, in the order it is listed to clients.
 */
export function createDefaultTools(): Array<RegisteredTool> {
	return [
		createReadLogToolDefinition(),
		createSearchLogsToolDefinition(),
		createTailLogsToolDefinition(),
		createReadFileToolDefinition(),
		createSearchFilesToolDefinition(),
		createGrepToolDefinition(),
		createListDirectoryToolDefinition(),
		createDeployServiceToolDefinition(),
		createRestartServiceToolDefinition(),
		createDockerStatusToolDefinition(),
		createGitToolDefinition(),
		createQueryDatabaseToolDefinition(),
		createSystemHealthToolDefinition(),
		createDailyStatsToolDefinition(),
		createRunCommandToolDefinition(),
		createTriggerReanalysisToolDefinition(),
		createHideRecordToolDefinition(),
	];
}
