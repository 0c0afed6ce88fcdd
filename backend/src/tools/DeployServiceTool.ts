/**
 * Tool definition and executor for the deploy_service tool.
 * Pulls the service's repository, rebuilds its image and brings the container up.
 * Each step runs only when the previous one succeeded.
 */

import { requireAllowedService } from "../sandbox";
import { getLog } from "../util/Logger";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const log = getLog(import.meta);

/** Build output is long; only the tail of each stream is reported. */
export const BUILD_OUTPUT_TAIL_CHARS = 2000;

/** Zod schema for deploy_service arguments. */
export const deployServiceArgsSchema = z.object({
	service: z.string().describe("Service to deploy (e.g. 'worker-main', 'apis', 'frontend')"),
	pull: z.boolean().default(true).describe("Run git pull first"),
	no_cache: z.boolean().default(true).describe("Build without the Docker cache"),
});

export type DeployStep =
	| { step: "git_pull"; repo: string; success: boolean; output: string }
	| { step: "docker_build" | "docker_up"; success: boolean; output: string };

export interface DeployServiceResult {
	service: string;
	steps: Array<DeployStep>;
	overall_success: boolean;
}

/** Executes the deploy_service tool. */
export async function executeDeployServiceTool(
	deps: ToolDeps,
	args: z.infer<typeof deployServiceArgsSchema>,
): Promise<DeployServiceResult> {
	const { settings, runner } = deps;
	const service = requireAllowedService(args.service, settings);
	const steps: Array<DeployStep> = [];
	const finish = (): DeployServiceResult => ({
		service,
		steps,
		overall_success: steps.every(step => step.success),
	});

	const repo = settings.serviceRepos.get(service);
	const repoPath = repo === undefined ? undefined : settings.repoPaths.get(repo);
	if (args.pull && repo !== undefined && repoPath !== undefined) {
		const pull = await runner.run(["git", "pull"], { cwd: repoPath, timeoutMs: 60_000 });
		steps.push({ step: "git_pull", repo, success: pull.success, output: pull.stdout + pull.stderr });
		if (!pull.success) {
			log.warn("Deploy of %s stopped: git pull failed in %s", service, repoPath);
			return finish();
		}
	}

	const buildCommand = ["docker", "compose", "build"];
	if (args.no_cache) {
		buildCommand.push("--no-cache");
	}
	buildCommand.push(service);
	const build = await runner.run(buildCommand, { cwd: settings.composeDirectory, timeoutMs: 600_000 });
	steps.push({
		step: "docker_build",
		success: build.success,
		output: build.stdout.slice(-BUILD_OUTPUT_TAIL_CHARS) + build.stderr.slice(-BUILD_OUTPUT_TAIL_CHARS),
	});
	if (!build.success) {
		log.warn("Deploy of %s stopped: build failed", service);
		return finish();
	}

	const up = await runner.run(["docker", "compose", "up", "-d", service], {
		cwd: settings.composeDirectory,
		timeoutMs: 120_000,
	});
	steps.push({ step: "docker_up", success: up.success, output: up.stdout + up.stderr });

	return finish();
}

/** Returns the tool definition for deploy_service. */
export function createDeployServiceToolDefinition(): RegisteredTool {
	return defineTool({
		name: "deploy_service",
		description: "Pull latest code, rebuild the image and restart a service.",
		schema: deployServiceArgsSchema,
		execute: executeDeployServiceTool,
	});
}
