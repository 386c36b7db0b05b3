// ============================================================================
// Flakeprobe - Configuration
// Defaults reproduce a 30-run Maven experiment. Override only what you need.
//
// Layers, later wins:
//   defaults → flakeprobe.config.{json,js,mjs} → FLAKEPROBE_* env → CLI flags
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError } from 'flakeprobe-runner';
import { z } from 'zod';

/** Full configuration with all options */
export interface FlakeprobeConfig {
	/** Shell command performing one full build-and-test cycle (default: 'mvn clean verify') */
	command: string;
	/** Working directory of the subject (default: '.') */
	cwd: string;
	/** Extra environment variables for every command (default: {}) */
	env: Record<string, string>;
	/** Number of runs N (default: 30) */
	runs: number;
	/** Per-run timeout in ms (default: 40 minutes) */
	timeout: number;
	/** Grace period between SIGTERM and SIGKILL in ms (default: 5000) */
	killGrace: number;
	/** Output directory for the log, tables and raw output (default: 'log') */
	outputDir: string;
	/** Report directories, relative to cwd */
	reportDirs: string[];
	/** Report file name pattern (default: 'TEST-*.xml') */
	reportPattern: string;
	/** Delete old report files before each run (default: true) */
	clearReports: boolean;
	/**
	 * Commands run once before the first run, e.g. a clean build.
	 *
	 * ```ts
	 * defineConfig({ prepare: ['mvn clean'] });
	 * ```
	 */
	prepare: string[];
	/**
	 * Commands run before every run, e.g. resetting a database.
	 *
	 * ```ts
	 * defineConfig({
	 *   beforeEach: [
	 *     "mysql -u root -e 'DROP DATABASE IF EXISTS app'",
	 *     'mvn -f pom-data.xml process-test-classes',
	 *   ],
	 * });
	 * ```
	 */
	beforeEach: string[];
	/** Stop after this many consecutive crashed/timed-out runs, 0 = never (default: 0) */
	bail: number;
	/** Log the resolved configuration and extra detail (default: false) */
	debug: boolean;
}

/** Users provide a partial config -- everything has defaults */
export type UserConfig = Partial<FlakeprobeConfig>;

const DEFAULTS: FlakeprobeConfig = {
	command: 'mvn clean verify',
	cwd: '.',
	env: {},
	runs: 30,
	timeout: 40 * 60_000,
	killGrace: 5_000,
	outputDir: 'log',
	reportDirs: ['target/surefire-reports', 'target/failsafe-reports'],
	reportPattern: 'TEST-*.xml',
	clearReports: true,
	prepare: [],
	beforeEach: [],
	bail: 0,
	debug: false,
};

/** Longest delay a Node timer honours */
const MAX_TIMER_MS = 2_147_483_647;

const ConfigSchema = z
	.object({
		command: z.string().min(1),
		cwd: z.string().min(1),
		env: z.record(z.string()),
		runs: z.number().int().min(0),
		timeout: z.number().int().positive().max(MAX_TIMER_MS),
		killGrace: z.number().int().min(0).max(MAX_TIMER_MS),
		outputDir: z.string().min(1),
		reportDirs: z.array(z.string().min(1)).min(1),
		reportPattern: z.string().min(1),
		clearReports: z.boolean(),
		prepare: z.array(z.string().min(1)),
		beforeEach: z.array(z.string().min(1)),
		bail: z.number().int().min(0),
		debug: z.boolean(),
	})
	.strict();

const UserConfigSchema = ConfigSchema.partial();

/**
 * Define your Flakeprobe config with full type safety.
 * This function is optional -- it's just a type helper for your IDE.
 *
 * ```js
 * // flakeprobe.config.mjs
 * import { defineConfig } from 'flakeprobe';
 *
 * export default defineConfig({
 *   runs: 50,
 *   command: 'mvn verify -DskipSurefireTests',
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Merge config layers over the defaults and validate the result.
 * `undefined` values in a layer do not override earlier layers.
 *
 * @throws ConfigError when the merged config is invalid
 */
export function resolveConfig(...layers: Array<UserConfig | undefined>): FlakeprobeConfig {
	const merged: Record<string, unknown> = { ...DEFAULTS };
	for (const layer of layers) {
		if (!layer) continue;
		for (const [key, value] of Object.entries(layer)) {
			if (value !== undefined) merged[key] = value;
		}
	}

	const parsed = ConfigSchema.safeParse(merged);
	if (!parsed.success) {
		throw new ConfigError(formatIssues(parsed.error));
	}
	return parsed.data;
}

/**
 * Read FLAKEPROBE_* overrides from the environment.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): UserConfig {
	const config: UserConfig = {};

	if (env.FLAKEPROBE_RUNS) config.runs = Number(env.FLAKEPROBE_RUNS);
	if (env.FLAKEPROBE_TIMEOUT) config.timeout = Number(env.FLAKEPROBE_TIMEOUT);
	if (env.FLAKEPROBE_OUTPUT_DIR) config.outputDir = env.FLAKEPROBE_OUTPUT_DIR;

	return config;
}

// ---------------------------------------------------------------------------
// Config file loading
// ---------------------------------------------------------------------------

const CONFIG_CANDIDATES = ['flakeprobe.config.json', 'flakeprobe.config.js', 'flakeprobe.config.mjs'];

/**
 * Load the config file: the explicit path if given, otherwise the first
 * candidate found in `cwd`. Returns undefined when there is none.
 *
 * @throws ConfigError when the file cannot be loaded or has invalid keys
 */
export async function loadConfigFile(
	cwd: string,
	explicitPath?: string,
): Promise<{ path: string; config: UserConfig } | undefined> {
	let configPath: string | undefined;

	if (explicitPath) {
		configPath = resolve(cwd, explicitPath);
		if (!existsSync(configPath)) {
			throw new ConfigError([`config file not found: ${configPath}`]);
		}
	} else {
		configPath = CONFIG_CANDIDATES.map((name) => resolve(cwd, name)).find((p) => existsSync(p));
		if (!configPath) return undefined;
	}

	let raw: unknown;
	try {
		if (configPath.endsWith('.json')) {
			raw = JSON.parse(readFileSync(configPath, 'utf-8'));
		} else {
			const mod: unknown = await import(pathToFileURL(configPath).href);
			raw = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
		}
	} catch (err) {
		throw new ConfigError([err instanceof Error ? err.message : String(err)], configPath);
	}

	const parsed = UserConfigSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(formatIssues(parsed.error), configPath);
	}

	return { path: configPath, config: parsed.data };
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join('.');
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}
