import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, type ExperimentResult, FlakinessAggregator } from 'flakeprobe-runner';
import { type FakeRun, FakeSubject } from 'flakeprobe-runner/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { exitCodeFor, flagsToConfig, parseFlags, runCommand } from './run-command.js';

let cwd: string;

beforeEach(async () => {
	cwd = await mkdtemp(join(tmpdir(), 'flakeprobe-e2e-'));
});

afterEach(async () => {
	await rm(cwd, { recursive: true, force: true });
});

function loginReport(loginPasses: boolean): string {
	const failure = loginPasses
		? ''
		: '<failure message="expected:&lt;Welcome&gt; but was:&lt;Error&gt;" type="org.opentest4j.AssertionFailedError"/>';
	return `<?xml version="1.0" encoding="UTF-8"?>
<testsuite name="com.shop.LoginIT" tests="2">
  <testcase name="login_valid" classname="com.shop.LoginIT" time="1.5">${failure}</testcase>
  <testcase name="logout" classname="com.shop.LoginIT" time="0.5"/>
</testsuite>
`;
}

/** A subject that writes a Surefire report, like `mvn verify` would */
function writesReport(loginPasses: boolean): FakeRun {
	return {
		stdout: ['[INFO] BUILD SUCCESS\n'],
		exitCode: loginPasses ? 0 : 1,
		onStart: async () => {
			const reports = join(cwd, 'target', 'surefire-reports');
			await mkdir(reports, { recursive: true });
			await writeFile(join(reports, 'TEST-com.shop.LoginIT.xml'), loginReport(loginPasses));
		},
	};
}

const quiet = () => {};

async function artifact(name: string): Promise<string> {
	return readFile(join(cwd, 'out', name), 'utf-8');
}

describe('runCommand', () => {
	it('should find a test that fails in one of three runs', async () => {
		const fake = new FakeSubject((_cmd, call) => writesReport(call !== 1));

		const result = await runCommand(['--runs', '3', '--output', 'out'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		expect(exitCodeFor(result)).toBe(0);
		expect(result.completedRuns).toBe(3);
		expect(result.summary.totals).toEqual({
			'stable-passing': 1,
			'stable-failing': 0,
			flaky: 1,
			'never-observed': 0,
		});

		expect(await artifact('flaky_tests.csv')).toBe(
			'test_id,class_name,name,pass_count,fail_count,error_count,skip_count,total_observed\n' +
				'com.shop.LoginIT#login_valid,com.shop.LoginIT,login_valid,2,1,0,0,3\n',
		);
		expect(await artifact('failing_tests.csv')).toBe(
			'run_index,test_id,class_name,name,verdict,duration_ms,failure_category,failure_detail\n' +
				'1,com.shop.LoginIT#login_valid,com.shop.LoginIT,login_valid,fail,1500,assertion,' +
				'expected:<Welcome> but was:<Error>\n',
		);
		expect(await artifact('run-0.output.log')).toBe('[INFO] BUILD SUCCESS\n');
	});

	it('should record a crashed run and attribute no verdicts to it', async () => {
		const fake = new FakeSubject((_cmd, call) =>
			call === 1 ? { signal: 'SIGKILL' } : writesReport(true),
		);

		const result = await runCommand(['--runs', '3', '--output', 'out'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		expect(exitCodeFor(result)).toBe(0);
		expect(result.summary.totals['stable-passing']).toBe(2);
		for (const entry of result.summary.entries) {
			expect(entry.observations.map((o) => o.runIndex)).toEqual([0, 2]);
		}

		const buildStats = (await artifact('build_stats.csv')).trimEnd().split('\n');
		expect(buildStats).toHaveLength(4);
		expect(buildStats[2]?.split(',').slice(4, 9)).toEqual([
			'crashed',
			'',
			'SIGKILL',
			'0',
			'run-1.output.log',
		]);
		expect(await artifact('flaky_tests.csv')).toBe(
			'test_id,class_name,name,pass_count,fail_count,error_count,skip_count,total_observed\n',
		);
		expect(await artifact('flakiness_tests.log')).toContain(' WARNING Run 1 crashed (killed by SIGKILL).\n');
	});

	it('should exit 1 when no run completed', async () => {
		const fake = new FakeSubject(() => ({ signal: 'SIGSEGV' }));

		const result = await runCommand(['--runs', '2', '--output', 'out'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		expect(result.completedRuns).toBe(0);
		expect(exitCodeFor(result)).toBe(1);
	});

	it('should write header-only tables for zero runs', async () => {
		const fake = new FakeSubject();

		const result = await runCommand(['--runs', '0', '--output', 'out'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		expect(fake.calls).toHaveLength(0);
		expect(exitCodeFor(result)).toBe(0);
		expect(await artifact('failing_tests.csv')).toBe(
			'run_index,test_id,class_name,name,verdict,duration_ms,failure_category,failure_detail\n',
		);
		expect(await artifact('flakiness_tests.log')).toContain(
			' Finished 0 of 0 run(s): 0 ordinary, 0 non-zero, 0 crashed, 0 timed out.\n',
		);
	});

	it('should count a run without a report as observing nothing', async () => {
		const fake = new FakeSubject((_cmd, call) => (call === 0 ? { exitCode: 1 } : writesReport(true)));

		const result = await runCommand(['--runs', '2', '--output', 'out'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		expect(result.completedRuns).toBe(2);
		expect(result.summary.entries.map((e) => e.totalObserved)).toEqual([1, 1]);
		expect(await artifact('flakiness_tests.log')).toContain(
			' WARNING Run 0: No report files matching TEST-*.xml',
		);
	});

	it('should layer config file, environment and flags', async () => {
		await writeFile(
			join(cwd, 'flakeprobe.config.json'),
			JSON.stringify({ runs: 5, command: 'mvn -q verify', outputDir: 'out' }),
		);
		const fake = new FakeSubject(() => writesReport(true));

		await runCommand([], { cwd, env: { FLAKEPROBE_RUNS: '2' }, write: quiet, spawn: fake.spawn });
		expect(fake.calls.map((c) => c.command)).toEqual(['mvn -q verify', 'mvn -q verify']);

		const again = new FakeSubject(() => writesReport(true));
		await runCommand(['--runs', '1'], {
			cwd,
			env: { FLAKEPROBE_RUNS: '2' },
			write: quiet,
			spawn: again.spawn,
		});
		expect(again.calls).toHaveLength(1);
	});

	it('should log the resolved configuration with secrets redacted', async () => {
		await writeFile(
			join(cwd, 'flakeprobe.config.json'),
			JSON.stringify({ env: { DB_PASSWORD: 'test-password', MAVEN_OPTS: '-Xmx2g' } }),
		);
		const fake = new FakeSubject(() => writesReport(true));

		await runCommand(['--runs', '1', '--output', 'out', '--debug'], {
			cwd,
			env: {},
			write: quiet,
			spawn: fake.spawn,
		});

		const log = await artifact('flakiness_tests.log');
		expect(log).toContain('"env":{"DB_PASSWORD":"[REDACTED]","MAVEN_OPTS":"-Xmx2g"}');
		expect(log).not.toContain('test-password');
		expect(fake.calls[0]?.options.env?.DB_PASSWORD).toBe('test-password');
	});

	it('should reject bad options before running anything', async () => {
		const fake = new FakeSubject();

		await expect(
			runCommand(['--runs', '-2'], { cwd, env: {}, write: quiet, spawn: fake.spawn }),
		).rejects.toBeInstanceOf(ConfigError);
		expect(fake.calls).toHaveLength(0);
	});
});

describe('parseFlags', () => {
	it('should read every option', () => {
		const flags = parseFlags([
			'--runs',
			'10',
			'--command',
			'mvn verify',
			'--cwd',
			'../shop',
			'--timeout',
			'60000',
			'--output',
			'out',
			'--config',
			'ci.json',
			'--bail',
			'3',
			'--debug',
		]);

		expect(flags).toEqual({
			runs: 10,
			command: 'mvn verify',
			cwd: '../shop',
			timeout: 60000,
			output: 'out',
			config: 'ci.json',
			bail: 3,
			debug: true,
		});
		expect(flagsToConfig(flags)).toEqual({
			runs: 10,
			command: 'mvn verify',
			cwd: '../shop',
			timeout: 60000,
			outputDir: 'out',
			bail: 3,
			debug: true,
		});
	});

	it('should accept short aliases', () => {
		expect(parseFlags(['-n', '4', '-c', 'gradle test', '-o', 'out'])).toEqual({
			runs: 4,
			command: 'gradle test',
			output: 'out',
		});
	});

	it('should reject unknown options and missing values', () => {
		expect(() => parseFlags(['--rnus', '3'])).toThrow('unknown option: --rnus');
		expect(() => parseFlags(['--runs'])).toThrow('--runs needs a value');
		expect(() => parseFlags(['--output', '--debug'])).toThrow('--output needs a value');
	});
});

describe('exitCodeFor', () => {
	function result(overrides: Partial<ExperimentResult>): ExperimentResult {
		return {
			records: [],
			summary: new FlakinessAggregator().finalize(),
			runs: 3,
			cancelled: false,
			bailed: false,
			completedRuns: 3,
			duration: 0,
			...overrides,
		};
	}

	it('should map outcomes to exit codes', () => {
		expect(exitCodeFor(result({}))).toBe(0);
		expect(exitCodeFor(result({ completedRuns: 1, bailed: true }))).toBe(0);
		expect(exitCodeFor(result({ completedRuns: 0 }))).toBe(1);
		expect(exitCodeFor(result({ runs: 0, completedRuns: 0 }))).toBe(0);
		expect(exitCodeFor(result({ cancelled: true }))).toBe(130);
	});
});
