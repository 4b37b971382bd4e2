import type { SyncConfig } from './config';
import { loadConfig } from './config';
import type { Synchronizer } from './index';
import { connectSynchronizer } from './index';
import { describeError } from './shared/errors';

export const ACTIONS = ['sync_once', 'sync_forever', 'reset'] as const;
export type Action = (typeof ACTIONS)[number];

const USAGE = `column-index-sync - sync a Cassandra table and an Elasticsearch index

Usage:
  column-index-sync <config-file> <action>

Actions:
  sync_once      run one bidirectional pass
  sync_forever   run passes forever, resting intervalSeconds between them
  reset          reset the checkpoint so the next pass is a full resync`;

export interface CliDeps {
	load?: (path: string) => Promise<SyncConfig>;
	connect?: (config: SyncConfig) => Promise<Synchronizer>;
	out?: (line: string) => void;
	err?: (line: string) => void;
}

function isAction(value: string): value is Action {
	return ACTIONS.some((a) => a === value);
}

function parseArgs(args: readonly string[]): { help: true } | { help: false; configPath: string; action: Action } | { error: string } {
	if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') return { help: true };
	if (args.length !== 2) return { error: `Expected 2 arguments, got ${args.length}` };
	const [configPath = '', action = ''] = args;
	if (!isAction(action)) return { error: `Unknown action: ${action} (choose from ${ACTIONS.join(', ')})` };
	return { help: false, configPath, action };
}

/** Run the CLI with `args` (argv without node and script); resolves to the exit code. */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
	const out = deps.out ?? ((line: string) => console.log(line));
	const err = deps.err ?? ((line: string) => console.error(line));
	const parsed = parseArgs(args);
	if ('error' in parsed) {
		err(parsed.error);
		err(USAGE);
		return 1;
	}
	if (parsed.help) {
		out(USAGE);
		return 0;
	}

	let sync: Synchronizer | undefined;
	try {
		const config = await (deps.load ?? loadConfig)(parsed.configPath);
		sync = await (deps.connect ?? connectSynchronizer)(config);
		if (parsed.action === 'reset') await sync.engine.reset();
		else if (parsed.action === 'sync_once') await sync.scheduler.runOnce();
		else await sync.scheduler.runForever();
		return 0;
	} catch (e) {
		err(`Sync failed: ${describeError(e)}`);
		return 1;
	} finally {
		if (sync) {
			try {
				await sync.close();
			} catch (e) {
				err(`Closing connections failed: ${describeError(e)}`);
			}
		}
	}
}
